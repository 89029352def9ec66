const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, sept: 9, oct: 10, nov: 11, dec: 12,
};

const ISO_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const US_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const LONG_RE = /^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/;

/** Cell values that mean "not stated". */
const BLANK_VALUES = new Set(['', 'n/a', 'na', '-', '--', '—']);

export function isBlank(raw: string | null | undefined): boolean {
  return raw == null || BLANK_VALUES.has(raw.trim().toLowerCase());
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Builds YYYY-MM-DD, or null if the parts do not name a real calendar day. */
export function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Parses the date formats dividend pages use:
 * '2024-01-15', '01/15/2024', 'Jan 15, 2024', 'January 15, 2024'.
 */
export function parseDate(raw: string): string | null {
  const text = raw.trim().replace(/\s+/g, ' ');

  let m = ISO_RE.exec(text);
  if (m) return toIsoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = US_RE.exec(text);
  if (m) return toIsoDate(Number(m[3]), Number(m[1]), Number(m[2]));

  m = LONG_RE.exec(text);
  if (m) {
    const name = (m[1] ?? '').toLowerCase();
    const month = MONTHS[name.slice(0, 4)] ?? MONTHS[name.slice(0, 3)];
    if (month === undefined) return null;
    return toIsoDate(Number(m[3]), month, Number(m[2]));
  }

  return null;
}

const AMOUNT_RE = /^(-?)\$?\s*(\d{1,3}(?:,\d{3})*|\d*)(\.\d+)?$/;

/** '$0.25' → 0.25, '$1,234.5' → 1234.5. The whole cell must be the amount. */
export function parseAmount(raw: string): number | null {
  const m = AMOUNT_RE.exec(raw.trim());
  if (!m) return null;
  const whole = (m[2] ?? '').replace(/,/g, '');
  const fraction = m[3] ?? '';
  if (!whole && !fraction) return null;
  return Number(`${m[1] ?? ''}${whole || '0'}${fraction}`);
}

