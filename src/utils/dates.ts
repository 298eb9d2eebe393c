const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(n: number) {
  return String(n).padStart(2, "0");
}

export function isoLocalDay(d = new Date()) {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

/** True for `YYYY-MM-DD` strings naming a real calendar day. */
export function isIsoDay(value: string): boolean {
  const m = ISO_DAY.exec(value);
  if (!m) return false;
  const y = Number(m[1]);
  const mo = Number(m[2]);
  const d = Number(m[3]);
  const dt = new Date(Date.UTC(y, mo - 1, d));
  return dt.getUTCFullYear() === y && dt.getUTCMonth() === mo - 1 && dt.getUTCDate() === d;
}

export function addDays(day: string, n: number): string {
  const m = ISO_DAY.exec(day);
  if (!m) throw new Error("INVALID_DATE");
  const dt = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]) + n));
  return `${dt.getUTCFullYear()}-${pad2(dt.getUTCMonth() + 1)}-${pad2(dt.getUTCDate())}`;
}

/** Half-open `[start, end)` day range covering one calendar month. */
export function monthRange(year: number, month: number): { start: string; end: string } {
  const start = `${year}-${pad2(month)}-01`;
  const end = month === 12 ? `${year + 1}-01-01` : `${year}-${pad2(month + 1)}-01`;
  return { start, end };
}

export function dayOfMonth(day: string): number {
  return Number(day.slice(8, 10));
}
