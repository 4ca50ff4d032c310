/**
 * Due-date parsing. Everything is normalised to a yyyy-MM-dd calendar date.
 * Accepts ISO dates plus: today, tomorrow, yesterday, relative (+3d/+2w/+1m),
 * day-of-week names (mon-sunday) and month+day (jan15).
 */

const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

/** Format a Date as yyyy-MM-dd (local time) */
export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

/** Local midnight of the given instant */
function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

/** The local calendar date of `now` as yyyy-MM-dd */
export function todayString(now: Date = new Date()): string {
  return formatDate(now);
}

/** True for a yyyy-MM-dd string naming a real calendar day (rejects 2026-02-30) */
export function isIsoDate(input: string): boolean {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]) - 1;
  const day = Number(m[3]);
  const d = new Date(year, month, day);
  return d.getFullYear() === year && d.getMonth() === month && d.getDate() === day;
}

/** Shift a yyyy-MM-dd date by a number of days */
export function shiftDate(isoDate: string, days: number): string {
  const [y, m, d] = isoDate.split('-').map(Number);
  return formatDate(addDays(new Date(y ?? 0, (m ?? 1) - 1, d ?? 1), days));
}

function tryParseRelative(input: string, today: Date): string | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const count = parseInt(m[1] ?? '0', 10);
  switch (m[2]) {
    case 'd': return formatDate(addDays(today, count));
    case 'w': return formatDate(addDays(today, count * 7));
    case 'm': return formatDate(addMonths(today, count));
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): string | null {
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let daysUntil = (target - today.getDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // next week if today
  return formatDate(addDays(today, daysUntil));
}

function tryParseMonthDay(input: string, today: Date): string | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m) return null;

  const month = MONTH_MAP[m[1] ?? ''];
  if (month === undefined) return null;
  const day = parseInt(m[2] ?? '0', 10);

  const candidate = new Date(today.getFullYear(), month, day);
  if (candidate.getMonth() !== month || candidate.getDate() !== day) {
    return null; // e.g. feb30
  }

  // Already passed this year: next year
  if (formatDate(candidate) < formatDate(today)) {
    candidate.setFullYear(candidate.getFullYear() + 1);
  }
  return formatDate(candidate);
}

/**
 * Parse a human-friendly date string into yyyy-MM-dd format.
 * Returns null if the input can't be parsed.
 *
 * @param input - e.g. "today", "+3d", "friday", "jan15", "2026-03-01"
 * @param now - Override "today" for testing
 */
export function parseDate(input: string | null | undefined, now: Date = new Date()): string | null {
  if (!input?.trim()) return null;

  const today = startOfDay(now);
  const normalized = input.trim().toLowerCase();
  const parsed = parseNormalized(normalized, today);

  // Huge offsets overflow into 5-digit or NaN years
  return parsed !== null && isIsoDate(parsed) ? parsed : null;
}

function parseNormalized(input: string, today: Date): string | null {
  switch (input) {
    case 'today': return formatDate(today);
    case 'tomorrow': return formatDate(addDays(today, 1));
    case 'yesterday': return formatDate(addDays(today, -1));
    default:
      return tryParseRelative(input, today)
        ?? tryParseDayOfWeek(input, today)
        ?? tryParseMonthDay(input, today)
        ?? input;
  }
}
