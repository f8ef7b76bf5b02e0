const DAY_MS = 86_400_000;

const ISO_LIKE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

const LONG_DATE =
  /(January|February|March|April|May|June|July|August|September|October|November|December)\s+(\d{1,2}),\s*(\d{4})\s*$/i;

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

function validDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function offsetMinutes(zone: string | undefined): number | null {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const m = /^([+-])(\d{2}):?(\d{2})$/.exec(zone);
  if (!m) return null;
  const sign = m[1] === "-" ? -1 : 1;
  return sign * (Number(m[2]) * 60 + Number(m[3]));
}

/**
 * Parses a raw review timestamp into an instant. Zone-less values are read as UTC,
 * so the result never depends on the host's local time zone.
 */
export function parseTimestamp(raw: string | null | undefined): Date | null {
  if (typeof raw !== "string") return null;
  const s = raw.trim();
  if (!s) return null;

  const iso = ISO_LIKE.exec(s);
  if (iso) {
    const [, y, mo, d, hh, mm, ss, frac, zone] = iso;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    if (!validDate(year, month, day)) return null;
    const hours = hh ? Number(hh) : 0;
    const minutes = mm ? Number(mm) : 0;
    const seconds = ss ? Number(ss) : 0;
    if (hours > 23 || minutes > 59 || seconds > 59) return null;
    const millis = frac ? Math.floor(Number(`0.${frac}`) * 1000) : 0;
    const offset = offsetMinutes(zone);
    if (offset === null) return null;
    const utc = Date.UTC(year, month - 1, day, hours, minutes, seconds, millis) - offset * 60_000;
    return new Date(utc);
  }

  const long = LONG_DATE.exec(s);
  if (long) {
    const month = MONTHS.indexOf(long[1].toLowerCase()) + 1;
    const day = Number(long[2]);
    const year = Number(long[3]);
    if (!validDate(year, month, day)) return null;
    return new Date(Date.UTC(year, month - 1, day));
  }

  return null;
}

export function floorToMinute(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 60_000) * 60_000);
}

export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Monday (UTC) of the week containing `date`, as YYYY-MM-DD. */
export function weekStartKey(date: Date): string {
  const midnight = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  const sinceMonday = (date.getUTCDay() + 6) % 7;
  return toDateKey(new Date(midnight - sinceMonday * DAY_MS));
}

/** Shifts a YYYY-MM-DD key by whole days. */
export function addDays(dateKey: string, days: number): string {
  const [y, m, d] = dateKey.split("-").map(Number);
  return toDateKey(new Date(Date.UTC(y, m - 1, d) + days * DAY_MS));
}
