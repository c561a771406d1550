/**
 * Best-effort date-time recognition
 *
 * Accepts the common shapes found in exported spreadsheets and logs and
 * normalises them to `YYYY-MM-DD HH:MM:SS`. Time zone designators are
 * accepted but ignored: the wall-clock time is kept as written.
 */

export interface DateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const MONTH_NAMES = [
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

const TIME = String.raw`(\d{1,2}):(\d{1,2})(?::(\d{1,2})(?:\.\d+)?)?(?:\s*([ap]m))?`;
const ZONE = String.raw`(?:\s*(?:z|utc|gmt|[+-]\d{2}(?::?\d{2})?))?`;
const WEEKDAY = String.raw`(?:(?:mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?,?\s+)?`;
const ORDINAL = String.raw`(?:st|nd|rd|th)?`;

const YEAR_FIRST = new RegExp(
  String.raw`^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})(?:(?:t|\s+)${TIME})?${ZONE}$`,
  "i"
);
const MONTH_FIRST = new RegExp(
  String.raw`^(\d{1,2})([-/.])(\d{1,2})\2(\d{4}|\d{2})(?:(?:t|\s+)${TIME})?${ZONE}$`,
  "i"
);
const COMPACT = /^(\d{4})(\d{2})(\d{2})(?:t?(\d{2})(\d{2})(\d{2})?)?$/i;
const NAMED_MONTH_FIRST = new RegExp(
  String.raw`^${WEEKDAY}([a-z]+)\.?\s+(\d{1,2})${ORDINAL},?\s+(\d{4})(?:,?\s+${TIME})?${ZONE}$`,
  "i"
);
const NAMED_DAY_FIRST = new RegExp(
  String.raw`^${WEEKDAY}(\d{1,2})${ORDINAL}\s+([a-z]+)\.?,?\s+(\d{4})(?:,?\s+${TIME})?${ZONE}$`,
  "i"
);

/**
 * Parse a date-time string, returning null when it is not recognised or
 * names an impossible calendar value
 */
export function parseDateTime(text: string): DateTimeParts | null {
  const value = text.trim();
  if (!value) return null;

  return (
    parseYearFirst(value) ??
    parseMonthFirst(value) ??
    parseCompact(value) ??
    parseNamedMonth(value)
  );
}

/**
 * Render parts as `YYYY-MM-DD HH:MM:SS`
 */
export function formatDateTime(parts: DateTimeParts): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return (
    `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)} ` +
    `${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`
  );
}

function parseYearFirst(value: string): DateTimeParts | null {
  const match = YEAR_FIRST.exec(value);
  if (!match) return null;
  const [, year, , month, day, hour, minute, second, meridiem] = match;
  return build(toInt(year), toInt(month), toInt(day), hour, minute, second, meridiem);
}

function parseMonthFirst(value: string): DateTimeParts | null {
  const match = MONTH_FIRST.exec(value);
  if (!match) return null;
  const [, first, , second, yearText, hour, minute, sec, meridiem] = match;

  let month = toInt(first);
  let day = toInt(second);
  // Day-first only when the leading number cannot be a month
  if (month > 12 && day <= 12) {
    [month, day] = [day, month];
  }

  const year = yearText?.length === 2 ? expandTwoDigitYear(toInt(yearText)) : toInt(yearText);
  return build(year, month, day, hour, minute, sec, meridiem);
}

function parseCompact(value: string): DateTimeParts | null {
  const match = COMPACT.exec(value);
  if (!match) return null;
  const [, year, month, day, hour, minute, second] = match;
  return build(toInt(year), toInt(month), toInt(day), hour, minute, second, undefined);
}

function parseNamedMonth(value: string): DateTimeParts | null {
  const monthFirst = NAMED_MONTH_FIRST.exec(value);
  if (monthFirst) {
    const [, name, day, year, hour, minute, second, meridiem] = monthFirst;
    const month = monthFromName(name);
    if (month === null) return null;
    return build(toInt(year), month, toInt(day), hour, minute, second, meridiem);
  }

  const dayFirst = NAMED_DAY_FIRST.exec(value);
  if (dayFirst) {
    const [, day, name, year, hour, minute, second, meridiem] = dayFirst;
    const month = monthFromName(name);
    if (month === null) return null;
    return build(toInt(year), month, toInt(day), hour, minute, second, meridiem);
  }

  return null;
}

/**
 * Month number for a full or abbreviated (3+ letters) English month name
 */
function monthFromName(name: string | undefined): number | null {
  if (!name || name.length < 3) return null;
  const lower = name.toLowerCase();
  const index = MONTH_NAMES.findIndex((full) => full.startsWith(lower));
  return index === -1 ? null : index + 1;
}

/**
 * Two-digit years land within fifty years of the current year
 */
function expandTwoDigitYear(twoDigit: number, now = new Date()): number {
  const currentYear = now.getFullYear();
  let year = currentYear - (currentYear % 100) + twoDigit;
  if (year >= currentYear + 50) {
    year -= 100;
  } else if (year < currentYear - 50) {
    year += 100;
  }
  return year;
}

function build(
  year: number,
  month: number,
  day: number,
  hourText: string | undefined,
  minuteText: string | undefined,
  secondText: string | undefined,
  meridiem: string | undefined
): DateTimeParts | null {
  let hour = hourText === undefined ? 0 : toInt(hourText);
  const minute = minuteText === undefined ? 0 : toInt(minuteText);
  const second = secondText === undefined ? 0 : toInt(secondText);

  if (meridiem) {
    if (hour < 1 || hour > 12) return null;
    const pm = meridiem.toLowerCase() === "pm";
    if (pm && hour < 12) hour += 12;
    if (!pm && hour === 12) hour = 0;
  }

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  return { year, month, day, hour, minute, second };
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function toInt(text: string | undefined): number {
  return text === undefined ? Number.NaN : Number.parseInt(text, 10);
}
