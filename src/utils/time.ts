const pad = (n: number, width = 2) => String(n).padStart(width, "0");

interface DateParts {
  year: number;
  month: number;
  day: number;
  hours: number;
  minutes: number;
  seconds: number;
}

function localParts(date: Date): DateParts {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hours: date.getHours(),
    minutes: date.getMinutes(),
    seconds: date.getSeconds()
  };
}

function utcParts(date: Date): DateParts {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hours: date.getUTCHours(),
    minutes: date.getUTCMinutes(),
    seconds: date.getUTCSeconds()
  };
}

function dateTime(p: DateParts): string {
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)} ${pad(p.hours)}:${pad(p.minutes)}:${pad(p.seconds)}`;
}

/** `YYYYMMDD-HHMMSS` in local time. */
export function compactLocalStamp(date: Date): string {
  const p = localParts(date);
  return `${pad(p.year, 4)}${pad(p.month)}${pad(p.day)}-${pad(p.hours)}${pad(p.minutes)}${pad(p.seconds)}`;
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function localDateTime(date: Date): string {
  return dateTime(localParts(date));
}

/**
 * `YYYY-MM-DD HH:MM:SS` (UTC) for an epoch-seconds value, or undefined when
 * the value is missing, fractional or outside the representable date range.
 */
export function epochSecondsToUtc(seconds: number | undefined): string | undefined {
  if (seconds === undefined || !Number.isSafeInteger(seconds)) return undefined;
  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime())) return undefined;
  return dateTime(utcParts(date));
}
