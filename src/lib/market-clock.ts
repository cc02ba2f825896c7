/**
 * Exchange-local time-of-day helpers. Session cutoffs are expressed as
 * "HH:MM" in the exchange's timezone; timestamps are ISO strings in any zone.
 */

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let f = formatters.get(timeZone);
  if (!f) {
    f = new Intl.DateTimeFormat('en-GB', {
      timeZone,
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, f);
  }
  return f;
}

/** Minutes after local midnight in `timeZone`. */
export function minutesOfDay(timestamp: string | Date, timeZone: string): number {
  const d = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  let hour = 0;
  let minute = 0;
  for (const part of formatterFor(timeZone).formatToParts(d)) {
    if (part.type === 'hour') hour = Number(part.value);
    if (part.type === 'minute') minute = Number(part.value);
  }
  return hour * 60 + minute;
}

/** "09:30" → 570. Throws on a malformed value; only called on validated config. */
export function parseClock(hhmm: string): number {
  const match = /^(\d{1,2}):(\d{2})$/.exec(hhmm.trim());
  if (!match) throw new Error(`Invalid clock time "${hhmm}" (expected HH:MM)`);
  const h = Number(match[1]);
  const m = Number(match[2]);
  if (h > 23 || m > 59) throw new Error(`Invalid clock time "${hhmm}"`);
  return h * 60 + m;
}

export function isAtOrAfter(timestamp: string, hhmm: string, timeZone: string): boolean {
  return minutesOfDay(timestamp, timeZone) >= parseClock(hhmm);
}

export function isWithinWindow(timestamp: string, start: string, end: string, timeZone: string): boolean {
  const now = minutesOfDay(timestamp, timeZone);
  return now >= parseClock(start) && now <= parseClock(end);
}

/** Local calendar date (YYYY-MM-DD) of a timestamp in `timeZone`. */
export function localDate(timestamp: string | Date, timeZone: string): string {
  const d = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  return new Intl.DateTimeFormat('en-CA', { timeZone, year: 'numeric', month: '2-digit', day: '2-digit' }).format(d);
}

export function minutesBetween(earlier: string, later: string): number {
  return (new Date(later).getTime() - new Date(earlier).getTime()) / 60_000;
}
