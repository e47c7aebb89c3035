/**
 * Date helpers
 *
 * Game dates are Eastern calendar dates (YYYY-MM-DD) because that is how the
 * league schedules and box scores are keyed. Plain string comparison of these
 * dates is chronological.
 */

const EASTERN = 'America/New_York';

const easternDateFormat = new Intl.DateTimeFormat('en-CA', {
  timeZone: EASTERN,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
});

const easternTimeFormat = new Intl.DateTimeFormat('en-US', {
  timeZone: EASTERN,
  weekday: 'short',
  month: 'short',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  hour12: true,
});

/**
 * ET calendar date for an instant, YYYY-MM-DD
 */
export function easternDate(instant: Date): string {
  return easternDateFormat.format(instant);
}

/**
 * ET calendar date of an ISO timestamp, or null if it does not parse
 */
export function easternDateOfIso(iso: string): string | null {
  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime())) return null;
  return easternDate(parsed);
}

/**
 * Display label like "Tue, Oct 21 • 07:30 PM ET"
 */
export function formatGameTime(iso: string): string {
  const parsed = new Date(iso);
  if (!iso || Number.isNaN(parsed.getTime())) return 'TBD';

  const parts = Object.fromEntries(
    easternTimeFormat.formatToParts(parsed).map(p => [p.type, p.value])
  );
  return `${parts.weekday}, ${parts.month} ${parts.day} • ${parts.hour}:${parts.minute} ${parts.dayPeriod} ET`;
}

/**
 * UTC calendar date, YYYY-MM-DD
 */
export function utcDate(instant: Date): string {
  return instant.toISOString().split('T')[0];
}

/**
 * Shift a YYYY-MM-DD date by whole days
 */
export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return utcDate(d);
}

export const sleep = (ms: number): Promise<void> =>
  ms > 0 ? new Promise(resolve => setTimeout(resolve, ms)) : Promise.resolve();
