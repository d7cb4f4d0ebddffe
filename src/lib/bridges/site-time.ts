/**
 * Site-Local Forecast Labels
 *
 * Forecast timestamps are UTC; the charts label them in the bridge site's
 * local time. Uses built-in Intl APIs for DST-safe timezone handling.
 * All Texas bridge sites use America/Chicago.
 */

export const DEFAULT_SITE_TIMEZONE = 'America/Chicago';

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      weekday: 'short',
      month: 'short',
      day: '2-digit',
      hour: '2-digit',
      hour12: true,
      timeZoneName: 'short',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Throws RangeError for an unknown IANA zone, like Intl itself.
 */
export function assertTimeZone(timeZone: string): void {
  getFormatter(timeZone);
}

/**
 * Format a UTC instant as "Sun, Feb 04 01PM CST" in the site timezone.
 */
export function formatSiteTime(date: Date, timeZone: string = DEFAULT_SITE_TIMEZONE): string {
  const parts = getFormatter(timeZone).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('weekday')}, ${part('month')} ${part('day')} ${part('hour')}${part('dayPeriod')} ${part('timeZoneName')}`;
}

/**
 * Slider label for a forecast step: step 0 is "+1hr".
 */
export function formatStepLabel(step: number, timestamp: string, timeZone: string = DEFAULT_SITE_TIMEZONE): string {
  return `+${step + 1}hr: ${formatSiteTime(new Date(timestamp), timeZone)}`;
}
