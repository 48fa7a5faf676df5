import ms from 'ms';

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;

// Stored durations carry whole seconds
function toWholeSeconds(durationMs: number): number {
  return Math.round(durationMs / SECOND_MS) * SECOND_MS;
}

/**
 * Stay length used when the entered text names no recognised unit.
 */
export const DEFAULT_VISIT_DURATION_MS = 30 * MINUTE_MS;

const COLON_FORM = /(\d+):([0-5]\d)(?!\d)/;
const NUMBER_WITH_UNIT = /(\d+(?:\.\d+)?)\s*([a-z]*)/;

/**
 * Convert an operator-entered stay length into milliseconds.
 *
 * Accepted forms (case-insensitive):
 * - "1:30" → 1 h 30 min
 * - "<number> <unit>" where unit starts with "h" (h, hr, hrs, hour, hours)
 *   or "m" (m, min, mins, minute, minutes); decimals allowed ("1.5 hours")
 *
 * Fractions are rounded to whole seconds. Never throws. Text with no number, or whose first number is not followed
 * by an hour/minute unit, yields DEFAULT_VISIT_DURATION_MS. This hides
 * operator typos ("1 hoor" is read as hours, "ten minutes" as the default),
 * which is accepted so that issuing a visit never fails on its duration.
 */
export function parseDuration(input: string): number {
  const text = input.trim().toLowerCase();

  const colon = COLON_FORM.exec(text);
  if (colon) {
    return (
      parseInt(colon[1], 10) * HOUR_MS + parseInt(colon[2], 10) * MINUTE_MS
    );
  }

  const match = NUMBER_WITH_UNIT.exec(text);
  if (!match) {
    return DEFAULT_VISIT_DURATION_MS;
  }

  const amount = parseFloat(match[1]);
  const unit = match[2];

  if (unit.startsWith('h')) {
    return toWholeSeconds(amount * HOUR_MS);
  }
  if (unit.startsWith('m')) {
    return toWholeSeconds(amount * MINUTE_MS);
  }

  return DEFAULT_VISIT_DURATION_MS;
}

const ISO_DURATION =
  /^P(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/**
 * Milliseconds → ISO-8601 duration ("PT1H30M"), whole seconds.
 */
export function toIsoDuration(durationMs: number): string {
  const totalSeconds = Math.max(0, Math.round(durationMs / SECOND_MS));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (totalSeconds === 0) {
    return 'PT0S';
  }

  return (
    'PT' +
    (hours ? `${hours}H` : '') +
    (minutes ? `${minutes}M` : '') +
    (seconds ? `${seconds}S` : '')
  );
}

/**
 * ISO-8601 duration → milliseconds. Returns null for anything that is not
 * a day/time duration.
 */
export function fromIsoDuration(value: string): number | null {
  const text = value.trim().toUpperCase();
  const match = ISO_DURATION.exec(text);
  if (!match || text === 'P' || text.endsWith('T')) {
    return null;
  }

  const [, days, hours, minutes, seconds] = match;
  const total =
    parseFloat(days ?? '0') * 24 * HOUR_MS +
    parseFloat(hours ?? '0') * HOUR_MS +
    parseFloat(minutes ?? '0') * MINUTE_MS +
    parseFloat(seconds ?? '0') * SECOND_MS;

  return Math.round(total);
}

/**
 * Human label for countdowns ("25 minutes", "1 hour").
 */
export function formatDuration(durationMs: number): string {
  return ms(Math.max(0, durationMs), { long: true });
}
