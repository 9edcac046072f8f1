/**
 * UTC timestamps with one-second resolution, e.g. "2024-03-05T14:07:09Z".
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/**
 * Compare two timestamps; negative when a is earlier than b.
 */
export function compareTimestamps(a: string, b: string): number {
  return Date.parse(a) - Date.parse(b);
}

/**
 * The later of the current and the given timestamp, so a clock running
 * backwards never moves a stored timestamp into the past.
 */
export function advanceTimestamp(current: string | undefined, clock: Clock): string {
  const now = formatTimestamp(clock());
  if (current !== undefined && compareTimestamps(current, now) > 0) {
    return current;
  }
  return now;
}
