/**
 * Utility functions for time parsing, formatting, and waiting.
 */

// Constants for time units in milliseconds
export enum Time {
  Second = 1000,
  Minute = 60 * 1000,
  Hour = 60 * 60 * 1000,
  Day = 24 * 60 * 60 * 1000,
}

/**
 * Parses a duration into milliseconds. Accepts a single unit time string
 * (e.g. "5s", "2m", "1h", "1d") or a plain number of milliseconds ("250").
 */
export function parseTime(timeStr: string): number {
  const trimmed = timeStr.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  const match = trimmed.match(/^(\d+)(ms|s|m|h|d)$/);
  if (!match) {
    throw new Error(`Invalid time format: ${timeStr}`);
  }
  const value = parseInt(match[1], 10);
  const unit = match[2];
  switch (unit) {
    case 'ms':
      return value;
    case 's':
      return value * Time.Second;
    case 'm':
      return value * Time.Minute;
    case 'h':
      return value * Time.Hour;
    case 'd':
      return value * Time.Day;
    default:
      throw new Error(`Unknown time unit: ${unit}`);
  }
}

/**
 * Formats a duration in seconds to a human-readable text string.
 * Shows at most two units (e.g. "1h 30m", "45s").
 */
export function formatDurationAsText(seconds: number): string {
  if (seconds < 0) {
    return 'Invalid input';
  }
  if (seconds < 60) {
    return seconds % 1 === 0 ? `${seconds}s` : `${seconds.toFixed(2)}s`;
  }

  const timeUnits = [
    { unit: 'd', secondsInUnit: 86400 },
    { unit: 'h', secondsInUnit: 3600 },
    { unit: 'm', secondsInUnit: 60 },
    { unit: 's', secondsInUnit: 1 },
  ];

  let remainingSeconds = seconds;
  const parts: string[] = [];

  for (const { unit, secondsInUnit } of timeUnits) {
    if (remainingSeconds >= secondsInUnit) {
      const value = Math.floor(remainingSeconds / secondsInUnit);
      parts.push(`${value}${unit}`);
      remainingSeconds %= secondsInUnit;
    }
  }

  return parts.slice(0, 2).join(' ');
}

/**
 * Returns a human-readable string of the time elapsed since a given point.
 * @param point The starting timestamp in milliseconds (e.g. from Date.now())
 */
export function getTimeTakenSincePoint(point: number): string {
  const duration = Date.now() - point;
  if (duration < 1000) {
    return `${duration.toFixed(2)}ms`;
  }
  return formatDurationAsText(duration / 1000);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
