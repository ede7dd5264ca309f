/**
 * @fileoverview Date and time utility functions.
 * Parses and renders listing and snapshot timestamps, and formats durations.
 */

import { format, formatDuration, intervalToDuration, isValid, parse, parseISO } from 'date-fns';

/**
 * Layout of the date and time fields of a listing line (local time).
 */
const LISTING_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/**
 * Layout of timestamps stored in cache snapshots (ISO-8601 local date-time).
 */
const SNAPSHOT_TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

/**
 * Parses the date and time fields of a listing line.
 * Any sub-second fraction on the time field is dropped before parsing.
 *
 * @param dateField - Date in `YYYY-MM-DD` form
 * @param timeField - Time in `HH:MM:SS[.fraction]` form
 * @returns The local timestamp, or undefined if either field is malformed
 */
export function parseListingTimestamp(dateField: string, timeField: string): Date | undefined {
  const [wholeSeconds] = timeField.split('.');
  const timestamp = parse(`${dateField} ${wholeSeconds}`, LISTING_TIMESTAMP_FORMAT, new Date(0));
  return isValid(timestamp) ? timestamp : undefined;
}

/**
 * Renders a timestamp as the date and time fields of a listing line.
 */
export function formatListingTimestamp(timestamp: Date): string {
  return format(timestamp, LISTING_TIMESTAMP_FORMAT);
}

/**
 * Renders a timestamp for storage in a cache snapshot.
 */
export function formatSnapshotTimestamp(timestamp: Date): string {
  return format(timestamp, SNAPSHOT_TIMESTAMP_FORMAT);
}

/**
 * Parses a timestamp read back from a cache snapshot.
 *
 * @returns The timestamp, or undefined if the string is not an ISO-8601 date-time
 */
export function parseSnapshotTimestamp(value: string): Date | undefined {
  const timestamp = parseISO(value);
  return isValid(timestamp) ? timestamp : undefined;
}

/**
 * Formats the time difference between start and end timestamps into a human-readable duration string.
 * Uses date-fns to create a natural language representation of the duration.
 *
 * @param startTimestampMs - Start timestamp in milliseconds
 * @param endTimestampMs - End timestamp in milliseconds
 * @returns Human-readable duration string (e.g., "1 hour 2 minutes 3 seconds")
 */
export function formatTimeBetween(startTimestampMs: number, endTimestampMs: number): string {
  const duration = intervalToDuration({
    start: 0,
    end: endTimestampMs - startTimestampMs,
  });

  return formatDuration(duration, {
    format: ['hours', 'minutes', 'seconds'],
    zero: false,
    delimiter: ' ',
  });
}
