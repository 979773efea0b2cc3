// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Stable identifier (area ids, sensor entity ids)
 */
export type Id = string;

/**
 * A raw reading as reported by the host platform.
 * `null` means the platform had no value at all.
 */
export type RawValue = string | number | boolean | null;

/**
 * Inclusive-exclusive time span in epoch milliseconds.
 */
export type TimeSpan = {
  start: number;
  end: number;
};
