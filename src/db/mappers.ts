/**
 * Column conversions. `pg` returns NUMERIC and BIGINT columns as strings.
 */

import type { FeedMarker } from "../types/risk";
import { DataIntegrityError } from "../utils/errors";

export type NumericColumn = string | number;

export function toNumber(value: NumericColumn): number {
  return typeof value === "number" ? value : Number(value);
}

export function toNullableNumber(value: NumericColumn | null): number | null {
  return value === null ? null : toNumber(value);
}

export function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

/**
 * Narrow a stored enum column
 *
 * @throws DataIntegrityError when the value is not a member
 */
export function toEnumValue<T extends string>(
  value: string,
  isMember: (candidate: string) => candidate is T,
  column: string
): T {
  if (!isMember(value)) {
    throw new DataIntegrityError(`Stored ${column} has unknown value ${value}`, null, { [column]: value });
  }
  return value;
}

function isMarker(value: unknown): value is FeedMarker {
  return (
    typeof value === "object" &&
    value !== null &&
    "timestamp" in value &&
    "transactionId" in value &&
    Number.isFinite(value.timestamp) &&
    Number.isInteger(value.transactionId)
  );
}

/**
 * Parse a JSONB array of feed markers
 *
 * @throws DataIntegrityError on anything else
 */
export function toMarkerList(value: unknown, column: string): FeedMarker[] {
  if (!Array.isArray(value) || !value.every(isMarker)) {
    throw new DataIntegrityError(`Stored ${column} is not a list of feed markers`, null, { [column]: value });
  }
  return value.map((marker) => ({ timestamp: marker.timestamp, transactionId: marker.transactionId }));
}
