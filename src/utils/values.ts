/**
 * Value comparison helpers shared by deduplication and change tracking
 */

import type { NormalizedRecord, NormalizedValue } from "../types/data-model.js";

/**
 * Field present on a record; an explicit null counts as present
 */
export function hasField(record: NormalizedRecord, field: string): boolean {
  return Object.hasOwn(record, field) && record[field] !== undefined;
}

/**
 * Numbers and numeric strings as numbers, anything else null
 */
export function asNumber(value: NormalizedValue | undefined): number | null {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Strict equality, except that a number equals a numeric string of the same
 * value (a field can resolve to string in one upload and integer in another)
 */
export function valuesEqual(a: NormalizedValue | undefined, b: NormalizedValue | undefined): boolean {
  if (a === b) return true;
  if (typeof a !== "number" && typeof b !== "number") return false;
  const left = asNumber(a);
  const right = asNumber(b);
  return left !== null && right !== null && left === right;
}
