/**
 * Record identity: the first identity field present on a record wins; records
 * without one are identified by their content
 */

import crypto from "crypto";
import type {
  Identifier,
  IdentityKey,
  NormalizedRecord,
  NormalizedValue,
} from "../../types/data-model.js";

const NUMERIC_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const EMAIL_SHAPE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Build the identifier of a record from a priority list of identity fields.
 * A field counts when its value is present, non-null and not the empty string.
 */
export function buildIdentifier(
  record: NormalizedRecord,
  priority: readonly string[],
): Identifier | null {
  for (const field of priority) {
    if (!Object.hasOwn(record, field)) continue;
    const value = record[field];
    if (value === undefined || value === null || value === "") continue;
    return { [field]: value };
  }
  return null;
}

/**
 * Type-independent text of a value: 7, "7" and "7.0" agree, and so do
 * email addresses that differ only in case
 */
export function canonicalValue(value: NormalizedValue): string | null {
  if (value === null) return null;
  if (typeof value !== "string") return String(value);

  const text = value.trim();
  if (NUMERIC_TEXT.test(text)) {
    const parsed = Number(text);
    if (Number.isFinite(parsed)) return String(parsed);
  }
  if (EMAIL_SHAPE.test(text)) return text.toLowerCase();
  return text;
}

/**
 * Identity key of a record. Identity fields give `key:["field","value"]`;
 * records without one get a digest of every field.
 */
export function identityKey(record: NormalizedRecord, identifier: Identifier | null): IdentityKey {
  if (identifier) {
    const [entry] = Object.entries(identifier);
    if (entry) {
      const [field, value] = entry;
      return `key:${JSON.stringify([field, canonicalValue(value)])}`;
    }
  }

  const content = Object.keys(record)
    .sort()
    .map((field) => [field, canonicalValue(record[field] ?? null)]);
  const digest = crypto.createHash("sha256").update(JSON.stringify(content)).digest("hex");
  return `content:${digest}`;
}
