/**
 * Structural schema comparison: same field names, same type per field.
 * Sample values and field order do not take part.
 */

import crypto from "crypto";
import type { FieldType, Schema } from "../../types/data-model.js";

export type SchemaProjection = Array<[field: string, type: FieldType]>;

export function projectSchema(schema: Schema): SchemaProjection {
  return Object.entries(schema)
    .map(([field, { type }]): [string, FieldType] => [field, type])
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function schemasEqual(a: Schema, b: Schema): boolean {
  const left = projectSchema(a);
  const right = projectSchema(b);
  if (left.length !== right.length) {
    return false;
  }
  return left.every(([field, type], index) => {
    const other = right[index];
    return other !== undefined && other[0] === field && other[1] === type;
  });
}

/**
 * Stable SHA-256 of the projection, for logs and run reports
 */
export function schemaFingerprint(schema: Schema): string {
  return crypto
    .createHash("sha256")
    .update(JSON.stringify(projectSchema(schema)))
    .digest("hex");
}
