/**
 * Field type resolution for conflicting observations
 * The outcome depends only on which types were seen, never on record order
 */

import { FIELD_TYPE_PRIORITY, type FieldType } from "../../types/data-model.js";
import type { FieldObservation } from "./types.js";

const NUMERIC_TYPES: ReadonlySet<FieldType> = new Set(["integer", "float"]);

export function createObservation(): FieldObservation {
  return {
    types: new Set<FieldType>(),
    ambiguousCount: 0,
    nullCount: 0,
    presentCount: 0,
    samples: [],
  };
}

/**
 * True when a field saw more than one non-null type
 */
export function hasConflict(observation: FieldObservation): boolean {
  const kinds = observation.types.size + (observation.ambiguousCount > 0 ? 1 : 0);
  return kinds > 1;
}

export interface ResolveOptions {
  /** False for identity fields, whose "1"/"0" tokens are always integers */
  ambiguousAsBoolean?: boolean;
}

/**
 * Resolve the field type:
 * - "1"/"0" tokens stay boolean unless other numbers (or other types) appear, then count as integers
 * - nothing but nulls → null
 * - integer with float → float
 * - any other mix → string
 */
export function resolveFieldType(
  observation: FieldObservation,
  options: ResolveOptions = {},
): FieldType {
  const types = new Set(observation.types);
  const ambiguousAsBoolean = options.ambiguousAsBoolean ?? true;

  if (observation.ambiguousCount > 0) {
    if (ambiguousAsBoolean && (types.size === 0 || (types.size === 1 && types.has("boolean")))) {
      return "boolean";
    }
    types.add("integer");
  }

  const ordered = [...types].sort((a, b) => FIELD_TYPE_PRIORITY[b] - FIELD_TYPE_PRIORITY[a]);
  const [highest] = ordered;

  if (highest === undefined) {
    return "null";
  }
  if (ordered.length === 1 || ordered.every((type) => NUMERIC_TYPES.has(type))) {
    return highest;
  }
  return "string";
}
