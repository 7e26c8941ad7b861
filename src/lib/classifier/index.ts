/**
 * Classifier module - maps raw scalars onto the eight field types
 */

import type { FieldType, NormalizedValue, RawValue } from "../../types/data-model.js";
import type { Classification, TypeDetector } from "./types.js";
import { BUILTIN_DETECTORS } from "./detectors.js";

export * from "./types.js";
export * from "./detectors.js";

const sortedDetectors = (detectors: readonly TypeDetector[]) =>
  [...detectors].sort((a, b) => a.priority - b.priority);

/**
 * Textual form of a raw value, trimmed
 */
export function rawText(raw: RawValue): string {
  if (raw === null || raw === undefined) return "";
  return typeof raw === "string" ? raw.trim() : String(raw);
}

export class TypeClassifier {
  private detectors: TypeDetector[];

  constructor(detectors: readonly TypeDetector[] = BUILTIN_DETECTORS) {
    this.detectors = sortedDetectors(detectors);
  }

  /**
   * Classify one raw value. Never throws: anything unrecognized is a string.
   */
  classify(raw: RawValue): Classification {
    if (raw === null || raw === undefined) {
      return { type: "null", value: null, ambiguous: false };
    }
    if (typeof raw === "boolean") {
      return { type: "boolean", value: raw, ambiguous: false };
    }
    if (typeof raw === "number") {
      if (Number.isSafeInteger(raw)) {
        return { type: "integer", value: raw === 0 ? 0 : raw, ambiguous: false };
      }
      if (Number.isFinite(raw) && !Number.isInteger(raw)) {
        return { type: "float", value: raw, ambiguous: false };
      }
      return { type: "string", value: String(raw), ambiguous: false };
    }

    const text = raw.trim();
    for (const detector of this.detectors) {
      const match = detector.detect(text);
      if (match) {
        return { type: detector.type, value: match.value, ambiguous: match.ambiguous ?? false };
      }
    }
    return { type: "string", value: text, ambiguous: false };
  }

  /**
   * Normalize a raw value against the type its field resolved to.
   * A value that looked like an integer in a string field comes back as text.
   */
  normalizeAs(raw: RawValue, type: FieldType): NormalizedValue {
    const classification = this.classify(raw);
    if (classification.type === "null") {
      return null;
    }

    switch (type) {
      case "null":
        return null;
      case "boolean":
        return classification.type === "boolean" ? classification.value : rawText(raw);
      case "integer":
      case "float":
        return toNumber(classification) ?? rawText(raw);
      case "email":
      case "url":
      case "date":
        return classification.type === type ? classification.value : rawText(raw);
      case "string":
        return rawText(raw);
      default: {
        const unreachable: never = type;
        throw new Error(`Unhandled field type: ${String(unreachable)}`);
      }
    }
  }
}

function toNumber(classification: Classification): number | null {
  switch (classification.type) {
    case "integer":
    case "float":
      return typeof classification.value === "number" ? classification.value : null;
    case "boolean":
      // Only "1"/"0" reach a numeric field as booleans
      if (classification.ambiguous) {
        return classification.value === true ? 1 : 0;
      }
      return null;
    default:
      return null;
  }
}

const defaultClassifier = new TypeClassifier();

/**
 * Classify a raw value with the built-in detectors
 */
export function classify(raw: RawValue): Classification {
  return defaultClassifier.classify(raw);
}

/**
 * Normalize a raw value against a resolved field type with the built-in detectors
 */
export function normalizeAs(raw: RawValue, type: FieldType): NormalizedValue {
  return defaultClassifier.normalizeAs(raw, type);
}
