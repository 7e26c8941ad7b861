/**
 * Classifier module types
 */

import type { FieldType, NormalizedValue } from "../../types/data-model.js";

/**
 * Classification - the semantic type of one raw scalar and its normalized form.
 * `ambiguous` marks the "1"/"0" tokens, which read as boolean on their own but
 * as integers next to other numbers.
 */
export interface Classification {
  type: FieldType;
  value: NormalizedValue;
  ambiguous: boolean;
}

export interface DetectorMatch {
  value: NormalizedValue;
  ambiguous?: boolean;
}

export interface TypeDetector {
  type: FieldType;
  priority: number; // Lower = evaluated first
  detect: (text: string) => DetectorMatch | null;
}
