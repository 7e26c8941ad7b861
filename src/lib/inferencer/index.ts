/**
 * Inferencer module - schema inference and normalization for a batch of raw records
 */

import type {
  NormalizedRecord,
  RawRecord,
  Schema,
} from "../../types/data-model.js";
import { TypeClassifier } from "../classifier/index.js";
import type { FieldObservation, InferencerOptions, InferencerResult } from "./types.js";
import { createObservation, hasConflict, resolveFieldType } from "./type-resolution.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./type-resolution.js";

/**
 * Default inferencer options
 */
const DEFAULT_OPTIONS: InferencerOptions = {
  sampleValueCap: 5,
};

/**
 * Collect per-field observations in order of first appearance
 */
function observe(
  batch: RawRecord[],
  classifier: TypeClassifier,
  sampleValueCap: number,
): Map<string, FieldObservation> {
  const observations = new Map<string, FieldObservation>();

  for (const record of batch) {
    for (const [field, raw] of Object.entries(record)) {
      if (raw === undefined) continue;

      let observation = observations.get(field);
      if (!observation) {
        observation = createObservation();
        observations.set(field, observation);
      }

      observation.presentCount++;
      if (observation.samples.length < sampleValueCap) {
        observation.samples.push(raw);
      }

      const { type, ambiguous } = classifier.classify(raw);
      if (type === "null") {
        observation.nullCount++;
      } else if (ambiguous) {
        observation.ambiguousCount++;
      } else {
        observation.types.add(type);
      }
    }
  }

  return observations;
}

/**
 * Infer a schema for a batch and normalize every record against it
 */
export function inferSchema(
  batch: RawRecord[],
  options: Partial<InferencerOptions> = {},
): InferencerResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const classifier = opts.classifier ?? new TypeClassifier();

  logger.debug("Starting schema inference", { recordCount: batch.length });

  const observations = observe(batch, classifier, opts.sampleValueCap);

  const identityFields = new Set(opts.identityFields ?? []);
  const schema: Schema = {};
  let conflictsResolved = 0;
  for (const [field, observation] of observations) {
    const type = resolveFieldType(observation, {
      ambiguousAsBoolean: !identityFields.has(field),
    });
    if (hasConflict(observation)) {
      conflictsResolved++;
      logger.debug("Resolved type conflict", {
        field,
        observed: [...observation.types],
        ambiguousTokens: observation.ambiguousCount,
        resolved: type,
      });
    }
    schema[field] = { type, sample_values: observation.samples };
  }

  const records = batch.map((record) => {
    const normalized: NormalizedRecord = {};
    for (const [field, { type }] of Object.entries(schema)) {
      const raw = Object.hasOwn(record, field) ? record[field] : undefined;
      if (raw === undefined) continue;
      normalized[field] = classifier.normalizeAs(raw, type);
    }
    return normalized;
  });

  const fieldsDiscovered = Object.keys(schema).length;
  logger.info("Schema inference complete", {
    recordsAnalyzed: batch.length,
    fieldsDiscovered,
    conflictsResolved,
  });

  return {
    schema,
    records,
    metadata: {
      recordsAnalyzed: batch.length,
      fieldsDiscovered,
      conflictsResolved,
    },
  };
}

/**
 * Main inferencer class
 */
export class SchemaInferrer {
  private options: InferencerOptions;

  constructor(options: Partial<InferencerOptions> = {}) {
    this.options = {
      ...DEFAULT_OPTIONS,
      ...options,
      classifier: options.classifier ?? new TypeClassifier(),
    };
  }

  infer(batch: RawRecord[]): InferencerResult {
    return inferSchema(batch, this.options);
  }
}
