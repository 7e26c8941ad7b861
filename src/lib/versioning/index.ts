/**
 * Versioning module - reconciles inferred schemas with stored schema versions
 */

import type { Schema, SchemaVersion } from "../../types/data-model.js";
import type { RecordStore } from "../store/types.js";
import { schemasEqual, schemaFingerprint } from "./schema-equality.js";
import { SchemaVersionError, VersionRaceLostError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export * from "./schema-equality.js";

export interface SchemaVersionStoreOptions {
  retryLimit: number;
  now?: () => Date;
}

export class SchemaVersionStore {
  private retryLimit: number;
  private now: () => Date;

  constructor(
    private store: RecordStore,
    options: SchemaVersionStoreOptions = { retryLimit: 5 },
  ) {
    this.retryLimit = options.retryLimit;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Reuse the stored version whose structure matches, or claim the next number.
   * A lost claim re-reads the version set and tries again.
   */
  async reconcile(schema: Schema, batchSize: number): Promise<SchemaVersion> {
    const fingerprint = schemaFingerprint(schema);

    for (let attempt = 0; attempt <= this.retryLimit; attempt++) {
      const versions = await this.store.findSchemaVersions();
      const match = versions.find((candidate) => schemasEqual(candidate.schema, schema));

      if (match) {
        const updated = await this.store.recordSchemaVersionUse(match.version, batchSize, this.now());
        if (updated) {
          logger.info("Using existing schema version", { version: updated.version, fingerprint });
          return updated;
        }
        continue;
      }

      const next = versions.reduce((max, candidate) => Math.max(max, candidate.version), 0) + 1;
      const now = this.now();
      const created: SchemaVersion = {
        version: next,
        schema,
        created_at: now,
        last_used: now,
        stats: {
          total_records: batchSize,
          total_fields: Object.keys(schema).length,
        },
      };

      try {
        await this.store.claimSchemaVersion(created);
        logger.info("New schema version saved", { version: next, fingerprint });
        return created;
      } catch (error) {
        if (!(error instanceof VersionRaceLostError)) {
          throw error;
        }
        logger.warn("Lost schema version race, reconciling again", {
          version: next,
          attempt: attempt + 1,
        });
      }
    }

    throw new SchemaVersionError(
      `Could not settle a schema version after ${this.retryLimit + 1} attempts`,
      { fingerprint, attempts: this.retryLimit + 1 },
    );
  }

  async list(): Promise<SchemaVersion[]> {
    const versions = await this.store.findSchemaVersions();
    return [...versions].sort((a, b) => a.version - b.version);
  }
}
