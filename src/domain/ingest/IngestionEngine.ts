/**
 * Idempotent batch ingestion into a vector collection.
 *
 * For every record, in source order:
 * - look the id up (with its embedding) in the store;
 * - found: skip, no embedding call and no write;
 * - not found: embed `content` and write one StoredItem;
 * - lookup error: fail-open by default (logged, handled as not found), or
 *   abort the batch when `onLookupError` is "abort".
 *
 * Records are processed one at a time, so a duplicate id later in the same
 * batch sees the earlier write and is skipped.
 */
import type { EmbeddingGateway } from "@domain/embedding/ports";
import {
  EmbeddingServiceError,
  errorMessage,
  LookupAmbiguousError,
  StoreWriteError,
} from "@domain/errors";
import type { StoredItem, VectorStore } from "@domain/vectorstore/ports";
import { logEvent } from "@infra/logging/Logger";

export interface IngestRecord {
  id: string;
  title: string;
  content: string;
}

export type LookupResult =
  | { status: "found"; item: StoredItem }
  | { status: "not_found" }
  | { status: "error"; error: unknown };

export type IngestOutcome = "created" | "skipped" | "failed";

export interface RecordOutcome {
  id: string;
  outcome: IngestOutcome;
  error?: string;
}

export interface IngestReport {
  collection: string;
  total: number;
  created: number;
  skipped: number;
  failed: number;
  outcomes: RecordOutcome[];
}

export interface IngestProgress {
  current: number;
  total: number;
  id: string;
  outcome: IngestOutcome;
}

export interface UpsertBatchOptions {
  /** Default "treat-as-missing". */
  onLookupError?: "treat-as-missing" | "abort";
  /** Default true: the first embedding/write failure aborts the batch. */
  stopOnError?: boolean;
  onProgress?: (progress: IngestProgress) => void;
  signal?: AbortSignal;
}

export interface IngestionEngineDeps {
  embeddings: EmbeddingGateway;
  store: VectorStore;
}

export class IngestionEngine {
  private readonly embeddings: EmbeddingGateway;
  private readonly store: VectorStore;

  constructor(deps: IngestionEngineDeps) {
    this.embeddings = deps.embeddings;
    this.store = deps.store;
  }

  async lookup(collection: string, id: string): Promise<LookupResult> {
    try {
      const item = await this.store.get(collection, id, {
        withEmbedding: true,
      });

      // Without its embedding the item was never fully materialized.
      if (!item || item.embedding.length === 0) {
        return { status: "not_found" };
      }
      return { status: "found", item };
    } catch (error: unknown) {
      return { status: "error", error };
    }
  }

  async upsertBatch(
    records: readonly IngestRecord[],
    collection: string,
    options: UpsertBatchOptions = {}
  ): Promise<IngestReport> {
    const {
      onLookupError = "treat-as-missing",
      stopOnError = true,
      onProgress,
      signal,
    } = options;

    const report: IngestReport = {
      collection,
      total: records.length,
      created: 0,
      skipped: 0,
      failed: 0,
      outcomes: [],
    };

    if (records.length === 0) {
      return report;
    }

    const startedAt = Date.now();
    logEvent("INGEST_BATCH_START", { collection, total: records.length });

    for (const [index, record] of records.entries()) {
      let outcome: RecordOutcome;

      try {
        outcome = await this.ingestRecord(
          record,
          collection,
          onLookupError,
          signal
        );
      } catch (error: unknown) {
        const abortable =
          stopOnError ||
          signal?.aborted === true ||
          error instanceof LookupAmbiguousError;

        if (abortable) {
          logEvent("INGEST_BATCH_ABORTED", {
            collection,
            id: record.id,
            processed: index,
            total: records.length,
            created: report.created,
            skipped: report.skipped,
            failed: report.failed,
            message: errorMessage(error),
          });
          throw error;
        }

        outcome = { id: record.id, outcome: "failed", error: errorMessage(error) };
      }

      report.outcomes.push(outcome);
      report[outcome.outcome] += 1;

      const progress: IngestProgress = {
        current: index + 1,
        total: records.length,
        id: record.id,
        outcome: outcome.outcome,
      };
      logEvent("INGEST_PROGRESS", { collection, ...progress });
      onProgress?.(progress);
    }

    logEvent("INGEST_BATCH_DONE", {
      collection,
      total: report.total,
      created: report.created,
      skipped: report.skipped,
      failed: report.failed,
      durationMs: Date.now() - startedAt,
    });

    return report;
  }

  private async ingestRecord(
    record: IngestRecord,
    collection: string,
    onLookupError: "treat-as-missing" | "abort",
    signal: AbortSignal | undefined
  ): Promise<RecordOutcome> {
    signal?.throwIfAborted();
    const existing = await this.lookup(collection, record.id);

    if (existing.status === "found") {
      return { id: record.id, outcome: "skipped" };
    }

    if (existing.status === "error") {
      if (onLookupError === "abort") {
        throw new LookupAmbiguousError(
          `Could not determine whether "${record.id}" exists`,
          { cause: existing.error, metadata: { collection, id: record.id } }
        );
      }

      logEvent("LOOKUP_AMBIGUOUS", {
        collection,
        id: record.id,
        message: errorMessage(existing.error),
      });
    }

    signal?.throwIfAborted();
    const embedding = await this.embed(record);

    signal?.throwIfAborted();
    await this.write(collection, {
      id: record.id,
      text: record.content,
      embedding,
      description: record.title,
      additionalMetadata: JSON.stringify({
        id: record.id,
        title: record.title,
        content: record.content,
      }),
    });

    return { id: record.id, outcome: "created" };
  }

  private async embed(record: IngestRecord): Promise<number[]> {
    try {
      return await this.embeddings.embed(record.content);
    } catch (error: unknown) {
      if (error instanceof EmbeddingServiceError) {
        throw error;
      }
      throw new EmbeddingServiceError(
        `Embedding failed for record "${record.id}"`,
        { cause: error, metadata: { id: record.id } }
      );
    }
  }

  private async write(collection: string, item: StoredItem): Promise<void> {
    try {
      await this.store.upsert(collection, item);
    } catch (error: unknown) {
      if (error instanceof StoreWriteError) {
        throw error;
      }
      throw new StoreWriteError(
        `Failed to store record "${item.id}" in "${collection}"`,
        { cause: error, metadata: { collection, id: item.id } }
      );
    }
  }
}
