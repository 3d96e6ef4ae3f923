/**
 * Batch ingestion use-case.
 *
 * Accepts records inline or a path to a JSON batch file:
 * - Validates file existence, size and shape (zod)
 * - Provisions the target collection (idempotent)
 * - Runs the records through the IngestionEngine
 *
 * Shared by POST /api/ingest and the ingestBatch script.
 */
import fs from "fs";

import { config } from "@config/index";
import { DomainError, ValidationError } from "@domain/errors";
import type {
  IngestionEngine,
  IngestRecord,
  IngestReport,
  UpsertBatchOptions,
} from "@domain/ingest/IngestionEngine";
import {
  collectionSpecFromConfig,
  isValidCollectionName,
} from "@domain/vectorstore/collections";
import type { CollectionSpec, VectorStore } from "@domain/vectorstore/ports";
import { logEvent } from "@infra/logging/Logger";
import { z } from "zod";

// Validates only; ids and content are stored exactly as read.
const NonBlankString = z
  .string()
  .refine((value) => value.trim().length > 0, { message: "must not be blank" });

export const IngestRecordSchema = z.object({
  id: NonBlankString,
  title: z.string(),
  content: NonBlankString,
});

export const IngestBatchSchema = z.array(IngestRecordSchema);

export interface IngestRequest {
  collection?: string;
  records?: IngestRecord[];
  filepath?: string;
}

export interface IngestUseCaseDeps {
  engine: IngestionEngine;
  store: VectorStore;
  defaultCollection: string;
  specFor?: (collection: string) => CollectionSpec;
  maxFileBytes?: number;
}

export function loadBatchFile(
  filepath: string,
  maxFileBytes: number = config.ingest.maxFileBytes
): IngestRecord[] {
  if (!fs.existsSync(filepath)) {
    throw new DomainError("file not found", {
      statusCode: 404,
      metadata: { filepath },
    });
  }

  const { size } = fs.statSync(filepath);
  if (size > maxFileBytes) {
    throw new ValidationError(`File too large (max ${maxFileBytes} bytes)`, {
      filepath,
      size,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filepath, "utf-8"));
  } catch (err: unknown) {
    throw new ValidationError("Batch file is not valid JSON", {
      filepath,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = IngestBatchSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("Batch file has invalid records", {
      filepath,
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}

export async function ingestBatch(
  deps: IngestUseCaseDeps,
  request: IngestRequest,
  options: UpsertBatchOptions = {}
): Promise<IngestReport> {
  const collection = request.collection ?? deps.defaultCollection;

  if (!isValidCollectionName(collection)) {
    throw new ValidationError("invalid collection name", { collection });
  }

  let records: IngestRecord[];
  if (request.records) {
    records = request.records;
  } else if (request.filepath) {
    records = loadBatchFile(request.filepath, deps.maxFileBytes);
  } else {
    throw new ValidationError("records or filepath required");
  }

  const specFor = deps.specFor ?? collectionSpecFromConfig;
  await deps.store.ensureCollection(specFor(collection));

  const report = await deps.engine.upsertBatch(records, collection, options);

  logEvent("INGEST_SUCCESS", {
    collection,
    source: request.filepath ?? "inline",
    total: report.total,
    created: report.created,
    skipped: report.skipped,
    failed: report.failed,
  });

  return report;
}
