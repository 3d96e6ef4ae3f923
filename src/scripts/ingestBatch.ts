/**
 * Ingests a JSON batch file into a collection.
 *
 *   npm run ingest -- data/movies.json [collection]
 *
 * Re-running with the same file skips every record that is already stored.
 */
import path from "path";

import { createContainer } from "@app/container";
import { ingestBatch } from "@app/ingest/IngestUseCase";
import { errorMessage } from "@domain/errors";
import { parseIngestArgs } from "@scripts/args";

async function run(): Promise<void> {
  const { file, collection } = parseIngestArgs(process.argv);
  const container = createContainer();

  try {
    const report = await ingestBatch(
      {
        engine: container.engine,
        store: container.store,
        defaultCollection: container.collection.name,
      },
      { collection, filepath: path.resolve(file) },
      {
        onProgress: ({ current, total, id, outcome }) => {
          process.stdout.write(`[${current}/${total}] ${id}: ${outcome}\n`);
        },
      }
    );

    console.log("=== IngestReport ===");
    console.log("collection:", report.collection);
    console.log("created:", report.created);
    console.log("skipped:", report.skipped);
    console.log("failed:", report.failed);
  } finally {
    await container.close();
  }
}

run().catch((err: unknown) => {
  console.error("Ingest error:", errorMessage(err));
  process.exitCode = 1;
});
