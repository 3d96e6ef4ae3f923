export interface IngestArgs {
  file: string;
  collection?: string;
}

export interface ChatArgs {
  collection?: string;
}

export function parseIngestArgs(argv: readonly string[]): IngestArgs {
  const [, , file, collection] = argv;
  if (!file) {
    throw new Error("Usage: npm run ingest -- <file.json> [collection]");
  }
  return { file, collection };
}

export function parseChatArgs(argv: readonly string[]): ChatArgs {
  const [, , collection] = argv;
  return { collection };
}
