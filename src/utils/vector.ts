/**
 * Vector helpers shared by the pgvector adapter and the in-memory store.
 */
export function toPgVectorLiteral(vector: number[]): string {
  if (!Array.isArray(vector)) {
    throw new TypeError("toPgVectorLiteral expected an array");
  }

  if (vector.length === 0) {
    throw new Error("toPgVectorLiteral received an empty vector");
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new Error("toPgVectorLiteral received a non-finite value");
  }

  return `[${vector.join(",")}]`;
}

/** Parses pgvector's text output (`[1,2,3]`) back into numbers. */
export function fromPgVectorLiteral(literal: string): number[] {
  const trimmed = literal.trim();
  if (!trimmed.startsWith("[") || !trimmed.endsWith("]")) {
    throw new Error(`Not a pgvector literal: ${trimmed.slice(0, 32)}`);
  }

  const body = trimmed.slice(1, -1).trim();
  if (!body) {
    return [];
  }

  return body.split(",").map((part) => {
    const value = Number(part);
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid pgvector component: ${part}`);
    }
    return value;
  });
}

function assertSameDimension(a: number[], b: number[]): void {
  if (a.length !== b.length) {
    throw new Error(
      `Embedding dimension mismatch: ${a.length} vs ${b.length}`
    );
  }
}

export function dotProduct(a: number[], b: number[]): number {
  assertSameDimension(a, b);
  let dot = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return dot;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const dot = dotProduct(a, b);
  const denom = Math.sqrt(dotProduct(a, a)) * Math.sqrt(dotProduct(b, b));
  return denom === 0 ? 0 : dot / denom;
}

export function euclideanDistance(a: number[], b: number[]): number {
  assertSameDimension(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}
