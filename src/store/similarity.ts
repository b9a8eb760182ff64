import type Database from 'better-sqlite3';

/**
 * Cosine similarity of two equal-length vectors; null when either has no magnitude
 * or the lengths differ.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number | null {
  if (a.length !== b.length || a.length === 0) return null;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return null;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function parseVector(value: unknown): number[] | null {
  if (typeof value !== 'string') return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) return null;
  const out: number[] = [];
  for (const n of parsed) {
    if (typeof n !== 'number') return null;
    out.push(n);
  }
  return out;
}

/**
 * Register `cosine_similarity(a, b)` on a connection. Both arguments are
 * JSON-encoded number arrays, as vectors are stored in the `embedding` column.
 */
export function registerSimilarityFunction(db: Database.Database): void {
  db.function('cosine_similarity', { deterministic: true }, (a: unknown, b: unknown) => {
    const va = parseVector(a);
    const vb = parseVector(b);
    if (!va || !vb) return null;
    return cosineSimilarity(va, vb);
  });
}
