import { describe, it, expect, afterAll } from 'vitest';
import Database from 'better-sqlite3';
import { cosineSimilarity, registerSimilarityFunction } from '../similarity.js';

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
  });

  it('is -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1, 10);
  });

  it('is null for mismatched lengths, empty or zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBeNull();
    expect(cosineSimilarity([], [])).toBeNull();
    expect(cosineSimilarity([0, 0], [1, 0])).toBeNull();
  });
});

describe('registerSimilarityFunction', () => {
  const db = new Database(':memory:');
  registerSimilarityFunction(db);

  afterAll(() => {
    db.close();
  });

  const similarity = (a: string | null, b: string | null): unknown =>
    db.prepare('SELECT cosine_similarity(?, ?) AS s').pluck().get(a, b);

  it('compares JSON-encoded vectors', () => {
    expect(similarity('[3,4]', '[3,4]')).toBeCloseTo(1, 10);
    expect(similarity('[1,0]', '[0,1]')).toBe(0);
  });

  it('returns NULL for unusable input', () => {
    expect(similarity(null, '[1]')).toBeNull();
    expect(similarity('not json', '[1]')).toBeNull();
    expect(similarity('[1,"x"]', '[1,2]')).toBeNull();
    expect(similarity('[1,2]', '[1]')).toBeNull();
  });
});
