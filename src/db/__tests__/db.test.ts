import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { initDb, closeDb } from '../db.js';

const dirs: string[] = [];

afterEach(() => {
  closeDb();
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe('initDb', () => {
  it('creates missing parent directories', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'db-'));
    dirs.push(dir);
    const dbPath = path.join(dir, 'nested', 'index.db');

    initDb(dbPath);
    expect(fs.existsSync(dbPath)).toBe(true);
  });

  it('returns the open connection until closed', () => {
    const first = initDb(':memory:');
    expect(initDb(':memory:')).toBe(first);

    closeDb();
    expect(first.open).toBe(false);
    expect(initDb(':memory:')).not.toBe(first);
  });
});
