import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CorpusEmptyError } from '../../errors.js';
import { DocumentStore } from '../document-store.js';

describe('DocumentStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'recall-corpus-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function seed() {
    writeFileSync(join(dir, 'b-decorators.md'), '# Decorators\nA decorator wraps a function.');
    writeFileSync(join(dir, 'a-generators.md'), '# Generators\nA generator yields values lazily.');
    writeFileSync(join(dir, 'notes.txt'), 'not markdown');
    mkdirSync(join(dir, 'nested'));
    writeFileSync(join(dir, 'nested', 'c-deep.md'), '# Deep');
  }

  it('should list only top-level markdown files, sorted', async () => {
    seed();

    const files = await new DocumentStore(dir).list();

    expect(files.map(f => basename(f))).toEqual(['a-generators.md', 'b-decorators.md']);
  });

  it('should pick by the random source', async () => {
    seed();

    const first = await new DocumentStore(dir, () => 0).pickRandom();
    const last = await new DocumentStore(dir, () => 0.99).pickRandom();

    expect(first.title).toBe('a-generators.md');
    expect(first.text).toBe('# Generators\nA generator yields values lazily.');
    expect(last.title).toBe('b-decorators.md');
  });

  it('should clamp a random source that returns 1', async () => {
    seed();

    const doc = await new DocumentStore(dir, () => 1).pickRandom();

    expect(doc.title).toBe('b-decorators.md');
  });

  it('should report an empty directory', async () => {
    const store = new DocumentStore(dir);

    await expect(store.hasDocuments()).resolves.toBe(false);
    await expect(store.pickRandom()).rejects.toBeInstanceOf(CorpusEmptyError);
    await expect(store.pickRandom()).rejects.toThrow(`No .md files found in ${dir}`);
  });

  it('should treat a missing directory as empty', async () => {
    const store = new DocumentStore(join(dir, 'does-not-exist'));

    await expect(store.hasDocuments()).resolves.toBe(false);
  });
});
