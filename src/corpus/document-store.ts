import { glob } from 'glob';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CorpusEmptyError } from '../errors.js';

export interface SourceDocument {
  /** File name shown as the question's source */
  title: string;
  path: string;
  text: string;
}

export type RandomSource = () => number;

/**
 * Markdown notes in one directory (not recursive). A missing directory is
 * treated the same as an empty one.
 */
export class DocumentStore {
  readonly directory: string;
  private random: RandomSource;

  constructor(directory: string, random: RandomSource = Math.random) {
    this.directory = path.resolve(directory);
    this.random = random;
  }

  async list(): Promise<string[]> {
    const matches = await glob('*.md', {
      cwd: this.directory,
      nodir: true,
      absolute: true,
    });
    return matches.sort();
  }

  async hasDocuments(): Promise<boolean> {
    const files = await this.list();
    return files.length > 0;
  }

  /** Pick one document uniformly at random and read it. */
  async pickRandom(): Promise<SourceDocument> {
    const files = await this.list();
    if (files.length === 0) {
      throw new CorpusEmptyError(this.directory, {
        hint: 'Add markdown notes or point ARTICLES_DIR at a folder that has some',
      });
    }

    const index = Math.min(files.length - 1, Math.floor(this.random() * files.length));
    const filePath = files[index];
    const text = await fs.readFile(filePath, 'utf-8');

    return {
      title: path.basename(filePath),
      path: filePath,
      text,
    };
  }
}
