/**
 * Scanline — File System Corpus
 *
 * Corpus backed by a Markdown vault directory on disk. The vault app
 * picks up changes itself, so plain file writes are enough.
 */

import { access, mkdir, readdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { nanoid } from 'nanoid';
import { CorpusUnavailableError } from '../lib/errors';
import { errorMessage, logger } from '../lib/logger';
import type { Corpus } from './types';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class FileSystemCorpus implements Corpus {
  readonly location: string;
  private readonly root: string;
  private readonly logger = logger.child({ component: 'FileSystemCorpus' });

  constructor(root: string) {
    this.root = path.resolve(root);
    this.location = this.root;
  }

  async listNotes(pathPrefix: string): Promise<string[]> {
    try {
      const rootStat = await stat(this.root);
      if (!rootStat.isDirectory()) {
        throw new Error('not a directory');
      }
    } catch (error) {
      throw new CorpusUnavailableError(this.root, { cause: error });
    }

    const dir = this.resolve(pathPrefix);
    let entries: string[];
    try {
      entries = await readdir(dir, { recursive: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new CorpusUnavailableError(dir, { cause: error });
    }

    const prefix = pathPrefix.replace(/\/+$/, '');
    return entries
      .filter(entry => entry.endsWith('.md'))
      .map(entry => `${prefix}/${entry.split(path.sep).join('/')}`)
      .sort();
  }

  async read(notePath: string): Promise<string> {
    return readFile(this.resolve(notePath), 'utf8');
  }

  async rewriteLine(
    notePath: string,
    lineNumber: number,
    newText: string,
    expected?: string
  ): Promise<boolean> {
    const file = this.resolve(notePath);

    try {
      const content = await readFile(file, 'utf8');
      const eol = content.includes('\r\n') ? '\r\n' : '\n';
      const lines = content.split(/\r?\n/);

      if (lineNumber < 0 || lineNumber >= lines.length) {
        this.logger.warn('Line out of range', { notePath, lineNumber });
        return false;
      }
      if (expected !== undefined && lines[lineNumber] !== expected) {
        this.logger.warn('Line changed since it was read', { notePath, lineNumber });
        return false;
      }

      lines[lineNumber] = newText;

      // Write beside the note and rename over it so a crash never leaves half a file
      const tmp = `${file}.${nanoid(8)}.tmp`;
      await writeFile(tmp, lines.join(eol), 'utf8');
      await rename(tmp, file);
      return true;
    } catch (error) {
      this.logger.warn('Line rewrite failed', { notePath, lineNumber, error: errorMessage(error) });
      return false;
    }
  }

  async create(notePath: string, content: string): Promise<boolean> {
    const file = this.resolve(notePath);

    try {
      await mkdir(path.dirname(file), { recursive: true });
      await writeFile(file, content, { encoding: 'utf8', flag: 'wx' });
      return true;
    } catch (error) {
      this.logger.warn('Note create failed', { notePath, error: errorMessage(error) });
      return false;
    }
  }

  async exists(notePath: string): Promise<boolean> {
    try {
      await access(this.resolve(notePath));
      return true;
    } catch {
      return false;
    }
  }

  private resolve(notePath: string): string {
    const resolved = path.resolve(this.root, notePath);
    if (resolved !== this.root && !resolved.startsWith(this.root + path.sep)) {
      throw new Error(`Path escapes the vault: ${notePath}`);
    }
    return resolved;
  }
}
