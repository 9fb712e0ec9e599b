/**
 * Filesystem object store
 * Keys map to files under a root directory, so the published site can be
 * served straight from that directory.
 */

import { promises as fs, type Dirent } from 'fs';
import * as path from 'path';
import type { DeleteOutcome, ObjectStore, ObjectSummary } from './types.js';
import { assertValidKey } from './types.js';

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html',
  '.json': 'application/json',
  '.css': 'text/css',
  '.js': 'text/javascript',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.svg': 'image/svg+xml',
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileSystemObjectStore implements ObjectStore {
  readonly kind = 'fs';
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  private resolveKey(key: string): string {
    assertValidKey(key);
    return path.join(this.rootDir, ...key.split('/'));
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.resolveKey(key));
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async put(key: string, body: Buffer | string, _contentType: string): Promise<void> {
    const filePath = this.resolveKey(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, body);
  }

  async delete(key: string): Promise<DeleteOutcome> {
    try {
      await fs.unlink(this.resolveKey(key));
      return 'deleted';
    } catch (err) {
      if (isMissingFile(err)) return 'absent';
      throw err;
    }
  }

  async list(prefix = ''): Promise<ObjectSummary[]> {
    const summaries: ObjectSummary[] = [];
    await this.walk(this.rootDir, summaries);
    return summaries
      .filter((summary) => summary.key.startsWith(prefix))
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  private async walk(dir: string, summaries: ObjectSummary[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isMissingFile(err)) return;
      throw err;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(fullPath, summaries);
      } else if (entry.isFile()) {
        const stats = await fs.stat(fullPath);
        const key = path.relative(this.rootDir, fullPath).split(path.sep).join('/');
        summaries.push({
          key,
          size: stats.size,
          contentType: CONTENT_TYPES[path.extname(entry.name)] ?? 'application/octet-stream',
          updated: stats.mtime.toISOString(),
        });
      }
    }
  }
}
