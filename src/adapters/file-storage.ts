/**
 * Durable storage adapter keeping all keys in one JSON file
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { StorageAdapter } from '../interfaces';
import { PersistenceError, errorMessage } from '../errors';
import { Mutex } from '../utils';

const fileContentsSchema = z.record(z.union([z.string(), z.boolean()]));

type FileContents = z.infer<typeof fileContentsSchema>;

/**
 * Every write replaces the file through a temp file and rename, so a
 * crash mid-write leaves the previous contents in place.
 */
export class JsonFileStorageAdapter implements StorageAdapter {
  private readonly lock = new Mutex();
  private cache: FileContents | undefined;

  constructor(private readonly filePath: string) {}

  async getString(key: string): Promise<string | null> {
    const value = (await this.load())[key];
    return typeof value === 'string' ? value : null;
  }

  async setString(key: string, value: string): Promise<void> {
    await this.update(contents => {
      contents[key] = value;
    });
  }

  async getBoolean(key: string): Promise<boolean | null> {
    const value = (await this.load())[key];
    return typeof value === 'boolean' ? value : null;
  }

  async setBoolean(key: string, value: boolean): Promise<void> {
    await this.update(contents => {
      contents[key] = value;
    });
  }

  async remove(key: string): Promise<void> {
    await this.update(contents => {
      delete contents[key];
    });
  }

  async keys(): Promise<string[]> {
    return Object.keys(await this.load());
  }

  async close(): Promise<void> {
    // Wait for queued writes
    await this.lock.runExclusive(async () => undefined);
    this.cache = undefined;
  }

  private async update(change: (contents: FileContents) => void): Promise<void> {
    await this.lock.runExclusive(async () => {
      const next = { ...(await this.load()) };
      change(next);
      await this.persist(next);
      this.cache = next;
    });
  }

  private async load(): Promise<FileContents> {
    if (this.cache) return this.cache;

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        this.cache = {};
        return this.cache;
      }
      throw new PersistenceError(`Failed to read ${this.filePath}: ${errorMessage(error)}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`${this.filePath} is not valid JSON`, error);
    }
    const parsed = fileContentsSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(`${this.filePath} does not contain a key-value object`, parsed.error);
    }
    this.cache = parsed.data;
    return this.cache;
  }

  private async persist(contents: FileContents): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(contents), 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new PersistenceError(`Failed to write ${this.filePath}: ${errorMessage(error)}`, error);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
