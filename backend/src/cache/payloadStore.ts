import { mkdir, open, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { createComponentLogger } from '../utils/logger.js';

export interface EntryMeta {
  key: string;
  createdAt: number;
  lastAccessedAt: number;
  byteSize: number;
  /** End of the retrieval window, when the request had one. */
  windowEnd?: number;
}

/** Backing storage for cache payloads. The cache owns the index; stores only persist it. */
export interface PayloadStore {
  loadIndex(): Promise<EntryMeta[]>;
  read(key: string): Promise<string | undefined>;
  write(meta: EntryMeta, payload: string): Promise<void>;
  touch(meta: EntryMeta): Promise<void>;
  remove(key: string): Promise<void>;
  clear(): Promise<void>;
}

export class MemoryPayloadStore implements PayloadStore {
  private readonly entries = new Map<string, { meta: EntryMeta; payload: string }>();

  async loadIndex(): Promise<EntryMeta[]> {
    return Array.from(this.entries.values(), (entry) => ({ ...entry.meta }));
  }

  async read(key: string): Promise<string | undefined> {
    return this.entries.get(key)?.payload;
  }

  async write(meta: EntryMeta, payload: string): Promise<void> {
    this.entries.set(meta.key, { meta: { ...meta }, payload });
  }

  async touch(meta: EntryMeta): Promise<void> {
    const entry = this.entries.get(meta.key);
    if (entry) {
      entry.meta = { ...meta };
    }
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}

export const HEADER_BYTES = 256;
const HEADER_VERSION = 1;
const ENTRY_SUFFIX = '.entry';

const headerSchema = z.object({
  v: z.literal(HEADER_VERSION),
  key: z.string().regex(/^[0-9a-f]{64}$/),
  createdAt: z.number(),
  lastAccessedAt: z.number(),
  byteSize: z.number().int().nonnegative(),
  windowEnd: z.number().optional()
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function encodeHeader(meta: EntryMeta): string {
  const json = JSON.stringify({ v: HEADER_VERSION, ...meta });
  if (json.length >= HEADER_BYTES) {
    throw new Error(`Cache header for ${meta.key} exceeds ${HEADER_BYTES} bytes`);
  }
  return json.padEnd(HEADER_BYTES - 1, ' ') + '\n';
}

export function decodeHeader(raw: string): EntryMeta | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw.trim());
  } catch {
    return undefined;
  }
  const parsed = headerSchema.safeParse(json);
  if (!parsed.success) {
    return undefined;
  }
  const { v: _version, ...meta } = parsed.data;
  return meta;
}

/**
 * One file per entry, named by the request hash: a fixed-width JSON header
 * line followed by the raw payload. Access-time updates rewrite the header
 * in place; startup reads headers only.
 */
export class FilePayloadStore implements PayloadStore {
  private readonly directory: string;
  private readonly logger: Logger;

  constructor(directory: string, logger: Logger = createComponentLogger('cache-store')) {
    this.directory = directory;
    this.logger = logger;
  }

  private pathFor(key: string): string {
    return join(this.directory, `${key}${ENTRY_SUFFIX}`);
  }

  async loadIndex(): Promise<EntryMeta[]> {
    await mkdir(this.directory, { recursive: true });
    const names = await readdir(this.directory);
    const index: EntryMeta[] = [];

    for (const name of names) {
      if (!name.endsWith(ENTRY_SUFFIX)) {
        continue;
      }
      const path = join(this.directory, name);
      const meta = await this.readHeader(path);
      if (!meta || `${meta.key}${ENTRY_SUFFIX}` !== name) {
        this.logger.warn({ file: name }, 'discarding unreadable cache entry');
        await rm(path, { force: true });
        continue;
      }
      index.push(meta);
    }

    return index;
  }

  private async readHeader(path: string): Promise<EntryMeta | undefined> {
    const handle = await open(path, 'r');
    try {
      const buffer = Buffer.alloc(HEADER_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, HEADER_BYTES, 0);
      if (bytesRead < HEADER_BYTES) {
        return undefined;
      }
      return decodeHeader(buffer.toString('utf8'));
    } finally {
      await handle.close();
    }
  }

  async read(key: string): Promise<string | undefined> {
    try {
      const contents = await readFile(this.pathFor(key));
      return contents.subarray(HEADER_BYTES).toString('utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async write(meta: EntryMeta, payload: string): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const target = this.pathFor(meta.key);
    const temporary = `${target}.${process.pid}.${Date.now()}.tmp`;
    await writeFile(temporary, encodeHeader(meta) + payload, 'utf8');
    await rename(temporary, target);
  }

  async touch(meta: EntryMeta): Promise<void> {
    const handle = await open(this.pathFor(meta.key), 'r+').catch((error: unknown) => {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    });
    if (!handle) {
      return;
    }
    try {
      await handle.write(encodeHeader(meta), 0, 'utf8');
    } finally {
      await handle.close();
    }
  }

  async remove(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  async clear(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const names = await readdir(this.directory);
    await Promise.all(
      names.filter((name) => name.endsWith(ENTRY_SUFFIX)).map((name) => rm(join(this.directory, name), { force: true }))
    );
  }
}
