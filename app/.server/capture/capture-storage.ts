/**
 * Capture artifact storage
 *
 * Images and their JSON sidecars live outside the database, grouped by local
 * day: `<root>/YYYY-MM-DD/<id>.png` + `<id>.json`. Handles are the
 * root-relative image paths stored on raw samples.
 */

import type { Dirent } from 'fs';
import { mkdir, readdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { join, resolve, sep } from 'path';
import { z } from 'zod';
import type { WindowMetadata } from './types';
import { addDays, dayKey, startOfDay } from '~/lib/utils/day';
import { getLogger } from '~/.server/log/logger';
import { StorageUnavailableError, errorMessage } from '../errors';

export interface CaptureRecord {
  id: string;
  timestamp: number;
  metadata: WindowMetadata;
  image: Buffer;
  text: string | null;
  textConfidence: number | null;
}

export interface StoredCapture {
  id: string;
  timestamp: number;
  metadata: WindowMetadata;
  /** Root-relative handle */
  imagePath: string;
  text: string | null;
  textConfidence: number | null;
}

export interface CaptureStorage {
  /** Persist image + sidecar; resolves to the image handle */
  save(capture: CaptureRecord): Promise<string>;
  /** Captures with from <= timestamp <= to, newest first */
  listCaptures(from: number, to: number): Promise<StoredCapture[]>;
  /** Delete one capture by handle; resolves to the bytes freed (0 when already gone) */
  deleteImage(handle: string): Promise<number>;
  /** Delete whole day directories before the cutoff's day; resolves to bytes freed */
  deleteCapturesOlderThan(cutoff: number): Promise<number>;
  deleteAllCaptures(): Promise<number>;
  totalStorageBytes(): Promise<number>;
}

const StoredCaptureSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  metadata: z.object({
    appName: z.string(),
    appIdentifier: z.string(),
    windowTitle: z.string(),
    browserUrl: z.string().nullable(),
  }),
  imagePath: z.string(),
  text: z.string().nullable(),
  textConfidence: z.number().nullable(),
});

const DAY_DIR = /^\d{4}-\d{2}-\d{2}$/;

const log = getLogger({ module: 'CaptureStorage' });

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toStored(capture: CaptureRecord, imagePath: string): StoredCapture {
  return {
    id: capture.id,
    timestamp: capture.timestamp,
    metadata: capture.metadata,
    imagePath,
    text: capture.text,
    textConfidence: capture.textConfidence,
  };
}

export class FileCaptureStorage implements CaptureStorage {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async save(capture: CaptureRecord): Promise<string> {
    const day = dayKey(capture.timestamp);
    const dir = join(this.root, day);

    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new StorageUnavailableError(dir, error);
    }

    const handle = `${day}/${capture.id}.png`;
    await writeFile(join(dir, `${capture.id}.png`), capture.image);
    await writeFile(join(dir, `${capture.id}.json`), JSON.stringify(toStored(capture, handle)));
    return handle;
  }

  async listCaptures(from: number, to: number): Promise<StoredCapture[]> {
    const captures: StoredCapture[] = [];

    for (let day = startOfDay(from); day <= to; day = startOfDay(addDays(day, 1))) {
      const dir = join(this.root, dayKey(day));
      let files: string[];
      try {
        files = await readdir(dir);
      } catch (error) {
        if (isMissing(error)) continue;
        throw error;
      }

      for (const file of files.filter((name) => name.endsWith('.json'))) {
        try {
          const parsed = StoredCaptureSchema.parse(JSON.parse(await readFile(join(dir, file), 'utf8')));
          if (parsed.timestamp >= from && parsed.timestamp <= to) captures.push(parsed);
        } catch (error) {
          log.warn({ file, err: errorMessage(error) }, 'skipping unreadable capture sidecar');
        }
      }
    }

    return captures.sort((a, b) => b.timestamp - a.timestamp);
  }

  async deleteImage(handle: string): Promise<number> {
    const imagePath = this.resolveHandle(handle);
    const sidecar = imagePath.replace(/\.png$/, '.json');
    let freed = 0;

    for (const path of imagePath === sidecar ? [imagePath] : [imagePath, sidecar]) {
      try {
        const { size } = await stat(path);
        await rm(path);
        freed += size;
      } catch (error) {
        if (!isMissing(error)) throw error;
      }
    }

    return freed;
  }

  async deleteCapturesOlderThan(cutoff: number): Promise<number> {
    const cutoffDay = dayKey(cutoff);
    let freed = 0;

    for (const name of await this.dayDirectories()) {
      if (name < cutoffDay) {
        const dir = join(this.root, name);
        freed += await directorySize(dir);
        await rm(dir, { recursive: true, force: true });
      }
    }

    return freed;
  }

  async deleteAllCaptures(): Promise<number> {
    const freed = await directorySize(this.root);
    await rm(this.root, { recursive: true, force: true });
    await mkdir(this.root, { recursive: true });
    log.info({ freed }, 'deleted all captures');
    return freed;
  }

  totalStorageBytes(): Promise<number> {
    return directorySize(this.root);
  }

  private async dayDirectories(): Promise<string[]> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory() && DAY_DIR.test(entry.name)).map((entry) => entry.name);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  private resolveHandle(handle: string): string {
    const path = resolve(this.root, handle);
    if (!path.startsWith(this.root + sep)) {
      throw new Error(`Capture handle escapes storage root: ${handle}`);
    }
    return path;
  }
}

async function directorySize(dir: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissing(error)) return 0;
    throw error;
  }

  let total = 0;
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(path);
    } else if (entry.isFile()) {
      total += (await stat(path)).size;
    }
  }
  return total;
}

/**
 * Map-backed storage for tests and embedding without a disk
 */
export class InMemoryCaptureStorage implements CaptureStorage {
  private readonly captures = new Map<string, { stored: StoredCapture; bytes: number }>();

  async save(capture: CaptureRecord): Promise<string> {
    const handle = `${dayKey(capture.timestamp)}/${capture.id}.png`;
    this.captures.set(handle, { stored: toStored(capture, handle), bytes: capture.image.length });
    return handle;
  }

  async listCaptures(from: number, to: number): Promise<StoredCapture[]> {
    return [...this.captures.values()]
      .map(({ stored }) => stored)
      .filter((stored) => stored.timestamp >= from && stored.timestamp <= to)
      .sort((a, b) => b.timestamp - a.timestamp);
  }

  async deleteImage(handle: string): Promise<number> {
    const existing = this.captures.get(handle);
    if (!existing) return 0;
    this.captures.delete(handle);
    return existing.bytes;
  }

  async deleteCapturesOlderThan(cutoff: number): Promise<number> {
    const cutoffDay = dayKey(cutoff);
    let freed = 0;
    for (const [handle, { stored, bytes }] of this.captures) {
      if (dayKey(stored.timestamp) < cutoffDay) {
        this.captures.delete(handle);
        freed += bytes;
      }
    }
    return freed;
  }

  async deleteAllCaptures(): Promise<number> {
    const freed = await this.totalStorageBytes();
    this.captures.clear();
    return freed;
  }

  async totalStorageBytes(): Promise<number> {
    let total = 0;
    for (const { bytes } of this.captures.values()) total += bytes;
    return total;
  }

  get size(): number {
    return this.captures.size;
  }
}
