import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileCaptureStorage, InMemoryCaptureStorage, type CaptureRecord } from './capture-storage';

const march10 = new Date(2026, 2, 10, 15, 0, 0).getTime();
const march12 = new Date(2026, 2, 12, 9, 30, 0).getTime();

function record(id: string, timestamp: number, image = 'png-bytes'): CaptureRecord {
  return {
    id,
    timestamp,
    metadata: {
      appName: 'Safari',
      appIdentifier: 'com.apple.Safari',
      windowTitle: 'Release notes',
      browserUrl: 'https://example.com/notes',
    },
    image: Buffer.from(image),
    text: 'Release notes for version two',
    textConfidence: 0.92,
  };
}

describe('FileCaptureStorage', () => {
  let root: string;
  let storage: FileCaptureStorage;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'screentrail-captures-'));
    storage = new FileCaptureStorage(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes the image and a sidecar under the day directory', async () => {
    const handle = await storage.save(record('a1', march10));

    expect(handle).toBe('2026-03-10/a1.png');
    expect((await readdir(join(root, '2026-03-10'))).sort()).toEqual(['a1.json', 'a1.png']);
    expect(await readFile(join(root, '2026-03-10', 'a1.png'), 'utf8')).toBe('png-bytes');

    const sidecar: unknown = JSON.parse(await readFile(join(root, '2026-03-10', 'a1.json'), 'utf8'));
    expect(sidecar).toMatchObject({ id: 'a1', imagePath: handle, textConfidence: 0.92 });
  });

  it('lists captures in range newest first and skips unreadable sidecars', async () => {
    await storage.save(record('a1', march10));
    await storage.save(record('a2', march10 + 60_000));
    await storage.save(record('b1', march12));
    await writeFile(join(root, '2026-03-10', 'broken.json'), '{not json');

    const all = await storage.listCaptures(march10, march12);
    expect(all.map((c) => c.id)).toEqual(['b1', 'a2', 'a1']);

    const firstDay = await storage.listCaptures(march10, march10 + 30_000);
    expect(firstDay.map((c) => c.id)).toEqual(['a1']);
  });

  it('deletes one capture and reports the bytes freed', async () => {
    const handle = await storage.save(record('a1', march10));
    const sidecarBytes = (await readFile(join(root, '2026-03-10', 'a1.json'))).length;

    expect(await storage.deleteImage(handle)).toBe('png-bytes'.length + sidecarBytes);
    expect(await readdir(join(root, '2026-03-10'))).toEqual([]);
    expect(await storage.deleteImage(handle)).toBe(0);
  });

  it('rejects handles outside the storage root', async () => {
    await expect(storage.deleteImage('../outside.png')).rejects.toThrow(
      'Capture handle escapes storage root: ../outside.png',
    );
  });

  it('removes whole day directories before the cutoff day', async () => {
    await storage.save(record('a1', march10));
    await storage.save(record('b1', march12));

    const freed = await storage.deleteCapturesOlderThan(new Date(2026, 2, 12, 0, 0, 0).getTime());

    expect(freed).toBeGreaterThan(0);
    expect(await readdir(root)).toEqual(['2026-03-12']);
  });

  it('totals and clears all captures', async () => {
    await storage.save(record('a1', march10));
    await storage.save(record('b1', march12));
    const total = await storage.totalStorageBytes();

    expect(await storage.deleteAllCaptures()).toBe(total);
    expect(await storage.totalStorageBytes()).toBe(0);
    expect(await readdir(root)).toEqual([]);
  });
});

describe('InMemoryCaptureStorage', () => {
  it('tracks image bytes per capture', async () => {
    const storage = new InMemoryCaptureStorage();
    const handle = await storage.save(record('a1', march10, 'abcd'));
    await storage.save(record('b1', march12, 'abcdefgh'));

    expect(await storage.totalStorageBytes()).toBe(12);
    expect(await storage.deleteImage(handle)).toBe(4);
    expect(await storage.deleteImage(handle)).toBe(0);
    expect(storage.size).toBe(1);
  });

  it('deletes captures from days before the cutoff day', async () => {
    const storage = new InMemoryCaptureStorage();
    await storage.save(record('a1', march10, 'abcd'));
    await storage.save(record('b1', march12, 'abcdefgh'));

    expect(await storage.deleteCapturesOlderThan(march12)).toBe(4);
    expect((await storage.listCaptures(0, march12)).map((c) => c.id)).toEqual(['b1']);
    expect(await storage.deleteAllCaptures()).toBe(8);
    expect(storage.size).toBe(0);
  });
});
