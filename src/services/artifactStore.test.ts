import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArtifactStore, artifactFileName } from './artifactStore';

describe('ArtifactStore', () => {
  let dir: string;
  let store: ArtifactStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'artifact-store-'));
    store = new ArtifactStore(path.join(dir, 'TariffXML'));
    await store.ensureDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('names artifacts after the identifier', () => {
    expect(artifactFileName(1042)).toBe('Tariff_1042.xml');
    expect(store.pathFor(1042)).toBe(path.join(dir, 'TariffXML', 'Tariff_1042.xml'));
  });

  it('writes the bytes and leaves no temp file behind', async () => {
    expect(await store.exists(7)).toBe(false);

    const written = await store.write(7, Buffer.from('<Tariff/>'));

    expect(written).toBe(store.pathFor(7));
    expect(await store.exists(7)).toBe(true);
    expect(await readFile(written, 'utf8')).toBe('<Tariff/>');
    expect(await readdir(store.outputDir)).toEqual(['Tariff_7.xml']);
  });

  it('replaces an existing artifact', async () => {
    await store.write(7, Buffer.from('old'));
    await store.write(7, Buffer.from('new'));
    expect(await readFile(store.pathFor(7), 'utf8')).toBe('new');
  });

  it('does not count a directory as an artifact', async () => {
    await mkdir(store.pathFor(9));
    expect(await store.exists(9)).toBe(false);
  });

  it('removes the temp file when the rename fails', async () => {
    await mkdir(store.pathFor(9));

    await expect(store.write(9, Buffer.from('x'))).rejects.toThrow();
    expect(await readdir(store.outputDir)).toEqual(['Tariff_9.xml']);
  });

  it('lists stored identifiers in ascending order', async () => {
    await store.write(30, Buffer.from('a'));
    await store.write(4, Buffer.from('b'));
    await writeFile(path.join(store.outputDir, 'notes.txt'), 'ignored');

    expect(await store.list()).toEqual([4, 30]);
  });

  it('lists nothing for a missing directory', async () => {
    expect(await new ArtifactStore(path.join(dir, 'absent')).list()).toEqual([]);
  });
});
