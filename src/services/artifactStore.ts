/**
 * artifactStore.ts — Durable storage for export documents.
 *
 * Layout: one file per identifier, `<outputDir>/Tariff_<id>.xml`.  The file's
 * presence is the only persisted state (there is no manifest), so a re-run
 * simply skips every identifier that already has one.
 *
 * Writes are all-or-nothing: bytes go to a temp file in the same directory and
 * are renamed into place, so a crash or a concurrent writer can never leave a
 * truncated `Tariff_<id>.xml` behind.
 */

import { randomBytes } from 'crypto';
import { mkdir, readdir, rename, stat, unlink, writeFile } from 'fs/promises';
import path from 'path';
import type { TariffId } from '../core/types';

const ARTIFACT_NAME = /^Tariff_(\d+)\.xml$/;

export function artifactFileName(id: TariffId): string {
  return `Tariff_${id}.xml`;
}

export class ArtifactStore {
  readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = path.resolve(outputDir);
  }

  pathFor(id: TariffId): string {
    return path.join(this.outputDir, artifactFileName(id));
  }

  async ensureDir(): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
  }

  async exists(id: TariffId): Promise<boolean> {
    try {
      return (await stat(this.pathFor(id))).isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async write(id: TariffId, bytes: Buffer): Promise<string> {
    const target = this.pathFor(id);
    const temp = path.join(
      this.outputDir,
      `.${artifactFileName(id)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`,
    );

    await writeFile(temp, bytes);
    try {
      await rename(temp, target);
    } catch (err) {
      await unlink(temp).catch(() => undefined);
      throw err;
    }
    return target;
  }

  /** Identifiers that already have an artifact, ascending. */
  async list(): Promise<TariffId[]> {
    let names: string[];
    try {
      names = await readdir(this.outputDir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const ids: TariffId[] = [];
    for (const name of names) {
      const match = ARTIFACT_NAME.exec(name);
      if (match) ids.push(Number(match[1]));
    }
    return ids.sort((a, b) => a - b);
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
