/**
 * pipelineDriver.ts — Turns an identifier set into files on disk.
 *
 * For each identifier, ascending:
 *   artifact exists?        → skipped   (no request made; failed if the check itself errors)
 *   beyond maxItems?        → deferred
 *   stop requested?         → cancelled (checked when the job starts, never mid-fetch)
 *   fetch → write           → downloaded, or failed once retryAttempts are spent
 *
 * Fetches run through a Bottleneck pool (CONCURRENCY / REQUEST_SPACING_MS).
 * One item's failure never affects another; the driver itself only throws
 * for programming errors.
 */

import { classifyFailure, describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type {
  ExportSource,
  ItemOutcome,
  ItemStatus,
  PipelineSummary,
  TariffId,
} from '../core/types';
import { sleep } from '../core/utils';
import { createExportLimiter } from '../middleware/compliance';
import type { ArtifactStore } from '../services/artifactStore';

export interface PipelineDriverOptions {
  /** Fetch attempts per identifier, including the first. */
  retryAttempts: number;
  retryDelayMs: number;
  concurrency: number;
  requestSpacingMs: number;
  /** Identifiers handed to the fetcher in this run; the rest are deferred. */
  maxItems?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export class PipelineDriver {
  private readonly source: ExportSource;
  private readonly store: ArtifactStore;
  private readonly options: PipelineDriverOptions;
  private readonly logger: Logger;

  constructor(source: ExportSource, store: ArtifactStore, options: PipelineDriverOptions) {
    this.source = source;
    this.store = store;
    this.options = options;
    this.logger = options.logger ?? new Logger('PipelineDriver');
  }

  async run(ids: Iterable<TariffId>): Promise<PipelineSummary> {
    const workList = [...new Set(ids)].sort((a, b) => a - b);
    const outcomes = new Map<TariffId, ItemOutcome>();
    const pending: TariffId[] = [];

    await this.store.ensureDir();

    // ── Skip pass ────────────────────────────────────────
    for (const id of workList) {
      const present = await this.checkExists(id);
      if (present === true) {
        outcomes.set(id, { id, status: 'skipped', attempts: 0 });
      } else if (present === false) {
        pending.push(id);
      } else {
        outcomes.set(id, present);
      }
    }

    const cap = this.options.maxItems ?? pending.length;
    const toFetch = pending.slice(0, cap);
    for (const id of pending.slice(cap)) {
      outcomes.set(id, { id, status: 'deferred', attempts: 0 });
    }

    const skipped = workList.filter((id) => outcomes.get(id)?.status === 'skipped').length;
    this.logger.info(
      `${workList.length} identifier(s): ${skipped} already on disk, ` +
        `${toFetch.length} to fetch` +
        (pending.length > toFetch.length ? `, ${pending.length - toFetch.length} deferred` : ''),
    );

    // ── Fetch pass ───────────────────────────────────────
    const limiter = createExportLimiter({
      concurrency: this.options.concurrency,
      spacingMs: this.options.requestSpacingMs,
    });
    const results = await Promise.all(
      toFetch.map((id) => limiter.schedule(() => this.process(id))),
    );
    for (const outcome of results) outcomes.set(outcome.id, outcome);

    return summarize(workList.map((id) => outcomes.get(id) ?? lost(id)));
  }

  private async process(id: TariffId): Promise<ItemOutcome> {
    if (this.options.signal?.aborted) {
      return { id, status: 'cancelled', attempts: 0 };
    }
    // Another run may have written it since the skip pass.
    const present = await this.checkExists(id);
    if (present === true) return { id, status: 'skipped', attempts: 0 };
    if (present !== false) return present;
    return this.fetchWithRetry(id);
  }

  /** `exists()` for one item; an I/O error becomes that item's failure. */
  private async checkExists(id: TariffId): Promise<boolean | ItemOutcome> {
    try {
      return await this.store.exists(id);
    } catch (err) {
      const error = describeError(err);
      this.logger.error(`tid=${id}: cannot check for an existing file: ${error}`);
      return { id, status: 'failed', attempts: 0, error };
    }
  }

  private async fetchWithRetry(id: TariffId): Promise<ItemOutcome> {
    const attempts = Math.max(1, this.options.retryAttempts);
    let lastError = '';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const bytes = await this.source.fetch(id);
        const file = await this.store.write(id, bytes);
        this.logger.info(`tid=${id}: saved ${bytes.length} byte(s) to ${file}`);
        return { id, status: 'downloaded', attempts: attempt };
      } catch (err) {
        lastError = describeError(err);
        this.logger.warn(`tid=${id}: attempt ${attempt}/${attempts} failed: ${lastError}`);
        this.logger.debug(`tid=${id}: failure classified as ${classifyFailure(err)}`);
      }

      if (attempt < attempts) {
        await sleep(this.options.retryDelayMs);
      }
    }

    this.logger.error(`tid=${id}: giving up after ${attempts} attempt(s)`);
    return { id, status: 'failed', attempts, error: lastError };
  }
}

function summarize(outcomes: ItemOutcome[]): PipelineSummary {
  const count = (status: ItemStatus): number =>
    outcomes.filter((outcome) => outcome.status === status).length;

  return {
    total: outcomes.length,
    skipped: count('skipped'),
    downloaded: count('downloaded'),
    failed: count('failed'),
    cancelled: count('cancelled'),
    deferred: count('deferred'),
    failedIds: outcomes.filter((o) => o.status === 'failed').map((o) => o.id),
    outcomes,
  };
}

/** Unreachable: every identifier receives an outcome above. */
function lost(id: TariffId): never {
  throw new Error(`No outcome recorded for tid=${id}`);
}

