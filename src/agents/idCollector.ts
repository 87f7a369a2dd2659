/**
 * idCollector.ts — Walks every page of the grid and gathers identifiers.
 *
 * Per page:  awaitReady → extractIdentifiers → merge → stop checks → advance
 *
 * Stop checks, first match wins:
 *   1. no enabled "next" control          → exhausted
 *   2. pagesVisited ≥ maxPages            → page-cap
 *   3. pagesVisited ≥ estimate + margin   → stall-guard
 *
 * A transient navigation fault re-runs the step that failed.  A page turn
 * that timed out is waited out like any postback; if the summary moved in the
 * meantime the new page is counted and read, otherwise the current page is
 * read again.  More than `navigationRetries` faults without reaching a new
 * page end the walk with `navigation-failed`; whatever was collected up to
 * then is still returned.
 */

import {
  describeError,
  FatalNavigationError,
  TransientNavigationError,
} from '../core/errors';
import { Logger } from '../core/logger';
import type {
  CollectionResult,
  CollectionStopReason,
  IdentifierCollector,
  TariffId,
} from '../core/types';
import type { GridNavigator } from './gridNavigator';

export interface IdCollectorOptions {
  maxPages: number;
  stallMarginPages: number;
  /** Transient faults tolerated between two successful page turns. */
  navigationRetries: number;
  /** Checked between pages. */
  signal?: AbortSignal;
  logger?: Logger;
}

export class IdCollector implements IdentifierCollector {
  private readonly navigator: GridNavigator;
  private readonly options: IdCollectorOptions;
  private readonly logger: Logger;

  constructor(navigator: GridNavigator, options: IdCollectorOptions) {
    this.navigator = navigator;
    this.options = options;
    this.logger = options.logger ?? new Logger('IdCollector');
  }

  async collect(): Promise<CollectionResult> {
    const nav = this.navigator;
    const identifiers = new Set<TariffId>();
    let pagesVisited = 0;
    let estimatedTotalPages = 0;
    let stallBound = Number.POSITIVE_INFINITY;
    let transientFaults = 0;
    let consecutiveFaults = 0;
    let onUncountedPage = true;

    const finish = (stopReason: CollectionStopReason): CollectionResult => {
      this.logger.info(
        `Collection stopped (${stopReason}): ${identifiers.size} identifier(s) ` +
          `across ${pagesVisited} page(s)`,
      );
      return {
        identifiers: [...identifiers].sort((a, b) => a - b),
        pagesVisited,
        estimatedTotalPages,
        stopReason,
        transientFaults,
      };
    };

    /** Record a transient fault; `false` once the retry budget is spent. */
    const absorb = (err: unknown, step: string): boolean => {
      if (!(err instanceof TransientNavigationError)) throw err;
      transientFaults++;
      consecutiveFaults++;
      if (consecutiveFaults > this.options.navigationRetries) {
        this.logger.error(`Giving up after ${consecutiveFaults} fault(s) while ${step}: ${err.message}`);
        return false;
      }
      this.logger.warn(`Transient fault while ${step} (${err.message}); retrying`);
      return true;
    };

    await this.start();

    for (;;) {
      if (this.options.signal?.aborted) return finish('cancelled');

      if (nav.currentState === 'loading') {
        try {
          await nav.awaitReady();
        } catch (err) {
          if (!absorb(err, 'waiting for the grid')) return finish('navigation-failed');
          continue;
        }
      }

      try {
        if (await nav.confirmLateTurn()) {
          onUncountedPage = true;
          consecutiveFaults = 0;
        }
      } catch (err) {
        if (!absorb(err, 'checking for a late page turn')) return finish('navigation-failed');
        continue;
      }

      if (onUncountedPage) {
        onUncountedPage = false;
        pagesVisited++;
      }

      if (estimatedTotalPages === 0) {
        try {
          estimatedTotalPages = await nav.estimateTotalPages();
        } catch (err) {
          if (!absorb(err, 'estimating the page count')) return finish('navigation-failed');
          continue;
        }
        stallBound = estimatedTotalPages + this.options.stallMarginPages;
        this.logger.info(`Grid reports ~${estimatedTotalPages} page(s)`);
      }

      let found: Set<TariffId>;
      try {
        found = await nav.extractIdentifiers();
      } catch (err) {
        if (!absorb(err, `reading page ${pagesVisited}`)) return finish('navigation-failed');
        continue;
      }

      const before = identifiers.size;
      for (const id of found) identifiers.add(id);
      const added = identifiers.size - before;
      this.logger.info(
        `Page ${pagesVisited}/${estimatedTotalPages}: ${found.size} link(s), ` +
          `${added} new, ${identifiers.size} total`,
      );
      if (added === 0 && pagesVisited > 1) {
        this.logger.warn(`Page ${pagesVisited} added no new identifiers; the pager may not have moved`);
      }

      let hasNext: boolean;
      try {
        hasNext = await nav.hasNextPage();
      } catch (err) {
        if (!absorb(err, 'checking the pager')) return finish('navigation-failed');
        continue;
      }

      if (!hasNext) return finish('exhausted');
      if (pagesVisited >= this.options.maxPages) return finish('page-cap');
      if (pagesVisited >= stallBound) {
        this.logger.warn(
          `Visited ${pagesVisited} page(s) against an estimate of ${estimatedTotalPages}, stopping`,
        );
        return finish('stall-guard');
      }

      try {
        if ((await nav.advance()) === 'exhausted') return finish('exhausted');
        onUncountedPage = true;
        consecutiveFaults = 0;
      } catch (err) {
        if (!absorb(err, `leaving page ${pagesVisited}`)) return finish('navigation-failed');
      }
    }
  }

  /** open + activate.  Any failure here means enumeration cannot begin. */
  private async start(): Promise<void> {
    try {
      await this.navigator.open();
      await this.navigator.activate();
    } catch (err) {
      if (err instanceof FatalNavigationError) throw err;
      throw new FatalNavigationError(`Could not start enumeration: ${describeError(err)}`);
    }
  }
}
