/**
 * tariffHarvester.ts — Top-level orchestrator.
 *
 *   1. COLLECT  → IdCollector walks the grid (browser session)
 *   2. EXPORT   → PipelineDriver skips, fetches and writes each identifier
 *   3. REPORT   → HarvestReport + formatSummary() for the operator
 *
 * The browser is only needed for stage 1; `createHarvester` shuts it down
 * through `SessionProvider.close()` as soon as collection ends.
 */

import { Duration } from 'luxon';
import { ExportFetcher, GridNavigator, IdCollector, PipelineDriver } from './agents';
import { Logger } from './core/logger';
import type {
  HarvesterConfig,
  HarvestReport,
  HttpSession,
  IdentifierCollector,
  InteractiveSession,
} from './core/types';
import { ArtifactStore } from './services/artifactStore';

export class TariffHarvester {
  private readonly collector: IdentifierCollector;
  private readonly driver: PipelineDriver;
  private readonly store: ArtifactStore;
  private readonly logger: Logger;

  constructor(
    collector: IdentifierCollector,
    driver: PipelineDriver,
    store: ArtifactStore,
    logger?: Logger,
  ) {
    this.collector = collector;
    this.driver = driver;
    this.store = store;
    this.logger = logger ?? new Logger('TariffHarvester');
  }

  async run(): Promise<HarvestReport> {
    const started = new Date();
    await this.store.ensureDir();
    this.logger.info(`Writing exports to ${this.store.outputDir}`);

    // ── Stage 1: COLLECT ───────────────────────────────────
    const collection = await this.collector.collect();

    // ── Stage 2: EXPORT ────────────────────────────────────
    const summary = await this.driver.run(collection.identifiers);

    // ── Stage 3: REPORT ────────────────────────────────────
    const finished = new Date();
    return {
      collection,
      summary,
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      elapsed: Duration.fromMillis(finished.getTime() - started.getTime()).toFormat('hh:mm:ss'),
    };
  }
}

/** Operator-facing summary; the last line always names the failed ids. */
export function formatSummary(report: HarvestReport): string[] {
  const { collection, summary } = report;
  return [
    `Identifiers collected: ${collection.identifiers.length} across ` +
      `${collection.pagesVisited} page(s) (stopped: ${collection.stopReason})`,
    `Downloaded: ${summary.downloaded}`,
    `Skipped (already on disk): ${summary.skipped}`,
    `Failed: ${summary.failed}`,
    `Cancelled: ${summary.cancelled}`,
    `Deferred: ${summary.deferred}`,
    `Elapsed: ${report.elapsed}`,
    `Failed ids: ${summary.failedIds.length > 0 ? summary.failedIds.join(', ') : 'none'}`,
  ];
}

// ─── Wiring ────────────────────────────────────────────────

/** Lends an interactive session for the duration of `fn`. */
export interface SessionProvider {
  withSession<T>(fn: (session: InteractiveSession) => Promise<T>): Promise<T>;
  /** Release the browser behind the sessions; safe to call more than once. */
  close(): Promise<void>;
}

export interface HarvesterWiring {
  sessions: SessionProvider;
  http: HttpSession;
  logger: Logger;
  signal?: AbortSignal;
}

export function createHarvester(config: HarvesterConfig, wiring: HarvesterWiring): TariffHarvester {
  const { sessions, http, logger, signal } = wiring;
  const store = new ArtifactStore(config.outputDir);

  const collector: IdentifierCollector = {
    async collect() {
      try {
        return await sessions.withSession((session) => {
          const navigator = new GridNavigator(session, {
            listUrl: config.listUrl,
            gridReadyTimeoutMs: config.gridReadyTimeoutMs,
            pagerTimeoutMs: config.pagerTimeoutMs,
            stalePauseMs: config.stalePauseMs,
            fallbackTotalPages: config.fallbackTotalPages,
            logger: logger.child('GridNavigator'),
          });
          return new IdCollector(navigator, {
            maxPages: config.maxPages,
            stallMarginPages: config.stallMarginPages,
            navigationRetries: config.navigationRetries,
            signal,
            logger: logger.child('IdCollector'),
          }).collect();
        });
      } finally {
        await sessions.close();
      }
    },
  };

  const fetcher = new ExportFetcher(http, {
    exportUrlTemplate: config.exportUrlTemplate,
    logger: logger.child('ExportFetcher'),
  });

  const driver = new PipelineDriver(fetcher, store, {
    retryAttempts: config.retryAttempts,
    retryDelayMs: config.retryDelayMs,
    concurrency: config.concurrency,
    requestSpacingMs: config.requestSpacingMs,
    maxItems: config.maxItems,
    signal,
    logger: logger.child('PipelineDriver'),
  });

  return new TariffHarvester(collector, driver, store, logger);
}
