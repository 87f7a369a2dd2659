/**
 * types.ts — Shared type definitions for the harvesting pipeline.
 *
 * Collector, fetcher, driver and store all agree on the shapes below.  The
 * two collaborator interfaces (InteractiveSession, HttpSession) are the only
 * things the core knows about the browser and the HTTP client; any compliant
 * implementation can be substituted.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';

// ─── Identifier ────────────────────────────────────────────

/** Positive integer taken from a record's export link (`tid=<digits>`). */
export type TariffId = number;

// ─── Interactive session (rendering engine) ────────────────

/**
 * A handle to one element of the live page.  Implementations raise
 * `StaleElementError` when the underlying node was replaced mid-read.
 */
export interface SessionElement {
  attribute(name: string): Promise<string | null>;
  text(): Promise<string>;
  isVisible(): Promise<boolean>;
}

export interface WaitOptions {
  timeoutMs: number;
  /** Interval between predicate evaluations.  Defaults to 250 ms. */
  pollMs?: number;
}

export interface InteractiveSession {
  navigate(url: string): Promise<void>;
  /** Zero or more elements matching a CSS selector. */
  find(selector: string): Promise<SessionElement[]>;
  /** Script-driven click, so overlays cannot intercept it. */
  click(element: SessionElement): Promise<void>;
  /** Evaluate a script expression in the page context. */
  execute(script: string): Promise<unknown>;
  /** Resolves `false` when `timeoutMs` elapses before the predicate holds. */
  waitUntil(predicate: () => Promise<boolean>, options: WaitOptions): Promise<boolean>;
}

// ─── HTTP session ──────────────────────────────────────────

export interface HttpResponse {
  statusCode: number;
  /** Final URL after redirects. */
  url: string;
  /** Raw response bytes. */
  body: Buffer;
  /** Body decoded as UTF-8. */
  text: string;
}

/** Cookie-preserving client; requests to the same host share one session. */
export interface HttpSession {
  get(url: string): Promise<HttpResponse>;
  post(url: string, form: Record<string, string>): Promise<HttpResponse>;
}

/** Anything that can produce the export bytes for one identifier. */
export interface ExportSource {
  fetch(id: TariffId): Promise<Buffer>;
}

// ─── Collection result ─────────────────────────────────────

export type CollectionStopReason =
  | 'exhausted'          // pager reported no further pages
  | 'page-cap'           // MAX_PAGES reached
  | 'stall-guard'        // far past the estimated page count
  | 'navigation-failed'  // transient navigation faults exceeded the retry budget
  | 'cancelled';         // stop signal observed between pages

export interface CollectionResult {
  /** Every identifier seen, ascending. */
  identifiers: TariffId[];
  pagesVisited: number;
  estimatedTotalPages: number;
  stopReason: CollectionStopReason;
  /** Transient navigation faults absorbed along the way. */
  transientFaults: number;
}

/** Produces the identifier set; the harvester does not care how. */
export interface IdentifierCollector {
  collect(): Promise<CollectionResult>;
}

// ─── Pipeline result ───────────────────────────────────────

export type ItemStatus = 'skipped' | 'downloaded' | 'failed' | 'cancelled' | 'deferred';

export interface ItemOutcome {
  id: TariffId;
  status: ItemStatus;
  /** Fetch attempts made for this item (0 when it never reached the fetcher). */
  attempts: number;
  /** Last error message, for failed items. */
  error?: string;
}

export interface PipelineSummary {
  total: number;
  skipped: number;
  downloaded: number;
  failed: number;
  cancelled: number;
  deferred: number;
  /** Ascending. */
  failedIds: TariffId[];
  /** One entry per identifier, ascending by id. */
  outcomes: ItemOutcome[];
}

export interface HarvestReport {
  collection: CollectionResult;
  summary: PipelineSummary;
  startedAt: string;
  finishedAt: string;
  /** Wall-clock duration as `hh:mm:ss`. */
  elapsed: string;
}

// ─── Configuration ─────────────────────────────────────────

export interface HarvesterConfig {
  listUrl: string;
  /** Export endpoint with a `{{tid}}` placeholder. */
  exportUrlTemplate: string;
  outputDir: string;
  maxPages: number;
  retryAttempts: number;
  retryDelayMs: number;
  navigationRetries: number;
  gridReadyTimeoutMs: number;
  pagerTimeoutMs: number;
  exportTimeoutMs: number;
  stalePauseMs: number;
  /** Cap on identifiers sent to the fetcher in one run. */
  maxItems?: number;
  concurrency: number;
  requestSpacingMs: number;
  stallMarginPages: number;
  fallbackTotalPages: number;
  headless: boolean;
  windowWidth: number;
  windowHeight: number;
  chromePath?: string;
  userAgent?: string;
  logLevel: LogLevel;
  logFile?: string;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const lowerCase = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

const integer = (fallback: number, min: number = 1) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const optionalInteger = () =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(1).optional());

const optionalString = () => z.preprocess(blankToUndefined, z.string().optional());

const flag = (fallback: boolean) =>
  z.preprocess(
    (value) => lowerCase(blankToUndefined(value)),
    z
      .enum(['true', 'false', '1', '0', 'yes', 'no'])
      .default(fallback ? 'true' : 'false')
      .transform((value) => value === 'true' || value === '1' || value === 'yes'),
  );

const EnvSchema = z.object({
  TARIFF_LIST_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('https://etariff.ferc.gov/TariffList.aspx'),
  ),
  EXPORT_URL_TEMPLATE: z.preprocess(
    blankToUndefined,
    z
      .string()
      .default('https://etariff.ferc.gov/TariffBrowser.aspx?tid={{tid}}')
      .refine((value) => value.includes('{{tid}}'), {
        message: 'must contain the {{tid}} placeholder',
      }),
  ),
  OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().default('TariffXML')),
  MAX_PAGES: integer(350),
  RETRY_ATTEMPTS: integer(3),
  RETRY_DELAY_MS: integer(3_000, 0),
  NAVIGATION_RETRIES: integer(1, 0),
  GRID_READY_TIMEOUT_MS: integer(30_000),
  PAGER_TIMEOUT_MS: integer(15_000),
  EXPORT_TIMEOUT_MS: integer(30_000),
  STALE_PAUSE_MS: integer(500, 0),
  MAX_ITEMS: optionalInteger(),
  CONCURRENCY: integer(3),
  REQUEST_SPACING_MS: integer(500, 0),
  STALL_MARGIN_PAGES: integer(10, 0),
  FALLBACK_TOTAL_PAGES: integer(300),
  HEADLESS: flag(true),
  WINDOW_WIDTH: integer(1920),
  WINDOW_HEIGHT: integer(1080),
  CHROME_PATH: optionalString(),
  USER_AGENT: optionalString(),
  LOG_LEVEL: z.preprocess(
    (value) => lowerCase(blankToUndefined(value)),
    z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ),
  LOG_FILE: optionalString(),
});

/**
 * Build a HarvesterConfig from environment variables with defaults.
 * Throws `ConfigError` listing every invalid variable.
 */
export function loadHarvesterConfig(
  env: NodeJS.ProcessEnv = process.env,
): HarvesterConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    listUrl: e.TARIFF_LIST_URL,
    exportUrlTemplate: e.EXPORT_URL_TEMPLATE,
    outputDir: e.OUTPUT_DIR,
    maxPages: e.MAX_PAGES,
    retryAttempts: e.RETRY_ATTEMPTS,
    retryDelayMs: e.RETRY_DELAY_MS,
    navigationRetries: e.NAVIGATION_RETRIES,
    gridReadyTimeoutMs: e.GRID_READY_TIMEOUT_MS,
    pagerTimeoutMs: e.PAGER_TIMEOUT_MS,
    exportTimeoutMs: e.EXPORT_TIMEOUT_MS,
    stalePauseMs: e.STALE_PAUSE_MS,
    maxItems: e.MAX_ITEMS,
    concurrency: e.CONCURRENCY,
    requestSpacingMs: e.REQUEST_SPACING_MS,
    stallMarginPages: e.STALL_MARGIN_PAGES,
    fallbackTotalPages: e.FALLBACK_TOTAL_PAGES,
    headless: e.HEADLESS,
    windowWidth: e.WINDOW_WIDTH,
    windowHeight: e.WINDOW_HEIGHT,
    chromePath: e.CHROME_PATH,
    userAgent: e.USER_AGENT,
    logLevel: e.LOG_LEVEL,
    logFile: e.LOG_FILE,
  };
}
