/**
 * gridNavigator.ts — Drives the server-rendered tariff grid.
 *
 * The grid replaces its rows in place after every postback; the URL never
 * changes.  The navigator therefore works as a small state machine and
 * infers every transition from the DOM:
 *
 *   idle ──activate()──▶ loading ──awaitReady()──▶ ready
 *                            ▲                       │
 *                            └─────advance()─────────┘   (summary text changed)
 *
 * `ready` is reached once the busy indicator has cleared and either export
 * links or the empty-grid marker are present.  A page turn is confirmed only
 * by the page-summary text ("Page 3 of 312 …") differing from its snapshot
 * taken before the click.  Activation is held to the same rule when the page
 * already showed a summary before the show-all click.
 *
 * A turn that times out drops the grid back to `loading` and keeps the
 * snapshot.  Once ready again, `confirmLateTurn()` tells the caller whether
 * the postback landed after all.
 *
 * Known limitation: if two consecutive pages ever render an identical summary,
 * the turn goes undetected and surfaces as a pager timeout.
 */

import {
  FatalNavigationError,
  NavigatorStateError,
  StaleElementError,
  TransientNavigationError,
} from '../core/errors';
import { Logger } from '../core/logger';
import type { InteractiveSession, TariffId } from '../core/types';
import { sleep } from '../core/utils';
import { collectTariffIds } from '../scrapers';
import {
  DEFAULT_GRID_SELECTORS,
  isControlDisabled,
  locateControl,
  type GridSelectors,
  type LocatedControl,
} from './controlLocator';

export type GridState = 'idle' | 'loading' | 'ready';

export type AdvanceResult = 'advanced' | 'exhausted';

export interface GridNavigatorOptions {
  listUrl: string;
  gridReadyTimeoutMs: number;
  pagerTimeoutMs: number;
  /** Pause before re-reading after a stale element. */
  stalePauseMs: number;
  /** Page count assumed when neither the summary nor the pager reveals one. */
  fallbackTotalPages: number;
  /** Interval between readiness / summary polls. */
  pollMs?: number;
  selectors?: Partial<GridSelectors>;
  logger?: Logger;
}

export class GridNavigator {
  private state: GridState = 'idle';
  /** Summary shown before the show-all click; `null` when there was none. */
  private activationSummary: string | null = null;
  /** Summary from before a page turn that timed out. */
  private lateTurnFrom: string | null = null;
  private readonly session: InteractiveSession;
  private readonly options: GridNavigatorOptions;
  private readonly selectors: GridSelectors;
  private readonly logger: Logger;

  constructor(session: InteractiveSession, options: GridNavigatorOptions) {
    this.session = session;
    this.options = options;
    this.selectors = { ...DEFAULT_GRID_SELECTORS, ...options.selectors };
    this.logger = options.logger ?? new Logger('GridNavigator');
  }

  get currentState(): GridState {
    return this.state;
  }

  // ── idle ───────────────────────────────────────────────

  /** Load the list page and wait for the document to finish loading. */
  async open(): Promise<void> {
    this.expectState('open', 'idle');
    this.logger.info(`Opening ${this.options.listUrl}`);

    await this.session.navigate(this.options.listUrl);
    const loaded = await this.session.waitUntil(
      async () => (await this.session.execute('document.readyState')) === 'complete',
      { timeoutMs: this.options.gridReadyTimeoutMs, pollMs: this.options.pollMs },
    );
    if (!loaded) {
      throw new FatalNavigationError(
        `${this.options.listUrl} did not finish loading within ${this.options.gridReadyTimeoutMs} ms`,
      );
    }
  }

  /** Click "show all records".  Without that control enumeration cannot begin. */
  async activate(): Promise<void> {
    this.expectState('activate', 'idle');

    const control = await this.withStaleRetry('locating the show-all control', () =>
      locateControl(this.session, this.selectors.showAll),
    );
    if (!control) {
      const tried = this.selectors.showAll.map((c) => c.label).join(', ');
      throw new FatalNavigationError(`No "show all" control on the page (tried: ${tried})`);
    }

    const before = await this.readSummary();
    this.activationSummary = before === '' ? null : before;

    this.logger.info(`Activating the grid via "${control.candidate.label}"`);
    await this.session.click(control.element);
    this.state = 'loading';
  }

  // ── loading ────────────────────────────────────────────

  /**
   * Wait for the busy indicator to clear and rows (or the empty marker) to
   * appear.  A grid that settles with neither is an empty page, not an error.
   * After activation over an existing summary, the summary must change too.
   */
  async awaitReady(): Promise<void> {
    this.expectState('awaitReady', 'loading');

    const settled = await this.session.waitUntil(() => this.isSettled(), {
      timeoutMs: this.options.gridReadyTimeoutMs,
      pollMs: this.options.pollMs,
    });

    if (!settled) {
      const busy = await this.withStaleRetry('checking the busy indicator', () => this.isBusy());
      if (busy) {
        throw new TransientNavigationError(
          `Grid still busy after ${this.options.gridReadyTimeoutMs} ms`,
        );
      }
      if (
        this.activationSummary !== null &&
        (await this.readSummary()) === this.activationSummary
      ) {
        this.logger.warn(
          `Page summary still "${this.activationSummary}" after activation; reading the grid as shown`,
        );
      } else {
        this.logger.info('Grid settled without export links, treating the page as empty');
      }
    }

    this.activationSummary = null;
    this.state = 'ready';
  }

  // ── ready ──────────────────────────────────────────────

  /** Identifiers behind every export link on the current page. */
  async extractIdentifiers(): Promise<Set<TariffId>> {
    this.expectState('extractIdentifiers', 'ready');

    return this.withStaleRetry('reading export links', async () => {
      const links = await this.session.find(this.selectors.exportLinks);
      const targets: Array<string | null> = [];
      for (const link of links) {
        targets.push(await link.attribute('href'));
        targets.push(await link.attribute('onclick'));
      }
      return collectTariffIds(targets);
    });
  }

  /**
   * After a page turn timed out: whether the summary has since moved away
   * from its pre-click snapshot.  `false` when no turn is outstanding.
   */
  async confirmLateTurn(): Promise<boolean> {
    this.expectState('confirmLateTurn', 'ready');
    if (this.lateTurnFrom === null) return false;

    const now = await this.readSummary();
    const turned = now !== this.lateTurnFrom;
    this.lateTurnFrom = null;
    if (turned) this.logger.info(`Late page turn detected: now "${now}"`);
    return turned;
  }

  /** Whether an enabled "next" control exists.  Does not click. */
  async hasNextPage(): Promise<boolean> {
    this.expectState('hasNextPage', 'ready');
    const next = await this.withStaleRetry('locating the pager', () => this.locateEnabledNext());
    return next !== null;
  }

  /**
   * Click "next" and wait for the summary text to change.
   *
   * Returns `'exhausted'` (staying ready) when the control is missing or
   * disabled.  Throws `TransientNavigationError` if the summary does not
   * change within `pagerTimeoutMs`; the grid is then back in `loading` with
   * the pre-click summary kept for `confirmLateTurn()`.
   */
  async advance(): Promise<AdvanceResult> {
    this.expectState('advance', 'ready');
    this.lateTurnFrom = null;

    const before = await this.readSummary();

    const clicked = await this.withStaleRetry('clicking the pager', async () => {
      const next = await this.locateEnabledNext();
      if (!next) return false;
      this.logger.debug(`Clicking next via "${next.candidate.label}"`);
      await this.session.click(next.element);
      return true;
    });

    if (!clicked) {
      this.logger.info('Pager has no enabled "next" control, last page reached');
      return 'exhausted';
    }

    const changed = await this.session.waitUntil(
      async () => {
        try {
          return (await this.readSummaryOnce()) !== before;
        } catch (err) {
          // The summary node is replaced along with the rows.
          if (err instanceof StaleElementError) return false;
          throw err;
        }
      },
      { timeoutMs: this.options.pagerTimeoutMs, pollMs: this.options.pollMs },
    );

    if (!changed) {
      this.lateTurnFrom = before;
      this.state = 'loading';
      throw new TransientNavigationError(
        `Page summary still "${before}" ${this.options.pagerTimeoutMs} ms after clicking next`,
      );
    }

    this.state = 'loading';
    return 'advanced';
  }

  /**
   * Best guess at the number of pages: "of N" in the summary, else the
   * highest numbered pager link, else `fallbackTotalPages`.
   */
  async estimateTotalPages(): Promise<number> {
    const summary = await this.readSummary();
    const ofMatch = /\bof\s+([\d,]+)/i.exec(summary);
    if (ofMatch) {
      const total = Number(ofMatch[1].replace(/,/g, ''));
      if (Number.isSafeInteger(total) && total > 0) return total;
    }

    const numbers = await this.withStaleRetry('reading pager numbers', async () => {
      const values: number[] = [];
      for (const link of await this.session.find(this.selectors.pagerNumbers)) {
        const text = (await link.text()).trim();
        if (/^\d+$/.test(text)) values.push(Number(text));
      }
      return values;
    });
    if (numbers.length > 0) return Math.max(...numbers);

    this.logger.warn(
      `Could not determine the page count, assuming ${this.options.fallbackTotalPages}`,
    );
    return this.options.fallbackTotalPages;
  }

  /** Current page-summary text, whitespace-collapsed; "" when absent. */
  readSummary(): Promise<string> {
    return this.withStaleRetry('reading the page summary', () => this.readSummaryOnce());
  }

  // ── Internals ──────────────────────────────────────────

  private async readSummaryOnce(): Promise<string> {
    const control = await locateControl(this.session, this.selectors.pageSummary);
    if (!control) return '';
    return (await control.element.text()).replace(/\s+/g, ' ').trim();
  }

  private async locateEnabledNext(): Promise<LocatedControl | null> {
    const control = await locateControl(this.session, this.selectors.nextPage);
    if (!control) return null;
    if (await isControlDisabled(control.element)) return null;
    return control;
  }

  private async isBusy(): Promise<boolean> {
    for (const indicator of await this.session.find(this.selectors.busyIndicator)) {
      if (await indicator.isVisible()) return true;
    }
    return false;
  }

  private async isSettled(): Promise<boolean> {
    try {
      if (await this.isBusy()) return false;
      if (
        this.activationSummary !== null &&
        (await this.readSummaryOnce()) === this.activationSummary
      ) {
        return false;
      }
      if ((await this.session.find(this.selectors.exportLinks)).length > 0) return true;
      return (await this.session.find(this.selectors.emptyGrid)).length > 0;
    } catch (err) {
      if (err instanceof StaleElementError) return false;
      throw err;
    }
  }

  /**
   * Run `action`; on a stale element pause and run it once more.  A second
   * staleness becomes a `TransientNavigationError`.
   */
  private async withStaleRetry<T>(step: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (err) {
      if (!(err instanceof StaleElementError)) throw err;
      this.logger.debug(`Stale element while ${step}; retrying in ${this.options.stalePauseMs} ms`);
    }

    await sleep(this.options.stalePauseMs);

    try {
      return await action();
    } catch (err) {
      if (err instanceof StaleElementError) {
        throw new TransientNavigationError(`Element went stale twice while ${step}: ${err.message}`);
      }
      throw err;
    }
  }

  private expectState(operation: string, expected: GridState): void {
    if (this.state !== expected) {
      throw new NavigatorStateError(operation, this.state);
    }
  }
}
