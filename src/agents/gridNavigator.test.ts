import { describe, expect, it } from 'vitest';
import {
  FatalNavigationError,
  NavigatorStateError,
  TransientNavigationError,
} from '../core/errors';
import { captureLogger, FakeGridSession, type FakeGridOptions } from '../testing/fakes';
import { GridNavigator } from './gridNavigator';

const LIST_URL = 'https://tariffs.test/TariffList.aspx';

function setup(options: FakeGridOptions) {
  const session = new FakeGridSession(options);
  const { logger, lines } = captureLogger('GridNavigator');
  const navigator = new GridNavigator(session, {
    listUrl: LIST_URL,
    gridReadyTimeoutMs: 1_000,
    pagerTimeoutMs: 1_000,
    stalePauseMs: 0,
    fallbackTotalPages: 300,
    logger,
  });
  return { session, navigator, lines };
}

async function readyOnFirstPage(options: FakeGridOptions) {
  const ctx = setup(options);
  await ctx.navigator.open();
  await ctx.navigator.activate();
  await ctx.navigator.awaitReady();
  return ctx;
}

describe('GridNavigator', () => {
  it('opens the list page, activates the grid and reads the first page', async () => {
    const { session, navigator } = setup({ pages: [[100, 101]] });

    await navigator.open();
    expect(session.visitedUrls).toEqual([LIST_URL]);
    expect(navigator.currentState).toBe('idle');

    await navigator.activate();
    expect(navigator.currentState).toBe('loading');

    await navigator.awaitReady();
    expect(navigator.currentState).toBe('ready');
    expect(await navigator.extractIdentifiers()).toEqual(new Set([100, 101]));
  });

  it('refuses operations from the wrong state', async () => {
    const { navigator } = setup({ pages: [[1]] });

    await expect(navigator.extractIdentifiers()).rejects.toThrow(
      new NavigatorStateError('extractIdentifiers', 'idle'),
    );
    await expect(navigator.advance()).rejects.toBeInstanceOf(NavigatorStateError);
  });

  it('fails fatally when there is no show-all control', async () => {
    const { navigator } = setup({ pages: [[1]], hasShowAll: false });
    await navigator.open();

    await expect(navigator.activate()).rejects.toBeInstanceOf(FatalNavigationError);
    expect(navigator.currentState).toBe('idle');
  });

  it('waits for the busy indicator to clear', async () => {
    const { navigator } = await readyOnFirstPage({ pages: [[5]], busyChecks: 3 });
    expect(await navigator.extractIdentifiers()).toEqual(new Set([5]));
  });

  it('reports a grid that never stops loading as transient', async () => {
    const { navigator } = setup({ pages: [[5]], busyForever: true });
    await navigator.open();
    await navigator.activate();

    await expect(navigator.awaitReady()).rejects.toBeInstanceOf(TransientNavigationError);
    expect(navigator.currentState).toBe('loading');
  });

  it('accepts a page with the empty-grid marker', async () => {
    const { navigator } = await readyOnFirstPage({ pages: [[]] });
    expect(await navigator.extractIdentifiers()).toEqual(new Set());
  });

  it('treats a settled grid with neither links nor marker as empty', async () => {
    const { navigator, lines } = await readyOnFirstPage({ pages: [[]], hasEmptyMarker: false });

    expect(navigator.currentState).toBe('ready');
    expect(
      lines.some((line) =>
        line.endsWith('[GridNavigator] Grid settled without export links, treating the page as empty'),
      ),
    ).toBe(true);
  });

  it('advances when the summary changes and reports exhaustion on the last page', async () => {
    const { session, navigator } = await readyOnFirstPage({ pages: [[1], [2]] });

    expect(await navigator.hasNextPage()).toBe(true);
    expect(await navigator.advance()).toBe('advanced');
    expect(navigator.currentState).toBe('loading');
    expect(session.currentPage).toBe(2);

    await navigator.awaitReady();
    expect(await navigator.extractIdentifiers()).toEqual(new Set([2]));
    expect(await navigator.hasNextPage()).toBe(false);
    expect(await navigator.advance()).toBe('exhausted');
    expect(navigator.currentState).toBe('ready');
    expect(session.nextClicks).toBe(1);
  });

  it('raises a transient error when a page turn does not take', async () => {
    const { navigator } = await readyOnFirstPage({ pages: [[1], [2]], stuckAdvances: 1 });

    await expect(navigator.advance()).rejects.toThrow(
      new TransientNavigationError('Page summary still "Page 1 of 2" 1000 ms after clicking next'),
    );
    expect(navigator.currentState).toBe('loading');

    await navigator.awaitReady();
    expect(await navigator.confirmLateTurn()).toBe(false);
    expect(await navigator.extractIdentifiers()).toEqual(new Set([1]));
    expect(await navigator.advance()).toBe('advanced');
  });

  it('notices a page turn that lands after the pager wait gave up', async () => {
    const { session, navigator, lines } = await readyOnFirstPage({
      pages: [[1], [2]],
      lateAdvances: 1,
    });

    await expect(navigator.advance()).rejects.toBeInstanceOf(TransientNavigationError);
    expect(navigator.currentState).toBe('loading');

    await navigator.awaitReady();
    expect(await navigator.confirmLateTurn()).toBe(true);
    expect(session.currentPage).toBe(2);
    expect(await navigator.extractIdentifiers()).toEqual(new Set([2]));
    expect(lines.at(-1)).toMatch(/\[GridNavigator\] Late page turn detected: now "Page 2 of 2"$/);

    expect(await navigator.confirmLateTurn()).toBe(false);
  });

  it('waits for a grid shown before activation to be replaced', async () => {
    const { navigator } = await readyOnFirstPage({
      pages: [[1, 2], [3]],
      initialGrid: { ids: [900], summary: 'Page 1 of 1 (1 items)', lingerReads: 2 },
    });

    expect(await navigator.extractIdentifiers()).toEqual(new Set([1, 2]));
    expect(await navigator.estimateTotalPages()).toBe(2);
  });

  it('reads the grid as shown when activation never changes the summary', async () => {
    const { navigator, lines } = await readyOnFirstPage({
      pages: [[1, 2]],
      initialGrid: { ids: [900], summary: 'Page 1 of 1 (1 items)', lingerReads: 99 },
    });

    expect(navigator.currentState).toBe('ready');
    expect(await navigator.extractIdentifiers()).toEqual(new Set([900]));
    expect(
      lines.some((line) =>
        line.endsWith(
          '[GridNavigator] Page summary still "Page 1 of 1 (1 items)" after activation; reading the grid as shown',
        ),
      ),
    ).toBe(true);
  });

  it('re-reads links once after a stale element', async () => {
    const { navigator } = await readyOnFirstPage({ pages: [[10, 11]], staleLinkReads: 1 });
    expect(await navigator.extractIdentifiers()).toEqual(new Set([10, 11]));
  });

  it('gives up with a transient error when links go stale twice', async () => {
    const { navigator } = await readyOnFirstPage({ pages: [[10, 11]], staleLinkReads: 2 });
    await expect(navigator.extractIdentifiers()).rejects.toBeInstanceOf(TransientNavigationError);
  });

  it('looks up the pager again after one stale read', async () => {
    const { navigator } = await readyOnFirstPage({ pages: [[1], [2]], staleNextReads: 1 });
    expect(await navigator.hasNextPage()).toBe(true);
  });

  it('reports a pager that goes stale twice as transient', async () => {
    const { navigator } = await readyOnFirstPage({ pages: [[1], [2]], staleNextReads: 2 });
    await expect(navigator.hasNextPage()).rejects.toBeInstanceOf(TransientNavigationError);
  });

  it('clicks next after a stale pager read', async () => {
    const { session, navigator } = await readyOnFirstPage({ pages: [[1], [2]], staleNextReads: 1 });

    expect(await navigator.advance()).toBe('advanced');
    expect(session.currentPage).toBe(2);
    expect(session.nextClicks).toBe(1);
  });

  it('re-reads the page summary once before a page turn', async () => {
    const { session, navigator } = await readyOnFirstPage({
      pages: [[1], [2]],
      staleSummaryReads: 1,
    });

    expect(await navigator.advance()).toBe('advanced');
    expect(session.currentPage).toBe(2);
  });

  it('does not click when the page summary goes stale twice', async () => {
    const { session, navigator } = await readyOnFirstPage({
      pages: [[1], [2]],
      staleSummaryReads: 2,
    });

    await expect(navigator.advance()).rejects.toBeInstanceOf(TransientNavigationError);
    expect(session.nextClicks).toBe(0);
    expect(navigator.currentState).toBe('ready');
  });

  describe('estimateTotalPages', () => {
    it('reads "of N" from the page summary', async () => {
      const { navigator } = await readyOnFirstPage({
        pages: [[1]],
        summaryText: () => 'Page 1 of 312 (6234 items)',
      });
      expect(await navigator.estimateTotalPages()).toBe(312);
    });

    it('falls back to the highest numbered pager link', async () => {
      const { navigator } = await readyOnFirstPage({
        pages: [[1]],
        summaryText: () => '',
        pagerNumbers: ['1', '2', '17', '...'],
      });
      expect(await navigator.estimateTotalPages()).toBe(17);
    });

    it('falls back to the configured page count', async () => {
      const { navigator } = await readyOnFirstPage({ pages: [[1]], summaryText: () => '' });
      expect(await navigator.estimateTotalPages()).toBe(300);
    });
  });
});
