/**
 * In-process stand-ins for the browser, the HTTP client and the export
 * endpoint.  Used only by the *.test.ts files.
 */

import { DEFAULT_GRID_SELECTORS } from '../agents/controlLocator';
import { StaleElementError } from '../core/errors';
import { Logger } from '../core/logger';
import type {
  ExportSource,
  HttpResponse,
  HttpSession,
  InteractiveSession,
  SessionElement,
  TariffId,
  WaitOptions,
} from '../core/types';

// ── Logging ────────────────────────────────────────────────

export function captureLogger(context: string): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger(context, { level: 'debug', sink: (line) => lines.push(line) });
  return { logger, lines };
}

// ── Grid ───────────────────────────────────────────────────

type FakeElementKind = 'show-all' | 'next' | 'link' | 'summary' | 'busy' | 'empty' | 'pager-number';

export class FakeElement implements SessionElement {
  readonly kind: FakeElementKind;
  private readonly attrs: Record<string, string>;
  private readonly content: string;
  private readonly onRead: () => void;

  constructor(
    kind: FakeElementKind,
    attrs: Record<string, string> = {},
    content = '',
    onRead: () => void = () => undefined,
  ) {
    this.kind = kind;
    this.attrs = attrs;
    this.content = content;
    this.onRead = onRead;
  }

  async attribute(name: string): Promise<string | null> {
    this.onRead();
    return name in this.attrs ? this.attrs[name] : null;
  }

  async text(): Promise<string> {
    this.onRead();
    return this.content;
  }

  async isVisible(): Promise<boolean> {
    return true;
  }
}

export interface FakeGridOptions {
  /** Identifiers shown on each page, first page first. */
  pages: TariffId[][];
  /** Summary text for a zero-based page index.  Defaults to "Page n of N". */
  summaryText?: (pageIndex: number) => string;
  /** Texts of the numbered pager links. */
  pagerNumbers?: string[];
  /** `false` removes the show-all control. */
  hasShowAll?: boolean;
  /** `false` omits the empty-grid marker on pages without links. */
  hasEmptyMarker?: boolean;
  /** Busy indicator stays visible for this many checks after each postback. */
  busyChecks?: number;
  busyForever?: boolean;
  /** This many "next" clicks are swallowed without turning the page. */
  stuckAdvances?: number;
  /**
   * This many "next" clicks turn the page only after the pager wait has
   * given up: the summary keeps its old text for `FAKE_POLLS` reads.
   */
  lateAdvances?: number;
  /** This many export-link reads raise StaleElementError. */
  staleLinkReads?: number;
  /** This many reads of the "next" control raise StaleElementError. */
  staleNextReads?: number;
  /** This many reads of the page summary raise StaleElementError. */
  staleSummaryReads?: number;
  /**
   * A grid already on the page before activation.  It stays in place for
   * `lingerReads` summary reads after the show-all click.
   */
  initialGrid?: { ids: TariffId[]; summary: string; lingerReads: number };
}

/** Readiness polls a fake `waitUntil` makes before reporting a timeout. */
const FAKE_POLLS = 5;

/**
 * Simulates a postback grid.  No time passes: `waitUntil` evaluates its
 * predicate a fixed number of times.
 */
export class FakeGridSession implements InteractiveSession {
  readonly visitedUrls: string[] = [];
  nextClicks = 0;
  private pageIndex = 0;
  private activated = false;
  private busyRemaining = 0;
  /** StaleElementError budget per kind of element read. */
  private readonly stale: Record<'link' | 'next' | 'summary', number>;
  private stuckRemaining: number;
  private lateRemaining: number;
  /** Summary reads left before a late page turn lands; `null` when none is pending. */
  private lateTurnReads: number | null = null;
  private lingerRemaining: number;
  private readonly options: FakeGridOptions;

  constructor(options: FakeGridOptions) {
    this.options = options;
    this.stale = {
      link: options.staleLinkReads ?? 0,
      next: options.staleNextReads ?? 0,
      summary: options.staleSummaryReads ?? 0,
    };
    this.stuckRemaining = options.stuckAdvances ?? 0;
    this.lateRemaining = options.lateAdvances ?? 0;
    this.lingerRemaining = options.initialGrid?.lingerReads ?? 0;
  }

  get currentPage(): number {
    return this.pageIndex + 1;
  }

  async navigate(url: string): Promise<void> {
    this.visitedUrls.push(url);
  }

  async execute(script: string): Promise<unknown> {
    return script === 'document.readyState' ? 'complete' : undefined;
  }

  async waitUntil(predicate: () => Promise<boolean>, _options: WaitOptions): Promise<boolean> {
    for (let poll = 0; poll < FAKE_POLLS; poll++) {
      if (await predicate()) return true;
    }
    return false;
  }

  async find(selector: string): Promise<SessionElement[]> {
    const s = DEFAULT_GRID_SELECTORS;

    if (selector === s.showAll[0].selector) {
      return this.options.hasShowAll === false ? [] : [new FakeElement('show-all')];
    }
    const initial = this.options.initialGrid;
    if (initial && (!this.activated || this.lingerRemaining > 0)) {
      return this.findInitial(selector, initial.ids, initial.summary);
    }
    if (!this.activated) return [];

    switch (selector) {
      case s.busyIndicator:
        if (this.options.busyForever) return [new FakeElement('busy')];
        if (this.busyRemaining > 0) {
          this.busyRemaining--;
          return [new FakeElement('busy')];
        }
        return [];

      case s.exportLinks:
        return this.currentIds().map(
          (id) =>
            new FakeElement('link', { href: `TariffBrowser.aspx?tid=${id}` }, 'XML', () =>
              this.maybeGoStale('link'),
            ),
        );

      case s.emptyGrid:
        return this.currentIds().length === 0 && this.options.hasEmptyMarker !== false
          ? [new FakeElement('empty')]
          : [];

      case s.nextPage[0].selector:
        return [
          new FakeElement('next', this.isLastPage() ? { class: 'aspNetDisabled' } : {}, '', () =>
            this.maybeGoStale('next'),
          ),
        ];

      case s.pageSummary[0].selector:
        return [
          new FakeElement('summary', {}, this.summary(), () => this.maybeGoStale('summary')),
        ];

      case s.pagerNumbers:
        return (this.options.pagerNumbers ?? []).map(
          (text) => new FakeElement('pager-number', {}, text),
        );

      default:
        return [];
    }
  }

  async click(element: SessionElement): Promise<void> {
    if (!(element instanceof FakeElement)) {
      throw new TypeError('FakeGridSession can only click its own elements');
    }

    if (element.kind === 'show-all') {
      this.activated = true;
      this.busyRemaining = this.options.busyChecks ?? 0;
    } else if (element.kind === 'next') {
      this.nextClicks++;
      if (this.stuckRemaining > 0) {
        this.stuckRemaining--;
        return;
      }
      if (this.lateRemaining > 0) {
        this.lateRemaining--;
        this.lateTurnReads = FAKE_POLLS;
        return;
      }
      this.turnPage();
    }
  }

  private turnPage(): void {
    this.pageIndex++;
    this.busyRemaining = this.options.busyChecks ?? 0;
  }

  private findInitial(selector: string, ids: TariffId[], summary: string): SessionElement[] {
    const s = DEFAULT_GRID_SELECTORS;
    switch (selector) {
      case s.exportLinks:
        return ids.map((id) => new FakeElement('link', { href: `TariffBrowser.aspx?tid=${id}` }));
      case s.pageSummary[0].selector:
        if (this.activated) this.lingerRemaining--;
        return [new FakeElement('summary', {}, summary)];
      default:
        return [];
    }
  }

  private currentIds(): TariffId[] {
    return this.options.pages[this.pageIndex] ?? [];
  }

  private isLastPage(): boolean {
    return this.pageIndex >= this.options.pages.length - 1;
  }

  private summary(): string {
    if (this.lateTurnReads !== null) {
      if (this.lateTurnReads > 0) {
        this.lateTurnReads--;
      } else {
        this.lateTurnReads = null;
        this.turnPage();
      }
    }
    return this.options.summaryText
      ? this.options.summaryText(this.pageIndex)
      : `Page ${this.pageIndex + 1} of ${this.options.pages.length}`;
  }


  private maybeGoStale(kind: 'link' | 'next' | 'summary'): void {
    if (this.stale[kind] > 0) {
      this.stale[kind]--;
      throw new StaleElementError('Node is detached from document');
    }
  }
}

// ── Export endpoint ────────────────────────────────────────

/**
 * Replays a per-identifier script: each fetch consumes the next step.  An
 * Error step is thrown; a string step is returned as bytes; once the script
 * runs out, `<Tariff tid="<id>"/>` is returned.
 */
export class ScriptedExportSource implements ExportSource {
  readonly calls: TariffId[] = [];
  private readonly script: Map<TariffId, Array<Error | string>>;
  private readonly onFetch: (id: TariffId) => void;

  constructor(
    script: Record<number, Array<Error | string>> = {},
    onFetch: (id: TariffId) => void = () => undefined,
  ) {
    this.script = new Map(Object.entries(script).map(([id, steps]) => [Number(id), [...steps]]));
    this.onFetch = onFetch;
  }

  async fetch(id: TariffId): Promise<Buffer> {
    this.calls.push(id);
    this.onFetch(id);
    const step = this.script.get(id)?.shift();
    if (step instanceof Error) throw step;
    return Buffer.from(step ?? `<Tariff tid="${id}"/>`, 'utf8');
  }
}

export function httpResponse(statusCode: number, text: string, url = 'https://tariffs.test/'): HttpResponse {
  const body = Buffer.from(text, 'utf8');
  return { statusCode, url, body, text };
}

/** Answers every GET and POST with the same canned responses, recording requests. */
export class FakeHttpSession implements HttpSession {
  readonly gets: string[] = [];
  readonly posts: Array<{ url: string; form: Record<string, string> }> = [];
  private readonly formResponse: HttpResponse;
  private readonly exportResponse: HttpResponse;

  constructor(formResponse: HttpResponse, exportResponse: HttpResponse) {
    this.formResponse = formResponse;
    this.exportResponse = exportResponse;
  }

  async get(url: string): Promise<HttpResponse> {
    this.gets.push(url);
    return this.formResponse;
  }

  async post(url: string, form: Record<string, string>): Promise<HttpResponse> {
    this.posts.push({ url, form });
    return this.exportResponse;
  }
}
