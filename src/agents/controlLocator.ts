/**
 * controlLocator.ts — Ordered selector candidates for the grid's controls.
 *
 * Each control (show-all, pager "next", page summary) is described by an
 * ordered list of candidates.  `locateControl` tries them in sequence and
 * returns the first that matches, together with the candidate that won so
 * the navigator can log which markup variant the page is using.  When the
 * markup for a run is pinned down, a single-entry list is enough.
 */

import type { InteractiveSession, SessionElement } from '../core/types';

export interface ControlCandidate {
  /** Short name used in logs. */
  label: string;
  selector: string;
}

export interface LocatedControl {
  element: SessionElement;
  candidate: ControlCandidate;
}

export interface GridSelectors {
  showAll: ControlCandidate[];
  nextPage: ControlCandidate[];
  pageSummary: ControlCandidate[];
  /** Links whose target carries `tid=<digits>`. */
  exportLinks: string;
  busyIndicator: string;
  /** Marker rendered when the grid has zero rows. */
  emptyGrid: string;
  /** Numbered pager links, used to estimate the page count. */
  pagerNumbers: string;
}

export const DEFAULT_GRID_SELECTORS: GridSelectors = {
  showAll: [
    { label: 'show-all submit', selector: 'input[type="submit"][value*="All" i]' },
    { label: 'show-all by id', selector: 'a[id*="ShowAll" i], input[id*="ShowAll" i]' },
    { label: 'show-all radio', selector: 'input[type="radio"][value="All" i]' },
  ],
  nextPage: [
    { label: 'title=Next', selector: 'a[title="Next"]' },
    { label: 'aria-label=Next', selector: 'a[aria-label="Next"]' },
    { label: 'Next submit', selector: 'input[type="submit"][value*="Next"]' },
    { label: '.pagination .next', selector: '.pagination .next a' },
    { label: 'pager next button', selector: '[class*="PagerNext"], .dxp-button[title="Next"]' },
  ],
  pageSummary: [
    { label: 'pager summary', selector: '.dxp-summary' },
    { label: 'summary by id', selector: '[id*="PagerSummary" i]' },
    { label: 'pagination info', selector: '.pager-summary, .pagination-info' },
  ],
  exportLinks: 'a[href*="tid="], a[onclick*="tid="]',
  busyIndicator: '[id*="LoadingPanel" i], .dxlpLoadingPanel, [aria-busy="true"]',
  emptyGrid: '.dxgvEmptyDataRow, [id*="EmptyDataRow" i], .grid-empty',
  pagerNumbers: '.pagination a, .pager a, .dxp-num',
};

export async function locateControl(
  session: InteractiveSession,
  candidates: readonly ControlCandidate[],
): Promise<LocatedControl | null> {
  for (const candidate of candidates) {
    const [element] = await session.find(candidate.selector);
    if (element) {
      return { element, candidate };
    }
  }
  return null;
}

/** `disabled`, `aria-disabled="true"` or a class containing "disabled". */
export async function isControlDisabled(element: SessionElement): Promise<boolean> {
  if ((await element.attribute('disabled')) !== null) return true;

  const ariaDisabled = await element.attribute('aria-disabled');
  if (ariaDisabled?.trim().toLowerCase() === 'true') return true;

  const className = (await element.attribute('class')) ?? '';
  return /disabled/i.test(className);
}
