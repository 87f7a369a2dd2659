/**
 * agents/index.ts — Barrel export for the stateful layer.
 *
 *   • Grid Navigator, ID Collector: walk the paginated grid
 *   • Export Fetcher: one identifier → export bytes
 *   • Pipeline Driver: identifiers → files, with retry and skip
 */

export {
  DEFAULT_GRID_SELECTORS,
  isControlDisabled,
  locateControl,
} from './controlLocator';
export type { ControlCandidate, GridSelectors, LocatedControl } from './controlLocator';

export { GridNavigator } from './gridNavigator';
export type { AdvanceResult, GridNavigatorOptions, GridState } from './gridNavigator';

export { IdCollector } from './idCollector';
export type { IdCollectorOptions } from './idCollector';

export { ExportFetcher, buildExportUrl } from './exportFetcher';
export type { ExportFetcherOptions } from './exportFetcher';

export { PipelineDriver } from './pipelineDriver';
export type { PipelineDriverOptions } from './pipelineDriver';
