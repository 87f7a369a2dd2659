/**
 * compliance.ts — Request pacing for the export phase.
 *
 * Two behaviours keep the harvester a tolerable guest on the tariff site:
 *
 * 1. **Identified User-Agent**: an operator-supplied UA wins over the
 *    generated browser headers.
 * 2. **Bounded worker pool**: Bottleneck caps concurrent exports and
 *    spaces request starts, so a run of thousands of identifiers never
 *    turns into a burst.
 */

import Bottleneck from 'bottleneck';
import type { HarvesterConfig } from '../core/types';

/** The UA to send, or `undefined` to let the header generator pick one. */
export function getBotUserAgent(config: Pick<HarvesterConfig, 'userAgent'>): string | undefined {
  return config.userAgent;
}

export interface ExportPoolOptions {
  /** Exports in flight at once. */
  concurrency: number;
  /** Minimum gap between two export starts. */
  spacingMs: number;
}

export function createExportLimiter(options: ExportPoolOptions): Bottleneck {
  return new Bottleneck({
    maxConcurrent: Math.max(1, options.concurrency),
    minTime: Math.max(0, options.spacingMs),
  });
}

/** HTTP 401 / 403 from the export endpoint means the session was dropped. */
export function isAuthWallResponse(statusCode: number): boolean {
  return statusCode === 401 || statusCode === 403;
}
