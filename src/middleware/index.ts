/**
 * middleware/index.ts — Barrel export for the request-level layer.
 */

// ── HTTP session ────────────────────────────────────────────
export { LightHttpSession } from './lightFetcher';
export type { LightSessionOptions } from './lightFetcher';

// ── Export form overlay ─────────────────────────────────────
export {
  applyExportSelections,
  resolveFieldName,
  DEFAULT_EXPORT_FORM,
  STATUS_CATEGORIES,
} from './exportForm';
export type { ExportFormSchema, StatusCategory } from './exportForm';

// ── Compliance ──────────────────────────────────────────────
export { getBotUserAgent, createExportLimiter, isAuthWallResponse } from './compliance';
export type { ExportPoolOptions } from './compliance';
