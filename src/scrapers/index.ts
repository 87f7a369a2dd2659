/**
 * scrapers/index.ts — Barrel export for the HTML parsers.
 */

export { extractFormState, listControlNames } from './formState';
export type { FieldMap } from './formState';
export { parseTariffIds, collectTariffIds } from './linkIdentifiers';
