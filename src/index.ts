/**
 * Public entry point for embedding the harvester.  The command-line runner
 * lives in cli.ts.
 */

export * from './agents';
export * from './middleware';
export * from './scrapers';
export { ArtifactStore, artifactFileName } from './services/artifactStore';
export { BrowserManager, PuppeteerSession } from './core/browserManager';
export type { BrowserLaunchOptions } from './core/browserManager';
export * from './core/errors';
export { Logger } from './core/logger';
export type { LogLevel, LoggerOptions } from './core/logger';
export * from './core/types';
export { TariffHarvester, createHarvester, formatSummary } from './tariffHarvester';
export type { HarvesterWiring, SessionProvider } from './tariffHarvester';
