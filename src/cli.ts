#!/usr/bin/env node
/**
 * cli.ts — `tariff-harvester [outputDir]`
 *
 * Reads `.env`, validates the configuration, launches Chromium for the
 * collection phase and prints the run summary.  Exit code 1 means the run
 * could not proceed (bad config, no activation control); items that failed
 * to download are reported but do not change the exit code.
 *
 * Ctrl-C requests a cooperative stop: exports already in flight finish,
 * nothing new starts, and the summary is still printed.
 */

import { config as loadDotenv } from 'dotenv';
import { BrowserManager } from './core/browserManager';
import { ConfigError, describeError } from './core/errors';
import { Logger } from './core/logger';
import { loadHarvesterConfig, type HarvesterConfig } from './core/types';
import { getBotUserAgent, LightHttpSession } from './middleware';
import { createHarvester, formatSummary } from './tariffHarvester';

async function main(argv: string[]): Promise<number> {
  loadDotenv();

  let config: HarvesterConfig;
  try {
    config = loadHarvesterConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  const outputDir = argv[0] ?? config.outputDir;
  if (!config.chromePath) {
    console.error('CHROME_PATH must point at a Chrome or Chromium executable');
    return 1;
  }

  const logger = new Logger('Harvester', { level: config.logLevel, file: config.logFile });

  const controller = new AbortController();
  const requestStop = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    logger.warn(`${signal} received; finishing in-flight exports, starting no new ones`);
    controller.abort();
  };
  process.once('SIGINT', requestStop);
  process.once('SIGTERM', requestStop);

  const browser = new BrowserManager({
    executablePath: config.chromePath,
    headless: config.headless,
    windowWidth: config.windowWidth,
    windowHeight: config.windowHeight,
    navigationTimeoutMs: config.gridReadyTimeoutMs,
    userAgent: config.userAgent,
    logger: logger.child('BrowserManager'),
  });

  const http = new LightHttpSession({
    timeoutMs: config.exportTimeoutMs,
    userAgent: getBotUserAgent(config),
    headers: { referer: config.listUrl },
    logger: logger.child('LightFetcher'),
  });

  try {
    const harvester = createHarvester(
      { ...config, outputDir },
      { sessions: browser, http, logger, signal: controller.signal },
    );
    const report = await harvester.run();
    for (const line of formatSummary(report)) {
      logger.info(line);
    }
    return 0;
  } catch (err) {
    logger.error(`Run aborted: ${describeError(err)}`, err);
    return 1;
  } finally {
    // No-op when collection already closed it.
    await browser.close();
    process.removeListener('SIGINT', requestStop);
    process.removeListener('SIGTERM', requestStop);
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
