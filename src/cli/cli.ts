#!/usr/bin/env node
/**
 * SecretSweep CLI
 *
 * Usage:
 *   secretsweep --region eu-west-1 --services ec2,lambda
 *   npm run sweep -- --profile audit --match-mode all-submatches
 *
 * Exit codes:
 *   0  sweep finished
 *   1  configuration error
 *   2  at least one resource type could not be listed, or the run was cancelled
 */

import { loadConfig, USAGE } from '../config/config.js';
import { PatternRegistry } from '../registry/pattern-registry.js';
import { ConsoleReporter } from '../report/console-reporter.js';
import { CancelledError, ConfigError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { createClientConfig, createSources } from '../sources/index.js';
import { SecretSweep } from '../sweep/secret-sweep.js';

const logger = createLogger('cli');

const EXIT_OK = 0;
const EXIT_CONFIG = 1;
const EXIT_SOURCE_FAILED = 2;

async function main(argv: readonly string[]): Promise<number> {
  const config = loadConfig(argv);

  if (config.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  if (config.unknownServices.length > 0) {
    console.error(`⚠️  Ignoring unknown services: ${config.unknownServices.join(', ')}`);
  }

  const registry = PatternRegistry.load(config.patternsPath);
  const warningSummary = registry.warningSummary();
  if (warningSummary !== null) {
    console.error(`⚠️  ${warningSummary}`);
  }
  if (registry.size === 0) {
    logger.warn({ path: config.patternsPath }, 'No usable patterns, nothing will match');
  }

  console.log(`Using match mode: ${config.matchMode}`);
  console.log(`Region: ${config.region}  Services: ${config.services.join(', ')}  Threads: ${config.threads}\n`);

  const sources = createSources(config.services, createClientConfig({ region: config.region, profile: config.profile }));
  const sweep = new SecretSweep({
    registry,
    matchMode: config.matchMode,
    threads: config.threads,
    reporter: new ConsoleReporter({ showContent: config.showContent }),
  });

  const controller = new AbortController();
  const shutdown = (signal: string): void => {
    if (controller.signal.aborted) return;
    console.error(`\n${signal} received, stopping...`);
    controller.abort();
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const summary = await sweep.run(sources, controller.signal);
  logger.info({ matches: summary.matchCount, failedSources: summary.failedSources }, 'Sweep finished');

  return summary.failedSources > 0 ? EXIT_SOURCE_FAILED : EXIT_OK;
}

main(process.argv.slice(2)).then(code => {
  process.exit(code);
}).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
    console.error(`   Run 'secretsweep --help' for usage.`);
    process.exit(EXIT_CONFIG);
  }
  if (error instanceof CancelledError) {
    console.error(`❌ ${error.message}`);
    process.exit(EXIT_SOURCE_FAILED);
  }
  console.error('Sweep failed:', errorMessage(error));
  process.exit(EXIT_SOURCE_FAILED);
});
