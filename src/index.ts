#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import { ConfigError, UsageError } from './errors.js';
import { parseInvocation, USAGE } from './invocation.js';
import { ConsoleLogger } from './logger.js';
import { runCrawl } from './run.js';

async function main() {
  const inv = parseInvocation(process.argv.slice(2));
  const config = loadConfig();
  await runCrawl(inv, config);
}

main().catch((err) => {
  const log = new ConsoleLogger('crawl');
  if (err instanceof UsageError) {
    log.error(USAGE, err);
  } else if (err instanceof ConfigError) {
    log.error('invalid configuration', err);
  } else {
    log.error('failed', err);
  }
  process.exit(1);
});
