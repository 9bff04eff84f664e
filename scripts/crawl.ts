import 'dotenv/config';

import { runCli } from '../src/cli';
import { loadConfig } from '../src/config';
import { createLogger } from '../src/logger';

async function main() {
  const config = loadConfig();
  const logger = createLogger('ucassist', config.logLevel);
  logger.info('Starting crawl', { baseUrl: config.baseUrl, maxPages: config.maxPages });
  process.exit(await runCli({ config, logger }));
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
