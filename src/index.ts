// src/index.ts

import { loadConfig } from './config/Config.ts';
import { runEtlPipeline } from './pipeline/EtlPipeline.ts';
import { createLogger } from './utils/Logger.ts';

const logger = createLogger('app');

async function main() {
  const config = loadConfig();
  logger.info({ config }, 'Sales merge ETL starting...');

  const summary = await runEtlPipeline(config);

  const failures = [summary.csv, summary.api, summary.transform, summary.load]
    .flatMap((result) => (result.ok ? [] : [result.failure.kind]));
  if (failures.length > 0) {
    logger.warn({ failures }, 'Run finished without a full load');
  }
}

try {
  await main();
} catch (err) {
  logger.error({ err }, 'Unexpected error in ETL run');
  throw err;
}
