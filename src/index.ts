import { loadConfig, readEnvironment } from './config.js';
import { createPostgresConnector } from './db/postgres.js';
import { runPipeline } from './pipeline/run.js';
import { createRedisClient, RedisRawStore } from './raw/store.js';
import { logger } from './utils/logger.js';

/**
 * Full batch run: API -> raw buffer -> staging -> warehouse.
 * Usage: npx tsx src/index.ts [--from-buffer] [--skip-populate]
 */
async function main(): Promise<boolean> {
  const args = new Set(process.argv.slice(2));
  const config = loadConfig(readEnvironment());
  logger.level = config.logLevel;

  logger.info('Starting sales staging pipeline...');

  const store = new RedisRawStore(createRedisClient(config.redis), config.redis.key);
  try {
    const report = await runPipeline(
      { config, connector: createPostgresConnector(config.database), store },
      { fromBuffer: args.has('--from-buffer'), skipPopulate: args.has('--skip-populate') },
    );

    for (const s of report.stages) {
      logger.info({ count: s.count, durationMs: s.durationMs }, `✓ ${s.stage}`);
    }
    if (report.failure) {
      logger.error(`✗ ${report.failure.stage}: ${report.failure.message}`);
    }
    return report.ok;
  } finally {
    await store.close();
  }
}

main()
  .then((ok) => {
    logger.info(ok ? 'Pipeline finished successfully' : 'Pipeline finished with errors');
    process.exit(ok ? 0 : 1);
  })
  .catch((err) => {
    logger.fatal(err, 'Pipeline aborted');
    process.exit(1);
  });
