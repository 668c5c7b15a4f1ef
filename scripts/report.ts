import { loadDatabaseConfig, readEnvironment } from '../src/config.js';
import { createPostgresConnector } from '../src/db/postgres.js';
import { runAnalyticalQueries } from '../src/db/reports.js';
import { countStagingRows } from '../src/staging/loader.js';
import { logger } from '../src/utils/logger.js';

const config = loadDatabaseConfig(readEnvironment());
logger.level = config.logLevel;
const connector = createPostgresConnector(config.database);

const staged = await countStagingRows(connector, config.staging.table);
console.log(`${staged} rows in ${config.staging.table}`);

for (const { query, rows } of await runAnalyticalQueries(connector, config.scripts.queriesDir)) {
  console.log(`\n== ${query} (${rows.length} rows)`);
  if (rows.length > 0) console.table(rows);
}
