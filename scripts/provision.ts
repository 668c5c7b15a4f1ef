import { loadDatabaseConfig, readEnvironment } from '../src/config.js';
import { createPostgresConnector } from '../src/db/postgres.js';
import { applySchema } from '../src/db/provisioner.js';
import { logger } from '../src/utils/logger.js';

const config = loadDatabaseConfig(readEnvironment());
logger.level = config.logLevel;

console.log('Provisioning schema...');
const applied = await applySchema(createPostgresConnector(config.database), config.scripts.schemaDir);
console.log(`${applied} schema scripts applied.`);
