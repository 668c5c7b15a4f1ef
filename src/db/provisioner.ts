import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { Connector } from './connection.js';
import { listSqlScripts, runSqlScript } from './scripts.js';
import { withTransaction } from './transaction.js';

/**
 * Apply every schema script of `schemaDir` in filename order, inside one
 * transaction. The first failing script aborts the rest and rolls back.
 * Returns the number of scripts applied.
 */
export async function applySchema(
  connector: Connector,
  schemaDir: string,
  log: Logger = rootLogger,
): Promise<number> {
  const scripts = listSqlScripts(schemaDir);

  if (scripts === null || scripts.length === 0) {
    log.warn({ schemaDir }, 'No schema scripts found, assuming schema already exists');
    return 0;
  }

  await withTransaction(
    connector,
    async (conn) => {
      for (const file of scripts) {
        await runSqlScript(conn, schemaDir, file, log);
      }
    },
    log,
  );

  log.info({ applied: scripts.length }, 'Database schema verified');
  return scripts.length;
}
