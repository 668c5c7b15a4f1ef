import { ScriptError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { Connector, SqlRow } from './connection.js';
import { listSqlScripts, readSqlScript } from './scripts.js';
import { withTransaction } from './transaction.js';

export interface QueryResult {
  /** Script file name, e.g. '01_vendas_por_categoria.sql' */
  query: string;
  rows: SqlRow[];
}

/**
 * Run every analytical query of `queriesDir` in filename order on one
 * connection. Each file holds a single SELECT over the star schema.
 */
export async function runAnalyticalQueries(
  connector: Connector,
  queriesDir: string,
  log: Logger = rootLogger,
): Promise<QueryResult[]> {
  const queries = listSqlScripts(queriesDir);

  if (queries === null || queries.length === 0) {
    log.warn({ queriesDir }, 'No analytical queries found');
    return [];
  }

  return withTransaction(
    connector,
    async (conn) => {
      const results: QueryResult[] = [];
      for (const query of queries) {
        const text = readSqlScript(queriesDir, query);
        try {
          const rows = await conn.select(text);
          log.info({ query, rows: rows.length }, 'Analytical query finished');
          results.push({ query, rows });
        } catch (err) {
          log.error({ err, query }, 'Analytical query failed');
          throw new ScriptError(query, { cause: err });
        }
      }
      return results;
    },
    log,
  );
}
