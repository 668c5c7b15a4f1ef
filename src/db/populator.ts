import fs from 'node:fs';
import path from 'node:path';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { Connector } from './connection.js';
import { runSqlScript } from './scripts.js';
import { withTransaction } from './transaction.js';

/** Dimensions first, the fact table last: it joins against all of them. */
export const POPULATE_SCRIPTS = [
  '01_populate_dim_tempo.sql',
  '02_populate_dim_local.sql',
  '03_populate_dim_vendedor.sql',
  '04_populate_dim_produto.sql',
  '05_populate_dim_pagamento.sql',
  '06_populate_fato_vendas.sql',
] as const;

/**
 * Fill the dimension and fact tables from staging. A missing directory or
 * script is skipped with a warning; a failing script rolls the whole
 * population back. Returns the number of scripts executed.
 */
export async function populateWarehouse(
  connector: Connector,
  populateDir: string,
  log: Logger = rootLogger,
): Promise<number> {
  if (!fs.existsSync(populateDir)) {
    log.warn({ populateDir }, 'Population scripts directory not found, skipping warehouse population');
    return 0;
  }

  const present = POPULATE_SCRIPTS.filter((file) => {
    const exists = fs.existsSync(path.join(populateDir, file));
    if (!exists) log.warn({ script: file }, 'Population script not found, skipping');
    return exists;
  });

  if (present.length === 0) return 0;

  await withTransaction(
    connector,
    async (conn) => {
      for (const file of present) {
        await runSqlScript(conn, populateDir, file, log);
      }
    },
    log,
  );

  log.info({ executed: present.length }, 'Warehouse populated from staging');
  return present.length;
}
