import type { Connector, SqlConnection, SqlRow, SqlValue } from '../db/connection.js';
import { withTransaction } from '../db/transaction.js';
import { StatementError, describeError } from '../errors.js';
import type { CanonicalRecord } from '../types/record.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/** Rows per INSERT statement. 1000 rows x 14 columns stays far below the bind limit. */
export const INSERT_PAGE_SIZE = 1000;

export type LoaderPhase = 'idle' | 'truncated' | 'loaded';

/** Double-quote an identifier so mixed case and reserved words survive. */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function toSqlValue(v: unknown): SqlValue {
  if (v === undefined || v === null) return null;
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean' || v instanceof Date) return v;
  return JSON.stringify(v);
}

/** Build a multi-row INSERT with positional placeholders. */
export function buildInsert(
  table: string,
  columns: readonly string[],
  rowCount: number,
): string {
  const cols = columns.map(quoteIdent).join(', ');
  const tuples: string[] = [];
  let n = 0;
  for (let r = 0; r < rowCount; r++) {
    tuples.push(`(${columns.map(() => `$${++n}`).join(', ')})`);
  }
  return `INSERT INTO ${quoteIdent(table)} (${cols}) VALUES ${tuples.join(', ')}`;
}

/**
 * Truncate-and-load operations against one connection that already sits
 * inside a transaction. Nothing here commits.
 */
export class StagingLoader {
  private readonly log: Logger;
  phase: LoaderPhase = 'idle';

  constructor(
    private readonly conn: SqlConnection,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'staging-loader' });
  }

  async truncate(table: string): Promise<void> {
    const statement = `TRUNCATE TABLE ${quoteIdent(table)}`;
    this.log.warn({ table }, 'Removing all rows from staging table');
    try {
      await this.conn.execute(statement);
    } catch (err) {
      this.log.error({ err, table }, 'Truncate failed');
      throw new StatementError(`Truncate of ${table} failed: ${describeError(err)}`, statement, { cause: err });
    }
    this.phase = 'truncated';
  }

  /**
   * Insert records as positional rows in `columns` order. Keys a record lacks
   * are bound as null. An empty batch issues nothing.
   */
  async bulkLoad(
    table: string,
    records: readonly Partial<CanonicalRecord>[],
    columns: readonly string[],
  ): Promise<number> {
    if (records.length === 0) {
      this.log.info({ table }, 'No records to load into staging');
      return 0;
    }

    const rows: SqlValue[][] = records.map((record) => {
      const lookup = new Map<string, unknown>(Object.entries(record));
      return columns.map((column) => toSqlValue(lookup.get(column)));
    });

    for (let start = 0; start < rows.length; start += INSERT_PAGE_SIZE) {
      const page = rows.slice(start, start + INSERT_PAGE_SIZE);
      const statement = buildInsert(table, columns, page.length);
      try {
        await this.conn.execute(statement, page.flat());
      } catch (err) {
        this.log.error({ err, table, offset: start, rows: page.length }, 'Bulk insert into staging failed');
        throw new StatementError(`Bulk load into ${table} failed: ${describeError(err)}`, statement, { cause: err });
      }
    }

    this.phase = 'loaded';
    this.log.info({ table, rows: rows.length }, 'Records loaded into staging');
    return rows.length;
  }

  async countRows(table: string): Promise<number> {
    const statement = `SELECT COUNT(*)::int AS count FROM ${quoteIdent(table)}`;
    let rows: SqlRow[];
    try {
      rows = await this.conn.select(statement);
    } catch (err) {
      throw new StatementError(`Row count of ${table} failed: ${describeError(err)}`, statement, { cause: err });
    }
    return Number(rows[0]?.['count'] ?? 0);
  }
}

/** Committed rows of the staging table, read on a fresh connection. */
export async function countStagingRows(
  connector: Connector,
  table: string,
  log: Logger = rootLogger,
): Promise<number> {
  return withTransaction(connector, (conn) => new StagingLoader(conn, log).countRows(table), log);
}

/** Full replacement of the staging table in one transaction: truncate, then load. */
export async function replaceStagingRows(
  connector: Connector,
  table: string,
  records: readonly CanonicalRecord[],
  columns: readonly string[],
  log: Logger = rootLogger,
): Promise<number> {
  return withTransaction(
    connector,
    async (conn) => {
      const loader = new StagingLoader(conn, log);
      await loader.truncate(table);
      return loader.bulkLoad(table, records, columns);
    },
    log,
  );
}
