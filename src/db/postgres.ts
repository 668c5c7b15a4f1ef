import postgres from 'postgres';
import type { DatabaseConfig } from '../config.js';
import { ConnectionError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { Connector, SqlConnection, SqlRow, SqlValue } from './connection.js';

/**
 * Each connect() opens a dedicated single-connection client, so BEGIN/COMMIT
 * issued as statements land on the same backend. Nothing is pooled across runs.
 */
export function createPostgresConnector(db: DatabaseConfig): Connector {
  const target = `${db.database}@${db.host}:${db.port}`;

  return {
    target,
    async connect(): Promise<SqlConnection> {
      const sql = postgres({
        host: db.host,
        port: db.port,
        database: db.database,
        username: db.user,
        password: db.password,
        max: 1,
        connect_timeout: 10,
        onnotice: (notice) => logger.debug({ notice: notice['message'] }, 'Postgres notice'),
      });

      try {
        await sql`SELECT 1`;
      } catch (err) {
        await sql.end({ timeout: 0 });
        throw new ConnectionError(target, { cause: err });
      }
      logger.info({ target }, 'Postgres connection established');

      return {
        async execute(text: string, params: readonly SqlValue[] = []): Promise<number> {
          const result = await sql.unsafe(text, [...params]);
          return result.count ?? 0;
        },
        async select(text: string, params: readonly SqlValue[] = []): Promise<SqlRow[]> {
          const rows = await sql.unsafe(text, [...params]);
          return rows.map((row): SqlRow => ({ ...row }));
        },
        async release(): Promise<void> {
          await sql.end({ timeout: 5 });
          logger.debug({ target }, 'Postgres connection closed');
        },
      };
    },
  };
}
