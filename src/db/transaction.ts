import { ConnectionError, StatementError, describeError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { Connector, SqlConnection } from './connection.js';

export type TransactionState = 'disconnected' | 'connected' | 'committed' | 'rolled_back';

/**
 * Acquire a connection, run the body inside BEGIN/COMMIT, roll back when the
 * body throws, and release the connection on every exit path.
 */
export class TransactionScope {
  private readonly log: Logger;
  readonly transitions: TransactionState[] = [];
  private current: TransactionState = 'disconnected';

  constructor(
    private readonly connector: Connector,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ target: connector.target });
  }

  get state(): TransactionState {
    return this.current;
  }

  async run<T>(body: (conn: SqlConnection) => Promise<T>): Promise<T> {
    let conn: SqlConnection;
    try {
      conn = await this.connector.connect();
    } catch (err) {
      this.log.error({ err }, 'Could not open database connection');
      throw err instanceof ConnectionError ? err : new ConnectionError(this.connector.target, { cause: err });
    }
    this.move('connected');

    try {
      let result: T;
      try {
        await conn.execute('BEGIN');
        result = await body(conn);
      } catch (err) {
        this.log.warn({ err: describeError(err) }, 'Transaction body failed, rolling back');
        await this.rollback(conn);
        throw err;
      }

      try {
        await conn.execute('COMMIT');
      } catch (err) {
        this.log.error({ err }, 'Commit failed, attempting final rollback');
        await this.rollback(conn);
        throw new StatementError(`Commit failed: ${describeError(err)}`, 'COMMIT', { cause: err });
      }
      this.move('committed');
      this.log.debug('Transaction committed');
      return result;
    } finally {
      await this.release(conn);
    }
  }

  private async rollback(conn: SqlConnection): Promise<void> {
    try {
      await conn.execute('ROLLBACK');
      this.log.info('Transaction rolled back');
    } catch (err) {
      // Only logged: the caller gets the error that triggered the rollback
      this.log.error({ err }, 'Rollback failed');
    }
    this.move('rolled_back');
  }

  private async release(conn: SqlConnection): Promise<void> {
    try {
      await conn.release();
    } catch (err) {
      this.log.error({ err }, 'Failed to release database connection');
    }
    this.move('disconnected');
  }

  private move(next: TransactionState): void {
    this.current = next;
    this.transitions.push(next);
  }
}

export async function withTransaction<T>(
  connector: Connector,
  body: (conn: SqlConnection) => Promise<T>,
  log?: Logger,
): Promise<T> {
  return new TransactionScope(connector, log).run(body);
}
