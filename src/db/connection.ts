/** Values the pipeline binds into SQL parameters. */
export type SqlValue = string | number | boolean | Date | null;

/** A result row keyed by column name. */
export type SqlRow = Record<string, unknown>;

/**
 * One exclusively owned database connection. Statements run on it in order;
 * transaction control is issued as plain statements by TransactionScope.
 */
export interface SqlConnection {
  /** Run a statement, or a multi-statement script when no params are given. Resolves to the affected row count. */
  execute(text: string, params?: readonly SqlValue[]): Promise<number>;
  /** Run a single query and resolve to its rows. */
  select(text: string, params?: readonly SqlValue[]): Promise<SqlRow[]>;
  release(): Promise<void>;
}

export interface Connector {
  /** Human-readable target for logs, e.g. 'sales@localhost:5432' */
  readonly target: string;
  connect(): Promise<SqlConnection>;
}
