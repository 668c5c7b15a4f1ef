import type { Connector, SqlConnection, SqlRow, SqlValue } from '../../src/db/connection.js';

type Row = Record<string, SqlValue>;
type Tables = Map<string, Row[]>;

const IDENT = '("(?:[^"]|"")+")';
const TRUNCATE = new RegExp(`^TRUNCATE TABLE ${IDENT}$`);
const INSERT = new RegExp(`^INSERT INTO ${IDENT} \\((.+?)\\) VALUES `, 's');
const COUNT = new RegExp(`^SELECT COUNT\\(\\*\\)::int AS count FROM ${IDENT}$`);

function unquote(ident: string): string {
  return ident.slice(1, -1).replace(/""/g, '"');
}

function copyTables(tables: Tables): Tables {
  return new Map([...tables].map(([name, rows]): [string, Row[]] => [name, rows.map((r) => ({ ...r }))]));
}

/**
 * In-memory stand-in for Postgres that understands just what the pipeline
 * sends: BEGIN/COMMIT/ROLLBACK, TRUNCATE and multi-row positional INSERTs.
 * Anything else (schema and population scripts) is recorded and accepted.
 * Rows written inside a transaction become visible only on COMMIT.
 * Queries return rows registered with answer(), else row counts of tables.
 */
export class FakeDatabase {
  readonly statements: string[] = [];
  connects = 0;
  releases = 0;
  connectError: Error | null = null;
  releaseError: Error | null = null;

  private committed: Tables = new Map();
  private failures: Array<{ match: (text: string) => boolean; error: Error }> = [];
  private answers: Array<{ match: (text: string) => boolean; rows: SqlRow[] }> = [];

  readonly connector: Connector = {
    target: 'fake@memory',
    connect: async () => {
      if (this.connectError) throw this.connectError;
      this.connects++;
      return this.open();
    },
  };

  /** Make every statement matching `pattern` throw `error`. */
  failWhen(pattern: RegExp, error: Error = new Error('injected failure')): this {
    this.failures.push({ match: (text) => pattern.test(text), error });
    return this;
  }

  /** Make queries matching `pattern` return `rows`. */
  answer(pattern: RegExp, rows: SqlRow[]): this {
    this.answers.push({ match: (text) => pattern.test(text), rows });
    return this;
  }

  seed(table: string, rows: Row[]): void {
    this.committed.set(table, rows.map((r) => ({ ...r })));
  }

  /** Committed rows, as another session would see them. */
  rows(table: string): Row[] {
    return this.committed.get(table) ?? [];
  }

  private open(): SqlConnection {
    let working: Tables | null = null;
    const tables = (): Tables => working ?? this.committed;
    const record = (text: string): void => {
      this.statements.push(text);
      const failure = this.failures.find((f) => f.match(text));
      if (failure) throw failure.error;
    };

    return {
      execute: async (text: string, params: readonly SqlValue[] = []): Promise<number> => {
        record(text);

        const sql = text.trim();
        if (sql === 'BEGIN') {
          working = copyTables(this.committed);
          return 0;
        }
        if (sql === 'COMMIT') {
          if (working) this.committed = working;
          working = null;
          return 0;
        }
        if (sql === 'ROLLBACK') {
          working = null;
          return 0;
        }

        const truncate = TRUNCATE.exec(sql);
        if (truncate?.[1] !== undefined) {
          tables().set(unquote(truncate[1]), []);
          return 0;
        }

        const insert = INSERT.exec(sql);
        if (insert?.[1] !== undefined && insert[2] !== undefined) {
          const columns = insert[2].split(', ').map(unquote);
          const placeholders = sql.match(/\$\d+/g)?.length ?? 0;
          if (placeholders !== params.length) {
            throw new Error(`bind mismatch: ${placeholders} placeholders, ${params.length} params`);
          }
          const table = unquote(insert[1]);
          const target = tables().get(table) ?? [];
          for (let i = 0; i < params.length; i += columns.length) {
            const row: Row = {};
            columns.forEach((column, j) => {
              row[column] = params[i + j] ?? null;
            });
            target.push(row);
          }
          tables().set(table, target);
          return params.length / columns.length;
        }

        return 0;
      },
      select: async (text: string): Promise<SqlRow[]> => {
        record(text);

        const answer = this.answers.find((a) => a.match(text));
        if (answer) return answer.rows.map((r) => ({ ...r }));

        const count = COUNT.exec(text.trim());
        if (count?.[1] !== undefined) {
          return [{ count: (tables().get(unquote(count[1])) ?? []).length }];
        }
        return [];
      },
      release: async (): Promise<void> => {
        // Closing a connection mid-transaction discards its work
        working = null;
        this.releases++;
        if (this.releaseError) throw this.releaseError;
      },
    };
  }
}
