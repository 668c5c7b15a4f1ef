import fs from 'node:fs';
import path from 'node:path';
import { ScriptError } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import type { SqlConnection } from './connection.js';

/** `.sql` files of a directory in lexicographic order, or null when the directory is missing. */
export function listSqlScripts(dir: string): string[] | null {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) return null;
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

export function readSqlScript(dir: string, file: string): string {
  try {
    return fs.readFileSync(path.join(dir, file), 'utf-8');
  } catch (err) {
    throw new ScriptError(file, { cause: err });
  }
}

/**
 * Execute one script file as a single statement batch. Scripts may hold
 * several semicolon-separated statements; they run without bind parameters.
 */
export async function runSqlScript(
  conn: SqlConnection,
  dir: string,
  file: string,
  log: Logger,
): Promise<void> {
  const content = readSqlScript(dir, file);

  log.info({ script: file }, 'Running SQL script');
  try {
    await conn.execute(content);
  } catch (err) {
    log.error({ err, script: file, excerpt: content.slice(0, 500) }, 'SQL script failed');
    throw new ScriptError(file, { cause: err });
  }
}
