import type { CanonicalRecord, RawRecord } from '../types/record.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { normalizeRecord } from './normalizer.js';

export interface TransformOptions {
  /** Batch capture time source. Read once per batch. */
  clock?: () => Date;
  log?: Logger;
}

/**
 * Copy the batch before touching it. structuredClone rejects functions and
 * other uncloneable values; fall back to shallow per-item copies then.
 */
function copyBatch(raw: readonly RawRecord[], log: Logger): RawRecord[] {
  try {
    return structuredClone([...raw]);
  } catch (err) {
    log.error({ err }, 'Deep copy of raw batch failed, falling back to shallow copies');
    return raw.map((item) => ({ ...item }));
  }
}

export function transformBatch(
  raw: readonly RawRecord[],
  options: TransformOptions = {},
): CanonicalRecord[] {
  const log = options.log ?? rootLogger;

  if (raw.length === 0) {
    log.warn('No raw records to transform');
    return [];
  }

  log.info({ count: raw.length }, 'Transforming raw records');
  const batch = copyBatch(raw, log);
  const loadedAt = (options.clock ?? (() => new Date()))();

  const records = batch.map((item) => normalizeRecord(item, loadedAt, log));

  log.info({ count: records.length, loadedAt: loadedAt.toISOString() }, 'Transformation complete');
  return records;
}
