import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { ExtractionError, describeError } from '../errors.js';
import type { RawRecord } from '../types/record.js';
import { logger } from '../utils/logger.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'sales-staging/1.0',
  Accept: 'application/json',
};

const payloadSchema = z.union([z.array(z.unknown()), z.record(z.unknown())]);

export interface FetchOptions {
  timeoutMs: number;
  /** Alternative undici dispatcher, e.g. a MockAgent in tests */
  dispatcher?: Dispatcher;
}

function isRecord(item: unknown): item is RawRecord {
  return typeof item === 'object' && item !== null && !Array.isArray(item);
}

/**
 * One GET against the sales API, no retries. Always resolves to a list:
 * a single object is wrapped, non-object array items are dropped.
 */
export async function fetchRawRecords(url: string, options: FetchOptions): Promise<RawRecord[]> {
  const log = logger.child({ url });
  log.info('Fetching sales from API');

  let statusCode: number;
  let payload: unknown;
  try {
    const res = await request(url, {
      method: 'GET',
      headers: DEFAULT_HEADERS,
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs,
      ...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
    });
    statusCode = res.statusCode;
    if (statusCode < 200 || statusCode >= 300) {
      await res.body.dump();
      throw new ExtractionError(url, `API responded with HTTP ${statusCode}`, { statusCode });
    }
    payload = await res.body.json();
  } catch (err) {
    if (err instanceof ExtractionError) throw err;
    throw new ExtractionError(url, `API request failed: ${describeError(err)}`, { cause: err });
  }

  const parsed = payloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ExtractionError(url, 'API payload is neither a list nor an object', { statusCode });
  }

  if (!Array.isArray(parsed.data)) {
    log.warn('API returned a single object, wrapping it in a list');
    return [parsed.data];
  }

  const records = parsed.data.filter(isRecord);
  const dropped = parsed.data.length - records.length;
  if (dropped > 0) log.warn({ dropped }, 'Ignoring API items that are not objects');

  log.info({ status: statusCode, count: records.length }, 'Sales fetched from API');
  return records;
}
