import type { PipelineConfig } from '../config.js';
import type { Connector } from '../db/connection.js';
import { populateWarehouse } from '../db/populator.js';
import { applySchema } from '../db/provisioner.js';
import { ExtractionError, PipelineError, StageError } from '../errors.js';
import { fetchRawRecords, type FetchOptions } from '../extract/api-client.js';
import type { RawDocumentStore } from '../raw/store.js';
import { replaceStagingRows } from '../staging/loader.js';
import type { RawRecord } from '../types/record.js';
import type { PipelineReport, StageName, StageOutcome } from '../types/report.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { transformBatch } from './transformer.js';

export interface PipelineDeps {
  config: PipelineConfig;
  connector: Connector;
  store: RawDocumentStore;
  fetchRecords?: (url: string, options: FetchOptions) => Promise<RawRecord[]>;
  clock?: () => Date;
  log?: Logger;
}

export interface RunOptions {
  /** Transform what is already buffered instead of calling the API */
  fromBuffer?: boolean;
  skipPopulate?: boolean;
}

/**
 * schema -> extract -> buffer -> read -> transform -> stage -> populate.
 * Strictly sequential; the first failing stage ends the run.
 */
export async function runPipeline(deps: PipelineDeps, options: RunOptions = {}): Promise<PipelineReport> {
  const { config, connector, store } = deps;
  const root = deps.log ?? rootLogger;
  const fetchRecords = deps.fetchRecords ?? fetchRawRecords;
  const stages: StageOutcome[] = [];

  async function runStage<T>(
    stage: StageName,
    body: (log: Logger) => Promise<T>,
    count: (result: T) => number | null,
  ): Promise<T> {
    const log = root.child({ stage });
    const started = Date.now();
    log.info('Stage started');
    try {
      const result = await body(log);
      const outcome: StageOutcome = { stage, count: count(result), durationMs: Date.now() - started };
      stages.push(outcome);
      log.info({ count: outcome.count, durationMs: outcome.durationMs }, 'Stage completed');
      return result;
    } catch (err) {
      throw new StageError(stage, err);
    }
  }

  const asCount = (n: number) => n;
  const length = (list: readonly unknown[]) => list.length;

  try {
    await runStage('schema', (log) => applySchema(connector, config.scripts.schemaDir, log), asCount);

    if (!options.fromBuffer) {
      const fetched = await runStage(
        'extract',
        async () => {
          const records = await fetchRecords(config.api.url, { timeoutMs: config.api.timeoutMs });
          if (records.length === 0) throw new ExtractionError(config.api.url, 'API returned no records');
          return records;
        },
        length,
      );
      await runStage('buffer', () => store.replaceAll(fetched), asCount);
    }

    const raw = await runStage(
      'read',
      async () => {
        const records = await store.findAll();
        if (records.length === 0) throw new PipelineError('Raw document buffer is empty');
        return records;
      },
      length,
    );

    const canonical = await runStage(
      'transform',
      async (log) => transformBatch(raw, { clock: deps.clock, log }),
      length,
    );

    await runStage(
      'stage',
      (log) => replaceStagingRows(connector, config.staging.table, canonical, config.staging.columns, log),
      asCount,
    );

    if (!options.skipPopulate) {
      await runStage('populate', (log) => populateWarehouse(connector, config.scripts.populateDir, log), asCount);
    }
  } catch (err) {
    if (!(err instanceof StageError)) throw err;
    root.error({ stage: err.stage, err: err.cause }, err.message);
    return { ok: false, stages, failure: { stage: err.stage, message: err.message } };
  }

  root.info({ stages: stages.map((s) => s.stage) }, 'Pipeline completed');
  return { ok: true, stages, failure: null };
}
