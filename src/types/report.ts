export type StageName = 'schema' | 'extract' | 'buffer' | 'read' | 'transform' | 'stage' | 'populate';

export interface StageOutcome {
  stage: StageName;
  /** Records or scripts handled by the stage, when it has something to count */
  count: number | null;
  durationMs: number;
}

export interface PipelineReport {
  ok: boolean;
  stages: StageOutcome[];
  failure: { stage: StageName; message: string } | null;
}
