import type { FeedSource } from '../types/adapter';
import type { SummaryType } from '../types/content-item';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { Pipeline } from './create-pipeline';
import { STAGE_NAMES, formatReport, type StageName, type StageReport } from './report';

export interface PipelineRunOptions {
  stages: StageName[];
  guid?: string;
  overwrite?: boolean;
  limit?: number | null;
  // fetch
  sources?: FeedSource[];
  maxItems?: number | null;
  // summarize
  summaryTypes?: SummaryType[];
  // curate
  mostRecent?: number;
  withinDays?: number | null;
  fullSummary?: boolean;
  // distribute
  digestIds?: string[];
  recipient?: string;
}

export interface StageAbort {
  stage: StageName;
  error: string;
}

export interface PipelineResult {
  reports: StageReport[];
  aborted: StageAbort[];
  startTime: number;
  endTime: number;
}

function nonEmpty(guids: string[] | undefined): string[] | undefined {
  return guids && guids.length > 0 ? guids : undefined;
}

/**
 * Run the requested stages in canonical order. Newly fetched items are handed
 * to process, and newly processed ones to summarize, as candidates. A stage
 * that aborts is recorded and the remaining stages still run.
 */
export async function runPipeline(pipeline: Pipeline, options: PipelineRunOptions): Promise<PipelineResult> {
  const result: PipelineResult = { reports: [], aborted: [], startTime: Date.now(), endTime: 0 };
  const requested = new Set(options.stages);
  const { guid, overwrite, limit } = options;

  let fetched: string[] | undefined;
  let processed: string[] | undefined;

  const stages: Record<StageName, () => Promise<StageReport>> = {
    fetch: async () => {
      const report = await pipeline.fetch.run({ sources: options.sources ?? [], guid, overwrite, maxItems: options.maxItems });
      fetched = nonEmpty(report.succeeded);
      return report;
    },
    process: async () => {
      const report = await pipeline.process.run({ guid, overwrite, limit, candidates: fetched });
      processed = nonEmpty(report.succeeded);
      return report;
    },
    summarize: () =>
      pipeline.summarize.run({ guid, overwrite, limit, candidates: processed, summaryTypes: options.summaryTypes }),
    curate: () =>
      pipeline.curate.run({
        overwrite,
        mostRecent: options.mostRecent,
        withinDays: options.withinDays,
        fullSummary: options.fullSummary
      }),
    distribute: () => pipeline.distribute.run({ digestIds: options.digestIds, recipient: options.recipient })
  };

  for (const stage of STAGE_NAMES) {
    if (!requested.has(stage)) continue;
    logger.info(`▶ ${stage}`);
    try {
      const report = await stages[stage]();
      result.reports.push(report);
      logger.info(formatReport(report));
    } catch (error) {
      logger.error(`Stage ${stage} aborted`, error);
      result.aborted.push({ stage, error: errorMessage(error) });
    }
  }

  result.endTime = Date.now();
  return result;
}
