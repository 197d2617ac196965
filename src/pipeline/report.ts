import { errorMessage } from '../utils/errors';

export const STAGE_NAMES = ['fetch', 'process', 'summarize', 'curate', 'distribute'] as const;
export type StageName = (typeof STAGE_NAMES)[number];

export interface ItemFailure {
  guid: string;
  error: string;
}

export interface ItemSkip {
  guid?: string;
  reason: string;
}

/**
 * Outcome of one stage invocation. Per-item failures land here instead of
 * aborting the stage.
 */
export interface StageReport {
  stage: StageName;
  succeeded: string[];
  failed: ItemFailure[];
  skipped: ItemSkip[];
  startTime: number;
  endTime?: number;
}

export function startReport(stage: StageName): StageReport {
  return {
    stage,
    succeeded: [],
    failed: [],
    skipped: [],
    startTime: Date.now()
  };
}

export function recordFailure(report: StageReport, guid: string, error: unknown): void {
  report.failed.push({ guid, error: errorMessage(error) });
}

export function finishReport<T extends StageReport>(report: T): T {
  report.endTime = Date.now();
  return report;
}

export function formatReport(report: StageReport): string {
  const duration = report.endTime === undefined ? '' : ` in ${report.endTime - report.startTime}ms`;
  return (
    `${report.stage}: ${report.succeeded.length} succeeded, ${report.failed.length} failed, ` +
    `${report.skipped.length} skipped${duration}`
  );
}
