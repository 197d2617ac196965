import pLimit from 'p-limit';
import {
  SUMMARY_PATH_FIELD,
  hasSummary,
  type ContentItem,
  type ContentItemPatch,
  type SummaryType
} from '../../types/content-item';
import type { BlobLayout } from '../../storage/blob-layout';
import type { BlobStore, MetadataStore } from '../../storage/types';
import type { Summarizer } from '../../summarizers/openai-summarizer';
import { StoreError, errorMessage } from '../../utils/errors';
import { logger as rootLogger } from '../../utils/logger';
import { finishReport, startReport, type StageReport } from '../report';
import type { StageSelector } from '../stage-selector';

const logger = rootLogger.child('summarize');

export interface SummarizeRunOptions {
  guid?: string;
  overwrite?: boolean;
  candidates?: string[];
  limit?: number | null;
  summaryTypes?: SummaryType[];
}

export interface SummarizeStageDeps {
  metadata: MetadataStore;
  blobs: BlobStore;
  layout: BlobLayout;
  selector: StageSelector;
  summarizer: Summarizer;
  now?: () => Date;
}

export interface SummarizeStageOptions {
  concurrency: number;
  defaultSummaryTypes: SummaryType[];
}

function summaryPatch(type: SummaryType, key: string, lastUpdated: string): ContentItemPatch {
  return type === 'short'
    ? { short_summary_path: key, last_updated: lastUpdated }
    : { summary_path: key, last_updated: lastUpdated };
}

/**
 * Summarize stage. Each summary type is produced and recorded on its own;
 * one failing never blocks or clears the other.
 */
export class SummarizeStage {
  private readonly now: () => Date;

  constructor(
    private readonly deps: SummarizeStageDeps,
    private readonly options: SummarizeStageOptions
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  private async loadMarkdown(item: ContentItem): Promise<string> {
    if (item.md_path === null) throw new StoreError('blob get', `no markdown for ${item.guid}`);
    const markdown = await this.deps.blobs.get(item.md_path);
    if (markdown === null) throw new StoreError('blob get', `missing blob ${item.md_path}`);
    return markdown;
  }

  private async summarizeItem(item: ContentItem, types: SummaryType[], overwrite: boolean, report: StageReport) {
    const { guid } = item;
    const pending = types.filter((type) => overwrite || !hasSummary(item, type));
    if (pending.length === 0) {
      report.skipped.push({ guid, reason: 'already summarized' });
      return;
    }

    let markdown: string;
    try {
      markdown = await this.loadMarkdown(item);
    } catch (error) {
      logger.error(`Failed to load markdown for ${guid}`, error);
      report.failed.push({ guid, error: errorMessage(error) });
      return;
    }

    const errors: string[] = [];
    for (const type of pending) {
      try {
        const summary = await this.deps.summarizer.summarize(markdown, type);
        const key = this.deps.layout.itemKey(guid, type);
        await this.deps.blobs.put(key, summary);
        await this.deps.metadata.update(guid, summaryPatch(type, key, this.now().toISOString()));
        logger.debug(`Wrote ${SUMMARY_PATH_FIELD[type]} for ${guid}`);
      } catch (error) {
        logger.error(`Failed ${type} summary for ${guid}`, error);
        errors.push(`${type}: ${errorMessage(error)}`);
      }
    }

    if (errors.length > 0) {
      report.failed.push({ guid, error: errors.join('; ') });
    } else {
      report.succeeded.push(guid);
    }
  }

  async run(options: SummarizeRunOptions = {}): Promise<StageReport> {
    const report = startReport('summarize');
    const types = options.summaryTypes ?? this.options.defaultSummaryTypes;
    const overwrite = options.overwrite ?? false;

    const items = await this.deps.selector.select('summarize', { ...options, summaryTypes: types });
    logger.info(`Summarizing ${items.length} item(s) [${types.join(', ')}]`);

    const limit = pLimit(this.options.concurrency);
    await Promise.all(items.map((item) => limit(() => this.summarizeItem(item, types, overwrite, report))));

    logger.info(`Summarize complete: ${report.succeeded.length} succeeded, ${report.failed.length} failed`);
    return finishReport(report);
  }
}
