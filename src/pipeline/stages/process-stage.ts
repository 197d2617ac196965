import pLimit from 'p-limit';
import type { ContentItem } from '../../types/content-item';
import type { BlobLayout } from '../../storage/blob-layout';
import type { BlobStore, MetadataStore } from '../../storage/types';
import type { ContentConverter } from '../../processors/markdown-converter';
import { StoreError } from '../../utils/errors';
import { logger as rootLogger } from '../../utils/logger';
import { finishReport, recordFailure, startReport, type StageReport } from '../report';
import type { StageSelector } from '../stage-selector';

const logger = rootLogger.child('process');

export interface ProcessRunOptions {
  guid?: string;
  overwrite?: boolean;
  candidates?: string[];
  limit?: number | null;
}

export interface ProcessStageDeps {
  metadata: MetadataStore;
  blobs: BlobStore;
  layout: BlobLayout;
  selector: StageSelector;
  converter: ContentConverter;
  now?: () => Date;
}

/**
 * Process stage: raw HTML → Markdown, or the paywall flag when the text is
 * too thin to be worth summarizing.
 */
export class ProcessStage {
  private readonly now: () => Date;

  constructor(
    private readonly deps: ProcessStageDeps,
    private readonly options: { concurrency: number }
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  private async processItem(item: ContentItem, report: StageReport) {
    const { guid, html_path: htmlPath } = item;
    try {
      if (htmlPath === null) {
        report.skipped.push({ guid, reason: 'no html' });
        return;
      }
      const html = await this.deps.blobs.get(htmlPath);
      if (html === null) {
        throw new StoreError('blob get', `missing blob ${htmlPath}`);
      }

      const result = this.deps.converter.convert(html, { title: item.title, url: item.link || null });
      const lastUpdated = this.now().toISOString();

      if (result.isTooShort || result.isPaywalled) {
        // Terminal: later stages never pick this item up again
        await this.deps.metadata.update(guid, {
          is_paywalled: true,
          md_path: null,
          short_summary_path: null,
          summary_path: null,
          last_updated: lastUpdated
        });
        const reason = result.isTooShort ? `too short (${result.wordCount} words)` : 'paywall or teaser';
        report.skipped.push({ guid, reason });
        logger.info(`Flagged ${guid}: ${reason}`);
        return;
      }

      const mdPath = this.deps.layout.itemKey(guid, 'markdown');
      await this.deps.blobs.put(mdPath, result.markdown);
      await this.deps.metadata.update(guid, { md_path: mdPath, is_paywalled: false, last_updated: lastUpdated });
      report.succeeded.push(guid);
      logger.debug(`Converted ${guid}`, { words: result.wordCount });
    } catch (error) {
      logger.error(`Failed to process ${guid}`, error);
      recordFailure(report, guid, error);
    }
  }

  async run(options: ProcessRunOptions = {}): Promise<StageReport> {
    const report = startReport('process');
    const items = await this.deps.selector.select('process', options);
    logger.info(`Processing ${items.length} item(s)`);

    const limit = pLimit(this.options.concurrency);
    await Promise.all(items.map((item) => limit(() => this.processItem(item, report))));

    logger.info(`Process complete: ${report.succeeded.length} converted, ${report.skipped.length} flagged, ${report.failed.length} failed`);
    return finishReport(report);
  }
}
