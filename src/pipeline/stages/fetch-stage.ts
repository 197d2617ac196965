/**
 * Fetch stage: read feeds, store each entry's raw HTML, create or refresh the
 * item record. Never touches fields written by later stages.
 */

import pLimit from 'p-limit';
import type { FeedEntry, FeedReader, FeedSource } from '../../types/adapter';
import { createContentItem } from '../../types/content-item';
import type { BlobLayout } from '../../storage/blob-layout';
import type { BlobStore, MetadataStore } from '../../storage/types';
import type { EnvironmentConfig } from '../../config/environment';
import { errorMessage } from '../../utils/errors';
import { logger as rootLogger } from '../../utils/logger';
import { finishReport, recordFailure, startReport, type StageReport } from '../report';

const logger = rootLogger.child('fetch');

export interface FeedFailure {
  url: string;
  error: string;
}

export interface FetchReport extends StageReport {
  failedFeeds: FeedFailure[];
}

export interface FetchRunOptions {
  sources: FeedSource[];
  guid?: string;
  overwrite?: boolean;
  /** Overrides every feed's cap; null lifts it */
  maxItems?: number | null;
}

export interface FetchStageDeps {
  metadata: MetadataStore;
  blobs: BlobStore;
  layout: BlobLayout;
  reader: FeedReader;
  fetchPage: (url: string) => Promise<string>;
  now?: () => Date;
}

export type FetchStageOptions = Pick<EnvironmentConfig['feeds'], 'defaultMaxItems' | 'fetchFullPage' | 'minFeedContentLength'> & {
  concurrency: number;
};

/**
 * Entry id, else link, else `<feed url>::<title>`
 */
export function entryGuid(entry: FeedEntry, feedUrl: string): string | null {
  if (entry.id) return entry.id;
  if (entry.link) return entry.link;
  if (entry.title) return `${feedUrl}::${entry.title}`;
  return null;
}

export class FetchStage {
  private readonly now: () => Date;

  constructor(
    private readonly deps: FetchStageDeps,
    private readonly options: FetchStageOptions
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  private capFor(source: FeedSource, run: FetchRunOptions): number | null {
    // A guid lookup must see the whole feed
    if (run.guid !== undefined) return null;
    if (run.maxItems !== undefined) return run.maxItems;
    if (source.maxItems !== undefined) return source.maxItems === 0 ? null : source.maxItems;
    return this.options.defaultMaxItems;
  }

  /**
   * The feed's HTML, or the article page when the feed only carries a teaser
   */
  private async resolveHtml(entry: FeedEntry): Promise<string | null> {
    const content = entry.content;
    const thin = content === null || content.length < this.options.minFeedContentLength;
    if (!thin || !this.options.fetchFullPage || !entry.link) return content;

    try {
      return await this.deps.fetchPage(entry.link);
    } catch (error) {
      if (content === null) throw error;
      logger.warn(`Full page unavailable, keeping feed content for ${entry.link}`, { error: errorMessage(error) });
      return content;
    }
  }

  private async fetchEntry(entry: FeedEntry, guid: string, feedUrl: string, run: FetchRunOptions, report: FetchReport) {
    try {
      const existing = await this.deps.metadata.get(guid);
      if (existing?.html_path && !run.overwrite) {
        report.skipped.push({ guid, reason: 'already fetched' });
        return;
      }

      const html = await this.resolveHtml(entry);
      if (!html) {
        report.skipped.push({ guid, reason: 'entry has no content' });
        return;
      }

      const htmlPath = this.deps.layout.itemKey(guid, 'html');
      await this.deps.blobs.put(htmlPath, html, 'text/html; charset=utf-8');

      const fields = {
        title: entry.title ?? entry.link ?? guid,
        link: entry.link ?? '',
        source_feed: feedUrl,
        published_at: entry.published_at,
        html_path: htmlPath
      };
      const now = this.now();
      if (existing) {
        await this.deps.metadata.update(guid, { ...fields, last_updated: now.toISOString() });
      } else {
        await this.deps.metadata.put(createContentItem({ guid, ...fields }, now));
      }
      report.succeeded.push(guid);
      logger.debug(`Stored ${guid}`, { htmlPath });
    } catch (error) {
      logger.error(`Failed to fetch entry ${guid}`, error);
      recordFailure(report, guid, error);
    }
  }

  private async fetchFeed(source: FeedSource, run: FetchRunOptions, report: FetchReport, seen: Set<string>) {
    const limit = pLimit(this.options.concurrency);
    const pending: Promise<void>[] = [];

    try {
      for await (const entry of this.deps.reader.read(source.url, { maxItems: this.capFor(source, run) })) {
        const guid = entryGuid(entry, source.url);
        if (run.guid !== undefined && guid !== run.guid) continue;
        if (guid === null || (!entry.title && !entry.link)) {
          report.skipped.push({ guid: guid ?? undefined, reason: 'malformed entry' });
          continue;
        }
        if (seen.has(guid)) {
          report.skipped.push({ guid, reason: 'duplicate entry' });
          continue;
        }
        seen.add(guid);
        pending.push(limit(() => this.fetchEntry(entry, guid, source.url, run, report)));
      }
    } catch (error) {
      logger.error(`Failed to read feed ${source.url}`, error);
      report.failedFeeds.push({ url: source.url, error: errorMessage(error) });
    }

    // fetchEntry records its own failures, so this never rejects
    await Promise.all(pending);
  }

  async run(run: FetchRunOptions): Promise<FetchReport> {
    const report: FetchReport = { ...startReport('fetch'), failedFeeds: [] };
    const seen = new Set<string>();

    logger.info(`Fetching ${run.sources.length} feed(s)`);
    for (const source of run.sources) {
      await this.fetchFeed(source, run, report, seen);
    }

    logger.info(
      `Fetch complete: ${report.succeeded.length} stored, ${report.skipped.length} skipped, ` +
        `${report.failed.length} failed, ${report.failedFeeds.length} feed(s) unreadable`
    );
    return finishReport(report);
  }
}
