/**
 * Curate stage: pick the newest summarized items, escalate the featured ones
 * to standard summaries on demand, and write an immutable digest.
 */

import type { ContentItem, Digest } from '../../types/content-item';
import type { BlobLayout } from '../../storage/blob-layout';
import type { BlobStore, MetadataStore } from '../../storage/types';
import type { EnvironmentConfig } from '../../config/environment';
import { escapeHtml } from '../../distributors/html-renderer';
import { errorMessage } from '../../utils/errors';
import { logger as rootLogger } from '../../utils/logger';
import { finishReport, recordFailure, startReport, type StageReport } from '../report';
import type { StageSelector } from '../stage-selector';
import type { SummarizeRunOptions } from './summarize-stage';

const logger = rootLogger.child('curate');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CurateReport extends StageReport {
  digest: Digest | null;
}

export interface CurateRunOptions {
  overwrite?: boolean;
  mostRecent?: number;
  withinDays?: number | null;
  /** Feature every selected item, not just the first few */
  fullSummary?: boolean;
}

/** The slice of the summarize stage curation escalates through */
export interface SummaryEscalation {
  run(options: SummarizeRunOptions): Promise<StageReport>;
}

export interface CurateStageDeps {
  metadata: MetadataStore;
  blobs: BlobStore;
  layout: BlobLayout;
  selector: StageSelector;
  summarize: SummaryEscalation;
  now?: () => Date;
}

export type CurateStageOptions = EnvironmentConfig['curator'];

export interface DigestEntry {
  item: ContentItem;
  shortSummary: string;
  fullSummary: string | null;
}

/**
 * Newest published first; undated items after every dated one
 */
export function byPublishedDesc(a: ContentItem, b: ContentItem): number {
  if (a.published_at === b.published_at) return 0;
  if (a.published_at === null) return 1;
  if (b.published_at === null) return -1;
  return a.published_at < b.published_at ? 1 : -1;
}

export function digestIdFor(date: Date): string {
  const stamp = date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `newsletter_${stamp}`;
}

/**
 * Feed text as inert Markdown: link and emphasis syntax is backslash-escaped,
 * markup becomes entities.
 */
export function escapeMarkdownText(text: string): string {
  return escapeHtml(text.replace(/[\\`*_[\]()!]/g, '\\$&'));
}

const URL_UNSAFE: Record<string, string> = {
  '(': '%28',
  ')': '%29',
  '<': '%3C',
  '>': '%3E',
  '"': '%22',
  ' ': '%20'
};

/**
 * Link target usable inside `[text](target)`, or null for anything but http(s)
 */
export function markdownLinkTarget(link: string): string | null {
  const trimmed = link.trim();
  if (!/^https?:\/\//i.test(trimmed)) return null;
  return trimmed.replace(/[()<>" ]/g, (char) => URL_UNSAFE[char] ?? char);
}

export function renderDigestMarkdown(date: Date, entries: DigestEntry[]): string {
  const lines: string[] = [`# Feed Digest for ${date.toISOString().slice(0, 10)}`, ''];

  for (const { item, shortSummary, fullSummary } of entries) {
    const title = escapeMarkdownText(item.title);
    const target = markdownLinkTarget(item.link);
    lines.push(target ? `## [${title}](${target})` : `## ${title}`, '');
    lines.push(`*Published ${item.published_at ? item.published_at.slice(0, 10) : 'date unknown'}*`, '');
    lines.push(shortSummary.trim(), '');
    if (fullSummary) {
      lines.push('### In depth', '', fullSummary.trim(), '');
    }
    lines.push('---', '');
  }

  return lines.join('\n');
}

export class CurateStage {
  private readonly now: () => Date;

  constructor(
    private readonly deps: CurateStageDeps,
    private readonly options: CurateStageOptions
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Give featured items without a standard summary one through the summarize
   * stage, then return the refreshed records. Items that still lack one stay
   * in the digest with their short summary.
   */
  private async escalate(featured: ContentItem[], report: StageReport): Promise<Map<string, ContentItem>> {
    const refreshed = new Map<string, ContentItem>();
    const missing = featured.filter((item) => item.summary_path === null).map((item) => item.guid);
    if (missing.length === 0) return refreshed;

    logger.info(`Escalating ${missing.length} featured item(s) to standard summaries`);
    try {
      const result = await this.deps.summarize.run({ summaryTypes: ['standard'], candidates: missing });
      for (const failure of result.failed) {
        report.failed.push({ guid: failure.guid, error: `standard summary: ${failure.error}` });
      }
    } catch (error) {
      logger.error('Summary escalation aborted', error);
      missing.forEach((guid) => recordFailure(report, guid, error));
    }

    for (const guid of missing) {
      const item = await this.deps.metadata.get(guid);
      if (item) refreshed.set(guid, item);
    }
    return refreshed;
  }

  private async loadEntry(item: ContentItem, featured: boolean, report: StageReport): Promise<DigestEntry | null> {
    if (item.short_summary_path === null) return null;
    const shortSummary = await this.deps.blobs.get(item.short_summary_path);
    if (shortSummary === null) {
      report.skipped.push({ guid: item.guid, reason: 'short summary blob missing' });
      return null;
    }

    let fullSummary: string | null = null;
    if (featured && item.summary_path !== null) {
      fullSummary = await this.deps.blobs.get(item.summary_path);
    }
    return { item, shortSummary, fullSummary };
  }

  private async uniqueDigestId(date: Date): Promise<string> {
    const base = digestIdFor(date);
    let candidate = base;
    for (let attempt = 2; ; attempt++) {
      const taken =
        (await this.deps.metadata.getDigest(candidate)) !== null ||
        (await this.deps.blobs.exists(this.deps.layout.digestKey(candidate)));
      if (!taken) return candidate;
      candidate = `${base}_${attempt}`;
    }
  }

  async run(options: CurateRunOptions = {}): Promise<CurateReport> {
    const report: CurateReport = { ...startReport('curate'), digest: null };
    const now = this.now();
    const withinDays = options.withinDays === undefined ? this.options.withinDays : options.withinDays;
    const publishedAfter = withinDays ? new Date(now.getTime() - withinDays * DAY_MS).toISOString() : undefined;

    const eligible = await this.deps.selector.select('curate', {
      overwrite: options.overwrite,
      publishedAfter
    });
    if (eligible.length === 0) {
      logger.info('No eligible items; no digest written');
      return finishReport(report);
    }

    const chosen = [...eligible].sort(byPublishedDesc).slice(0, options.mostRecent ?? this.options.mostRecent);
    const featuredCount = options.fullSummary ? chosen.length : this.options.featuredCount;
    const refreshed = await this.escalate(chosen.slice(0, featuredCount), report);

    const entries: DigestEntry[] = [];
    for (const [index, original] of chosen.entries()) {
      const item = refreshed.get(original.guid) ?? original;
      try {
        const entry = await this.loadEntry(item, index < featuredCount, report);
        if (entry) entries.push(entry);
      } catch (error) {
        logger.error(`Failed to load summaries for ${item.guid}`, error);
        recordFailure(report, item.guid, error);
      }
    }
    if (entries.length === 0) {
      logger.warn('No summaries could be loaded; no digest written');
      return finishReport(report);
    }

    const digestId = await this.uniqueDigestId(now);
    const digestPath = this.deps.layout.digestKey(digestId);
    const content = renderDigestMarkdown(now, entries);

    await this.deps.blobs.put(digestPath, content);
    const digest: Digest = {
      digest_id: digestId,
      item_guids: entries.map((entry) => entry.item.guid),
      digest_path: digestPath,
      created_at: now.toISOString()
    };
    await this.deps.metadata.putDigest(digest);
    report.digest = digest;

    // Items whose escalation failed are in the digest but already reported as failed
    const failedEarlier = new Set(report.failed.map((failure) => failure.guid));
    for (const { item } of entries) {
      try {
        await this.deps.metadata.appendDigestKey(item.guid, digestId, now.toISOString());
        if (!failedEarlier.has(item.guid)) report.succeeded.push(item.guid);
      } catch (error) {
        logger.error(`Digest ${digestId} written but ${item.guid} not marked`, error);
        recordFailure(report, item.guid, error);
      }
    }

    if (this.options.writeLatestAlias) {
      try {
        await this.deps.blobs.put(this.deps.layout.latestDigestKey(), content);
      } catch (error) {
        logger.warn('Could not update latest digest alias', { error: errorMessage(error) });
      }
    }

    logger.info(`Wrote digest ${digestId} with ${entries.length} item(s)`);
    return finishReport(report);
  }
}
