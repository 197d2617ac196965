/**
 * Decides which items a stage acts on. Eligibility is derived only from path
 * presence and the paywall flag, so any stage can be re-run at any time.
 */

import { SUMMARY_PATH_FIELD, hasSummary, type ContentItem, type SummaryType } from '../types/content-item';
import { matchesQuery, type ItemQuery, type MetadataStore } from '../storage/types';

export type SelectableStage = 'process' | 'summarize' | 'curate';

export interface SelectOptions {
  guid?: string;
  overwrite?: boolean;
  candidates?: string[];
  /** Most recently fetched first when capped */
  limit?: number | null;
  /** Summarize only */
  summaryTypes?: SummaryType[];
  /** Curate only: lower bound on published_at */
  publishedAfter?: string;
}

export interface StageSelectorOptions {
  /** An item is curated once it is in one of this many latest digests */
  excludeRecentDigests: number;
}

interface DoneContext {
  summaryTypes: SummaryType[];
  recentlyDigested: Set<string>;
}

export function meetsPrecondition(stage: SelectableStage, item: ContentItem): boolean {
  switch (stage) {
    case 'process':
      return item.html_path !== null;
    case 'summarize':
      return item.md_path !== null && !item.is_paywalled;
    case 'curate':
      return item.short_summary_path !== null && !item.is_paywalled;
  }
}

function isDone(stage: SelectableStage, item: ContentItem, context: DoneContext): boolean {
  switch (stage) {
    case 'process':
      return item.md_path !== null || item.is_paywalled;
    case 'summarize':
      return context.summaryTypes.every((type) => hasSummary(item, type));
    case 'curate':
      return (
        context.recentlyDigested.has(item.guid) ||
        item.included_in_digest_keys.some((key) => context.recentlyDigested.has(key))
      );
  }
}

function scanQuery(stage: SelectableStage, options: SelectOptions, summaryTypes: SummaryType[]): ItemQuery {
  const overwrite = options.overwrite ?? false;
  switch (stage) {
    case 'process':
      return overwrite
        ? { present: ['html_path'] }
        : { present: ['html_path'], absent: ['md_path'], isPaywalled: false };
    case 'summarize':
      return overwrite
        ? { present: ['md_path'], isPaywalled: false }
        : {
            present: ['md_path'],
            isPaywalled: false,
            anyAbsent: summaryTypes.map((type) => SUMMARY_PATH_FIELD[type])
          };
    case 'curate':
      return options.publishedAfter
        ? { present: ['short_summary_path'], isPaywalled: false, publishedAfter: options.publishedAfter }
        : { present: ['short_summary_path'], isPaywalled: false };
  }
}

function mostRecentlyFetched(items: ContentItem[], limit: number | null | undefined): ContentItem[] {
  if (limit === null || limit === undefined || items.length <= limit) return items;
  return [...items].sort((a, b) => (a.fetched_at < b.fetched_at ? 1 : a.fetched_at > b.fetched_at ? -1 : 0)).slice(0, limit);
}

export class StageSelector {
  constructor(
    private readonly metadata: MetadataStore,
    private readonly options: StageSelectorOptions
  ) {}

  private async doneContext(stage: SelectableStage, summaryTypes: SummaryType[]): Promise<DoneContext> {
    const recentlyDigested = new Set<string>();
    if (stage === 'curate' && this.options.excludeRecentDigests > 0) {
      const digests = await this.metadata.listRecentDigests(this.options.excludeRecentDigests);
      for (const digest of digests) {
        recentlyDigested.add(digest.digest_id);
        digest.item_guids.forEach((guid) => recentlyDigested.add(guid));
      }
    }
    return { summaryTypes, recentlyDigested };
  }

  /**
   * Eligible items for a stage. Store failures propagate; they never read as
   * "nothing to do".
   */
  async select(stage: SelectableStage, options: SelectOptions = {}): Promise<ContentItem[]> {
    const overwrite = options.overwrite ?? false;
    const summaryTypes = options.summaryTypes ?? ['short'];
    const extraFilter: ItemQuery = options.publishedAfter ? { publishedAfter: options.publishedAfter } : {};
    const context = await this.doneContext(stage, summaryTypes);

    const eligible = (item: ContentItem): boolean =>
      meetsPrecondition(stage, item) &&
      matchesQuery(item, extraFilter) &&
      (overwrite || !isDone(stage, item, context));

    if (options.guid !== undefined) {
      const item = await this.metadata.get(options.guid);
      return item && eligible(item) ? [item] : [];
    }

    if (options.candidates !== undefined) {
      const unique = [...new Set(options.candidates)];
      const items: ContentItem[] = [];
      for (const guid of unique) {
        const item = await this.metadata.get(guid);
        if (item && eligible(item)) items.push(item);
      }
      return mostRecentlyFetched(items, options.limit);
    }

    const scanned = await this.metadata.scan(scanQuery(stage, options, summaryTypes));
    // The scan narrows, the predicates decide
    return mostRecentlyFetched(scanned.filter(eligible), options.limit);
  }
}
