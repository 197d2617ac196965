import Parser from 'rss-parser';
import type { FeedEntry, FeedReader, ReadFeedOptions } from '../types/adapter';

interface RSSItem {
  id?: string;
  'content:encoded'?: string;
}

type FeedMeta = Record<string, unknown>;

export type RssParser = Pick<Parser<FeedMeta, RSSItem>, 'parseURL'>;

export interface RssFeedReaderOptions {
  timeoutMs?: number;
  userAgent?: string;
}

type ParsedItem = Parser.Item & RSSItem;

function nonEmpty(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function normalizeDate(raw: string | undefined): string | null {
  if (!raw) return null;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export function toFeedEntry(item: ParsedItem): FeedEntry {
  return {
    id: nonEmpty(item.guid) ?? nonEmpty(item.id),
    title: nonEmpty(item.title),
    link: nonEmpty(item.link),
    published_at: normalizeDate(item.isoDate ?? item.pubDate),
    // Prefer the full body over the teaser
    content: nonEmpty(item['content:encoded']) ?? nonEmpty(item.content) ?? nonEmpty(item.summary)
  };
}

/**
 * RSS 2.0 / Atom reader over rss-parser. Entries come newest first; undated
 * entries keep their feed order after the dated ones.
 */
export class RssFeedReader implements FeedReader {
  private readonly parser: RssParser;

  constructor(options: RssFeedReaderOptions = {}, parser?: RssParser) {
    this.parser =
      parser ??
      new Parser<FeedMeta, RSSItem>({
        timeout: options.timeoutMs ?? 10000,
        headers: { 'User-Agent': options.userAgent ?? 'Mozilla/5.0 (compatible; FeedDigest/0.1)' },
        customFields: { item: ['id', 'content:encoded'] }
      });
  }

  async *read(url: string, options: ReadFeedOptions = {}): AsyncIterable<FeedEntry> {
    const feed = await this.parser.parseURL(url);
    const entries = (feed.items ?? []).map(toFeedEntry);

    entries.sort((a, b) => {
      if (a.published_at === b.published_at) return 0;
      if (a.published_at === null) return 1;
      if (b.published_at === null) return -1;
      return a.published_at < b.published_at ? 1 : -1;
    });

    const limit = options.maxItems ?? null;
    const selected = limit === null ? entries : entries.slice(0, limit);
    for (const entry of selected) {
      yield entry;
    }
  }
}
