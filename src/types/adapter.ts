// Entry shape every feed adapter yields; fields are raw and may be missing
export interface FeedEntry {
  id: string | null;          // Entry GUID / Atom id as published by the feed
  title: string | null;       // Entry headline
  link: string | null;        // Absolute link to the full article
  published_at: string | null; // ISO 8601 timestamp when the feed provides one
  content: string | null;     // Best HTML body the feed carries (content:encoded, content, summary)
}

export interface FeedSource {
  url: string;
  maxItems?: number;          // Per-feed cap, newest entries first
}

export interface ReadFeedOptions {
  maxItems?: number | null;
}

/**
 * Feed reader contract: a fresh call re-reads the whole feed, the caller
 * filters already-known entries by guid.
 */
export interface FeedReader {
  read(url: string, options?: ReadFeedOptions): AsyncIterable<FeedEntry>;
}
