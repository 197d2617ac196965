import type { ContentItem, ContentItemPatch, Digest, PathField } from '../types/content-item';

/**
 * Attribute filter for `MetadataStore.scan`. All given conditions must hold.
 */
export interface ItemQuery {
  present?: PathField[];
  absent?: PathField[];
  /** At least one of these fields is absent */
  anyAbsent?: PathField[];
  isPaywalled?: boolean;
  fetchedAfter?: string;
  fetchedBefore?: string;
  publishedAfter?: string;
  publishedBefore?: string;
}

/**
 * guid → ContentItem records plus the digest records.
 * Every failure is raised as a StoreError.
 */
export interface MetadataStore {
  get(guid: string): Promise<ContentItem | null>;
  /** Upsert by guid */
  put(item: ContentItem): Promise<void>;
  /** Write only the given fields of an existing item */
  update(guid: string, patch: ContentItemPatch): Promise<void>;
  /**
   * Add a digest id to `included_in_digest_keys` in one atomic step, so that
   * concurrent curate runs never drop each other's keys. No-op when present.
   */
  appendDigestKey(guid: string, digestId: string, updatedAt: string): Promise<void>;
  /** Matching items in no particular order */
  scan(query: ItemQuery): Promise<ContentItem[]>;

  putDigest(digest: Digest): Promise<void>;
  getDigest(digestId: string): Promise<Digest | null>;
  /** Newest first */
  listRecentDigests(limit: number): Promise<Digest[]>;
}

export interface BlobStore {
  put(key: string, content: string, contentType?: string): Promise<void>;
  get(key: string): Promise<string | null>;
  exists(key: string): Promise<boolean>;
  createShareUrl(key: string, expiresInSeconds: number): Promise<string>;
}

/**
 * Evaluate an ItemQuery against one record; shared by stores that filter in memory
 */
export function matchesQuery(item: ContentItem, query: ItemQuery): boolean {
  if (query.present?.some((field) => item[field] === null)) return false;
  if (query.absent?.some((field) => item[field] !== null)) return false;
  if (query.anyAbsent && query.anyAbsent.length > 0 && query.anyAbsent.every((field) => item[field] !== null)) {
    return false;
  }
  if (query.isPaywalled !== undefined && item.is_paywalled !== query.isPaywalled) return false;
  if (query.fetchedAfter && item.fetched_at < query.fetchedAfter) return false;
  if (query.fetchedBefore && item.fetched_at > query.fetchedBefore) return false;
  if (query.publishedAfter && (item.published_at === null || item.published_at < query.publishedAfter)) return false;
  if (query.publishedBefore && (item.published_at === null || item.published_at > query.publishedBefore)) return false;
  return true;
}
