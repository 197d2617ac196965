/**
 * Item model shared by every stage.
 *
 * Completion of a stage is signalled only by the presence of the path field it
 * writes; there are no status booleans besides the content-quality flag.
 */

import { z } from 'zod';

export const SUMMARY_TYPES = ['short', 'standard'] as const;
export type SummaryType = (typeof SUMMARY_TYPES)[number];

export const summaryTypeSchema = z.enum(SUMMARY_TYPES);

/** Nullable blob-key columns of a ContentItem */
export const PATH_FIELDS = ['html_path', 'md_path', 'short_summary_path', 'summary_path'] as const;
export type PathField = (typeof PATH_FIELDS)[number];

export const SUMMARY_PATH_FIELD: Record<SummaryType, 'short_summary_path' | 'summary_path'> = {
  short: 'short_summary_path',
  standard: 'summary_path'
};

export const contentItemSchema = z.object({
  guid: z.string().min(1),
  title: z.string(),
  link: z.string(),
  source_feed: z.string(),
  published_at: z.string().nullable(),
  fetched_at: z.string(),
  html_path: z.string().nullable(),
  md_path: z.string().nullable(),
  is_paywalled: z.boolean(),
  short_summary_path: z.string().nullable(),
  summary_path: z.string().nullable(),
  included_in_digest_keys: z.array(z.string()),
  last_updated: z.string()
});

export type ContentItem = z.infer<typeof contentItemSchema>;

/** Fields a stage may write after the item exists; guid and fetched_at never change */
export type ContentItemPatch = Partial<Omit<ContentItem, 'guid' | 'fetched_at'>>;

export const digestSchema = z.object({
  digest_id: z.string().min(1),
  item_guids: z.array(z.string()),
  digest_path: z.string(),
  created_at: z.string()
});

export type Digest = z.infer<typeof digestSchema>;

export interface NewItemFields {
  guid: string;
  title: string;
  link: string;
  source_feed: string;
  published_at: string | null;
  html_path: string;
}

/**
 * Build the record for an entry seen for the first time
 */
export function createContentItem(fields: NewItemFields, now: Date = new Date()): ContentItem {
  const timestamp = now.toISOString();
  return {
    ...fields,
    fetched_at: timestamp,
    md_path: null,
    is_paywalled: false,
    short_summary_path: null,
    summary_path: null,
    included_in_digest_keys: [],
    last_updated: timestamp
  };
}

export function hasSummary(item: ContentItem, type: SummaryType): boolean {
  return item[SUMMARY_PATH_FIELD[type]] !== null;
}

/**
 * Lifecycle invariants: md_path ⇒ html_path; summaries ⇒ md_path ∧ ¬is_paywalled.
 * Returns the violated rules, empty when the record is consistent.
 */
export function lifecycleViolations(item: ContentItem): string[] {
  const violations: string[] = [];
  if (item.md_path !== null && item.html_path === null) {
    violations.push('md_path without html_path');
  }
  for (const type of SUMMARY_TYPES) {
    const field = SUMMARY_PATH_FIELD[type];
    if (item[field] === null) continue;
    if (item.md_path === null) violations.push(`${field} without md_path`);
    if (item.is_paywalled) violations.push(`${field} on paywalled item`);
  }
  return violations;
}
