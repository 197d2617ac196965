/**
 * Metadata store backed by two Supabase tables: one row per guid in the items
 * table, one row per digest in the digests table.
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { StoreError } from '../utils/errors';
import { withRetry, type RetryPolicy } from '../utils/retry';
import {
  contentItemSchema,
  digestSchema,
  type ContentItem,
  type ContentItemPatch,
  type Digest
} from '../types/content-item';
import type { ItemQuery, MetadataStore } from './types';

const PAGE_SIZE = 1000;

// Postgres renders timestamptz as "+00:00"; normalize so in-process comparisons stay lexicographic
const timestamp = z.string().transform((value) => new Date(value).toISOString());

const itemRowSchema = contentItemSchema.extend({
  published_at: timestamp.nullable(),
  fetched_at: timestamp,
  last_updated: timestamp,
  included_in_digest_keys: z
    .array(z.string())
    .nullable()
    .transform((keys) => keys ?? [])
});

const digestRowSchema = digestSchema.extend({
  created_at: timestamp
});

export interface SupabaseMetadataStoreOptions {
  itemsTable: string;
  digestsTable: string;
  retry: RetryPolicy;
}

type SupabaseResult = { data: unknown; error: PostgrestError | null };

export class SupabaseMetadataStore implements MetadataStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly options: SupabaseMetadataStoreOptions
  ) {}

  private execute(operation: string, request: () => PromiseLike<SupabaseResult>): Promise<unknown> {
    return withRetry(
      async () => {
        const { data, error } = await request();
        if (error) {
          throw new StoreError(operation, error.message, { cause: error });
        }
        return data;
      },
      this.options.retry,
      `metadata ${operation}`
    );
  }

  private parseItem(operation: string, row: unknown): ContentItem {
    const result = itemRowSchema.safeParse(row);
    if (!result.success) {
      throw new StoreError(operation, `malformed item row: ${result.error.issues[0]?.message ?? 'invalid'}`, {
        cause: result.error
      });
    }
    return result.data;
  }

  private parseDigest(operation: string, row: unknown): Digest {
    const result = digestRowSchema.safeParse(row);
    if (!result.success) {
      throw new StoreError(operation, `malformed digest row: ${result.error.issues[0]?.message ?? 'invalid'}`, {
        cause: result.error
      });
    }
    return result.data;
  }

  async get(guid: string): Promise<ContentItem | null> {
    const row = await this.execute('get', () =>
      this.client.from(this.options.itemsTable).select('*').eq('guid', guid).maybeSingle()
    );
    return row === null ? null : this.parseItem('get', row);
  }

  async put(item: ContentItem): Promise<void> {
    await this.execute('put', () =>
      this.client.from(this.options.itemsTable).upsert(item, { onConflict: 'guid' })
    );
  }

  async update(guid: string, patch: ContentItemPatch): Promise<void> {
    const rows = await this.execute('update', () =>
      this.client.from(this.options.itemsTable).update(patch).eq('guid', guid).select('guid')
    );
    if (!Array.isArray(rows) || rows.length === 0) {
      throw new StoreError('update', `no item with guid ${guid}`);
    }
  }

  async appendDigestKey(guid: string, digestId: string, updatedAt: string): Promise<void> {
    // Server-side array_append; see supabase/migrations
    const affected = await this.execute('appendDigestKey', () =>
      this.client.rpc('append_digest_key', {
        p_table: this.options.itemsTable,
        p_guid: guid,
        p_digest_id: digestId,
        p_updated_at: updatedAt
      })
    );
    if (affected === 0) {
      throw new StoreError('appendDigestKey', `no item with guid ${guid}`);
    }
  }

  private buildScan(query: ItemQuery, from: number) {
    let builder = this.client.from(this.options.itemsTable).select('*');
    for (const field of query.present ?? []) {
      builder = builder.not(field, 'is', null);
    }
    for (const field of query.absent ?? []) {
      builder = builder.is(field, null);
    }
    if (query.anyAbsent && query.anyAbsent.length > 0) {
      builder = builder.or(query.anyAbsent.map((field) => `${field}.is.null`).join(','));
    }
    if (query.isPaywalled !== undefined) {
      builder = builder.eq('is_paywalled', query.isPaywalled);
    }
    if (query.fetchedAfter) builder = builder.gte('fetched_at', query.fetchedAfter);
    if (query.fetchedBefore) builder = builder.lte('fetched_at', query.fetchedBefore);
    if (query.publishedAfter) builder = builder.gte('published_at', query.publishedAfter);
    if (query.publishedBefore) builder = builder.lte('published_at', query.publishedBefore);
    // Stable order so that pages do not overlap
    return builder.order('guid', { ascending: true }).range(from, from + PAGE_SIZE - 1);
  }

  async scan(query: ItemQuery): Promise<ContentItem[]> {
    const items: ContentItem[] = [];
    for (let from = 0; ; from += PAGE_SIZE) {
      const rows = await this.execute('scan', () => this.buildScan(query, from));
      if (!Array.isArray(rows)) {
        throw new StoreError('scan', 'expected a list of rows');
      }
      for (const row of rows) {
        items.push(this.parseItem('scan', row));
      }
      if (rows.length < PAGE_SIZE) break;
    }
    return items;
  }

  async putDigest(digest: Digest): Promise<void> {
    // insert, not upsert: a digest is never rewritten
    await this.execute('putDigest', () => this.client.from(this.options.digestsTable).insert(digest));
  }

  async getDigest(digestId: string): Promise<Digest | null> {
    const row = await this.execute('getDigest', () =>
      this.client.from(this.options.digestsTable).select('*').eq('digest_id', digestId).maybeSingle()
    );
    return row === null ? null : this.parseDigest('getDigest', row);
  }

  async listRecentDigests(limit: number): Promise<Digest[]> {
    if (limit <= 0) return [];
    const rows = await this.execute('listRecentDigests', () =>
      this.client
        .from(this.options.digestsTable)
        .select('*')
        .order('created_at', { ascending: false })
        .limit(limit)
    );
    if (!Array.isArray(rows)) {
      throw new StoreError('listRecentDigests', 'expected a list of rows');
    }
    return rows.map((row) => this.parseDigest('listRecentDigests', row));
  }
}
