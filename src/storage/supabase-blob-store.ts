/**
 * Blob store backed by a Supabase Storage bucket. Keys are object paths
 * inside the bucket, e.g. `markdown/<sha256>.md`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { StoreError } from '../utils/errors';
import { withRetry, type RetryPolicy } from '../utils/retry';
import type { BlobStore } from './types';

export interface SupabaseBlobStoreOptions {
  bucket: string;
  retry: RetryPolicy;
}

function splitKey(key: string): { folder: string; name: string } {
  const slash = key.lastIndexOf('/');
  return slash === -1 ? { folder: '', name: key } : { folder: key.slice(0, slash), name: key.slice(slash + 1) };
}

export class SupabaseBlobStore implements BlobStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly options: SupabaseBlobStoreOptions
  ) {}

  private get bucket() {
    return this.client.storage.from(this.options.bucket);
  }

  async put(key: string, content: string, contentType = 'text/markdown; charset=utf-8'): Promise<void> {
    await withRetry(
      async () => {
        const { error } = await this.bucket.upload(key, content, { contentType, upsert: true });
        if (error) {
          throw new StoreError('blob put', `${key}: ${error.message}`, { cause: error });
        }
      },
      this.options.retry,
      `blob put ${key}`
    );
  }

  async get(key: string): Promise<string | null> {
    return withRetry(
      async () => {
        const { data, error } = await this.bucket.download(key);
        if (error) {
          // Storage reports a missing object as an error; tell it apart from a failed read
          if (!(await this.exists(key))) return null;
          throw new StoreError('blob get', `${key}: ${error.message}`, { cause: error });
        }
        return data.text();
      },
      this.options.retry,
      `blob get ${key}`
    );
  }

  async exists(key: string): Promise<boolean> {
    const { folder, name } = splitKey(key);
    const { data, error } = await this.bucket.list(folder, { search: name, limit: 100 });
    if (error) {
      throw new StoreError('blob exists', `${key}: ${error.message}`, { cause: error });
    }
    return data.some((file) => file.name === name);
  }

  async createShareUrl(key: string, expiresInSeconds: number): Promise<string> {
    return withRetry(
      async () => {
        const { data, error } = await this.bucket.createSignedUrl(key, expiresInSeconds);
        if (error) {
          throw new StoreError('blob share', `${key}: ${error.message}`, { cause: error });
        }
        return data.signedUrl;
      },
      this.options.retry,
      `blob share ${key}`
    );
  }
}
