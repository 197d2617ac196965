import { loadEnvironmentConfig, type EnvironmentConfig } from '../../config/environment';
import type { ContentItem } from '../../types/content-item';

export function makeItem(guid: string, overrides: Partial<ContentItem> = {}): ContentItem {
  return {
    guid,
    title: `Title ${guid}`,
    link: `https://example.com/${guid}`,
    source_feed: 'https://example.com/feed.xml',
    published_at: null,
    fetched_at: '2026-10-01T00:00:00.000Z',
    html_path: `html/${guid}.html`,
    md_path: null,
    is_paywalled: false,
    short_summary_path: null,
    summary_path: null,
    included_in_digest_keys: [],
    last_updated: '2026-10-01T00:00:00.000Z',
    ...overrides
  };
}

export const TEST_ENV = {
  OPENAI_API_KEY: 'test-key',
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_KEY: 'test-secret'
};

export function testConfig(overrides: Record<string, string> = {}): EnvironmentConfig {
  return loadEnvironmentConfig({ ...TEST_ENV, ...overrides });
}

export const NO_RETRY = { retries: 0, factor: 1, minTimeout: 0, maxTimeout: 0 };
