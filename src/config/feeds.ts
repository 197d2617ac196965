import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import type { FeedSource } from '../types/adapter';

const feedsFileSchema = z.object({
  feeds: z.array(
    z.object({
      url: z.string().url(),
      maxItems: z.number().int().min(0).optional(),
      active: z.boolean().default(true)
    })
  )
});

/**
 * Parse the feed list document. Inactive feeds are dropped; a per-feed
 * `maxItems` of 0 lifts the cap for that feed.
 */
export function parseFeedSources(raw: unknown): FeedSource[] {
  const result = feedsFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid feeds file: ${issues.join('; ')}`);
  }
  return result.data.feeds
    .filter((feed) => feed.active)
    .map((feed) => (feed.maxItems === undefined ? { url: feed.url } : { url: feed.url, maxItems: feed.maxItems }));
}

export async function loadFeedSources(sourcesFile: string, cwd: string = process.cwd()): Promise<FeedSource[]> {
  const filePath = path.resolve(cwd, sourcesFile);
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Feeds file not readable: ${filePath}`, { cause: error });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Feeds file is not valid JSON: ${filePath}`, { cause: error });
  }
  return parseFeedSources(raw);
}
