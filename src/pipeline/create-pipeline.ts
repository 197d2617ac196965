import { createClient } from '@supabase/supabase-js';
import type { EnvironmentConfig } from '../config/environment';
import type { FeedReader } from '../types/adapter';
import { RssFeedReader } from '../adapters/rss';
import { BlobLayout } from '../storage/blob-layout';
import { SupabaseBlobStore } from '../storage/supabase-blob-store';
import { SupabaseMetadataStore } from '../storage/supabase-metadata-store';
import type { BlobStore, MetadataStore } from '../storage/types';
import { MarkdownConverter, type ContentConverter } from '../processors/markdown-converter';
import { OpenAISummarizer, type Summarizer } from '../summarizers/openai-summarizer';
import { SlackWebhookTransport } from '../distributors/slack-transport';
import { EmailTransport, createSmtpSender } from '../distributors/email-transport';
import { RoutingTransport, type DistributionTransport } from '../distributors/transport';
import { OpenAIClient } from '../utils/openaiClient';
import { fetchPage } from '../utils/http';
import { StageSelector } from './stage-selector';
import { FetchStage } from './stages/fetch-stage';
import { ProcessStage } from './stages/process-stage';
import { SummarizeStage } from './stages/summarize-stage';
import { CurateStage } from './stages/curate-stage';
import { DistributeStage } from './stages/distribute-stage';

export interface Pipeline {
  fetch: FetchStage;
  process: ProcessStage;
  summarize: SummarizeStage;
  curate: CurateStage;
  distribute: DistributeStage;
}

export interface PipelineDeps {
  metadata: MetadataStore;
  blobs: BlobStore;
  reader: FeedReader;
  converter: ContentConverter;
  summarizer: Summarizer;
  transport: DistributionTransport;
  fetchPage: (url: string) => Promise<string>;
  layout?: BlobLayout;
  now?: () => Date;
}

/**
 * Wire the stages around the given collaborators
 */
export function createStages(deps: PipelineDeps, config: EnvironmentConfig): Pipeline {
  const layout = deps.layout ?? new BlobLayout();
  const { metadata, blobs, now } = deps;
  const { concurrency } = config.pipeline;
  const selector = new StageSelector(metadata, { excludeRecentDigests: config.curator.excludeRecentDigests });

  const summarize = new SummarizeStage(
    { metadata, blobs, layout, selector, summarizer: deps.summarizer, now },
    { concurrency, defaultSummaryTypes: config.summarizer.defaultSummaryTypes }
  );

  return {
    fetch: new FetchStage(
      { metadata, blobs, layout, reader: deps.reader, fetchPage: deps.fetchPage, now },
      { ...config.feeds, concurrency }
    ),
    process: new ProcessStage({ metadata, blobs, layout, selector, converter: deps.converter, now }, { concurrency }),
    summarize,
    curate: new CurateStage({ metadata, blobs, layout, selector, summarize, now }, config.curator),
    distribute: new DistributeStage({ metadata, blobs, layout, transport: deps.transport }, config.distributor)
  };
}

/**
 * Slack always; email when SMTP is configured
 */
export function createTransport(config: EnvironmentConfig): DistributionTransport {
  const { distributor } = config;
  const { retry } = config.pipeline;
  const slack = new SlackWebhookTransport(distributor.slackWebhookUrl, retry);
  const smtp = distributor.email;
  const email = smtp
    ? new EmailTransport(createSmtpSender(smtp), { from: smtp.from, to: smtp.to, retry })
    : undefined;
  return new RoutingTransport({ slack, email }, distributor.channel);
}

/**
 * Production wiring: Supabase tables and storage, rss-parser, OpenAI, Slack and SMTP
 */
export function createPipeline(config: EnvironmentConfig): Pipeline {
  const supabase = createClient(config.supabase.url, config.supabase.key);
  const { retry } = config.pipeline;
  OpenAIClient.configure(config.openai.apiKey);

  return createStages(
    {
      metadata: new SupabaseMetadataStore(supabase, {
        itemsTable: config.supabase.itemsTable,
        digestsTable: config.supabase.digestsTable,
        retry
      }),
      blobs: new SupabaseBlobStore(supabase, { bucket: config.supabase.bucket, retry }),
      reader: new RssFeedReader({ timeoutMs: config.feeds.requestTimeoutMs, userAgent: config.feeds.userAgent }),
      converter: new MarkdownConverter(config.processing),
      summarizer: new OpenAISummarizer({ ...config.openai, retry }),
      transport: createTransport(config),
      fetchPage: (url) =>
        fetchPage(url, { timeoutMs: config.feeds.requestTimeoutMs, userAgent: config.feeds.userAgent })
    },
    config
  );
}
