/**
 * Environment configuration for the pipeline
 * Loaded once at process start and passed by reference into every stage
 */

import { ConfigurationError } from '../utils/errors';
import { isLogLevel, type LogLevel } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from '../utils/retry';
import { summaryTypeSchema, type SummaryType } from '../types/content-item';
import { DISTRIBUTION_CHANNELS, type DistributionChannel } from '../distributors/transport';

export interface EmailConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string | null;
  password: string | null;
  from: string;
  /** Default recipients, comma separated */
  to: string | null;
}

export interface EnvironmentConfig {
  openai: {
    apiKey: string;
    model: string;
    temperature: number;
    maxInputChars: number;
  };
  supabase: {
    url: string;
    key: string;
    itemsTable: string;
    digestsTable: string;
    bucket: string;
  };
  feeds: {
    sourcesFile: string;
    defaultMaxItems: number | null;
    fetchFullPage: boolean;
    minFeedContentLength: number;
    requestTimeoutMs: number;
    userAgent: string;
  };
  processing: {
    minWords: number;
    paywallMaxWords: number;
  };
  summarizer: {
    defaultSummaryTypes: SummaryType[];
  };
  curator: {
    mostRecent: number;
    featuredCount: number;
    excludeRecentDigests: number;
    withinDays: number | null;
    writeLatestAlias: boolean;
  };
  distributor: {
    channel: DistributionChannel;
    slackWebhookUrl: string | null;
    email: EmailConfig | null;
    shareLinkTtlSeconds: number;
    subjectPrefix: string;
  };
  pipeline: {
    concurrency: number;
    batchSize: number | null;
    retry: RetryPolicy;
  };
  logging: {
    level: LogLevel;
  };
}

type Env = Record<string, string | undefined>;

function intVar(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function optionalIntVar(env: Env, name: string): number | null {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return null;
  return intVar(env, name, 0, 1);
}

function floatVar(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function boolVar(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw !== 'false' && raw !== '0';
}

function isDistributionChannel(value: string): value is DistributionChannel {
  return (DISTRIBUTION_CHANNELS as readonly string[]).includes(value);
}

function loadEmailConfig(env: Env): EmailConfig | null {
  const host = env.SMTP_HOST;
  if (!host) return null;
  const from = env.EMAIL_FROM;
  if (!from) {
    throw new ConfigurationError('EMAIL_FROM is required when SMTP_HOST is set');
  }
  const port = intVar(env, 'SMTP_PORT', 587, 1);
  return {
    host,
    port,
    // Implicit TLS on the submissions port, STARTTLS elsewhere
    secure: boolVar(env, 'SMTP_SECURE', port === 465),
    user: env.SMTP_USER || null,
    password: env.SMTP_PASSWORD || null,
    from,
    to: env.EMAIL_TO || null
  };
}

function distributionChannel(env: Env, email: EmailConfig | null): DistributionChannel {
  const raw = env.DISTRIBUTION_CHANNEL;
  if (!raw) return email ? 'email' : 'slack';
  if (!isDistributionChannel(raw)) {
    throw new ConfigurationError(`DISTRIBUTION_CHANNEL must be slack or email, got "${raw}"`);
  }
  if (raw === 'email' && !email) {
    throw new ConfigurationError('DISTRIBUTION_CHANNEL=email needs SMTP_HOST and EMAIL_FROM');
  }
  return raw;
}

export function parseSummaryTypes(raw: string): SummaryType[] {
  const types = raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  const parsed: SummaryType[] = [];
  for (const type of types) {
    const result = summaryTypeSchema.safeParse(type);
    if (!result.success) {
      throw new ConfigurationError(`Unknown summary type "${type}" (expected short or standard)`);
    }
    if (!parsed.includes(result.data)) parsed.push(result.data);
  }
  if (parsed.length === 0) {
    throw new ConfigurationError('At least one summary type is required');
  }
  return parsed;
}

/**
 * Load and validate environment configuration
 * @throws ConfigurationError if required environment variables are missing or malformed
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  // Prefer the service role key so server-side writes bypass RLS
  const supabaseUrl = env.SUPABASE_URL;
  const supabaseKey = env.SUPABASE_KEY || env.SUPABASE_SERVICE_ROLE_KEY;
  const openaiKey = env.OPENAI_API_KEY;

  const requiredVars = [
    { name: 'OPENAI_API_KEY', value: openaiKey },
    { name: 'SUPABASE_URL', value: supabaseUrl },
    { name: 'SUPABASE_KEY (or SUPABASE_SERVICE_ROLE_KEY)', value: supabaseKey }
  ];

  const missing = requiredVars.filter((varObj) => !varObj.value);
  if (missing.length > 0 || !openaiKey || !supabaseUrl || !supabaseKey) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.map((v) => v.name).join(', ')}`
    );
  }

  const logLevel = env.LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  const fetchMaxItems = intVar(env, 'FETCH_MAX_ITEMS', 5);
  const email = loadEmailConfig(env);

  return {
    openai: {
      apiKey: openaiKey,
      model: env.SUMMARIZER_MODEL || 'gpt-4o-mini',
      temperature: floatVar(env, 'SUMMARIZER_TEMPERATURE', 0),
      maxInputChars: intVar(env, 'SUMMARIZER_MAX_INPUT_CHARS', 12000, 1)
    },
    supabase: {
      url: supabaseUrl,
      key: supabaseKey,
      itemsTable: env.ITEMS_TABLE || 'content_items',
      digestsTable: env.DIGESTS_TABLE || 'digests',
      bucket: env.STORAGE_BUCKET || 'feed-digest'
    },
    feeds: {
      sourcesFile: env.FEEDS_FILE || 'data/feeds.json',
      // 0 means no per-feed cap
      defaultMaxItems: fetchMaxItems === 0 ? null : fetchMaxItems,
      fetchFullPage: boolVar(env, 'FETCH_FULL_PAGE', true),
      minFeedContentLength: intVar(env, 'MIN_FEED_CONTENT_LENGTH', 200),
      requestTimeoutMs: intVar(env, 'REQUEST_TIMEOUT_MS', 10000, 1),
      userAgent: env.FETCH_USER_AGENT || 'Mozilla/5.0 (compatible; FeedDigest/0.1)'
    },
    processing: {
      minWords: intVar(env, 'MIN_WORDS', 80),
      paywallMaxWords: intVar(env, 'PAYWALL_MAX_WORDS', 400)
    },
    summarizer: {
      defaultSummaryTypes: parseSummaryTypes(env.DEFAULT_SUMMARY_TYPES || 'short')
    },
    curator: {
      mostRecent: intVar(env, 'CURATE_MOST_RECENT', 10, 1),
      featuredCount: intVar(env, 'CURATE_FEATURED_COUNT', 3),
      excludeRecentDigests: intVar(env, 'CURATE_EXCLUDE_RECENT_DIGESTS', 1),
      withinDays: optionalIntVar(env, 'CURATE_WITHIN_DAYS'),
      writeLatestAlias: boolVar(env, 'CURATE_WRITE_LATEST', true)
    },
    distributor: {
      channel: distributionChannel(env, email),
      slackWebhookUrl: env.SLACK_WEBHOOK_URL || null,
      email,
      shareLinkTtlSeconds: intVar(env, 'SHARE_LINK_TTL_SECONDS', 7 * 24 * 60 * 60, 1),
      subjectPrefix: env.SUBJECT_PREFIX ?? '[Feed Digest] '
    },
    pipeline: {
      concurrency: intVar(env, 'PIPELINE_CONCURRENCY', 1, 1),
      batchSize: optionalIntVar(env, 'PIPELINE_BATCH_SIZE'),
      retry: {
        ...DEFAULT_RETRY_POLICY,
        retries: intVar(env, 'RETRY_ATTEMPTS', DEFAULT_RETRY_POLICY.retries)
      }
    },
    logging: {
      level: logLevel
    }
  };
}
