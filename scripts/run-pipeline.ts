#!/usr/bin/env tsx

/**
 * Command-line driver for the feed digest pipeline
 *
 *   tsx scripts/run-pipeline.ts --all
 *   tsx scripts/run-pipeline.ts --summarize --summary-types short,standard --limit 20
 *   tsx scripts/run-pipeline.ts --rss-url https://example.com/feed.xml
 */

import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { loadEnvironmentConfig, parseSummaryTypes } from '../src/config/environment';
import { loadFeedSources } from '../src/config/feeds';
import { createPipeline } from '../src/pipeline/create-pipeline';
import { runPipeline, type PipelineRunOptions } from '../src/pipeline/run-pipeline';
import { formatReport, STAGE_NAMES, type StageName } from '../src/pipeline/report';
import { ConfigurationError } from '../src/utils/errors';
import { logger } from '../src/utils/logger';

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

const { values } = parseArgs({
  options: {
    fetch: { type: 'boolean', default: false },
    process: { type: 'boolean', default: false },
    summarize: { type: 'boolean', default: false },
    curate: { type: 'boolean', default: false },
    distribute: { type: 'boolean', default: false },
    all: { type: 'boolean', default: false },
    overwrite: { type: 'boolean', default: false },
    id: { type: 'string' },
    'rss-url': { type: 'string' },
    'fetch-max-items': { type: 'string' },
    limit: { type: 'string' },
    'summary-types': { type: 'string' },
    'full-summary': { type: 'boolean', default: false },
    'most-recent': { type: 'string' },
    'within-days': { type: 'string' },
    digest: { type: 'string', multiple: true },
    recipient: { type: 'string' }
  },
  strict: true
});

function intFlag(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined) return undefined;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    throw new ConfigurationError(`--${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function selectedStages(): StageName[] {
  if (values.all) return [...STAGE_NAMES];
  const chosen = STAGE_NAMES.filter((stage) => values[stage]);
  if (chosen.length > 0) return chosen;
  // A one-off feed is taken as far as summaries by default
  return values['rss-url'] ? ['fetch', 'process', 'summarize'] : [...STAGE_NAMES];
}

async function main() {
  try {
    const config = loadEnvironmentConfig();
    logger.setLevel(config.logging.level);

    const stages = selectedStages();
    const rssUrl = values['rss-url'];
    const sources = stages.includes('fetch')
      ? rssUrl
        ? [{ url: rssUrl }]
        : await loadFeedSources(config.feeds.sourcesFile, projectRoot)
      : [];

    const maxItems = intFlag('fetch-max-items', values['fetch-max-items'], 0);
    const limit = intFlag('limit', values.limit, 1);
    const withinDays = intFlag('within-days', values['within-days'], 1);

    const options: PipelineRunOptions = {
      stages,
      guid: values.id,
      overwrite: values.overwrite,
      limit: limit ?? config.pipeline.batchSize,
      sources,
      maxItems: maxItems === undefined ? undefined : maxItems === 0 ? null : maxItems,
      summaryTypes: values['summary-types'] ? parseSummaryTypes(values['summary-types']) : undefined,
      mostRecent: intFlag('most-recent', values['most-recent'], 1),
      withinDays,
      fullSummary: values['full-summary'],
      digestIds: values.digest,
      recipient: values.recipient
    };

    console.log(`🚀 Running stages: ${stages.join(' → ')}`);
    const result = await runPipeline(createPipeline(config), options);

    console.log('\n' + '═'.repeat(80));
    for (const report of result.reports) {
      console.log(`   • ${formatReport(report)}`);
      for (const failure of report.failed) {
        console.log(`       ✗ ${failure.guid}: ${failure.error}`);
      }
    }
    for (const abort of result.aborted) {
      console.log(`   • ${abort.stage}: ABORTED (${abort.error})`);
    }
    console.log(`   • Duration: ${result.endTime - result.startTime}ms`);

    process.exit(result.aborted.length > 0 ? 1 : 0);
  } catch (error) {
    console.error('\n💥 PIPELINE FAILED');
    console.error('Error:', error);
    process.exit(1);
  }
}

void main();
