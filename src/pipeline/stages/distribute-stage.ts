import type { Digest } from '../../types/content-item';
import type { BlobLayout } from '../../storage/blob-layout';
import type { BlobStore, MetadataStore } from '../../storage/types';
import type { EnvironmentConfig } from '../../config/environment';
import type { DistributionTransport } from '../../distributors/transport';
import { renderDigestHtml } from '../../distributors/html-renderer';
import { PipelineError, StoreError } from '../../utils/errors';
import { logger as rootLogger } from '../../utils/logger';
import { finishReport, recordFailure, startReport, type StageReport } from '../report';

const logger = rootLogger.child('distribute');

export interface DistributeReport extends StageReport {
  success: boolean;
  shareUrl: string | null;
}

export interface DistributeRunOptions {
  /** Defaults to the newest digest */
  digestIds?: string[];
  recipient?: string;
}

export interface DistributeStageDeps {
  metadata: MetadataStore;
  blobs: BlobStore;
  layout: BlobLayout;
  transport: DistributionTransport;
}

export type DistributeStageOptions = Pick<EnvironmentConfig['distributor'], 'shareLinkTtlSeconds' | 'subjectPrefix'>;

/**
 * Distribute stage: render digests to a shareable page and announce it.
 * Item records are never touched.
 */
export class DistributeStage {
  constructor(
    private readonly deps: DistributeStageDeps,
    private readonly options: DistributeStageOptions
  ) {}

  private async resolveDigests(digestIds: string[] | undefined): Promise<Digest[]> {
    if (!digestIds || digestIds.length === 0) {
      return this.deps.metadata.listRecentDigests(1);
    }
    const digests: Digest[] = [];
    for (const id of digestIds) {
      const digest = await this.deps.metadata.getDigest(id);
      if (!digest) throw new PipelineError(`Unknown digest ${id}`);
      digests.push(digest);
    }
    return digests;
  }

  private async loadMarkdown(digests: Digest[]): Promise<string> {
    const parts: string[] = [];
    for (const digest of digests) {
      const content = await this.deps.blobs.get(digest.digest_path);
      if (content === null) throw new StoreError('blob get', `missing digest blob ${digest.digest_path}`);
      parts.push(content.trim());
    }
    return `${parts.join('\n\n---\n\n')}\n`;
  }

  async run(options: DistributeRunOptions = {}): Promise<DistributeReport> {
    const report: DistributeReport = { ...startReport('distribute'), success: false, shareUrl: null };
    const label = options.digestIds?.join(',') ?? 'latest';

    try {
      const digests = await this.resolveDigests(options.digestIds);
      if (digests.length === 0) {
        report.skipped.push({ reason: 'no digest to distribute' });
        logger.info('No digest to distribute');
        return finishReport(report);
      }

      const markdown = await this.loadMarkdown(digests);
      const newest = digests.reduce((a, b) => (b.created_at > a.created_at ? b : a));
      const subject = `${this.options.subjectPrefix}${newest.created_at.slice(0, 10)}`;

      const sharedKey = this.deps.layout.sharedKey(digests.map((digest) => digest.digest_id).join('__'));
      const html = await renderDigestHtml(markdown, subject);
      await this.deps.blobs.put(sharedKey, html, 'text/html; charset=utf-8');
      const shareUrl = await this.deps.blobs.createShareUrl(sharedKey, this.options.shareLinkTtlSeconds);

      await this.deps.transport.send({ subject, url: shareUrl, markdown, html, recipient: options.recipient });

      report.success = true;
      report.shareUrl = shareUrl;
      report.succeeded.push(...digests.map((digest) => digest.digest_id));
      logger.info(`Distributed ${report.succeeded.join(', ')}`, { shareUrl });
    } catch (error) {
      logger.error(`Failed to distribute ${label}`, error);
      recordFailure(report, label, error);
    }

    return finishReport(report);
  }
}
