import type { Mock } from 'vitest';
import { DistributeStage } from '../distribute-stage';
import type { DistributionMessage } from '../../../distributors/transport';
import { BlobLayout } from '../../../storage/blob-layout';
import { InMemoryBlobStore, InMemoryMetadataStore } from '../../../__tests__/helpers/in-memory-stores';
import { makeItem } from '../../../__tests__/helpers/fixtures';
import { TransportError } from '../../../utils/errors';

const layout = new BlobLayout();

describe('DistributeStage', () => {
  let metadata: InMemoryMetadataStore;
  let blobs: InMemoryBlobStore;
  let send: Mock<(message: DistributionMessage) => Promise<void>>;
  let stage: DistributeStage;

  beforeEach(async () => {
    metadata = new InMemoryMetadataStore();
    blobs = new InMemoryBlobStore();
    send = vi.fn<(message: DistributionMessage) => Promise<void>>(async () => undefined);
    stage = new DistributeStage(
      { metadata, blobs, layout, transport: { send } },
      { shareLinkTtlSeconds: 604800, subjectPrefix: '[Feed Digest] ' }
    );

    await metadata.putDigest({
      digest_id: 'd1',
      item_guids: ['a'],
      digest_path: 'curated/d1.md',
      created_at: '2026-10-10T06:00:00.000Z'
    });
    await metadata.putDigest({
      digest_id: 'd2',
      item_guids: ['b'],
      digest_path: 'curated/d2.md',
      created_at: '2026-10-17T06:00:00.000Z'
    });
    await blobs.put('curated/d1.md', '# Digest one\n\nfirst\n');
    await blobs.put('curated/d2.md', '# Digest two\n\nhello\n');
  });

  it('distributes the newest digest by default', async () => {
    const report = await stage.run();

    const shareUrl = 'https://storage.test/shared/d2.html?expires=604800';
    expect(report.success).toBe(true);
    expect(report.shareUrl).toBe(shareUrl);
    expect(report.succeeded).toEqual(['d2']);
    expect(send).toHaveBeenCalledWith({
      subject: '[Feed Digest] 2026-10-17',
      url: shareUrl,
      markdown: '# Digest two\n\nhello\n',
      html: blobs.blobs.get('shared/d2.html'),
      recipient: undefined
    });
  });

  it('stores a styled HTML page under the shared namespace', async () => {
    await stage.run();

    const html = blobs.blobs.get('shared/d2.html') ?? '';
    expect(blobs.contentTypes.get('shared/d2.html')).toBe('text/html; charset=utf-8');
    expect(html).toContain('<title>[Feed Digest] 2026-10-17</title>');
    expect(html).toContain('<h1>Digest two</h1>');
  });

  it('combines several digests into one message', async () => {
    const report = await stage.run({ digestIds: ['d1', 'd2'], recipient: 'https://hooks.example.com/other' });

    expect(report.shareUrl).toBe('https://storage.test/shared/d1__d2.html?expires=604800');
    expect(send).toHaveBeenCalledWith({
      subject: '[Feed Digest] 2026-10-17',
      url: 'https://storage.test/shared/d1__d2.html?expires=604800',
      markdown: '# Digest one\n\nfirst\n\n---\n\n# Digest two\n\nhello\n',
      html: blobs.blobs.get('shared/d1__d2.html'),
      recipient: 'https://hooks.example.com/other'
    });
  });

  it('reports an unknown digest without sending anything', async () => {
    const report = await stage.run({ digestIds: ['nope'] });

    expect(report.success).toBe(false);
    expect(report.failed).toEqual([{ guid: 'nope', error: 'Unknown digest nope' }]);
    expect(send).not.toHaveBeenCalled();
  });

  it('skips when there is no digest yet', async () => {
    metadata.digests.clear();
    const report = await stage.run();

    expect(report.success).toBe(false);
    expect(report.skipped).toEqual([{ reason: 'no digest to distribute' }]);
    expect(send).not.toHaveBeenCalled();
  });

  it('reports a transport failure and leaves item state alone', async () => {
    await metadata.put(makeItem('b', { included_in_digest_keys: ['d2'] }));
    send.mockRejectedValue(new TransportError('Slack webhook responded 500'));

    const report = await stage.run();

    expect(report.success).toBe(false);
    expect(report.shareUrl).toBeNull();
    expect(report.failed).toEqual([{ guid: 'latest', error: 'Slack webhook responded 500' }]);
    expect(metadata.updates).toEqual([]);
  });
});
