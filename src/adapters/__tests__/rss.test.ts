import type Parser from 'rss-parser';
import { RssFeedReader, toFeedEntry, type RssParser } from '../rss';
import type { FeedEntry } from '../../types/adapter';

type Item = Parser.Item & { id?: string; 'content:encoded'?: string };

async function collect(iterable: AsyncIterable<FeedEntry>): Promise<FeedEntry[]> {
  const entries: FeedEntry[] = [];
  for await (const entry of iterable) entries.push(entry);
  return entries;
}

function readerFor(items: Item[]) {
  const parseURL = vi.fn(async () => ({ items }));
  const parser: RssParser = { parseURL };
  return { reader: new RssFeedReader({}, parser), parseURL };
}

describe('RssFeedReader', () => {
  const items: Item[] = [
    { guid: 'old', title: 'Old', link: 'https://example.com/old', isoDate: '2026-10-01T00:00:00.000Z' },
    { guid: 'undated', title: 'Undated', link: 'https://example.com/undated' },
    { guid: 'new', title: 'New', link: 'https://example.com/new', isoDate: '2026-10-10T00:00:00.000Z' }
  ];

  it('yields entries newest first with undated entries last', async () => {
    const { reader, parseURL } = readerFor(items);
    const entries = await collect(reader.read('https://example.com/feed.xml'));

    expect(parseURL).toHaveBeenCalledWith('https://example.com/feed.xml');
    expect(entries.map((entry) => entry.id)).toEqual(['new', 'old', 'undated']);
  });

  it('caps the entries after sorting', async () => {
    const { reader } = readerFor(items);
    const entries = await collect(reader.read('https://example.com/feed.xml', { maxItems: 1 }));
    expect(entries.map((entry) => entry.id)).toEqual(['new']);
  });

  it('propagates a feed that cannot be parsed', async () => {
    const parser: RssParser = { parseURL: vi.fn(async () => Promise.reject(new Error('Status code 404'))) };
    const reader = new RssFeedReader({}, parser);
    await expect(collect(reader.read('https://example.com/missing.xml'))).rejects.toThrow('Status code 404');
  });
});

describe('toFeedEntry', () => {
  it('prefers the full encoded body over the teaser', () => {
    const entry = toFeedEntry({
      guid: 'g1',
      title: ' Title ',
      link: 'https://example.com/g1',
      pubDate: 'Fri, 16 Oct 2026 08:00:00 GMT',
      content: '<p>teaser</p>',
      'content:encoded': '<p>full body</p>'
    });

    expect(entry).toEqual({
      id: 'g1',
      title: 'Title',
      link: 'https://example.com/g1',
      published_at: '2026-10-16T08:00:00.000Z',
      content: '<p>full body</p>'
    });
  });

  it('falls back to the Atom id and the summary', () => {
    const entry = toFeedEntry({ id: 'urn:entry:1', title: 'Atom', summary: '<p>summary</p>' });
    expect(entry.id).toBe('urn:entry:1');
    expect(entry.content).toBe('<p>summary</p>');
  });

  it('maps blank fields and unparseable dates to null', () => {
    expect(toFeedEntry({ guid: '  ', title: '', pubDate: 'not a date' })).toEqual({
      id: null,
      title: null,
      link: null,
      published_at: null,
      content: null
    });
  });
});
