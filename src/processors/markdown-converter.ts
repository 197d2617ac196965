/**
 * HTML → Markdown conversion and content-quality classification.
 *
 * Full documents go through Readability first to drop page chrome; feed
 * fragments go straight to Turndown.
 */

import { JSDOM } from 'jsdom';
import { Readability } from '@mozilla/readability';
import TurndownService from 'turndown';

const REMOVED_TAGS: TurndownService.Filter = ['script', 'style', 'nav', 'footer', 'aside'];
const REMOVED_SELECTOR = 'script, style, nav, footer, aside, noscript';

const FULL_DOCUMENT = /<html[\s>]|<body[\s>]/i;

// Matched against lower-cased text with collapsed whitespace
const PAYWALL_PHRASES = [
  'subscribe to continue',
  'subscribe to read',
  'subscribers only',
  'subscriber-only',
  'already a subscriber',
  'sign in to continue',
  'log in to continue',
  'to continue reading',
  'create a free account',
  'become a member to',
  'unlock this article',
  'this content is for members'
];

export interface ConvertOptions {
  title: string;
  url: string | null;
}

export interface ConversionResult {
  markdown: string;
  wordCount: number;
  isPaywalled: boolean;
  isTooShort: boolean;
}

export interface ContentConverter {
  convert(html: string, options: ConvertOptions): ConversionResult;
}

export interface MarkdownConverterOptions {
  minWords: number;
  paywallMaxWords: number;
}

function validUrl(url: string | null): string | undefined {
  if (!url) return undefined;
  try {
    return new URL(url).toString();
  } catch {
    return undefined;
  }
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function containsPaywallPhrase(text: string): boolean {
  const normalized = text.toLowerCase().replace(/\s+/g, ' ');
  return PAYWALL_PHRASES.some((phrase) => normalized.includes(phrase));
}

function visibleText(html: string): string {
  const { document } = new JSDOM(`<body>${html}</body>`).window;
  document.querySelectorAll(REMOVED_SELECTOR).forEach((element) => element.remove());
  return document.body.textContent ?? '';
}

export class MarkdownConverter implements ContentConverter {
  private readonly turndown: TurndownService;

  constructor(private readonly options: MarkdownConverterOptions) {
    this.turndown = new TurndownService({
      headingStyle: 'atx',
      codeBlockStyle: 'fenced'
    });
    this.turndown.remove(REMOVED_TAGS);
  }

  /**
   * Main content of the page as HTML. Falls back to the whole body when
   * Readability finds no article.
   */
  private extractContent(html: string, url: string | null): string {
    if (!FULL_DOCUMENT.test(html)) return html;

    const dom = new JSDOM(html, { url: validUrl(url) });
    const fallback = dom.window.document.body.innerHTML;
    const article = new Readability(dom.window.document).parse();
    return article?.content ? article.content : fallback;
  }

  convert(html: string, { title, url }: ConvertOptions): ConversionResult {
    const content = this.extractContent(html, url);
    const text = visibleText(content);
    const wordCount = countWords(text);

    const header = url ? `# ${title}\n\nSource: ${url}\n\n` : `# ${title}\n\n`;
    const markdown = `${header}${this.turndown.turndown(content).trim()}\n`;

    const isTooShort = wordCount < this.options.minWords;
    const isPaywalled = !isTooShort && wordCount < this.options.paywallMaxWords && containsPaywallPhrase(text);

    return { markdown, wordCount, isPaywalled, isTooShort };
  }
}
