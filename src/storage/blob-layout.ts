import CryptoJS from 'crypto-js';
import type { SummaryType } from '../types/content-item';

export type ContentKind = 'html' | 'markdown' | SummaryType;

export interface BlobNamespaces {
  html: string;
  markdown: string;
  short: string;
  standard: string;
  digests: string;
  shared: string;
}

export const DEFAULT_NAMESPACES: BlobNamespaces = {
  html: 'html',
  markdown: 'markdown',
  short: 'processed/short_summaries',
  standard: 'processed/summaries',
  digests: 'curated',
  shared: 'shared'
};

const EXTENSIONS: Record<ContentKind, string> = {
  html: 'html',
  markdown: 'md',
  short: 'md',
  standard: 'md'
};

/**
 * Stable, path-safe key stem for a guid. Feed guids are often URLs, so the
 * key uses the SHA-256 of the guid rather than the guid itself.
 */
export function guidKey(guid: string): string {
  return CryptoJS.SHA256(guid).toString();
}

/**
 * Bijection (guid, kind) → blob key and digest id → blob key
 */
export class BlobLayout {
  constructor(private readonly namespaces: BlobNamespaces = DEFAULT_NAMESPACES) {}

  itemKey(guid: string, kind: ContentKind): string {
    return `${this.namespaces[kind]}/${guidKey(guid)}.${EXTENSIONS[kind]}`;
  }

  digestKey(digestId: string): string {
    return `${this.namespaces.digests}/${digestId}.md`;
  }

  latestDigestKey(): string {
    return `${this.namespaces.digests}/latest.md`;
  }

  sharedKey(name: string): string {
    return `${this.namespaces.shared}/${name}.html`;
  }
}
