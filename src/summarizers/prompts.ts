import type { SummaryType } from '../types/content-item';

export interface SummaryPrompt {
  system: string;
  user: (content: string) => string;
  maxTokens: number;
}

const SYSTEM =
  'You summarize articles for a technical newsletter. Write plain Markdown, no headings, ' +
  'no preamble such as "This article". Report only what the article says.';

export const SUMMARY_PROMPTS: Record<SummaryType, SummaryPrompt> = {
  short: {
    system: SYSTEM,
    user: (content) =>
      `Summarize the following article in two or three sentences (at most 60 words).\n\n---\n${content}`,
    maxTokens: 150
  },
  standard: {
    system: SYSTEM,
    user: (content) =>
      'Summarize the following article in one or two paragraphs, followed by up to five bullet points ' +
      `with the key facts, figures or takeaways.\n\n---\n${content}`,
    maxTokens: 600
  }
};
