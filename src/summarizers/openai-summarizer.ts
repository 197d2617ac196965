import type { SummaryType } from '../types/content-item';
import { SummarizationError, errorMessage } from '../utils/errors';
import { openai, type ChatClient } from '../utils/openaiClient';
import { withRetry, type RetryPolicy } from '../utils/retry';
import { SUMMARY_PROMPTS } from './prompts';

export interface Summarizer {
  summarize(text: string, type: SummaryType): Promise<string>;
}

export interface OpenAISummarizerOptions {
  model: string;
  temperature: number;
  maxInputChars: number;
  retry: RetryPolicy;
}

export class OpenAISummarizer implements Summarizer {
  constructor(
    private readonly options: OpenAISummarizerOptions,
    private readonly client: ChatClient = openai
  ) {}

  async summarize(text: string, type: SummaryType): Promise<string> {
    const prompt = SUMMARY_PROMPTS[type];
    const input = text.length > this.options.maxInputChars ? text.slice(0, this.options.maxInputChars) : text;

    let content: string | null | undefined;
    try {
      const completion = await withRetry(
        () =>
          this.client.chat.completions.create({
            model: this.options.model,
            temperature: this.options.temperature,
            max_tokens: prompt.maxTokens,
            messages: [
              { role: 'system', content: prompt.system },
              { role: 'user', content: prompt.user(input) }
            ]
          }),
        this.options.retry,
        `summarize ${type}`
      );
      content = completion.choices[0]?.message.content;
    } catch (error) {
      throw new SummarizationError(`${type} summary request failed: ${errorMessage(error)}`, { cause: error });
    }

    const summary = content?.trim();
    if (!summary) {
      throw new SummarizationError(`${type} summary came back empty`);
    }
    return summary;
  }
}
