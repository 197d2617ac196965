import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { OpenAISummarizer } from '../openai-summarizer';
import { SUMMARY_PROMPTS } from '../prompts';
import { SummarizationError } from '../../utils/errors';
import { NO_RETRY } from '../../__tests__/helpers/fixtures';

function completion(content: string | null): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-4o-mini',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null }
      }
    ]
  };
}

describe('OpenAISummarizer', () => {
  const create = vi.fn<(body: ChatCompletionCreateParamsNonStreaming) => Promise<ChatCompletion>>();
  const client = { chat: { completions: { create } } };
  const options = { model: 'gpt-4o-mini', temperature: 0, maxInputChars: 10, retry: NO_RETRY };

  beforeEach(() => {
    create.mockReset();
  });

  it('returns the trimmed model output', async () => {
    create.mockResolvedValue(completion('  A short summary.  \n'));
    const summarizer = new OpenAISummarizer(options, client);

    await expect(summarizer.summarize('article', 'short')).resolves.toBe('A short summary.');
  });

  it('sends the prompt for the requested type with truncated input', async () => {
    create.mockResolvedValue(completion('Summary'));
    const summarizer = new OpenAISummarizer(options, client);

    await summarizer.summarize('abcdefghijklmnop', 'standard');

    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      temperature: 0,
      max_tokens: SUMMARY_PROMPTS.standard.maxTokens,
      messages: [
        { role: 'system', content: SUMMARY_PROMPTS.standard.system },
        { role: 'user', content: SUMMARY_PROMPTS.standard.user('abcdefghij') }
      ]
    });
  });

  it('rejects an empty answer', async () => {
    create.mockResolvedValue(completion('   '));
    const summarizer = new OpenAISummarizer(options, client);

    await expect(summarizer.summarize('article', 'short')).rejects.toThrow('short summary came back empty');
  });

  it('wraps API failures in a SummarizationError', async () => {
    create.mockRejectedValue(new Error('rate limited'));
    const summarizer = new OpenAISummarizer(options, client);

    const error = await summarizer.summarize('article', 'short').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SummarizationError);
    expect(error).toHaveProperty('message', 'short summary request failed: rate limited');
  });

  it('retries a failed request under the retry policy', async () => {
    create.mockRejectedValueOnce(new Error('timeout')).mockResolvedValueOnce(completion('Recovered'));
    const summarizer = new OpenAISummarizer({ ...options, retry: { ...NO_RETRY, retries: 1 } }, client);

    await expect(summarizer.summarize('article', 'short')).resolves.toBe('Recovered');
    expect(create).toHaveBeenCalledTimes(2);
  });
});
