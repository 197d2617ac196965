/**
 * OpenAI client utility
 * Provides a singleton instance of the OpenAI client with lazy loading
 */

import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { ConfigurationError } from './errors';

/**
 * OpenAI Client Singleton
 * Manages a single instance of the OpenAI client with lazy initialization
 */
class OpenAIClient {
  private static instance: OpenAI | null = null;
  private static apiKey: string | null = null;

  /**
   * Use this key instead of OPENAI_API_KEY; drops any client already built
   */
  static configure(apiKey: string): void {
    this.apiKey = apiKey;
    this.instance = null;
  }

  /**
   * Get the singleton OpenAI client instance
   * Creates the instance on first access
   */
  static get(): OpenAI {
    if (!this.instance) {
      const apiKey = this.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigurationError('OPENAI_API_KEY environment variable is missing or empty');
      }
      // Retries are driven by the pipeline's own policy
      this.instance = new OpenAI({ apiKey, maxRetries: 0 });
    }
    return this.instance;
  }

  /**
   * Reset the singleton instance (useful for testing)
   */
  static reset(): void {
    this.instance = null;
    this.apiKey = null;
  }
}

/** The part of the SDK the summarizer talks to */
export interface ChatClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

// Export the lazy-loaded singleton instance
export const openai: ChatClient = {
  get chat() {
    return OpenAIClient.get().chat;
  }
};

export { OpenAIClient };
