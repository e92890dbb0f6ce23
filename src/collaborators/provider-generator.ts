/**
 * Generator backed by an LLM provider.
 */

import type { ChatOptions, LLMProvider } from '../providers/types.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type { Conversation, GenerationContext, Generator } from '../types.js';

export interface ProviderGeneratorOptions {
  /** Prepended as a system turn on every call */
  systemPrompt?: string;
  chatOptions?: ChatOptions;
  logger?: StructuredLogger;
}

export class ProviderGenerator implements Generator {
  private readonly provider: LLMProvider;
  private readonly systemPrompt?: string;
  private readonly chatOptions?: ChatOptions;
  private readonly log: StructuredLogger;

  constructor(provider: LLMProvider, options: ProviderGeneratorOptions = {}) {
    this.provider = provider;
    this.systemPrompt = options.systemPrompt;
    this.chatOptions = options.chatOptions;
    this.log = options.logger ?? createComponentLogger('ProviderGenerator');
  }

  async generate(conversation: Conversation, context: GenerationContext): Promise<string> {
    const messages = this.systemPrompt
      ? [{ role: 'system' as const, content: this.systemPrompt }, ...conversation]
      : [...conversation];

    const response = await this.provider.chat(messages, this.chatOptions);
    this.log.debug('Generated output', {
      provider: this.provider.name,
      attempt: context.attempt,
      stopReason: response.stopReason,
      outputTokens: response.usage?.outputTokens,
    });
    return response.content;
  }
}
