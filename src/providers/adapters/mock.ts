/**
 * Mock Provider
 *
 * Deterministic LLM provider for tests, demos and offline runs.
 * Replays configured replies in order (the last one repeats); without
 * replies it answers with a fixed template built from the latest user turn.
 */

import { registerProvider } from '../provider.js';
import type { ChatOptions, ChatResponse, LLMProvider, Message, MockConfig } from '../types.js';

export interface MockCall {
  messages: Message[];
  options?: ChatOptions;
}

function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export class MockProvider implements LLMProvider {
  readonly name = 'mock';
  readonly defaultModel = 'mock-model';

  readonly calls: MockCall[] = [];
  private replies: string[];

  constructor(config: MockConfig = {}) {
    this.replies = config.replies ?? [];
  }

  isConfigured(): boolean {
    return true;
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const index = this.calls.length;
    this.calls.push({ messages: messages.map((m) => ({ ...m })), ...(options && { options }) });

    const lastUser = [...messages].reverse().find((m) => m.role === 'user');
    const prompt = lastUser?.content ?? '';

    const content =
      this.replies.length > 0
        ? this.replies[Math.min(index, this.replies.length - 1)]
        : `I'll help you with: ${prompt}. Here is a structured response:\n\n` +
          '1. Understanding the request\n2. Working through it\n3. Providing the answer';

    return {
      content,
      stopReason: 'end_turn',
      usage: {
        inputTokens: messages.reduce((sum, m) => sum + estimateTokens(m.content), 0),
        outputTokens: estimateTokens(content),
      },
    };
  }

  /**
   * Replace the reply script and forget previous calls.
   */
  setReplies(replies: string[]): void {
    this.replies = replies;
    this.calls.length = 0;
  }

  getCallCount(): number {
    return this.calls.length;
  }
}

registerProvider('mock', {
  priority: 100, // Lowest priority - only used when nothing else is configured
  detect: () => true,
  create: async () => new MockProvider(),
});
