/**
 * OpenAI Provider Adapter
 *
 * Adapts the OpenAI Chat Completions API to the LLMProvider interface.
 * Also works against OpenAI-compatible servers through `baseUrl`.
 */

import { z } from 'zod';
import { ErrorCategory, ProviderError } from '../../errors/index.js';
import { postJson } from '../http.js';
import { registerProvider, hasEnv, requireEnv } from '../provider.js';
import type { ChatOptions, ChatResponse, LLMProvider, Message, OpenAIConfig } from '../types.js';

const OpenAIResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

function mapFinishReason(reason: string | null | undefined): ChatResponse['stopReason'] {
  return reason === 'length' ? 'max_tokens' : 'end_turn';
}

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  readonly defaultModel = 'gpt-4o-mini';

  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private organization?: string;
  private timeoutMs?: number;

  constructor(config: OpenAIConfig = {}) {
    this.apiKey = config.apiKey ?? requireEnv('OPENAI_API_KEY');
    this.model = config.model ?? this.defaultModel;
    this.baseUrl = config.baseUrl ?? 'https://api.openai.com';
    this.organization = config.organization ?? process.env.OPENAI_ORG_ID;
    this.timeoutMs = config.timeoutMs;
  }

  isConfigured(): boolean {
    return this.apiKey !== '';
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const data = await postJson({
      url: `${this.baseUrl}/v1/chat/completions`,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        ...(this.organization && { 'OpenAI-Organization': this.organization }),
      },
      body: {
        model: options?.model ?? this.model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        max_tokens: options?.maxTokens ?? 4096,
        temperature: options?.temperature ?? 0.7,
      },
      providerName: this.name,
      timeoutMs: this.timeoutMs,
    });

    const parsed = OpenAIResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected response shape from ${this.name}: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
        ErrorCategory.PERMANENT,
        false,
        this.name
      );
    }

    const choice = parsed.data.choices[0];
    return {
      content: choice.message.content ?? '',
      stopReason: mapFinishReason(choice.finish_reason),
      ...(parsed.data.usage && {
        usage: {
          inputTokens: parsed.data.usage.prompt_tokens,
          outputTokens: parsed.data.usage.completion_tokens,
        },
      }),
    };
  }
}

registerProvider('openai', {
  priority: 2,
  detect: () => hasEnv('OPENAI_API_KEY'),
  create: async () => new OpenAIProvider(),
});
