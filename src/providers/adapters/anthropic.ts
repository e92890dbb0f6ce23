/**
 * Anthropic Claude Provider Adapter
 *
 * Adapts the Anthropic Messages API to the LLMProvider interface.
 */

import { z } from 'zod';
import { ErrorCategory, ProviderError } from '../../errors/index.js';
import { postJson } from '../http.js';
import { registerProvider, hasEnv, requireEnv } from '../provider.js';
import type { ChatOptions, ChatResponse, HttpProviderConfig, LLMProvider, Message } from '../types.js';

// =============================================================================
// ANTHROPIC API TYPES
// =============================================================================

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

/**
 * Split a transcript into the `system` parameter and alternating turns.
 *
 * Leading system turns become the system prompt. Later system turns (such
 * as retry feedback) are sent as user content, and consecutive turns with
 * the same role are merged.
 */
export function toAnthropicMessages(messages: Message[]): {
  system?: string;
  messages: AnthropicMessage[];
} {
  const systemParts: string[] = [];
  const converted: AnthropicMessage[] = [];

  for (const message of messages) {
    if (message.role === 'system' && converted.length === 0) {
      systemParts.push(message.content);
      continue;
    }

    const role = message.role === 'assistant' ? 'assistant' : 'user';
    const previous = converted[converted.length - 1];
    if (previous && previous.role === role) {
      previous.content = `${previous.content}\n\n${message.content}`;
    } else {
      converted.push({ role, content: message.content });
    }
  }

  return {
    ...(systemParts.length > 0 && { system: systemParts.join('\n\n') }),
    messages: converted,
  };
}

function mapStopReason(reason: string | null | undefined): ChatResponse['stopReason'] {
  if (reason === 'max_tokens') return 'max_tokens';
  if (reason === 'stop_sequence') return 'stop_sequence';
  return 'end_turn';
}

// =============================================================================
// ANTHROPIC PROVIDER
// =============================================================================

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly defaultModel = 'claude-sonnet-4-20250514';

  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private timeoutMs?: number;

  constructor(config: HttpProviderConfig = {}) {
    this.apiKey = config.apiKey ?? requireEnv('ANTHROPIC_API_KEY');
    this.model = config.model ?? this.defaultModel;
    this.baseUrl = config.baseUrl ?? 'https://api.anthropic.com';
    this.timeoutMs = config.timeoutMs;
  }

  isConfigured(): boolean {
    return this.apiKey !== '';
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const { system, messages: turns } = toAnthropicMessages(messages);

    const data = await postJson({
      url: `${this.baseUrl}/v1/messages`,
      headers: {
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: {
        model: options?.model ?? this.model,
        max_tokens: options?.maxTokens ?? 4096,
        temperature: options?.temperature ?? 0.7,
        ...(system !== undefined && { system }),
        messages: turns,
      },
      providerName: this.name,
      timeoutMs: this.timeoutMs,
    });

    const parsed = AnthropicResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected response shape from ${this.name}: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
        ErrorCategory.PERMANENT,
        false,
        this.name
      );
    }

    const content = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    return {
      content,
      stopReason: mapStopReason(parsed.data.stop_reason),
      ...(parsed.data.usage && {
        usage: {
          inputTokens: parsed.data.usage.input_tokens,
          outputTokens: parsed.data.usage.output_tokens,
        },
      }),
    };
  }
}

// =============================================================================
// REGISTRATION
// =============================================================================

registerProvider('anthropic', {
  priority: 1,
  detect: () => hasEnv('ANTHROPIC_API_KEY'),
  create: async () => new AnthropicProvider(),
});
