/**
 * Provider Abstraction Types
 *
 * The minimal chat surface the provider-backed generator and evaluator
 * need from an LLM service.
 */

import type { Turn } from '../types.js';

// =============================================================================
// MESSAGE TYPES
// =============================================================================

export type Message = Turn;

// =============================================================================
// PROVIDER INTERFACE
// =============================================================================

export interface ChatOptions {
  /** Maximum tokens to generate */
  maxTokens?: number;

  /** Temperature for randomness (0-1) */
  temperature?: number;

  /** Model override (uses provider default if not specified) */
  model?: string;
}

export interface ChatResponse {
  /** The assistant's response text */
  content: string;

  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence';

  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * The core LLM provider interface.
 */
export interface LLMProvider {
  /** Provider name for logging/debugging */
  readonly name: string;

  readonly defaultModel: string;

  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;

  isConfigured(): boolean;
}

// =============================================================================
// PROVIDER CONFIGURATION
// =============================================================================

export interface HttpProviderConfig {
  /** Falls back to the provider's environment variable */
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 120000) */
  timeoutMs?: number;
}

export interface OpenAIConfig extends HttpProviderConfig {
  organization?: string;
}

export interface MockConfig {
  /** Replies returned in order; the last one repeats */
  replies?: string[];
}

export type ProviderConfig =
  | { type: 'anthropic'; config?: HttpProviderConfig }
  | { type: 'openai'; config?: OpenAIConfig }
  | { type: 'mock'; config?: MockConfig };

export type ProviderType = ProviderConfig['type'];
