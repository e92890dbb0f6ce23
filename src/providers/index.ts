/**
 * Providers
 *
 * Importing this module registers every bundled adapter with the
 * provider registry, so `getProvider()` can auto-detect them.
 */

import './adapters/anthropic.js';
import './adapters/openai.js';
import './adapters/mock.js';

export { getProvider, createProvider, listProviders, registerProvider } from './provider.js';
export { AnthropicProvider, toAnthropicMessages } from './adapters/anthropic.js';
export { OpenAIProvider } from './adapters/openai.js';
export { MockProvider, type MockCall } from './adapters/mock.js';
export type {
  ChatOptions,
  ChatResponse,
  HttpProviderConfig,
  LLMProvider,
  Message,
  MockConfig,
  OpenAIConfig,
  ProviderConfig,
  ProviderType,
} from './types.js';
