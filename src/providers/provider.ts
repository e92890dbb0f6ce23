/**
 * Provider Factory
 *
 * Creates LLM providers, either from explicit configuration or by
 * auto-detecting which credentials are present.
 */

import { ErrorCategory, ProviderError } from '../errors/index.js';
import { logger } from '../utilities/logger.js';
import type { LLMProvider, ProviderConfig } from './types.js';

// =============================================================================
// PROVIDER REGISTRY
// =============================================================================

interface ProviderRegistration {
  detect: () => boolean;
  create: () => Promise<LLMProvider>;
  /** Lower = higher priority */
  priority: number;
}

const providers: Map<string, ProviderRegistration> = new Map();

/**
 * Register a provider. Each adapter module registers itself on import.
 */
export function registerProvider(name: string, registration: ProviderRegistration): void {
  providers.set(name, registration);
}

// =============================================================================
// PROVIDER FACTORY
// =============================================================================

/**
 * Auto-detect and create the best available provider.
 *
 * Detection order (by priority):
 * 1. Anthropic (if ANTHROPIC_API_KEY set)
 * 2. OpenAI (if OPENAI_API_KEY set)
 * 100. Mock (always available as fallback)
 */
export async function getProvider(preferred?: string): Promise<LLMProvider> {
  if (preferred) {
    const registration = providers.get(preferred);
    if (registration?.detect()) {
      return registration.create();
    }
    throw ProviderError.notConfigured(preferred);
  }

  const sorted = [...providers.entries()].sort((a, b) => a[1].priority - b[1].priority);

  for (const [name, registration] of sorted) {
    if (registration.detect()) {
      logger.info(`Using provider: ${name}`);
      return registration.create();
    }
  }

  throw ProviderError.notConfigured('none');
}

/**
 * Create a provider from explicit configuration, skipping detection.
 */
export async function createProvider(config: ProviderConfig): Promise<LLMProvider> {
  switch (config.type) {
    case 'anthropic': {
      const { AnthropicProvider } = await import('./adapters/anthropic.js');
      return new AnthropicProvider(config.config);
    }
    case 'openai': {
      const { OpenAIProvider } = await import('./adapters/openai.js');
      return new OpenAIProvider(config.config);
    }
    case 'mock': {
      const { MockProvider } = await import('./adapters/mock.js');
      return new MockProvider(config.config);
    }
    default: {
      const unknown: never = config;
      throw new ProviderError(
        `Unknown provider type: ${JSON.stringify(unknown)}`,
        ErrorCategory.VALIDATION,
        false,
        'unknown'
      );
    }
  }
}

/**
 * List all registered providers and their status.
 */
export function listProviders(): Array<{ name: string; configured: boolean; priority: number }> {
  return [...providers.entries()]
    .map(([name, registration]) => ({
      name,
      configured: registration.detect(),
      priority: registration.priority,
    }))
    .sort((a, b) => a.priority - b.priority);
}

// =============================================================================
// HELPERS FOR ADAPTERS
// =============================================================================

/**
 * Check if an environment variable is set and non-empty.
 */
export function hasEnv(key: string): boolean {
  const value = process.env[key];
  return value !== undefined && value.trim() !== '';
}

/**
 * Get environment variable or throw.
 */
export function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}
