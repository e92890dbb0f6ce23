/**
 * Review Stack Builder
 *
 * Turns resolved settings into a ready-to-run controller plus the
 * generator and evaluator it should be run with.
 */

import { createReviewLoop, type ReviewLoop } from './core/review-loop.js';
import { HeuristicEvaluator } from './collaborators/heuristic-evaluator.js';
import { ProviderEvaluator } from './collaborators/provider-evaluator.js';
import { ProviderGenerator } from './collaborators/provider-generator.js';
import { createProvider, getProvider } from './providers/index.js';
import type { ChatOptions, LLMProvider, ProviderConfig } from './providers/types.js';
import type { ReviewSettings } from './config/settings.js';
import type { StructuredLogger } from './utilities/logger.js';
import type { Evaluator, Generator } from './types.js';

export interface ReviewStack {
  loop: ReviewLoop;
  generator: Generator;
  evaluator: Evaluator;
  provider: LLMProvider;
}

export interface BuildOptions {
  /** Use this provider instead of creating one from settings */
  provider?: LLMProvider;
  logger?: StructuredLogger;
}

export function toProviderConfig(
  provider: ReviewSettings['provider'] & { type: NonNullable<ReviewSettings['provider']['type']> }
): ProviderConfig {
  const http = {
    ...(provider.model !== undefined && { model: provider.model }),
    ...(provider.baseUrl !== undefined && { baseUrl: provider.baseUrl }),
    ...(provider.timeoutMs !== undefined && { timeoutMs: provider.timeoutMs }),
  };

  switch (provider.type) {
    case 'anthropic':
      return { type: 'anthropic', config: http };
    case 'openai':
      return { type: 'openai', config: http };
    case 'mock':
      return { type: 'mock' };
  }
}

function chatOptionsFrom(provider: ReviewSettings['provider']): ChatOptions {
  return {
    ...(provider.maxTokens !== undefined && { maxTokens: provider.maxTokens }),
    ...(provider.temperature !== undefined && { temperature: provider.temperature }),
  };
}

async function resolveProvider(settings: ReviewSettings): Promise<LLMProvider> {
  const { type } = settings.provider;
  if (type === undefined) {
    return getProvider();
  }
  return createProvider(toProviderConfig({ ...settings.provider, type }));
}

export function buildEvaluator(
  settings: ReviewSettings,
  provider: LLMProvider,
  logger?: StructuredLogger
): Evaluator {
  const { reviewer } = settings;
  if (reviewer.kind === 'provider') {
    return new ProviderEvaluator(provider, {
      ...(reviewer.instructions !== undefined && { instructions: reviewer.instructions }),
      criteria: reviewer.criteria,
      chatOptions: chatOptionsFrom(settings.provider),
      ...(logger && { logger }),
    });
  }
  return new HeuristicEvaluator({
    minLength: reviewer.minLength,
    maxQuestions: reviewer.maxQuestions,
    requiredScore: reviewer.requiredScore,
  });
}

export async function buildReviewStack(
  settings: ReviewSettings,
  options: BuildOptions = {}
): Promise<ReviewStack> {
  const provider = options.provider ?? (await resolveProvider(settings));

  const generator = new ProviderGenerator(provider, {
    ...(settings.provider.systemPrompt !== undefined && {
      systemPrompt: settings.provider.systemPrompt,
    }),
    chatOptions: chatOptionsFrom(settings.provider),
    ...(options.logger && { logger: options.logger }),
  });

  return {
    loop: createReviewLoop({
      maxAttempts: settings.maxAttempts,
      ...(options.logger && { logger: options.logger }),
    }),
    generator,
    evaluator: buildEvaluator(settings, provider, options.logger),
    provider,
  };
}
