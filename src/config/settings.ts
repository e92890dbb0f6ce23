/**
 * Resolved settings: validated config with every default filled in.
 */

import { DEFAULT_MAX_ATTEMPTS } from '../core/review-loop.js';
import { getDefaultLogPath } from '../paths.js';
import type { ProviderType } from '../providers/types.js';
import type { LogLevel } from '../utilities/logger.js';
import type { ValidatedConfig } from './schema.js';

export type ReviewerKind = 'heuristic' | 'provider';

export interface ReviewSettings {
  maxAttempts: number;
  logging: {
    level: LogLevel;
    /** Absent when file logging is off */
    file?: string;
  };
  provider: {
    /** Absent means auto-detect from the environment */
    type?: ProviderType;
    model?: string;
    baseUrl?: string;
    maxTokens?: number;
    temperature?: number;
    timeoutMs?: number;
    systemPrompt?: string;
  };
  reviewer: {
    kind: ReviewerKind;
    minLength: number;
    maxQuestions: number;
    requiredScore: number;
    instructions?: string;
    criteria: string[];
  };
}

export function resolveSettings(config: ValidatedConfig = {}): ReviewSettings {
  const fileSetting = config.logging?.file;
  const file =
    fileSetting === true ? getDefaultLogPath() : typeof fileSetting === 'string' ? fileSetting : undefined;

  return {
    maxAttempts: config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    logging: {
      level: config.logging?.level ?? 'info',
      ...(file !== undefined && { file }),
    },
    provider: { ...config.provider },
    reviewer: {
      kind: config.reviewer?.kind ?? 'heuristic',
      minLength: config.reviewer?.minLength ?? 50,
      maxQuestions: config.reviewer?.maxQuestions ?? 2,
      requiredScore: config.reviewer?.requiredScore ?? 3,
      ...(config.reviewer?.instructions !== undefined && {
        instructions: config.reviewer.instructions,
      }),
      criteria: config.reviewer?.criteria ?? [],
    },
  };
}
