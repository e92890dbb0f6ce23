/**
 * Zod schema for user-facing configuration (config.json).
 *
 * Lives in `~/.config/review-loop/config.json` or `.review-loop/config.json`.
 */

import { z } from 'zod';

const LoggingSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).optional(),
    /** Path of a JSON-lines log file; `true` uses the default state path */
    file: z.union([z.string().min(1), z.boolean()]).optional(),
  })
  .strict();

const ProviderSchema = z
  .object({
    type: z.enum(['anthropic', 'openai', 'mock']).optional(),
    model: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    maxTokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeoutMs: z.number().int().positive().optional(),
    systemPrompt: z.string().optional(),
  })
  .strict();

const ReviewerSchema = z
  .object({
    kind: z.enum(['heuristic', 'provider']).optional(),
    minLength: z.number().int().nonnegative().optional(),
    maxQuestions: z.number().int().nonnegative().optional(),
    requiredScore: z.number().int().min(1).max(4).optional(),
    instructions: z.string().min(1).optional(),
    criteria: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const ConfigSchema = z
  .object({
    maxAttempts: z.number().int().positive().optional(),
    logging: LoggingSchema.optional(),
    provider: ProviderSchema.optional(),
    reviewer: ReviewerSchema.optional(),
  })
  .strict();

export type ValidatedConfig = z.infer<typeof ConfigSchema>;
