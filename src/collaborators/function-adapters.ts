/**
 * Plain-function adapters for the Generator and Evaluator capabilities.
 */

import type {
  Conversation,
  EvaluationContext,
  Evaluator,
  GenerationContext,
  Generator,
  Verdict,
} from '../types.js';

type MaybePromise<T> = T | Promise<T>;

export type GenerateFn = (
  conversation: Conversation,
  context: GenerationContext
) => MaybePromise<string | null | undefined>;

/** A boolean result is shorthand for a verdict without feedback. */
export type EvaluateFn = (
  request: string,
  output: string,
  context: EvaluationContext
) => MaybePromise<Verdict | boolean>;

export function functionGenerator(fn: GenerateFn): Generator {
  return {
    async generate(conversation, context) {
      const output = await fn(conversation, context);
      return output ?? '';
    },
  };
}

export function functionEvaluator(fn: EvaluateFn): Evaluator {
  return {
    async evaluate(request, output, context) {
      const verdict = await fn(request, output, context);
      return typeof verdict === 'boolean' ? { accepted: verdict } : verdict;
    },
  };
}
