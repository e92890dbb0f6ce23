/**
 * Evaluator backed by an LLM provider.
 *
 * Asks the model to review an output against the original request and
 * parses the reply with `parseVerdictText`. Empty output is rejected
 * without a model call.
 */

import type { ChatOptions, LLMProvider, Message } from '../providers/types.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type { EvaluationContext, Evaluator, Verdict } from '../types.js';
import { parseVerdictText } from './verdict-parser.js';

export const DEFAULT_REVIEW_INSTRUCTIONS =
  'You are a strict reviewer. Decide whether the response fully and correctly answers the request. ' +
  'Reply with "APPROVED: <short reason>" when it does, or "NEEDS_IMPROVEMENT: <specific, actionable feedback>" when it does not.';

export interface ProviderEvaluatorOptions {
  /** System prompt for the reviewer model */
  instructions?: string;
  /** Extra review criteria appended to the review request */
  criteria?: string[];
  chatOptions?: ChatOptions;
  logger?: StructuredLogger;
}

export function buildReviewMessages(
  request: string,
  output: string,
  instructions: string = DEFAULT_REVIEW_INSTRUCTIONS,
  criteria: readonly string[] = []
): Message[] {
  const sections = [`Original request:\n${request}`, `Response to review:\n${output}`];
  if (criteria.length > 0) {
    sections.push(`Review criteria:\n${criteria.map((c) => `- ${c}`).join('\n')}`);
  }
  return [
    { role: 'system', content: instructions },
    { role: 'user', content: sections.join('\n\n') },
  ];
}

export class ProviderEvaluator implements Evaluator {
  private readonly provider: LLMProvider;
  private readonly instructions: string;
  private readonly criteria: string[];
  private readonly chatOptions?: ChatOptions;
  private readonly log: StructuredLogger;

  constructor(provider: LLMProvider, options: ProviderEvaluatorOptions = {}) {
    this.provider = provider;
    this.instructions = options.instructions ?? DEFAULT_REVIEW_INSTRUCTIONS;
    this.criteria = options.criteria ?? [];
    this.chatOptions = options.chatOptions;
    this.log = options.logger ?? createComponentLogger('ProviderEvaluator');
  }

  async evaluate(request: string, output: string, context: EvaluationContext): Promise<Verdict> {
    if (output.trim() === '') {
      return { accepted: false, feedback: 'No output to review.' };
    }

    const response = await this.provider.chat(
      buildReviewMessages(request, output, this.instructions, this.criteria),
      this.chatOptions
    );
    const verdict = parseVerdictText(response.content);
    this.log.debug('Review received', {
      provider: this.provider.name,
      attempt: context.attempt,
      accepted: verdict.accepted,
    });
    return verdict;
  }
}
