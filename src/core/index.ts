/**
 * Core Module
 *
 * The review loop controller and the pieces it is built from.
 *
 * @example
 * ```typescript
 * import { createReviewLoop } from './core/index.js';
 *
 * const loop = createReviewLoop({ maxAttempts: 3 });
 * const outcome = await loop.review('Summarize the report', generator, evaluator);
 * ```
 */

export {
  ReviewLoop,
  createReviewLoop,
  DEFAULT_MAX_ATTEMPTS,
  type ReviewLoopOptions,
} from './review-loop.js';
export { IterationState, assertMaxAttempts } from './iteration-state.js';
export {
  TurnSchema,
  DEFAULT_FEEDBACK_TEMPLATE,
  validateConversation,
  extractRequest,
  composeFeedbackTurn,
  composeOutputTurn,
  composeFinalMessage,
  type FeedbackTemplate,
} from './conversation.js';
export { normalizeVerdict } from './verdict.js';
