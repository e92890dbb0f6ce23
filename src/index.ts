/**
 * review-loop
 *
 * Generator → evaluator → retry-or-finish loop with a bounded number of
 * attempts.
 *
 * @example
 * ```typescript
 * import { createReviewLoop, functionGenerator, HeuristicEvaluator } from 'review-loop';
 *
 * const loop = createReviewLoop({ maxAttempts: 3 });
 * const outcome = await loop.review(
 *   'Explain event loops',
 *   functionGenerator(async (conversation) => callMyModel(conversation)),
 *   new HeuristicEvaluator()
 * );
 * if (outcome.status === 'approved') console.log(outcome.output);
 * ```
 */

export * from './types.js';
export * from './errors/index.js';
export * from './core/index.js';
export * from './collaborators/index.js';
export * from './providers/index.js';
export * from './config/index.js';
export { buildReviewStack, buildEvaluator, type ReviewStack, type BuildOptions } from './builder.js';
export {
  StructuredLogger,
  ConsoleSink,
  MemorySink,
  FileSink,
  logger,
  createLogger,
  configureLogger,
  createComponentLogger,
  formatLogLine,
  LOG_LEVELS,
  type LogLevel,
  type EntryLevel,
  type LogEntry,
  type LogSink,
  type LogBindings,
  type LogOutput,
  type LoggerConfig,
} from './utilities/logger.js';
