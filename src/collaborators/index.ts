/**
 * Generator and Evaluator adapters.
 */

export { functionGenerator, functionEvaluator, type GenerateFn, type EvaluateFn } from './function-adapters.js';
export {
  ScriptedGenerator,
  ScriptedEvaluator,
  rejectThenAccept,
  type GenerationCall,
  type EvaluationCall,
} from './scripted.js';
export {
  HeuristicEvaluator,
  DEFAULT_HELPFUL_TERMS,
  DEFAULT_FAILURE_TERMS,
  type HeuristicEvaluatorOptions,
  type QualityReport,
} from './heuristic-evaluator.js';
export { ProviderGenerator, type ProviderGeneratorOptions } from './provider-generator.js';
export {
  ProviderEvaluator,
  buildReviewMessages,
  DEFAULT_REVIEW_INSTRUCTIONS,
  type ProviderEvaluatorOptions,
} from './provider-evaluator.js';
export { parseVerdictText } from './verdict-parser.js';
