/**
 * Heuristic Evaluator
 *
 * Deterministic stand-in reviewer scoring an output against four quality
 * indicators:
 *
 *   1. longer than `minLength` characters
 *   2. at most `maxQuestions` question marks
 *   3. mentions at least one helpful term
 *   4. mentions no failure term
 *
 * The output is approved when at least `requiredScore` indicators hold.
 * Useful offline and in tests; swap in a ProviderEvaluator for real review.
 */

import type { EvaluationContext, Evaluator, Verdict } from '../types.js';

export interface HeuristicEvaluatorOptions {
  /** Output must be strictly longer than this (default: 50) */
  minLength?: number;
  /** Maximum number of '?' characters (default: 2) */
  maxQuestions?: number;
  /** Indicators required for approval, 1-4 (default: 3) */
  requiredScore?: number;
  helpfulTerms?: readonly string[];
  failureTerms?: readonly string[];
}

export interface QualityReport {
  score: number;
  issues: string[];
}

export const DEFAULT_HELPFUL_TERMS = ['help', 'answer', 'response', 'solution'] as const;
export const DEFAULT_FAILURE_TERMS = ['error', 'failed', 'cannot', "don't know"] as const;

export class HeuristicEvaluator implements Evaluator {
  private readonly minLength: number;
  private readonly maxQuestions: number;
  private readonly requiredScore: number;
  private readonly helpfulTerms: readonly string[];
  private readonly failureTerms: readonly string[];

  constructor(options: HeuristicEvaluatorOptions = {}) {
    this.minLength = options.minLength ?? 50;
    this.maxQuestions = options.maxQuestions ?? 2;
    this.requiredScore = options.requiredScore ?? 3;
    this.helpfulTerms = options.helpfulTerms ?? DEFAULT_HELPFUL_TERMS;
    this.failureTerms = options.failureTerms ?? DEFAULT_FAILURE_TERMS;
  }

  async evaluate(_request: string, output: string, _context?: EvaluationContext): Promise<Verdict> {
    if (!output) {
      return { accepted: false, feedback: 'No output to review.' };
    }

    const report = this.assess(output);
    if (report.score >= this.requiredScore) {
      return { accepted: true };
    }
    return {
      accepted: false,
      feedback: `Output needs improvement: ${report.issues.join('; ')}`,
    };
  }

  /**
   * Score an output and list the indicators it misses.
   */
  assess(output: string): QualityReport {
    const lower = output.toLowerCase();
    const questions = output.split('?').length - 1;
    const issues: string[] = [];

    if (output.length <= this.minLength) {
      issues.push('Response is too short');
    }
    if (questions > this.maxQuestions) {
      issues.push('Too many questions, provide more definitive answers');
    }
    if (!this.helpfulTerms.some((term) => lower.includes(term))) {
      issues.push('Response lacks helpful content');
    }
    if (this.failureTerms.some((term) => lower.includes(term))) {
      issues.push('Response contains failure indicators');
    }

    return { score: 4 - issues.length, issues };
  }
}
