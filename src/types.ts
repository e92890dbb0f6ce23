/**
 * Core types for the review loop.
 */

import type { UpstreamError, UpstreamStage } from './errors/index.js';

// =============================================================================
// CONVERSATION
// =============================================================================

/**
 * Turn origin: `user` input, `assistant` generated output, `system` directive
 * (including retry feedback).
 */
export type TurnRole = 'user' | 'assistant' | 'system';

export interface Turn {
  role: TurnRole;
  content: string;
}

export type Conversation = readonly Turn[];

// =============================================================================
// COLLABORATORS
// =============================================================================

/**
 * What the generator sees besides the transcript.
 */
export interface GenerationContext {
  /** 1-based number of the attempt being generated */
  attempt: number;

  /** Feedback from the rejection that triggered this attempt */
  feedback?: string;
}

/**
 * What the evaluator sees besides the request and output.
 */
export interface EvaluationContext {
  attempt: number;

  /** Transcript up to and including the output under review */
  transcript: Conversation;
}

export interface Verdict {
  accepted: boolean;
  feedback?: string;
}

/**
 * Produces a candidate output from the conversation so far.
 */
export interface Generator {
  generate(conversation: Conversation, context: GenerationContext): Promise<string>;
}

/**
 * Judges a candidate output. The return value is normalized by the
 * controller; anything short of `accepted: true` counts as a rejection.
 */
export interface Evaluator {
  evaluate(request: string, output: string, context: EvaluationContext): Promise<Verdict>;
}

// =============================================================================
// LOOP STATE & RESULTS
// =============================================================================

export type LoopStatus = 'running' | 'approved' | 'exhausted';

export type TerminalStatus = Exclude<LoopStatus, 'running'>;

interface OutcomeBase {
  /** Generator invocations that completed */
  attemptsUsed: number;

  /** Last reviewer feedback, absent when none was given */
  feedback?: string;

  /** Input conversation plus every output and feedback turn */
  transcript: Turn[];

  /** One verdict per completed evaluation, in order */
  verdicts: Verdict[];

  durationMs: number;
}

export interface ReviewResult extends OutcomeBase {
  status: TerminalStatus;

  /** Output of the final attempt */
  output: string;

  /** Assistant turn summarizing the outcome for the caller's conversation */
  finalMessage: Turn;
}

export interface UpstreamFailure extends OutcomeBase {
  status: 'failed';

  stage: UpstreamStage;

  /** 1-based attempt during which the failure happened */
  attempt: number;

  error: UpstreamError;

  /** Output under review when the evaluator failed */
  output?: string;
}

export type ReviewOutcome = ReviewResult | UpstreamFailure;

// =============================================================================
// EVENTS
// =============================================================================

export type ReviewLoopEvent =
  | { type: 'attempt.started'; attempt: number; feedback?: string }
  | { type: 'generation.completed'; attempt: number; output: string }
  | { type: 'evaluation.completed'; attempt: number; verdict: Verdict }
  | { type: 'attempt.rejected'; attempt: number; feedback?: string; willRetry: boolean }
  | { type: 'loop.completed'; result: ReviewResult }
  | { type: 'loop.failed'; failure: UpstreamFailure };

export type ReviewLoopEventListener = (event: ReviewLoopEvent) => void;
