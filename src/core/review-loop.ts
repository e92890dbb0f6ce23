/**
 * Review Loop Controller
 *
 * Drives generate → evaluate → (retry | finish) until the evaluator approves
 * an output or the attempt cap is reached.
 *
 *   Request → [Generator] → Output → [Evaluator] → Approved? → Done
 *                 ↑                                   ↓ No, attempts left
 *                 └──────────── Feedback turn ────────┘
 *
 * Retry feedback is appended permanently to the run's transcript, so the
 * returned transcript shows every output and every piece of feedback in
 * order. The caller's conversation is never mutated.
 *
 * Collaborator failures are not retried: they end the run with an
 * `UpstreamFailure` outcome naming the failing stage.
 */

import { randomUUID } from 'node:crypto';
import { UpstreamError, type UpstreamStage } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type {
  Conversation,
  Evaluator,
  Generator,
  ReviewLoopEvent,
  ReviewLoopEventListener,
  ReviewOutcome,
  ReviewResult,
  Turn,
  UpstreamFailure,
  Verdict,
} from '../types.js';
import {
  DEFAULT_FEEDBACK_TEMPLATE,
  composeFeedbackTurn,
  composeFinalMessage,
  composeOutputTurn,
  extractRequest,
  validateConversation,
  type FeedbackTemplate,
} from './conversation.js';
import { IterationState, assertMaxAttempts } from './iteration-state.js';
import { normalizeVerdict } from './verdict.js';

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface ReviewLoopOptions {
  /** Attempt cap used when `run` is not given one (default: 3) */
  maxAttempts?: number;

  /** Content of the feedback turn appended after a rejection */
  feedbackTemplate?: FeedbackTemplate;

  /** Logger to use instead of the global component logger */
  logger?: StructuredLogger;
}

/** Per-run bookkeeping; never shared between runs. */
interface RunContext {
  state: IterationState;
  transcript: Turn[];
  verdicts: Verdict[];
  startTime: number;
  log: StructuredLogger;
}

// =============================================================================
// REVIEW LOOP
// =============================================================================

export class ReviewLoop {
  readonly maxAttempts: number;
  private readonly feedbackTemplate: FeedbackTemplate;
  private readonly log: StructuredLogger;
  private listeners: Set<ReviewLoopEventListener> = new Set();

  /**
   * @throws ConfigurationError when `maxAttempts` is not an integer >= 1
   */
  constructor(options: ReviewLoopOptions = {}) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    assertMaxAttempts(maxAttempts);
    this.maxAttempts = maxAttempts;
    this.feedbackTemplate = options.feedbackTemplate ?? DEFAULT_FEEDBACK_TEMPLATE;
    this.log = options.logger ?? createComponentLogger('ReviewLoop');
  }

  // ===========================================================================
  // MAIN EXECUTION
  // ===========================================================================

  /**
   * Run the loop to a terminal outcome.
   *
   * Rejects with `ConfigurationError` or `InvalidInputError` before any
   * collaborator is called. Generator and evaluator failures resolve to an
   * outcome with `status: 'failed'`.
   */
  async run(
    conversation: Conversation,
    generator: Generator,
    evaluator: Evaluator,
    maxAttempts: number = this.maxAttempts
  ): Promise<ReviewOutcome> {
    assertMaxAttempts(maxAttempts);
    const turns = validateConversation(conversation);
    const request = extractRequest(turns);

    const run: RunContext = {
      state: new IterationState(maxAttempts),
      transcript: [...turns],
      verdicts: [],
      startTime: performance.now(),
      log: this.log.child({ traceId: randomUUID() }),
    };
    const { state, transcript, verdicts, log } = run;

    log.debug('Review loop started', { maxAttempts, turns: turns.length });

    let feedback: string | undefined;

    while (!state.isTerminal()) {
      const attempt = state.attemptCount + 1;
      this.emit({ type: 'attempt.started', attempt, feedback });
      log.debug('Attempt started', { attempt, withFeedback: feedback !== undefined });

      let output: string;
      try {
        const generated = await generator.generate(transcript.slice(), {
          attempt,
          ...(feedback !== undefined && { feedback }),
        });
        output = typeof generated === 'string' ? generated : '';
      } catch (error) {
        return this.fail(run, 'generator', attempt, error);
      }

      state.recordGeneration(output);
      transcript.push(composeOutputTurn(output));
      this.emit({ type: 'generation.completed', attempt, output });

      let verdict: Verdict;
      try {
        verdict = normalizeVerdict(
          await evaluator.evaluate(request, output, { attempt, transcript: transcript.slice() })
        );
      } catch (error) {
        return this.fail(run, 'evaluator', attempt, error);
      }

      state.recordVerdict(verdict);
      verdicts.push(verdict);
      this.emit({ type: 'evaluation.completed', attempt, verdict });

      const status = state.decide();
      if (status === 'approved') {
        break;
      }

      const willRetry = status === 'running';
      this.emit({ type: 'attempt.rejected', attempt, feedback: verdict.feedback, willRetry });
      log.debug('Attempt rejected', { attempt, willRetry, feedback: verdict.feedback });

      if (willRetry && verdict.feedback !== undefined) {
        transcript.push(composeFeedbackTurn(verdict.feedback, this.feedbackTemplate));
      }
      feedback = verdict.feedback;
    }

    return this.complete(run);
  }

  /**
   * Run the loop on a single user prompt.
   */
  async review(
    prompt: string,
    generator: Generator,
    evaluator: Evaluator,
    maxAttempts: number = this.maxAttempts
  ): Promise<ReviewOutcome> {
    return this.run([{ role: 'user', content: prompt }], generator, evaluator, maxAttempts);
  }

  // ===========================================================================
  // TERMINAL OUTCOMES
  // ===========================================================================

  private complete(run: RunContext): ReviewResult {
    const { state } = run;
    const status = state.getStatus();
    if (status === 'running') {
      throw new Error('Review loop completed while still running');
    }

    const output = state.lastOutput ?? '';
    const feedback = state.lastVerdict?.feedback;
    const result: ReviewResult = {
      status,
      output,
      attemptsUsed: state.attemptCount,
      ...(feedback !== undefined && { feedback }),
      transcript: run.transcript,
      verdicts: run.verdicts,
      finalMessage: composeFinalMessage(status, output, state.maxAttempts, feedback),
      durationMs: performance.now() - run.startTime,
    };

    if (status === 'approved') {
      run.log.info('Output approved', { attemptsUsed: result.attemptsUsed });
    } else {
      run.log.warn('Attempts exhausted without approval', {
        attemptsUsed: result.attemptsUsed,
        feedback,
      });
    }

    this.emit({ type: 'loop.completed', result });
    return result;
  }

  private fail(
    run: RunContext,
    stage: UpstreamStage,
    attempt: number,
    cause: unknown
  ): UpstreamFailure {
    const { state } = run;
    const error = UpstreamError.fromError(cause, stage, attempt);
    const feedback = state.lastVerdict?.feedback;
    const output = stage === 'evaluator' ? state.lastOutput : undefined;

    const failure: UpstreamFailure = {
      status: 'failed',
      stage,
      attempt,
      error,
      attemptsUsed: state.attemptCount,
      ...(output !== undefined && { output }),
      ...(feedback !== undefined && { feedback }),
      transcript: run.transcript,
      verdicts: run.verdicts,
      durationMs: performance.now() - run.startTime,
    };

    run.log.error('Upstream failure', {
      stage,
      attempt,
      attemptsUsed: failure.attemptsUsed,
      error: error.toLogString(),
    });

    this.emit({ type: 'loop.failed', failure });
    return failure;
  }

  // ===========================================================================
  // EVENT HANDLING
  // ===========================================================================

  /**
   * Subscribe to loop events. Returns an unsubscribe function.
   */
  on(listener: ReviewLoopEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(event: ReviewLoopEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.warn('Review loop event listener threw', {
          event: event.type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Create a freshly configured controller.
 */
export function createReviewLoop(options: ReviewLoopOptions = {}): ReviewLoop {
  return new ReviewLoop(options);
}
