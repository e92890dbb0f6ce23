/**
 * Review Loop Controller Tests
 *
 * Covers the decision policy, termination, attempt counting, transcript
 * handling, upstream failures and event emission.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ReviewLoop,
  createReviewLoop,
  DEFAULT_MAX_ATTEMPTS,
} from '../../src/core/review-loop.js';
import { ScriptedEvaluator, ScriptedGenerator, rejectThenAccept } from '../../src/collaborators/scripted.js';
import { functionEvaluator, functionGenerator } from '../../src/collaborators/function-adapters.js';
import {
  ConfigurationError,
  ErrorCategory,
  InvalidInputError,
  UpstreamError,
} from '../../src/errors/index.js';
import { MemorySink, createLogger } from '../../src/utilities/logger.js';
import type { Evaluator, ReviewLoopEvent, Turn } from '../../src/types.js';

const REQUEST: Turn[] = [{ role: 'user', content: 'Explain backpressure' }];

function feedbackTurn(feedback: string): Turn {
  return {
    role: 'system',
    content: `Previous attempt was not approved. Reviewer feedback: ${feedback}. Please improve your response.`,
  };
}

describe('ReviewLoop', () => {
  let sink: MemorySink;
  let loop: ReviewLoop;

  beforeEach(() => {
    sink = new MemorySink();
    loop = createReviewLoop({
      logger: createLogger({ level: 'debug', sinks: [sink] }),
    });
  });

  // ===========================================================================
  // SCENARIOS
  // ===========================================================================

  describe('scenarios', () => {
    it('approves on the first attempt without feedback', async () => {
      const generator = new ScriptedGenerator(['first draft']);
      const evaluator = new ScriptedEvaluator([{ accepted: true }]);

      const outcome = await loop.run(REQUEST, generator, evaluator, 3);

      expect(outcome.status).toBe('approved');
      expect(outcome.attemptsUsed).toBe(1);
      expect(outcome.feedback).toBeUndefined();
      expect(generator.callCount).toBe(1);
      expect(evaluator.callCount).toBe(1);
    });

    it('exhausts after the cap when every attempt is rejected', async () => {
      const generator = new ScriptedGenerator(['draft 1', 'draft 2']);
      const evaluator = new ScriptedEvaluator([{ accepted: false, feedback: 'Too vague' }]);

      const outcome = await loop.run(REQUEST, generator, evaluator, 2);

      expect(outcome.status).toBe('exhausted');
      expect(outcome.attemptsUsed).toBe(2);
      expect(outcome.feedback).toBe('Too vague');
      expect(generator.callCount).toBe(2);
    });

    it('approves on the last allowed attempt after two rejections', async () => {
      const generator = new ScriptedGenerator(['draft 1', 'draft 2', 'draft 3']);
      const evaluator = rejectThenAccept(2);

      const outcome = await loop.run(REQUEST, generator, evaluator, 3);

      expect(outcome.status).toBe('approved');
      expect(outcome.attemptsUsed).toBe(3);
      if (outcome.status === 'failed') throw new Error('unexpected failure');
      expect(outcome.output).toBe('draft 3');
    });

    it('makes a single attempt when maxAttempts is 1', async () => {
      const generator = new ScriptedGenerator(['only draft']);
      const evaluator = new ScriptedEvaluator([{ accepted: false, feedback: 'Wrong' }]);

      const outcome = await loop.run(REQUEST, generator, evaluator, 1);

      expect(outcome.status).toBe('exhausted');
      expect(outcome.attemptsUsed).toBe(1);
      expect(generator.callCount).toBe(1);
    });

    it('rejects an empty conversation before calling the generator', async () => {
      const generator = new ScriptedGenerator(['never']);
      const evaluator = new ScriptedEvaluator([{ accepted: true }]);

      await expect(loop.run([], generator, evaluator, 3)).rejects.toBeInstanceOf(InvalidInputError);
      expect(generator.callCount).toBe(0);
      expect(evaluator.callCount).toBe(0);
    });

    it('rejects maxAttempts of 0 before any call', async () => {
      const generator = new ScriptedGenerator(['never']);
      const evaluator = new ScriptedEvaluator([{ accepted: true }]);

      await expect(loop.run(REQUEST, generator, evaluator, 0)).rejects.toBeInstanceOf(
        ConfigurationError
      );
      expect(generator.callCount).toBe(0);
      expect(evaluator.callCount).toBe(0);
    });
  });

  // ===========================================================================
  // PROPERTIES
  // ===========================================================================

  describe('termination and counting', () => {
    it.each([1, 2, 5, 8])('never exceeds %i generator calls', async (maxAttempts) => {
      const generator = new ScriptedGenerator(['draft']);
      const evaluator = new ScriptedEvaluator([{ accepted: false, feedback: 'no' }]);

      const outcome = await loop.run(REQUEST, generator, evaluator, maxAttempts);

      expect(generator.callCount).toBe(maxAttempts);
      expect(outcome.attemptsUsed).toBe(maxAttempts);
    });

    it('passes attempt numbers 1..n to the generator in order', async () => {
      const generator = new ScriptedGenerator(['a', 'b', 'c']);
      const evaluator = rejectThenAccept(2);

      await loop.run(REQUEST, generator, evaluator, 5);

      expect(generator.calls.map((c) => c.context.attempt)).toEqual([1, 2, 3]);
      expect(evaluator.calls.map((c) => c.attempt)).toEqual([1, 2, 3]);
    });

    it('makes no further calls once approved', async () => {
      const generator = new ScriptedGenerator(['a', 'b']);
      const evaluator = rejectThenAccept(1);

      const outcome = await loop.run(REQUEST, generator, evaluator, 10);

      expect(outcome.attemptsUsed).toBe(2);
      expect(generator.callCount).toBe(2);
      expect(evaluator.callCount).toBe(2);
    });

    it('uses the controller default when run gets no cap', async () => {
      const generator = new ScriptedGenerator(['draft']);
      const evaluator = new ScriptedEvaluator([{ accepted: false }]);

      const outcome = await loop.run(REQUEST, generator, evaluator);

      expect(loop.maxAttempts).toBe(DEFAULT_MAX_ATTEMPTS);
      expect(outcome.attemptsUsed).toBe(3);
    });

    it('treats a verdict without a literal true as a rejection', async () => {
      const generator = new ScriptedGenerator(['draft']);
      const evaluator: Evaluator = {
        async evaluate() {
          return JSON.parse('{"accepted":"yes","feedback":"looks fine"}');
        },
      };

      const outcome = await loop.run(REQUEST, generator, evaluator, 2);

      expect(outcome.status).toBe('exhausted');
      expect(outcome.verdicts).toEqual([
        { accepted: false, feedback: 'looks fine' },
        { accepted: false, feedback: 'looks fine' },
      ]);
    });

    it('forwards empty generator output to the evaluator unchanged', async () => {
      const generator = functionGenerator(() => undefined);
      const evaluator = new ScriptedEvaluator([{ accepted: false, feedback: 'Empty' }]);

      const outcome = await loop.run(REQUEST, generator, evaluator, 1);

      expect(evaluator.calls[0].output).toBe('');
      expect(outcome.status).toBe('exhausted');
    });
  });

  // ===========================================================================
  // TRANSCRIPT & FEEDBACK
  // ===========================================================================

  describe('transcript', () => {
    it('appends outputs and feedback turns permanently', async () => {
      const generator = new ScriptedGenerator(['draft 1', 'draft 2']);
      const evaluator = new ScriptedEvaluator([{ accepted: false, feedback: 'Too vague' }]);

      const outcome = await loop.run(REQUEST, generator, evaluator, 2);

      expect(outcome.transcript).toEqual([
        { role: 'user', content: 'Explain backpressure' },
        { role: 'assistant', content: 'draft 1' },
        feedbackTurn('Too vague'),
        { role: 'assistant', content: 'draft 2' },
      ]);
    });

    it('shows the generator the feedback from the previous rejection', async () => {
      const generator = new ScriptedGenerator(['draft 1', 'draft 2']);
      const evaluator = rejectThenAccept(1, 'Add an example');

      await loop.run(REQUEST, generator, evaluator, 3);

      expect(generator.calls[0].context).toEqual({ attempt: 1 });
      expect(generator.calls[0].conversation).toEqual(REQUEST);
      expect(generator.calls[1].context).toEqual({ attempt: 2, feedback: 'Add an example (1)' });
      expect(generator.calls[1].conversation).toEqual([
        ...REQUEST,
        { role: 'assistant', content: 'draft 1' },
        feedbackTurn('Add an example (1)'),
      ]);
    });

    it('skips the feedback turn when a rejection carries no feedback', async () => {
      const generator = new ScriptedGenerator(['draft 1', 'draft 2']);
      const evaluator = new ScriptedEvaluator([{ accepted: false }, { accepted: true }]);

      const outcome = await loop.run(REQUEST, generator, evaluator, 3);

      expect(outcome.transcript.map((t) => t.role)).toEqual(['user', 'assistant', 'assistant']);
      expect(generator.calls[1].context).toEqual({ attempt: 2 });
    });

    it('uses a custom feedback template', async () => {
      const custom = createReviewLoop({
        feedbackTemplate: (feedback) => `Fix this: ${feedback}`,
        logger: createLogger({ level: 'silent' }),
      });
      const generator = new ScriptedGenerator(['draft 1', 'draft 2']);
      const evaluator = rejectThenAccept(1, 'typo');

      const outcome = await custom.run(REQUEST, generator, evaluator, 2);

      expect(outcome.transcript[2]).toEqual({ role: 'system', content: 'Fix this: typo (1)' });
    });

    it('does not mutate the caller conversation', async () => {
      const conversation: Turn[] = [{ role: 'user', content: 'Explain backpressure' }];
      const generator = new ScriptedGenerator(['draft']);
      const evaluator = new ScriptedEvaluator([{ accepted: false, feedback: 'again' }]);

      await loop.run(conversation, generator, evaluator, 3);

      expect(conversation).toEqual([{ role: 'user', content: 'Explain backpressure' }]);
    });

    it('evaluates against the latest user turn of the input', async () => {
      const conversation: Turn[] = [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'First question' },
        { role: 'assistant', content: 'First answer' },
        { role: 'user', content: 'Follow-up question' },
      ];
      const generator = new ScriptedGenerator(['draft']);
      const evaluator = new ScriptedEvaluator([{ accepted: true }]);

      await loop.run(conversation, generator, evaluator, 1);

      expect(evaluator.calls[0].request).toBe('Follow-up question');
    });

    it('builds the final message for approved and exhausted runs', async () => {
      const approved = await loop.run(
        REQUEST,
        new ScriptedGenerator(['good answer']),
        new ScriptedEvaluator([{ accepted: true }]),
        2
      );
      const exhausted = await loop.run(
        REQUEST,
        new ScriptedGenerator(['weak answer']),
        new ScriptedEvaluator([{ accepted: false, feedback: 'Too short' }]),
        2
      );

      if (approved.status === 'failed' || exhausted.status === 'failed') {
        throw new Error('unexpected failure');
      }
      expect(approved.finalMessage).toEqual({ role: 'assistant', content: 'good answer' });
      expect(exhausted.finalMessage).toEqual({
        role: 'assistant',
        content:
          'Maximum attempts (2) reached. Best attempt:\n\nweak answer\n\nFinal feedback: Too short',
      });
    });
  });

  // ===========================================================================
  // UPSTREAM FAILURES
  // ===========================================================================

  describe('upstream failures', () => {
    it('reports a generator failure without counting the failed attempt', async () => {
      const generator = new ScriptedGenerator(['draft 1', new Error('model offline')]);
      const evaluator = new ScriptedEvaluator([{ accepted: false, feedback: 'More detail' }]);

      const outcome = await loop.run(REQUEST, generator, evaluator, 3);

      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') throw new Error('expected failure');
      expect(outcome.stage).toBe('generator');
      expect(outcome.attempt).toBe(2);
      expect(outcome.attemptsUsed).toBe(1);
      expect(outcome.feedback).toBe('More detail');
      expect(outcome.output).toBeUndefined();
      expect(outcome.error).toBeInstanceOf(UpstreamError);
      expect(outcome.error.message).toBe('generator failed on attempt 2: model offline');
      expect(outcome.error.cause?.message).toBe('model offline');
      expect(evaluator.callCount).toBe(1);
    });

    it('reports an evaluator failure with the output under review', async () => {
      const generator = new ScriptedGenerator(['draft 1']);
      const evaluator = new ScriptedEvaluator([new Error('request timeout')]);

      const outcome = await loop.run(REQUEST, generator, evaluator, 3);

      if (outcome.status !== 'failed') throw new Error('expected failure');
      expect(outcome.stage).toBe('evaluator');
      expect(outcome.attempt).toBe(1);
      expect(outcome.attemptsUsed).toBe(1);
      expect(outcome.output).toBe('draft 1');
      expect(outcome.error.category).toBe(ErrorCategory.TRANSIENT);
      expect(outcome.error.recoverable).toBe(true);
      expect(generator.callCount).toBe(1);
    });

    it('wraps non-Error throws', async () => {
      const generator = functionGenerator(() => {
        throw 'plain string';
      });
      const evaluator = new ScriptedEvaluator([{ accepted: true }]);

      const outcome = await loop.run(REQUEST, generator, evaluator, 3);

      if (outcome.status !== 'failed') throw new Error('expected failure');
      expect(outcome.attemptsUsed).toBe(0);
      expect(outcome.error.message).toBe('generator failed on attempt 1: plain string');
      expect(outcome.error.category).toBe(ErrorCategory.DEPENDENCY);
    });

    it('logs the failure at error level', async () => {
      const generator = new ScriptedGenerator([new Error('model offline')]);
      const evaluator = new ScriptedEvaluator([{ accepted: true }]);

      await loop.run(REQUEST, generator, evaluator, 3);

      const errors = sink.find({ level: 'error' });
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('Upstream failure');
      expect(errors[0].data).toMatchObject({ stage: 'generator', attempt: 1, attemptsUsed: 0 });
    });
  });

  // ===========================================================================
  // EVENTS & LOGGING
  // ===========================================================================

  describe('events', () => {
    it('emits events in loop order', async () => {
      const events: ReviewLoopEvent['type'][] = [];
      loop.on((event) => events.push(event.type));

      await loop.run(
        REQUEST,
        new ScriptedGenerator(['a', 'b']),
        rejectThenAccept(1),
        3
      );

      expect(events).toEqual([
        'attempt.started',
        'generation.completed',
        'evaluation.completed',
        'attempt.rejected',
        'attempt.started',
        'generation.completed',
        'evaluation.completed',
        'loop.completed',
      ]);
    });

    it('marks the last rejection as not retrying', async () => {
      const rejections: boolean[] = [];
      loop.on((event) => {
        if (event.type === 'attempt.rejected') rejections.push(event.willRetry);
      });

      await loop.run(
        REQUEST,
        new ScriptedGenerator(['a']),
        new ScriptedEvaluator([{ accepted: false }]),
        2
      );

      expect(rejections).toEqual([true, false]);
    });

    it('stops delivering events after unsubscribe', async () => {
      const seen: string[] = [];
      const unsubscribe = loop.on((event) => seen.push(event.type));
      unsubscribe();

      await loop.run(REQUEST, new ScriptedGenerator(['a']), new ScriptedEvaluator([{ accepted: true }]), 1);

      expect(seen).toEqual([]);
    });

    it('keeps running when a listener throws', async () => {
      loop.on(() => {
        throw new Error('listener broke');
      });

      const outcome = await loop.run(
        REQUEST,
        new ScriptedGenerator(['a']),
        new ScriptedEvaluator([{ accepted: true }]),
        1
      );

      expect(outcome.status).toBe('approved');
      const warnings = sink.find({ level: 'warn' });
      expect(warnings[0].message).toBe('Review loop event listener threw');
      expect(warnings[0].data).toEqual({ event: 'attempt.started', error: 'listener broke' });
    });

    it('logs approval with a per-run trace id', async () => {
      await loop.run(REQUEST, new ScriptedGenerator(['a']), new ScriptedEvaluator([{ accepted: true }]), 1);

      const info = sink.find({ level: 'info' });
      expect(info).toHaveLength(1);
      expect(info[0].message).toBe('Output approved');
      expect(info[0].data).toEqual({ attemptsUsed: 1 });
      expect(info[0].traceId).toEqual(expect.any(String));
    });
  });

  // ===========================================================================
  // CONFIGURATION & CONCURRENCY
  // ===========================================================================

  describe('configuration', () => {
    it.each([0, -1, 1.5, Number.NaN])('refuses maxAttempts %s at construction', (value) => {
      expect(() => createReviewLoop({ maxAttempts: value })).toThrow(ConfigurationError);
    });

    it('review() wraps a prompt in a user turn', async () => {
      const generator = new ScriptedGenerator(['answer']);
      const evaluator = new ScriptedEvaluator([{ accepted: true }]);

      const outcome = await loop.review('What is a mutex?', generator, evaluator);

      expect(outcome.transcript[0]).toEqual({ role: 'user', content: 'What is a mutex?' });
      expect(evaluator.calls[0].request).toBe('What is a mutex?');
    });

    it('keeps concurrent runs on one controller independent', async () => {
      const fastGen = functionGenerator(async (_c, ctx) => `fast ${ctx.attempt}`);
      const slowGen = functionGenerator(async (_c, ctx) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return `slow ${ctx.attempt}`;
      });
      const acceptSecond = functionEvaluator((_r, _o, ctx) => ctx.attempt >= 2);

      const [fast, slow] = await Promise.all([
        loop.run(REQUEST, fastGen, new ScriptedEvaluator([{ accepted: true }]), 3),
        loop.run(REQUEST, slowGen, acceptSecond, 3),
      ]);

      expect(fast.attemptsUsed).toBe(1);
      expect(slow.attemptsUsed).toBe(2);
      expect(fast.transcript).toHaveLength(2);
      expect(slow.transcript).toHaveLength(3);
      if (fast.status === 'failed' || slow.status === 'failed') throw new Error('unexpected failure');
      expect(fast.output).toBe('fast 1');
      expect(slow.output).toBe('slow 2');
    });
  });
});
