/**
 * Scripted Collaborator Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ScriptedEvaluator,
  ScriptedGenerator,
  rejectThenAccept,
} from '../../src/collaborators/scripted.js';

describe('ScriptedGenerator', () => {
  it('replays the script and repeats the last entry', async () => {
    const generator = new ScriptedGenerator(['a', 'b']);
    const outputs: string[] = [];
    for (let attempt = 1; attempt <= 3; attempt++) {
      outputs.push(await generator.generate([], { attempt }));
    }
    expect(outputs).toEqual(['a', 'b', 'b']);
    expect(generator.callCount).toBe(3);
  });

  it('throws Error entries', async () => {
    const generator = new ScriptedGenerator([new Error('offline')]);
    await expect(generator.generate([], { attempt: 1 })).rejects.toThrow('offline');
    expect(generator.callCount).toBe(1);
  });

  it('records a copy of each call', async () => {
    const conversation = [{ role: 'user' as const, content: 'q' }];
    const generator = new ScriptedGenerator(['a']);
    await generator.generate(conversation, { attempt: 1 });
    conversation.push({ role: 'user', content: 'later' });

    expect(generator.calls[0]).toEqual({
      conversation: [{ role: 'user', content: 'q' }],
      context: { attempt: 1 },
    });
  });

  it('needs at least one entry', () => {
    expect(() => new ScriptedGenerator([])).toThrow('ScriptedGenerator needs at least one entry');
  });
});

describe('ScriptedEvaluator', () => {
  it('records request, output and attempt', async () => {
    const evaluator = new ScriptedEvaluator([{ accepted: true }]);
    await evaluator.evaluate('q', 'o', { attempt: 4, transcript: [] });
    expect(evaluator.calls).toEqual([{ request: 'q', output: 'o', attempt: 4 }]);
  });

  it('needs at least one entry', () => {
    expect(() => new ScriptedEvaluator([])).toThrow('ScriptedEvaluator needs at least one entry');
  });
});

describe('rejectThenAccept', () => {
  it('rejects with numbered feedback, then approves', async () => {
    const evaluator = rejectThenAccept(2, 'Shorter');
    const context = { attempt: 1, transcript: [] };
    const verdicts = [
      await evaluator.evaluate('q', 'o', context),
      await evaluator.evaluate('q', 'o', context),
      await evaluator.evaluate('q', 'o', context),
      await evaluator.evaluate('q', 'o', context),
    ];
    expect(verdicts).toEqual([
      { accepted: false, feedback: 'Shorter (1)' },
      { accepted: false, feedback: 'Shorter (2)' },
      { accepted: true },
      { accepted: true },
    ]);
  });
});
