/**
 * Scripted Collaborators
 *
 * Deterministic generator and evaluator that replay a fixed script. Once
 * the script runs out the last entry repeats. An `Error` entry is thrown
 * instead of returned.
 */

import type {
  Conversation,
  EvaluationContext,
  Evaluator,
  GenerationContext,
  Generator,
  Turn,
  Verdict,
} from '../types.js';

export interface GenerationCall {
  conversation: Turn[];
  context: GenerationContext;
}

export interface EvaluationCall {
  request: string;
  output: string;
  attempt: number;
}

function pick<T>(script: readonly T[], index: number): T {
  return script[Math.min(index, script.length - 1)];
}

export class ScriptedGenerator implements Generator {
  readonly calls: GenerationCall[] = [];
  private readonly script: ReadonlyArray<string | Error>;

  constructor(script: ReadonlyArray<string | Error>) {
    if (script.length === 0) {
      throw new Error('ScriptedGenerator needs at least one entry');
    }
    this.script = script;
  }

  async generate(conversation: Conversation, context: GenerationContext): Promise<string> {
    const next = pick(this.script, this.calls.length);
    this.calls.push({ conversation: [...conversation], context: { ...context } });
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  get callCount(): number {
    return this.calls.length;
  }
}

export class ScriptedEvaluator implements Evaluator {
  readonly calls: EvaluationCall[] = [];
  private readonly script: ReadonlyArray<Verdict | Error>;

  constructor(script: ReadonlyArray<Verdict | Error>) {
    if (script.length === 0) {
      throw new Error('ScriptedEvaluator needs at least one entry');
    }
    this.script = script;
  }

  async evaluate(request: string, output: string, context: EvaluationContext): Promise<Verdict> {
    const next = pick(this.script, this.calls.length);
    this.calls.push({ request, output, attempt: context.attempt });
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  get callCount(): number {
    return this.calls.length;
  }
}

/**
 * Evaluator that rejects the first `rejections` outputs with numbered
 * feedback, then approves.
 */
export function rejectThenAccept(rejections: number, feedback = 'Needs more detail'): ScriptedEvaluator {
  const script: Verdict[] = [];
  for (let i = 1; i <= rejections; i++) {
    script.push({ accepted: false, feedback: `${feedback} (${i})` });
  }
  script.push({ accepted: true });
  return new ScriptedEvaluator(script);
}
