/**
 * Iteration State
 *
 * Per-run record owned by the controller. Tracks the attempt counter, the
 * latest output and verdict, and the loop status.
 *
 * Valid transitions:
 *   running → running | approved | exhausted
 *   approved, exhausted: terminal
 */

import { ConfigurationError } from '../errors/index.js';
import type { LoopStatus, Verdict } from '../types.js';

const VALID_TRANSITIONS: Record<LoopStatus, ReadonlySet<LoopStatus>> = {
  running: new Set<LoopStatus>(['running', 'approved', 'exhausted']),
  approved: new Set<LoopStatus>(),
  exhausted: new Set<LoopStatus>(),
};

export function assertMaxAttempts(value: unknown): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw ConfigurationError.invalidMaxAttempts(value);
  }
}

export class IterationState {
  readonly maxAttempts: number;
  private attempts = 0;
  private status: LoopStatus = 'running';
  private output?: string;
  private verdict?: Verdict;

  constructor(maxAttempts: number) {
    assertMaxAttempts(maxAttempts);
    this.maxAttempts = maxAttempts;
  }

  get attemptCount(): number {
    return this.attempts;
  }

  get lastOutput(): string | undefined {
    return this.output;
  }

  get lastVerdict(): Verdict | undefined {
    return this.verdict;
  }

  getStatus(): LoopStatus {
    return this.status;
  }

  isTerminal(): boolean {
    return this.status !== 'running';
  }

  /** Count a completed generator call and keep its output. */
  recordGeneration(output: string): number {
    this.assertRunning('record a generation');
    this.attempts++;
    this.output = output;
    return this.attempts;
  }

  recordVerdict(verdict: Verdict): void {
    this.assertRunning('record a verdict');
    this.verdict = verdict;
  }

  /**
   * Apply the decision policy to the latest verdict. Approval is checked
   * before the attempt cap, so an approved final attempt is `approved`.
   */
  decide(): LoopStatus {
    if (!this.verdict) {
      throw new Error('IterationState.decide() called before any verdict was recorded');
    }

    let next: LoopStatus = 'running';
    if (this.verdict.accepted) {
      next = 'approved';
    } else if (this.attempts >= this.maxAttempts) {
      next = 'exhausted';
    }

    this.transition(next);
    return next;
  }

  private transition(to: LoopStatus): void {
    if (!VALID_TRANSITIONS[this.status].has(to)) {
      throw new Error(`Invalid loop transition: ${this.status} → ${to}`);
    }
    this.status = to;
  }

  private assertRunning(action: string): void {
    if (this.status !== 'running') {
      throw new Error(`Cannot ${action}: loop is already ${this.status}`);
    }
  }
}
