/**
 * Verdict normalization.
 *
 * Evaluators are opaque and may hand back anything at runtime. Only an
 * object whose `accepted` property is the boolean `true` approves; every
 * other shape is a rejection.
 */

import { z } from 'zod';
import type { Verdict } from '../types.js';

const LooseVerdictSchema = z.object({
  accepted: z.unknown(),
  feedback: z.unknown(),
});

export function normalizeVerdict(raw: unknown): Verdict {
  const parsed = LooseVerdictSchema.safeParse(raw);
  if (!parsed.success) {
    return { accepted: false };
  }

  const accepted = parsed.data.accepted === true;
  const feedback =
    typeof parsed.data.feedback === 'string' && parsed.data.feedback.trim() !== ''
      ? parsed.data.feedback.trim()
      : undefined;

  return feedback === undefined ? { accepted } : { accepted, feedback };
}
