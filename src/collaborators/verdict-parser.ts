/**
 * Verdict text parsing for language-model reviewers.
 *
 * Accepted reply formats, tried in order:
 *   1. A leading keyword:
 *        APPROVED: reason
 *        NEEDS_IMPROVEMENT: what to change
 *        REJECTED: what to change
 *   2. A reply that is exactly one JSON object, optionally inside a ``` fence:
 *        {"approved": true, "feedback": "..."}   ("accepted" works too)
 *
 * Anything else is ambiguous and counts as a rejection, with the whole
 * reply kept as feedback. JSON inside keyword feedback is never read as a
 * decision.
 */

import { z } from 'zod';
import type { Verdict } from '../types.js';

const JsonVerdictSchema = z.object({
  approved: z.boolean().optional(),
  accepted: z.boolean().optional(),
  feedback: z.string().optional(),
});

const KEYWORD_PATTERN = /^(APPROVED|NEEDS_IMPROVEMENT|REJECTED)\b\s*:?\s*([\s\S]*)$/i;
const FENCE_PATTERN = /^```[a-z]*\s*\n?([\s\S]*?)\n?\s*```$/i;

function withFeedback(accepted: boolean, feedback: string | undefined): Verdict {
  const trimmed = feedback?.trim();
  return trimmed ? { accepted, feedback: trimmed } : { accepted };
}

function unfence(reply: string): string {
  const fenced = FENCE_PATTERN.exec(reply);
  return fenced ? fenced[1].trim() : reply;
}

function parseJsonVerdict(reply: string): Verdict | undefined {
  const body = unfence(reply);
  if (!body.startsWith('{') || !body.endsWith('}')) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return undefined; // not JSON; treated as free text
  }

  const parsed = JsonVerdictSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }

  const { approved, accepted, feedback } = parsed.data;
  if (approved !== undefined && accepted !== undefined && approved !== accepted) {
    return withFeedback(false, feedback ?? 'Reviewer reply has conflicting approval flags.');
  }
  const decision = approved ?? accepted;
  if (decision === undefined) {
    return undefined;
  }
  return withFeedback(decision, feedback);
}

export function parseVerdictText(text: string): Verdict {
  const reply = text.trim();
  if (!reply) {
    return { accepted: false, feedback: 'Reviewer returned an empty reply.' };
  }

  const keyword = KEYWORD_PATTERN.exec(reply);
  if (keyword) {
    const accepted = keyword[1].toUpperCase() === 'APPROVED';
    return withFeedback(accepted, keyword[2]);
  }

  return parseJsonVerdict(reply) ?? { accepted: false, feedback: reply };
}
