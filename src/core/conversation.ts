/**
 * Conversation helpers: input validation, request extraction and the
 * turns the controller appends to a transcript.
 */

import { z } from 'zod';
import { InvalidInputError } from '../errors/index.js';
import type { Conversation, TerminalStatus, Turn } from '../types.js';

export const TurnSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
});

const ConversationSchema = z.array(TurnSchema);

/**
 * Builds the directive content shown to the generator after a rejection.
 */
export type FeedbackTemplate = (feedback: string) => string;

export const DEFAULT_FEEDBACK_TEMPLATE: FeedbackTemplate = (feedback) =>
  `Previous attempt was not approved. Reviewer feedback: ${feedback}. Please improve your response.`;

/**
 * Check that a conversation can start a run.
 *
 * Leading system directives are allowed, but the first non-system turn
 * must come from the user.
 *
 * @throws InvalidInputError
 */
export function validateConversation(conversation: unknown): Turn[] {
  if (!Array.isArray(conversation) || conversation.length === 0) {
    throw InvalidInputError.empty();
  }

  const parsed = ConversationSchema.safeParse(conversation);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidInputError(`turn ${issue.path.join('.')}: ${issue.message}`, {
      path: issue.path,
    });
  }

  const turns = parsed.data;
  const firstOpen = turns.find((t) => t.role !== 'system');
  if (!firstOpen) {
    throw InvalidInputError.missingUserTurn();
  }
  if (firstOpen.role !== 'user') {
    throw InvalidInputError.missingUserTurn(firstOpen.role);
  }

  return turns;
}

/**
 * The request under review: the most recent user turn.
 */
export function extractRequest(conversation: Conversation): string {
  for (let i = conversation.length - 1; i >= 0; i--) {
    if (conversation[i].role === 'user') {
      return conversation[i].content;
    }
  }
  return '';
}

export function composeFeedbackTurn(
  feedback: string,
  template: FeedbackTemplate = DEFAULT_FEEDBACK_TEMPLATE
): Turn {
  return { role: 'system', content: template(feedback) };
}

export function composeOutputTurn(output: string): Turn {
  return { role: 'assistant', content: output };
}

/**
 * Assistant turn handed back to the caller once the loop is over.
 * Approved output is returned verbatim; an exhausted loop reports its
 * best attempt together with the last feedback.
 */
export function composeFinalMessage(
  status: TerminalStatus,
  output: string,
  maxAttempts: number,
  feedback?: string
): Turn {
  if (status === 'approved') {
    return composeOutputTurn(output);
  }
  return composeOutputTurn(
    `Maximum attempts (${maxAttempts}) reached. Best attempt:\n\n${output}\n\n` +
      `Final feedback: ${feedback ?? 'none'}`
  );
}
