/**
 * CLI Argument Parsing and Output Formatting
 */

import chalk from 'chalk';
import { ConfigurationError, formatError } from './errors/index.js';
import type { ReviewSettings, ReviewerKind } from './config/settings.js';
import type { ProviderType } from './providers/types.js';
import type { ReviewOutcome } from './types.js';

export const VERSION = '0.1.0';

export interface CLIArgs {
  help: boolean;
  version: boolean;
  debug: boolean;
  prompt?: string;
  maxAttempts?: number;
  provider?: ProviderType;
  model?: string;
  reviewer?: ReviewerKind;
}

const PROVIDER_TYPES: readonly ProviderType[] = ['anthropic', 'openai', 'mock'];
const REVIEWER_KINDS: readonly ReviewerKind[] = ['heuristic', 'provider'];

function isProviderType(value: string): value is ProviderType {
  return PROVIDER_TYPES.some((type) => type === value);
}

function isReviewerKind(value: string): value is ReviewerKind {
  return REVIEWER_KINDS.some((kind) => kind === value);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`${flag} requires a value`, [flag]);
  }
  return value;
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws ConfigurationError on unknown flags or bad values
 */
export function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = { help: false, version: false, debug: false };
  const promptParts: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--max-attempts' || arg === '-n') {
      const raw = requireValue(args, ++i, arg);
      const value = Number(raw);
      if (!Number.isInteger(value) || value < 1) {
        throw ConfigurationError.invalidMaxAttempts(raw);
      }
      result.maxAttempts = value;
    } else if (arg === '--provider' || arg === '-p') {
      const value = requireValue(args, ++i, arg);
      if (!isProviderType(value)) {
        throw new ConfigurationError(
          `Unknown provider "${value}" (expected ${PROVIDER_TYPES.join(', ')})`,
          ['provider']
        );
      }
      result.provider = value;
    } else if (arg === '--model' || arg === '-m') {
      result.model = requireValue(args, ++i, arg);
    } else if (arg === '--reviewer' || arg === '-r') {
      const value = requireValue(args, ++i, arg);
      if (!isReviewerKind(value)) {
        throw new ConfigurationError(
          `Unknown reviewer "${value}" (expected ${REVIEWER_KINDS.join(', ')})`,
          ['reviewer']
        );
      }
      result.reviewer = value;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new ConfigurationError(`Unknown option: ${arg}`, [arg]);
    } else {
      promptParts.push(arg);
    }
  }

  if (promptParts.length > 0) {
    result.prompt = promptParts.join(' ');
  }
  return result;
}

/**
 * Layer command-line overrides on top of file settings.
 */
export function applyArgs(settings: ReviewSettings, args: CLIArgs): ReviewSettings {
  return {
    ...settings,
    maxAttempts: args.maxAttempts ?? settings.maxAttempts,
    logging: { ...settings.logging, ...(args.debug && { level: 'debug' as const }) },
    provider: {
      ...settings.provider,
      ...(args.provider !== undefined && { type: args.provider }),
      ...(args.model !== undefined && { model: args.model }),
    },
    reviewer: {
      ...settings.reviewer,
      ...(args.reviewer !== undefined && { kind: args.reviewer }),
    },
  };
}

export function helpText(): string {
  return `
${chalk.bold('review-loop')} - generate, review, retry until approved

${chalk.bold('USAGE')}
  review-loop [options] <prompt>

${chalk.bold('OPTIONS')}
  -n, --max-attempts <n>   Attempt cap (default: 3, or config maxAttempts)
  -p, --provider <name>    anthropic | openai | mock (default: auto-detect)
  -m, --model <name>       Model override for the provider
  -r, --reviewer <kind>    heuristic | provider (default: heuristic)
      --debug              Debug logging
  -h, --help               Show this help
  -v, --version            Show version

${chalk.bold('CONFIG')}
  ~/.config/review-loop/config.json, then .review-loop/config.json

${chalk.bold('EXIT CODES')}
  0 approved, 1 exhausted or upstream failure, 2 usage or configuration error
`;
}

export function exitCodeFor(outcome: ReviewOutcome): number {
  return outcome.status === 'approved' ? 0 : 1;
}

/**
 * Human-readable summary of an outcome.
 */
export function formatOutcome(outcome: ReviewOutcome): string {
  const attempts = `${outcome.attemptsUsed} attempt${outcome.attemptsUsed === 1 ? '' : 's'}`;

  switch (outcome.status) {
    case 'approved':
      return `${chalk.green.bold('✓ Approved')} after ${attempts}\n\n${outcome.output}`;
    case 'exhausted':
      return `${chalk.yellow.bold('✗ Not approved')} after ${attempts}\n\n${outcome.finalMessage.content}`;
    case 'failed':
      return (
        `${chalk.red.bold(`✗ ${outcome.stage} failed`)} on attempt ${outcome.attempt} ` +
        `(${attempts} completed)\n${formatError(outcome.error)}`
      );
  }
}
