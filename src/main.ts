#!/usr/bin/env node
/**
 * review-loop CLI
 *
 * Runs one generate → review → retry loop on a prompt with the configured
 * provider and prints the outcome.
 *
 * Run: review-loop "Explain how TCP slow start works"
 */

// Load environment
import { config as loadEnv } from 'dotenv';
loadEnv();

import { buildReviewStack } from './builder.js';
import { VERSION, applyArgs, exitCodeFor, formatOutcome, helpText, parseArgs } from './cli.js';
import { loadConfig, resolveSettings } from './config/index.js';
import { formatError } from './errors/index.js';
import {
  ConsoleSink,
  FileSink,
  configureLogger,
  logger,
  type LogSink,
} from './utilities/logger.js';

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(helpText());
    return 0;
  }
  if (args.version) {
    console.log(VERSION);
    return 0;
  }
  if (!args.prompt) {
    console.error('No prompt given.\n' + helpText());
    return 2;
  }

  const { config, warnings } = loadConfig();
  const settings = applyArgs(resolveSettings(config), args);

  const sinks: LogSink[] = [new ConsoleSink()];
  if (settings.logging.file) {
    sinks.push(new FileSink(settings.logging.file));
  }
  configureLogger({ level: settings.logging.level, sinks });

  for (const warning of warnings) {
    logger.warn(warning);
  }

  const { loop, generator, evaluator, provider } = await buildReviewStack(settings);
  logger.debug('Review stack ready', {
    provider: provider.name,
    reviewer: settings.reviewer.kind,
    maxAttempts: settings.maxAttempts,
  });

  const outcome = await loop.review(args.prompt, generator, evaluator);
  console.log(formatOutcome(outcome));
  return exitCodeFor(outcome);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 2;
  });
