/**
 * XDG Base Directory compliant paths for review-loop.
 *
 * - Config: ~/.config/review-loop/ (or $XDG_CONFIG_HOME/review-loop/)
 * - State: ~/.local/state/review-loop/ (or $XDG_STATE_HOME/review-loop/)
 *   Logs written by the file sink.
 * - Project: .review-loop/ in the working directory
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = 'review-loop';

export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.config', APP_DIR);
}

export function getStateDir(): string {
  const xdg = process.env.XDG_STATE_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'state', APP_DIR);
}

/**
 * Project-specific directory: always `.review-loop/` under `cwd`.
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, `.${APP_DIR}`);
}

/**
 * User-level configuration file.
 */
export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Default destination for the JSON-lines log file.
 */
export function getDefaultLogPath(): string {
  return join(getStateDir(), 'logs', 'review-loop.log');
}
