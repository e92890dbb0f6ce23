/**
 * Configuration Loader
 *
 * Loads, merges and validates configuration from the user-level
 * (~/.config/review-loop/config.json) and project-level
 * (.review-loop/config.json) files. Problems are reported as warnings;
 * loading never throws.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { getConfigPath, getProjectDir } from '../paths.js';
import { ConfigSchema, type ValidatedConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
}

export interface ConfigLoadResult {
  /** Merged and validated config; invalid sections are dropped */
  config: ValidatedConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project'; loaded: boolean }>;
  /** Non-fatal problems found while loading */
  warnings: string[];
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// DEEP MERGE
// =============================================================================

/**
 * One-level deep merge: nested objects merge key by key, everything else
 * (arrays included) is replaced.
 */
export function mergeConfigs(base: JsonObject, override: JsonObject): JsonObject {
  const result: JsonObject = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    result[key] =
      isJsonObject(value) && isJsonObject(baseValue) ? { ...baseValue, ...value } : value;
  }

  return result;
}

// =============================================================================
// LOADER
// =============================================================================

function loadJsonFile(filePath: string, warnings: string[]): JsonObject | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));

    if (!isJsonObject(parsed)) {
      warnings.push(
        `${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`
      );
      return null;
    }

    return parsed;
  } catch (err) {
    warnings.push(
      `${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`
    );
    return null;
  }
}

/**
 * Validate a merged config object. Top-level sections with issues are
 * reported and dropped so the rest of the file still applies.
 */
export function validateConfig(raw: JsonObject, warnings: string[]): ValidatedConfig {
  const result = ConfigSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const invalidKeys = new Set<string>();
  for (const issue of result.error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    warnings.push(`config validation: ${path}: ${issue.message}`);

    if (issue.code === 'unrecognized_keys' && issue.path.length === 0) {
      issue.keys.forEach((key) => invalidKeys.add(key));
    } else if (issue.path.length > 0) {
      invalidKeys.add(String(issue.path[0]));
    }
  }

  const pruned = Object.fromEntries(
    Object.entries(raw).filter(([key]) => !invalidKeys.has(key))
  );
  const retry = ConfigSchema.safeParse(pruned);
  return retry.success ? retry.data : {};
}

/**
 * Load configuration from user-level and project-level sources.
 *
 * Priority: user ← project (project overrides user).
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  const userConfigPath = getConfigPath();
  const userRaw = loadJsonFile(userConfigPath, warnings);
  sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });

  let projectRaw: JsonObject | null = null;
  if (!skipProject) {
    const projectConfigPath = join(getProjectDir(cwd), 'config.json');
    projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  }

  let merged: JsonObject = userRaw ? { ...userRaw } : {};
  if (projectRaw) {
    merged = mergeConfigs(merged, projectRaw);
  }

  return { config: validateConfig(merged, warnings), sources, warnings };
}
