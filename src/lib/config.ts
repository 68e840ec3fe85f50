/**
 * Scanline — Configuration Loader
 *
 * Reads config/pipeline.json (or $SCANLINE_CONFIG), applies environment
 * overrides and validates the result. The returned value is deeply frozen.
 */

import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ZodError } from 'zod';
import { PipelineConfigSchema } from '../types';
import type { PipelineConfig } from '../types';
import { ConfigValidationError } from './errors';
import { errorMessage, logger } from './logger';

export const DEFAULT_CONFIG_PATH = 'config/pipeline.json';

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate a raw configuration object.
 */
export function parseConfig(
  input: unknown,
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }

  const parsed = result.data;
  const vaultOverride = env.SCANLINE_VAULT_PATH;
  if (vaultOverride) {
    parsed.run.corpusPath = vaultOverride;
  }

  const config: PipelineConfig = deepFreeze(parsed);
  return config;
}

/**
 * Load and validate the configuration file.
 */
export async function loadConfig(
  configPath: string = process.env.SCANLINE_CONFIG ?? DEFAULT_CONFIG_PATH
): Promise<PipelineConfig> {
  const resolved = path.resolve(configPath);

  let raw: string;
  try {
    raw = await readFile(resolved, 'utf8');
  } catch (error) {
    throw new ConfigValidationError([`${resolved}: ${errorMessage(error)}`]);
  }

  let input: unknown;
  try {
    input = JSON.parse(raw);
  } catch (error) {
    throw new ConfigValidationError([`${resolved}: ${errorMessage(error)}`]);
  }

  const config = parseConfig(input);

  logger.debug('Configuration loaded', {
    path: resolved,
    topics: config.topics.map(t => t.slug),
    mustFollow: config.mustFollow.length,
  });

  return config;
}

/**
 * Worker pool size for topic fetches: one per topic plus must-follow.
 */
export function fetchConcurrency(config: PipelineConfig, topicCount: number): number {
  return config.run.concurrency ?? topicCount + 1;
}
