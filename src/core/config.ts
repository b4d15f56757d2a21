/**
 * Config loading
 *
 * Reads `.planwarden.yml` from the project directory (or an explicit path),
 * validates it and maps it onto sensitivity rules and analyzer settings.
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import YAML from 'yaml';
import { PlanwardenConfig, type SensitivityRule } from '../types.js';
import type { AnalyzerConfig } from './analyzer.js';
import { ConfigError, errorMessage } from './errors.js';
import { formatZodError } from './validation.js';

export const CONFIG_FILENAMES = ['.planwarden.yml', '.planwarden.yaml'];

export function findConfigPath(cwd: string): string | undefined {
  for (const name of CONFIG_FILENAMES) {
    const candidate = join(cwd, name);
    if (existsSync(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Load config. Without an explicit path a missing file means defaults; an
 * explicit path that does not exist is an error.
 */
export function loadConfig(cwd: string, explicitPath?: string): PlanwardenConfig {
  const configPath = explicitPath ? resolve(cwd, explicitPath) : findConfigPath(cwd);

  if (!configPath) {
    return PlanwardenConfig.parse({});
  }
  if (!existsSync(configPath)) {
    throw new ConfigError(configPath, 'config file not found');
  }

  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(configPath, `invalid YAML: ${errorMessage(error)}`, { cause: error });
  }

  // An empty file parses to null
  const result = PlanwardenConfig.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(configPath, formatZodError(result.error), { cause: result.error });
  }
  return result.data;
}

export function rulesFromConfig(config: PlanwardenConfig): SensitivityRule[] {
  return [
    ...config.sensitiveResources.map(
      (entry): SensitivityRule => ({ kind: 'resource', resourceType: entry.resourceType })
    ),
    ...config.sensitiveProperties.map(
      (entry): SensitivityRule => ({
        kind: 'property',
        resourceType: entry.resourceType,
        property: entry.property,
      })
    ),
  ];
}

export type ConfiguredAnalyzer = Pick<AnalyzerConfig, 'limits' | 'maxDependencies' | 'grouping' | 'disclosure'> &
  Partial<Pick<AnalyzerConfig, 'concurrency'>>;

export function analyzerConfigFromConfig(config: PlanwardenConfig): ConfiguredAnalyzer {
  const analyzerConfig: ConfiguredAnalyzer = {
    limits: {
      maxDepth: config.limits.maxDepth,
      maxProperties: config.limits.maxProperties,
      maxTotalBytes: config.limits.maxTotalBytes,
    },
    maxDependencies: config.limits.maxDependencies,
    grouping: { ...config.grouping },
    disclosure: { ...config.disclosure },
  };
  if (config.concurrency !== undefined) {
    analyzerConfig.concurrency = config.concurrency;
  }
  return analyzerConfig;
}
