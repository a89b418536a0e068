import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import YAML from 'yaml';
import { GuardianConfig } from '../types.js';
import { formatZodError } from './validation.js';
import { debugLog } from './utils.js';

export const CONFIG_DIR = '.genops';
export const CONFIG_FILE = 'config.yml';

/** Locations searched in order, relative to the repository root */
export const CONFIG_CANDIDATES = [join(CONFIG_DIR, CONFIG_FILE), 'genops.config.yml'];

/**
 * Config with every default applied
 */
export function defaultConfig(): GuardianConfig {
  return GuardianConfig.parse({});
}

/**
 * Find the config file for a repository, if any
 */
export function findConfigPath(cwd: string): string | undefined {
  return CONFIG_CANDIDATES.map((candidate) => join(cwd, candidate)).find((path) => existsSync(path));
}

/**
 * Parse YAML config text. Throws with formatted zod issues on invalid config.
 */
export function parseConfig(content: string, source = 'config'): GuardianConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    throw new Error(`Invalid YAML in ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = GuardianConfig.safeParse(raw ?? {});
  if (!result.success) {
    throw new Error(`Invalid ${source}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Load config for a repository. Missing file means defaults.
 * Environment overrides are applied last.
 */
export async function loadConfig(cwd: string, env: NodeJS.ProcessEnv = process.env): Promise<GuardianConfig> {
  const configPath = findConfigPath(cwd);
  let config: GuardianConfig;

  if (configPath) {
    debugLog('Loading config from', configPath);
    config = parseConfig(readFileSync(configPath, 'utf-8'), configPath);
  } else {
    config = defaultConfig();
  }

  return applyEnvOverrides(config, env);
}

/**
 * GENOPS_CONCURRENCY and GENOPS_RUN_SEMGREP override file settings
 */
export function applyEnvOverrides(config: GuardianConfig, env: NodeJS.ProcessEnv): GuardianConfig {
  const next: GuardianConfig = {
    ...config,
    runner: { ...config.runner },
    tools: { ...config.tools },
  };

  const concurrency = Number.parseInt(env.GENOPS_CONCURRENCY ?? '', 10);
  if (Number.isInteger(concurrency) && concurrency >= 1) {
    next.runner.concurrency = concurrency;
  }

  if (env.GENOPS_RUN_SEMGREP !== undefined) {
    next.tools.semgrep = env.GENOPS_RUN_SEMGREP.toLowerCase() === 'true';
  }

  return next;
}

/**
 * YAML text for a fresh config file
 */
export function renderDefaultConfig(): string {
  return YAML.stringify(defaultConfig());
}
