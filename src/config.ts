import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { loadEnvFiles } from './env-loader.js';
import { ContentValidationError } from './errors.js';
import { EngineConfig, EngineConfigSchema } from './types.js';

export const CONFIG_FILE = 'cms.yaml';

/** Environment variables that override cms.yaml */
export const ENV_OVERRIDES = {
  maxEntries: 'CMS_CACHE_MAX_ENTRIES',
  maxBytes: 'CMS_CACHE_MAX_BYTES',
  logLevel: 'CMS_LOG_LEVEL',
} as const;

export interface LoadedConfig {
  config: EngineConfig;
  /** Path of the cms.yaml that was read, or null when defaults were used */
  configFile: string | null;
  loadedEnvFiles: string[];
}

export interface LoadConfigOptions {
  /** Directory the project root search starts from (defaults to process.cwd()) */
  cwd?: string;
  /** Environment to read overrides from (defaults to process.env, after .env loading) */
  env?: NodeJS.ProcessEnv;
}

// ============================================
// Helpers
// ============================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Render zod issues one per line, `  - path: message`
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.errors
    .map(issue => {
      const location = issue.path.join('.') || '(root)';
      return `  - ${location}: ${issue.message}`;
    })
    .join('\n');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseIntegerOverride(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ContentValidationError(
      `${name} must be a positive integer, got: ${value}`,
      `Unset ${name} or give it a whole number`
    );
  }
  return parsed;
}

/**
 * Apply CMS_* environment overrides on top of the raw file config
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const cache: Record<string, unknown> = isRecord(raw.cache) ? { ...raw.cache } : {};
  const merged: Record<string, unknown> = { ...raw, cache };

  const maxEntries = env[ENV_OVERRIDES.maxEntries];
  if (maxEntries) {
    cache.max_entries = parseIntegerOverride(ENV_OVERRIDES.maxEntries, maxEntries);
  }

  const maxBytes = env[ENV_OVERRIDES.maxBytes];
  if (maxBytes) {
    cache.max_bytes = parseIntegerOverride(ENV_OVERRIDES.maxBytes, maxBytes);
  }

  const logLevel = env[ENV_OVERRIDES.logLevel];
  if (logLevel) {
    merged.log_level = logLevel;
  }

  return merged;
}

// ============================================
// Loading
// ============================================

/**
 * Validate a raw configuration object
 * @throws ContentValidationError listing every invalid field
 */
export function validateConfig(raw: unknown, file?: string): EngineConfig {
  try {
    return EngineConfigSchema.parse(raw ?? {});
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ContentValidationError(
        `Configuration validation failed:\n${formatZodIssues(error)}`,
        `Check ${CONFIG_FILE} and the ${Object.values(ENV_OVERRIDES).join('/')} variables`,
        file
      );
    }
    throw error;
  }
}

/**
 * Load engine configuration for a content directory
 *
 * 1. Load .env files (content directory, then project root)
 * 2. Read cms.yaml from the content directory, if present
 * 3. Apply environment overrides
 * 4. Validate with defaults filled in
 */
export async function loadEngineConfig(contentDir: string, options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const root = path.resolve(contentDir);
  const loadedEnvFiles = options.env ? [] : loadEnvFiles(root, options.cwd ?? process.cwd());
  const env = options.env ?? process.env;

  const configPath = path.join(root, CONFIG_FILE);
  let raw: Record<string, unknown> = {};
  let configFile: string | null = null;

  if (await fileExists(configPath)) {
    let parsed: unknown;
    try {
      parsed = parseYaml(await fs.readFile(configPath, 'utf-8'));
    } catch (error) {
      throw new ContentValidationError(
        `Failed to parse ${CONFIG_FILE}: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        configPath
      );
    }

    if (isRecord(parsed)) {
      raw = parsed;
    } else if (parsed !== null && parsed !== undefined) {
      throw new ContentValidationError(`${CONFIG_FILE} must contain a mapping`, undefined, configPath);
    }
    configFile = configPath;
  }

  return {
    config: validateConfig(applyEnvOverrides(raw, env), configFile ?? undefined),
    configFile,
    loadedEnvFiles,
  };
}
