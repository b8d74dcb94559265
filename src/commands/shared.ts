import path from 'node:path';
import { InvalidArgumentError } from 'commander';
import { loadEngineConfig } from '../config.js';
import { ContentEngine } from '../engine.js';
import { ContentError, ContentValidationError } from '../errors.js';
import { createLogger, Logger } from '../logger.js';
import { loadContentDirectory } from '../store/file-store.js';
import type { VariableMap } from '../types.js';

export interface ContentContext {
  engine: ContentEngine;
  logger: Logger;
  contentDir: string;
}

/**
 * Parse a numeric CLI option
 */
export function parseId(value: string, name = 'id'): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got: ${value}`);
  }
  return parsed;
}

/**
 * Collect repeated `--var tag=value` options into a map.
 * The first `=` separates tag from value; later ones belong to the value.
 */
export function parseVariablePairs(pairs: string[] = []): VariableMap {
  const vars: VariableMap = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Variable must look like tag=value, got: ${pair}`);
    }
    vars[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return vars;
}

/**
 * Load configuration and content, and build an engine over them
 */
export async function openContent(contentDir: string, options: { verbose?: boolean } = {}): Promise<ContentContext> {
  const root = path.resolve(contentDir);
  const { config, configFile, loadedEnvFiles } = await loadEngineConfig(root);
  const logger = createLogger(options.verbose ? 'debug' : config.log_level);

  for (const file of loadedEnvFiles) {
    logger.debug(`Environment file loaded: ${file}`);
  }
  logger.debug(configFile ? `Configuration: ${configFile}` : 'Configuration: defaults');

  const store = await loadContentDirectory(root);
  return { engine: new ContentEngine({ store, config, logger }), logger, contentDir: root };
}

/**
 * Log a command failure to stderr, with the hint or error code when there is one
 */
export function reportFailure(action: string, error: unknown, verbose = false): void {
  console.error(`[ERROR] ${action}`);

  if (error instanceof Error) {
    console.error(error.message);
    if (error instanceof ContentValidationError) {
      if (error.file) console.error(`  File: ${error.file}`);
      if (error.hint) console.error(`  Hint: ${error.hint}`);
    }
    if (error instanceof ContentError) {
      console.error(`  Code: ${error.code}${error.retryable ? ' (retryable)' : ''}`);
    }
    if (verbose && error.stack) {
      console.error(error.stack);
    }
  } else {
    console.error(String(error));
  }
}
