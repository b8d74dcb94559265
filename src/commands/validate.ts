import path from 'node:path';
import { loadEngineConfig } from '../config.js';
import { formatOutput, parseOutputFormat } from '../output-formatter.js';
import { readContentDirectory } from '../store/file-store.js';
import { validateSnapshot, ValidationReport } from '../store/validate.js';
import type { ValidateCommandOptions } from '../types.js';
import { reportFailure } from './shared.js';

/**
 * Load configuration and content files and check the content graph
 *
 * @throws ContentValidationError when a file cannot be loaded at all
 */
export async function validateContent(contentDir: string): Promise<{ report: ValidationReport; files: string[] }> {
  const root = path.resolve(contentDir);
  const { configFile } = await loadEngineConfig(root);
  const { snapshot, files } = await readContentDirectory(root);
  return {
    report: validateSnapshot(snapshot),
    files: configFile ? [configFile, ...files] : files,
  };
}

/**
 * Handle the validate command. Exits 1 when the content has errors.
 */
export async function handleValidateCommand(options: ValidateCommandOptions): Promise<void> {
  try {
    const format = parseOutputFormat(options.format);
    const { report, files } = await validateContent(options.content);
    const output = formatOutput({ kind: 'validation', report, files }, format);
    if (output) {
      console.log(output);
    }
    if (!report.valid) {
      process.exit(1);
    }
  } catch (error) {
    reportFailure('Content validation failed', error);
    process.exit(1);
  }
}
