/**
 * Output Formatting Module
 * Structured output for automation and Unix pipe integration.
 * Everything returned here goes to stdout; logs never do.
 */

import type { ValidationReport } from './store/validate.js';
import { CollectionDescription, MenuEntry, OutputFormat, RenderResult } from './types.js';

export const OUTPUT_SCHEMA_VERSION = '1.0';

export type CommandOutput =
  | { kind: 'render'; results: RenderResult[] }
  | { kind: 'menu'; menuId: number; entries: MenuEntry[] }
  | { kind: 'collection'; description: CollectionDescription }
  | { kind: 'validation'; report: ValidationReport; files: string[] };

const RULE = '─'.repeat(60);

/**
 * Parse a --format value
 * @throws Error naming the accepted formats
 */
export function parseOutputFormat(value: string | undefined): OutputFormat {
  const format = value ?? OutputFormat.Text;
  for (const candidate of Object.values(OutputFormat)) {
    if (candidate === format) {
      return candidate;
    }
  }
  throw new Error(`Unknown output format: ${format} (expected ${Object.values(OutputFormat).join(', ')})`);
}

// ============================================
// Text
// ============================================

function renderText(result: RenderResult): string[] {
  const lines: string[] = [];
  lines.push(RULE);
  lines.push(`Article: ${result.article.id} (${result.article.name})`);
  if (result.slot) {
    lines.push(`Collection: ${result.slot.collectionId}${result.slot.url !== null ? ` at ${result.slot.url}` : ''}`);
  }
  lines.push(`Version: ${result.version}`);
  lines.push(`Cache: ${result.cache}`);
  lines.push(`Atoms: ${result.atoms.length}`);

  if (result.collisions.length > 0) {
    lines.push('');
    lines.push('Variable collisions:');
    for (const collision of result.collisions) {
      lines.push(`  • {${collision.tag}}: ${collision.tiers.join(' > ')} (using ${collision.chosen})`);
    }
  }

  lines.push(RULE);
  lines.push(result.content);
  lines.push(RULE);
  return lines;
}

function menuText(menuId: number, entries: MenuEntry[]): string[] {
  const lines = [RULE, `Menu: ${menuId}`, RULE];
  if (entries.length === 0) {
    lines.push('(no entries)');
  }
  for (const entry of entries) {
    lines.push(`  • ${entry.displayName} → ${entry.url ?? '(no url)'}`);
  }
  return lines;
}

function collectionText(description: CollectionDescription): string[] {
  const { collection, articles, menus } = description;
  const lines = [RULE, `Collection: ${collection.id} (${collection.name})`, RULE];

  lines.push('Articles:');
  for (const slot of articles) {
    lines.push(`  ${slot.sortorder}. ${slot.name} [${slot.articleId}] ${slot.url ?? '(no url)'}`);
  }

  for (const [name, entries] of Object.entries(menus)) {
    lines.push('');
    lines.push(`Menu ${name}:`);
    for (const entry of entries) {
      lines.push(`  • ${entry.displayName} → ${entry.url ?? '(no url)'}`);
    }
  }
  return lines;
}

function validationText(report: ValidationReport, files: string[]): string[] {
  const lines = [RULE, `Content: ${report.valid ? 'valid' : 'invalid'}`, RULE];
  lines.push(`Files: ${files.length}`);
  for (const [entity, count] of Object.entries(report.counts)) {
    lines.push(`  • ${entity}: ${count}`);
  }

  if (report.issues.length > 0) {
    lines.push('');
    lines.push('Issues:');
    for (const issue of report.issues) {
      lines.push(`  [${issue.severity.toUpperCase()}] ${issue.entity} ${issue.id}: ${issue.message}`);
    }
  }
  return lines;
}

/**
 * Format command output as human-readable text (default format)
 */
export function formatText(output: CommandOutput): string {
  switch (output.kind) {
    case 'render':
      return output.results.flatMap(renderText).join('\n');
    case 'menu':
      return menuText(output.menuId, output.entries).join('\n');
    case 'collection':
      return collectionText(output.description).join('\n');
    case 'validation':
      return validationText(output.report, output.files).join('\n');
  }
}

// ============================================
// JSON
// ============================================

/**
 * Build the JSON payload for command output
 */
export function buildOutputPayload(output: CommandOutput): Record<string, unknown> {
  switch (output.kind) {
    case 'render': {
      const renders = output.results.map(result => ({
        article: result.article,
        slot: result.slot,
        version: result.version,
        cache: result.cache,
        content: result.content,
        atoms: result.atoms,
        by_key: result.byKey,
        by_id: result.byId,
        collisions: result.collisions,
      }));
      return { schema_version: OUTPUT_SCHEMA_VERSION, renders };
    }
    case 'menu':
      return { schema_version: OUTPUT_SCHEMA_VERSION, menu_id: output.menuId, entries: output.entries };
    case 'collection':
      return { schema_version: OUTPUT_SCHEMA_VERSION, ...output.description };
    case 'validation':
      return { schema_version: OUTPUT_SCHEMA_VERSION, files: output.files, ...output.report };
  }
}

/**
 * Format command output as JSON (structured format for automation)
 */
export function formatJson(output: CommandOutput): string {
  return JSON.stringify(buildOutputPayload(output), null, 2);
}

// ============================================
// Raw
// ============================================

/**
 * Format command output as raw text (Unix pipe-friendly)
 * Only the essential content, no metadata
 */
export function formatRaw(output: CommandOutput): string {
  switch (output.kind) {
    case 'render':
      return output.results.map(result => result.content).join('\n');
    case 'menu':
      return output.entries.map(entry => `${entry.url ?? ''}\t${entry.displayName}`).join('\n');
    case 'collection':
      return output.description.articles.map(slot => `${slot.url ?? ''}\t${slot.name}`).join('\n');
    case 'validation':
      return output.report.issues
        .map(issue => `${issue.severity}\t${issue.entity}\t${issue.id}\t${issue.message}`)
        .join('\n');
  }
}

/**
 * Main formatter function - routes to the format handler
 */
export function formatOutput(output: CommandOutput, format: OutputFormat = OutputFormat.Text): string {
  switch (format) {
    case OutputFormat.Json:
      return formatJson(output);
    case OutputFormat.Raw:
      return formatRaw(output);
    case OutputFormat.Text:
    default:
      return formatText(output);
  }
}
