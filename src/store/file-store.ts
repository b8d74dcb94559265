import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { formatZodIssues } from '../config.js';
import { ContentValidationError } from '../errors.js';
import { ContentSnapshot, MemoryStore } from './memory-store.js';
import { ContentFile, ContentFileSchema } from './schema.js';

export const CONTENT_FILE = 'content.yaml';

export interface ContentDirectory {
  snapshot: ContentSnapshot;
  /** Every file read, entry file last */
  files: string[];
}

interface ImportContext {
  contentHome: string;
  /** Files on the current import chain */
  loading: Set<string>;
  /** Files already merged; a second import of one adds nothing */
  visited: Set<string>;
  files: string[];
}

// ============================================
// File Utilities
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
 * Validate an import path: relative, and inside the content directory
 */
function validateImportPath(importPath: string, contentHome: string, from: string): string {
  if (importPath.includes('../') || path.isAbsolute(importPath)) {
    throw new ContentValidationError(
      `Invalid import path: ${importPath}`,
      'Paths must be relative and cannot traverse parent directories.',
      from
    );
  }

  const absPath = path.resolve(contentHome, importPath);
  const normalizedHome = path.normalize(contentHome + path.sep);
  if (!path.normalize(absPath).startsWith(normalizedHome)) {
    throw new ContentValidationError(
      `Import path outside content directory: ${importPath}\n  Resolved to: ${absPath}`,
      undefined,
      from
    );
  }
  return absPath;
}

// ============================================
// Merging
// ============================================

/**
 * Merge entities by identity with Last Write Wins:
 * a later file redefines an entity with the same id.
 */
function mergeBy<T>(items: T[], identity: (item: T) => string): T[] {
  const merged = new Map<string, T>();
  for (const item of items) {
    merged.set(identity(item), item);
  }
  return [...merged.values()];
}

function emptyFile(): Omit<ContentFile, 'imports'> {
  return { types: [], atoms: [], articles: [], collections: [], menus: [], variables: [] };
}

function appendFile(target: Omit<ContentFile, 'imports'>, source: Omit<ContentFile, 'imports'>): void {
  target.types.push(...source.types);
  target.atoms.push(...source.atoms);
  target.articles.push(...source.articles);
  target.collections.push(...source.collections);
  target.menus.push(...source.menus);
  target.variables.push(...source.variables);
}

// ============================================
// Loading
// ============================================

async function parseContentFile(filePath: string): Promise<ContentFile> {
  let raw: unknown;
  try {
    raw = parseYaml(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ContentValidationError(
      `Failed to parse ${path.basename(filePath)}: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      filePath
    );
  }

  try {
    return ContentFileSchema.parse(raw ?? {});
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ContentValidationError(
        `${path.basename(filePath)} validation failed:\n${formatZodIssues(error)}`,
        undefined,
        filePath
      );
    }
    throw error;
  }
}

/**
 * Load a content file and its imports (depth first, imports before the
 * importing file so the importer's definitions win)
 */
async function loadWithImports(filePath: string, ctx: ImportContext): Promise<Omit<ContentFile, 'imports'>> {
  const absPath = path.resolve(filePath);
  if (ctx.loading.has(absPath)) {
    throw new ContentValidationError(`Circular import detected: ${path.relative(ctx.contentHome, absPath)}`, undefined, absPath);
  }
  if (ctx.visited.has(absPath)) {
    return emptyFile();
  }
  ctx.loading.add(absPath);

  const { imports, ...local } = await parseContentFile(absPath);
  const collected = emptyFile();

  for (const importPath of imports) {
    const validatedPath = validateImportPath(importPath, ctx.contentHome, absPath);
    if (!(await fileExists(validatedPath))) {
      throw new ContentValidationError(
        `Import file not found: ${importPath}\n  Resolved to: ${validatedPath}`,
        undefined,
        absPath
      );
    }
    appendFile(collected, await loadWithImports(validatedPath, ctx));
  }

  appendFile(collected, local);
  ctx.loading.delete(absPath);
  ctx.visited.add(absPath);
  ctx.files.push(absPath);
  return collected;
}

/**
 * Read a content directory into a snapshot without building a store
 *
 * @throws ContentValidationError when the entry file is missing, a file does
 *   not parse or validate, or imports are invalid or circular
 */
export async function readContentDirectory(dir: string, entry: string = CONTENT_FILE): Promise<ContentDirectory> {
  const contentHome = path.resolve(dir);
  const entryPath = path.join(contentHome, entry);

  if (!(await fileExists(entryPath))) {
    throw new ContentValidationError(
      `No ${entry} found in ${contentHome}`,
      `Create ${entry} or use --content <path> to point at a content directory`
    );
  }

  const ctx: ImportContext = { contentHome, loading: new Set(), visited: new Set(), files: [] };
  const content = await loadWithImports(entryPath, ctx);

  return {
    snapshot: {
      types: mergeBy(content.types, type => String(type.id)),
      atoms: mergeBy(content.atoms, atom => String(atom.id)),
      articles: mergeBy(content.articles, article => String(article.id)),
      collections: mergeBy(content.collections, collection => String(collection.id)),
      menus: mergeBy(content.menus, menu => String(menu.id)),
      variables: mergeBy(content.variables, variable => `${variable.client}:${variable.tag}`),
    },
    files: ctx.files,
  };
}

/**
 * Load a content directory into an in-process store
 */
export async function loadContentDirectory(dir: string, entry: string = CONTENT_FILE): Promise<MemoryStore> {
  const { snapshot } = await readContentDirectory(dir, entry);
  return new MemoryStore(snapshot);
}
