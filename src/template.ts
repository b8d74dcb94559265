/**
 * Type Template Renderer
 *
 * Renders an atom's content through the template of its type. Templates use
 * a small bracket syntax:
 *
 *   [title]                  field value, HTML-escaped
 *   [image:src]  [list:0]    nested lookup by key or index
 *   [body|raw]               field value without escaping
 *   {{ for item in [list] }} ... [item:name] ... {{ endfor }}
 *   {{ if [subtitle] }} ... {{ else }} ... {{ endif }}
 *   [atom:12]                another atom, rendered in its own type
 *
 * A tag that cannot be resolved is left in the output literally, matching the
 * way unresolved variables are treated further down the pipeline.
 */

import { marked } from 'marked';
import type { Atom, AtomType, FieldSchema } from './types.js';

export class TemplateSyntaxError extends Error {
  constructor(
    message: string,
    public readonly template: string
  ) {
    super(message);
    this.name = 'TemplateSyntaxError';
  }
}

/**
 * Markup that is already HTML: written to the output without escaping
 */
export class SafeHtml {
  constructor(public readonly html: string) {}
}

/** Output for an embedded atom that does not exist or belongs to another client */
export const UNKNOWN_ATOM = '[Unknown atom]';

// ============================================
// Parsing
// ============================================

export type TemplateNode =
  | { kind: 'text'; value: string }
  | { kind: 'for'; variable: string; source: string; body: TemplateNode[] }
  | { kind: 'if'; condition: string; then: TemplateNode[]; otherwise: TemplateNode[] };

interface OpenBlock {
  node: Extract<TemplateNode, { kind: 'for' | 'if' }>;
  inElse: boolean;
}

const BLOCK_PATTERN = /\{\{\s*(.*?)\s*\}\}/g;
const TAG_PATTERN = /\[([A-Za-z_][\w-]*(?::[\w-]+)*)(?:\|(raw|html))?\]/g;
const FOR_PATTERN = /^for\s+([A-Za-z_]\w*)\s+in\s+\[([A-Za-z_][\w-]*(?::[\w-]+)*)\]$/;
const IF_PATTERN = /^if\s+\[([A-Za-z_][\w-]*(?::[\w-]+)*)\]$/;

const EMBED_PATTERN = /\[atom:(\d+)(?:\|(?:raw|html))?\]/g;

const parsedTemplates = new Map<string, TemplateNode[]>();

/**
 * Ids of the atoms a template embeds with `[atom:ID]`, in order of first use
 */
export function embeddedAtomIds(template: string): number[] {
  const ids = new Set<number>();
  for (const match of template.matchAll(EMBED_PATTERN)) {
    ids.add(Number(match[1]));
  }
  return [...ids];
}

export function parseTemplate(template: string): TemplateNode[] {
  const cached = parsedTemplates.get(template);
  if (cached) {
    return cached;
  }

  const root: TemplateNode[] = [];
  const stack: OpenBlock[] = [];

  const target = (): TemplateNode[] => {
    const open = stack[stack.length - 1];
    if (!open) return root;
    if (open.node.kind === 'for') return open.node.body;
    return open.inElse ? open.node.otherwise : open.node.then;
  };

  let cursor = 0;
  for (const match of template.matchAll(BLOCK_PATTERN)) {
    const index = match.index ?? 0;
    if (index > cursor) {
      target().push({ kind: 'text', value: template.slice(cursor, index) });
    }
    cursor = index + match[0].length;

    const statement = match[1] ?? '';
    const forMatch = FOR_PATTERN.exec(statement);
    const ifMatch = IF_PATTERN.exec(statement);

    if (forMatch && forMatch[1] && forMatch[2]) {
      const node: Extract<TemplateNode, { kind: 'for' }> = { kind: 'for', variable: forMatch[1], source: forMatch[2], body: [] };
      target().push(node);
      stack.push({ node, inElse: false });
    } else if (ifMatch && ifMatch[1]) {
      const node: Extract<TemplateNode, { kind: 'if' }> = { kind: 'if', condition: ifMatch[1], then: [], otherwise: [] };
      target().push(node);
      stack.push({ node, inElse: false });
    } else if (statement === 'else') {
      const open = stack[stack.length - 1];
      if (!open || open.node.kind !== 'if' || open.inElse) {
        throw new TemplateSyntaxError('Unexpected {{ else }}', template);
      }
      open.inElse = true;
    } else if (statement === 'endfor' || statement === 'endif') {
      const open = stack.pop();
      const expected = statement === 'endfor' ? 'for' : 'if';
      if (!open || open.node.kind !== expected) {
        throw new TemplateSyntaxError(`Unexpected {{ ${statement} }}`, template);
      }
    } else {
      throw new TemplateSyntaxError(`Unknown template statement: {{ ${statement} }}`, template);
    }
  }

  if (cursor < template.length) {
    target().push({ kind: 'text', value: template.slice(cursor) });
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    throw new TemplateSyntaxError(`Unclosed {{ ${unclosed.node.kind} }} block`, template);
  }

  parsedTemplates.set(template, root);
  return root;
}

// ============================================
// Evaluation
// ============================================

type Scope = Array<Record<string, unknown>>;

const MISSING = Symbol('missing');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lookup(scope: Scope, path: string): unknown {
  const [head, ...rest] = path.split(':');
  if (head === undefined) return MISSING;

  let value: unknown = MISSING;
  for (let i = scope.length - 1; i >= 0; i--) {
    const frame = scope[i];
    if (frame && Object.prototype.hasOwnProperty.call(frame, head)) {
      value = frame[head];
      break;
    }
  }

  for (const part of rest) {
    if (Array.isArray(value)) {
      const index = Number(part);
      value = Number.isInteger(index) && index >= 0 && index < value.length ? value[index] : MISSING;
    } else if (isRecord(value) && Object.prototype.hasOwnProperty.call(value, part)) {
      value = value[part];
    } else {
      return MISSING;
    }
  }
  return value;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof SafeHtml) return value.html;
  return JSON.stringify(value);
}

function isTruthy(value: unknown): boolean {
  if (value === MISSING || value === null || value === undefined) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof SafeHtml) return value.html.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return Boolean(value);
}

function renderText(text: string, scope: Scope): string {
  return text.replace(TAG_PATTERN, (fullMatch, path: string, filter: string | undefined) => {
    const value = lookup(scope, path);
    if (value === MISSING) {
      return fullMatch;
    }
    const output = stringify(value);
    return filter === 'raw' || value instanceof SafeHtml ? output : escapeHtml(output);
  });
}

function renderNodes(nodes: TemplateNode[], scope: Scope): string {
  let output = '';
  for (const node of nodes) {
    switch (node.kind) {
      case 'text':
        output += renderText(node.value, scope);
        break;

      case 'for': {
        const items = lookup(scope, node.source);
        if (Array.isArray(items)) {
          for (const item of items) {
            output += renderNodes(node.body, [...scope, { [node.variable]: item }]);
          }
        }
        break;
      }

      case 'if':
        output += renderNodes(isTruthy(lookup(scope, node.condition)) ? node.then : node.otherwise, scope);
        break;
    }
  }
  return output;
}

/**
 * Render a template against a set of named values
 */
export function renderTemplate(template: string, values: Record<string, unknown>): string {
  return renderNodes(parseTemplate(template), [values]);
}

// ============================================
// Atom Rendering
// ============================================

/**
 * Decode stored atom content. Content is JSON for schema-driven types;
 * anything that does not parse is treated as plain text.
 */
export function decodeAtomContent(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return content;
  }
}

export function renderMarkdown(text: string): string {
  const html = marked.parse(text, { async: false });
  if (typeof html !== 'string') {
    throw new Error('Markdown renderer returned a promise for a synchronous parse');
  }
  return html;
}

/**
 * Render the string values the schema marks as markdown, following
 * `properties` into objects and `items` into arrays
 */
export function applyMarkdown(value: unknown, schema: FieldSchema): unknown {
  if (typeof value === 'string') {
    return schema.markdown ? new SafeHtml(renderMarkdown(value)) : value;
  }
  if (Array.isArray(value)) {
    const items = schema.items;
    return items ? value.map(item => applyMarkdown(item, items)) : value;
  }
  const properties = schema.properties;
  if (isRecord(value) && properties) {
    const rendered: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
      const fieldSchema = properties[key];
      rendered[key] = fieldSchema ? applyMarkdown(field, fieldSchema) : field;
    }
    return rendered;
  }
  return value;
}

/**
 * Collect the template values for an atom.
 *
 * With an object schema only the declared properties present in the content
 * are exposed, each under its own name. Without declared properties the whole
 * decoded content is exposed as `root`. Markdown fields arrive as HTML.
 */
export function templateValues(decoded: unknown, schema: FieldSchema): Record<string, unknown> {
  const content = applyMarkdown(decoded, schema);
  const properties = schema.properties;
  if (!properties || Object.keys(properties).length === 0) {
    return { root: content };
  }

  const values: Record<string, unknown> = {};
  if (isRecord(content)) {
    for (const field of Object.keys(properties)) {
      if (Object.prototype.hasOwnProperty.call(content, field)) {
        values[field] = content[field];
      }
    }
  }
  return values;
}

/**
 * Render an atom in the template of its type.
 *
 * `embedded` holds the finished HTML of the atoms the template embeds, by id.
 * An embed without an entry stays in the output literally.
 */
export function renderAtom(atom: Atom, type: AtomType, embedded: ReadonlyMap<number, string> = new Map()): string {
  const scope: Scope = [templateValues(decodeAtomContent(atom.content), type.schema)];
  if (embedded.size > 0) {
    const atoms: Record<string, SafeHtml> = {};
    for (const [id, html] of embedded) {
      atoms[String(id)] = new SafeHtml(html);
    }
    scope.push({ atom: atoms });
  }
  return renderNodes(parseTemplate(type.template), scope);
}
