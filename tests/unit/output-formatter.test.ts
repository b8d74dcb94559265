/**
 * Unit tests for output-formatter.ts
 * Text, JSON and raw output for every command
 */

import {
  buildOutputPayload,
  formatJson,
  formatOutput,
  formatRaw,
  formatText,
  parseOutputFormat,
} from '../../src/output-formatter.js';
import type { ValidationReport } from '../../src/store/validate.js';
import { MenuEntry, OutputFormat, RenderResult, VariableTier } from '../../src/types.js';

const RULE = '─'.repeat(60);

function createRenderResult(overrides: Partial<RenderResult> = {}): RenderResult {
  return {
    article: { id: 10, name: 'Copyright' },
    slot: null,
    content: '© 2024',
    atoms: [{ id: 1, key: 'footer', type: 'text', sortorder: 1, content: '© 2024' }],
    byKey: { footer: 0 },
    byId: { '1': 0 },
    version: '100.100',
    cache: 'hit',
    collisions: [],
    ...overrides,
  };
}

const entries: MenuEntry[] = [
  { articleId: 11, displayName: 'Start', url: '/', sortorder: 1 },
  { articleId: 10, displayName: 'Copyright', url: null, sortorder: 2 },
];

const report: ValidationReport = {
  valid: false,
  issues: [{ severity: 'error', entity: 'atom', id: 50, message: 'Atom references missing type 42' }],
  counts: { types: 1, atoms: 2, articles: 1, collections: 0, menus: 0, variables: 0 },
};

describe('output-formatter.ts - parseOutputFormat', () => {
  test('should default to text', () => {
    expect(parseOutputFormat(undefined)).toBe(OutputFormat.Text);
  });

  test('should accept every known format', () => {
    expect(parseOutputFormat('json')).toBe(OutputFormat.Json);
    expect(parseOutputFormat('raw')).toBe(OutputFormat.Raw);
  });

  test('should name the accepted formats for an unknown one', () => {
    expect(() => parseOutputFormat('xml')).toThrow('Unknown output format: xml (expected text, json, raw)');
  });
});

describe('output-formatter.ts - render output', () => {
  test('should format a render as text', () => {
    const text = formatText({ kind: 'render', results: [createRenderResult()] });

    expect(text.split('\n')).toEqual([
      RULE,
      'Article: 10 (Copyright)',
      'Version: 100.100',
      'Cache: hit',
      'Atoms: 1',
      RULE,
      '© 2024',
      RULE,
    ]);
  });

  test('should show the collection slot and collisions', () => {
    const result = createRenderResult({
      slot: { collectionId: 5, articleId: 12, url: '/about', template: 'page', meta: null, sortorder: 2 },
      collisions: [{ tag: 'site', tiers: [VariableTier.Uncacheable, VariableTier.Global], chosen: VariableTier.Uncacheable }],
    });
    const lines = formatText({ kind: 'render', results: [result] }).split('\n');

    expect(lines[2]).toBe('Collection: 5 at /about');
    expect(lines).toContain('  • {site}: uncacheable > global (using uncacheable)');
  });

  test('should emit only content in raw mode', () => {
    const output = { kind: 'render' as const, results: [createRenderResult(), createRenderResult({ content: 'second' })] };

    expect(formatRaw(output)).toBe('© 2024\nsecond');
  });

  test('should build a versioned JSON payload', () => {
    const parsed: unknown = JSON.parse(formatJson({ kind: 'render', results: [createRenderResult()] }));

    expect(parsed).toEqual({
      schema_version: '1.0',
      renders: [
        {
          article: { id: 10, name: 'Copyright' },
          slot: null,
          version: '100.100',
          cache: 'hit',
          content: '© 2024',
          atoms: [{ id: 1, key: 'footer', type: 'text', sortorder: 1, content: '© 2024' }],
          by_key: { footer: 0 },
          by_id: { '1': 0 },
          collisions: [],
        },
      ],
    });
  });
});

describe('output-formatter.ts - menu and collection output', () => {
  test('should list menu entries as text', () => {
    expect(formatText({ kind: 'menu', menuId: 7, entries }).split('\n')).toEqual([
      RULE,
      'Menu: 7',
      RULE,
      '  • Start → /',
      '  • Copyright → (no url)',
    ]);
  });

  test('should mark an empty menu', () => {
    expect(formatText({ kind: 'menu', menuId: 9, entries: [] }).split('\n').pop()).toBe('(no entries)');
  });

  test('should emit url and name per line in raw mode', () => {
    expect(formatRaw({ kind: 'menu', menuId: 7, entries })).toBe('/\tStart\n\tCopyright');
  });

  test('should describe a collection', () => {
    const description = {
      collection: { id: 5, name: 'site', client: 1 },
      articles: [
        { collectionId: 5, articleId: 11, url: '/', template: 'home', meta: null, sortorder: 1, name: 'Home' },
        { collectionId: 5, articleId: 10, url: null, template: 'partial', meta: null, sortorder: 3, name: 'Copyright' },
      ],
      menus: { main: [{ articleId: 11, displayName: 'Start', url: '/', sortorder: 1 }] },
    };

    expect(formatText({ kind: 'collection', description }).split('\n')).toEqual([
      RULE,
      'Collection: 5 (site)',
      RULE,
      'Articles:',
      '  1. Home [11] /',
      '  3. Copyright [10] (no url)',
      '',
      'Menu main:',
      '  • Start → /',
    ]);
    expect(formatRaw({ kind: 'collection', description })).toBe('/\tHome\n\tCopyright');
    expect(buildOutputPayload({ kind: 'collection', description })).toEqual({ schema_version: '1.0', ...description });
  });
});

describe('output-formatter.ts - validation output', () => {
  test('should summarise counts and issues as text', () => {
    const lines = formatText({ kind: 'validation', report, files: ['/content/content.yaml'] }).split('\n');

    expect(lines).toEqual([
      RULE,
      'Content: invalid',
      RULE,
      'Files: 1',
      '  • types: 1',
      '  • atoms: 2',
      '  • articles: 1',
      '  • collections: 0',
      '  • menus: 0',
      '  • variables: 0',
      '',
      'Issues:',
      '  [ERROR] atom 50: Atom references missing type 42',
    ]);
  });

  test('should emit tab-separated issues in raw mode', () => {
    expect(formatOutput({ kind: 'validation', report, files: [] }, OutputFormat.Raw)).toBe(
      'error\tatom\t50\tAtom references missing type 42'
    );
  });

  test('should include files in the JSON payload', () => {
    expect(buildOutputPayload({ kind: 'validation', report, files: ['a.yaml'] })).toEqual({
      schema_version: '1.0',
      files: ['a.yaml'],
      valid: false,
      issues: report.issues,
      counts: report.counts,
    });
  });

  test('should default to text', () => {
    expect(formatOutput({ kind: 'menu', menuId: 9, entries: [] })).toBe(
      formatText({ kind: 'menu', menuId: 9, entries: [] })
    );
  });
});
