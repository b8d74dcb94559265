/**
 * Unit tests for template.ts
 * Type templates: field tags, escaping, loops, conditionals, atom decoding
 */

import {
  applyMarkdown,
  decodeAtomContent,
  embeddedAtomIds,
  escapeHtml,
  parseTemplate,
  renderAtom,
  renderTemplate,
  SafeHtml,
  TemplateSyntaxError,
  templateValues,
} from '../../src/template.js';
import type { Atom, AtomType } from '../../src/types.js';

describe('template.ts - renderTemplate', () => {
  it('should substitute field tags and escape HTML', () => {
    expect(renderTemplate('<p>[body]</p>', { body: 'Fish & <Chips>' })).toBe('<p>Fish &amp; &lt;Chips&gt;</p>');
  });

  it('should not escape fields marked raw', () => {
    expect(renderTemplate('<div>[body|raw]</div>', { body: '<b>bold</b>' })).toBe('<div><b>bold</b></div>');
  });

  it('should resolve nested keys and array indexes', () => {
    const values = { image: { src: 'a.png', alt: 'A' }, tags: ['first', 'second'] };
    expect(renderTemplate('[image:src] [image:alt] [tags:1]', values)).toBe('a.png A second');
  });

  it('should leave negative and out-of-range indexes literally', () => {
    expect(renderTemplate('[list:-1]', { list: ['a'] })).toBe('[list:-1]');
    expect(renderTemplate('[list:1]', { list: ['a'] })).toBe('[list:1]');
  });

  it('should leave unresolved tags literally', () => {
    expect(renderTemplate('[title] [missing] [tags:5]', { title: 'T', tags: [] })).toBe('T [missing] [tags:5]');
  });

  it('should render null and undefined values as empty text', () => {
    expect(renderTemplate('<i>[subtitle]</i>', { subtitle: null })).toBe('<i></i>');
  });

  it('should repeat a loop body per item', () => {
    const template = '<ul>{{ for link in [links] }}<li>[link:name]</li>{{ endfor }}</ul>';
    const values = { links: [{ name: 'One' }, { name: 'Two' }] };
    expect(renderTemplate(template, values)).toBe('<ul><li>One</li><li>Two</li></ul>');
  });

  it('should render nothing for a loop over a missing list', () => {
    expect(renderTemplate('a{{ for x in [xs] }}[x]{{ endfor }}b', {})).toBe('ab');
  });

  it('should choose the branch of a conditional', () => {
    const template = '{{ if [subtitle] }}<h2>[subtitle]</h2>{{ else }}<hr>{{ endif }}';
    expect(renderTemplate(template, { subtitle: 'Sub' })).toBe('<h2>Sub</h2>');
    expect(renderTemplate(template, { subtitle: '' })).toBe('<hr>');
    expect(renderTemplate(template, {})).toBe('<hr>');
  });

  it('should treat empty lists and objects as false', () => {
    const template = '{{ if [items] }}yes{{ else }}no{{ endif }}';
    expect(renderTemplate(template, { items: [] })).toBe('no');
    expect(renderTemplate(template, { items: {} })).toBe('no');
    expect(renderTemplate(template, { items: [1] })).toBe('yes');
  });

  it('should pass variable placeholders through untouched', () => {
    expect(renderTemplate('[root] {year}', { root: '©' })).toBe('© {year}');
  });
});

describe('template.ts - parseTemplate', () => {
  it('should reject an unclosed block', () => {
    expect(() => parseTemplate('{{ for x in [xs] }}[x]')).toThrow(TemplateSyntaxError);
    expect(() => parseTemplate('{{ for x in [xs] }}[x]')).toThrow('Unclosed {{ for }} block');
  });

  it('should reject a mismatched end statement', () => {
    expect(() => parseTemplate('{{ if [a] }}x{{ endfor }}')).toThrow('Unexpected {{ endfor }}');
  });

  it('should reject a stray else', () => {
    expect(() => parseTemplate('x{{ else }}y')).toThrow('Unexpected {{ else }}');
  });

  it('should reject unknown statements', () => {
    expect(() => parseTemplate('{{ include [header] }}')).toThrow('Unknown template statement: {{ include [header] }}');
  });

  it('should return the same parse for the same template', () => {
    const template = '<p>[body]</p>{{ if [x] }}x{{ endif }}';
    expect(parseTemplate(template)).toBe(parseTemplate(template));
  });
});

describe('template.ts - atom rendering', () => {
  const heading: AtomType = {
    id: 2,
    name: 'heading',
    schema: { type: 'object', properties: { title: { type: 'string' } } },
    template: '<h1>[title]</h1>[secret]',
    version: 1,
  };

  it('should decode JSON content and fall back to plain text', () => {
    expect(decodeAtomContent('{"a":1}')).toEqual({ a: 1 });
    expect(decodeAtomContent('© {year}')).toBe('© {year}');
    expect(decodeAtomContent('42')).toBe(42);
  });

  it('should expose only declared schema fields', () => {
    expect(templateValues({ title: 'T', secret: 's' }, heading.schema)).toEqual({ title: 'T' });
  });

  it('should expose content as root when the schema declares no fields', () => {
    expect(templateValues('plain', { type: 'string' })).toEqual({ root: 'plain' });
  });

  it('should render an atom through its type template', () => {
    const atom: Atom = { id: 7, key: null, type: 2, content: '{"title":"Hi & bye","secret":"x"}', version: 1 };
    expect(renderAtom(atom, heading)).toBe('<h1>Hi &amp; bye</h1>[secret]');
  });

  it('should escape quotes', () => {
    expect(escapeHtml(`"it's"`)).toBe('&quot;it&#39;s&quot;');
  });
});

describe('template.ts - embedded atoms', () => {
  const frame: AtomType = { id: 4, name: 'frame', schema: {}, template: '<div>[root] [atom:1]</div>', version: 1 };
  const atom: Atom = { id: 9, key: null, type: 4, content: 'outer', version: 1 };

  it('should list embedded atom ids once each', () => {
    expect(embeddedAtomIds('[atom:3] [atom:1] [atom:3|raw] [atoms:2] [atom:x]')).toEqual([3, 1]);
    expect(embeddedAtomIds('[root]')).toEqual([]);
  });

  it('should place the rendered atom without escaping it', () => {
    expect(renderAtom(atom, frame, new Map([[1, 'inner']]))).toBe('<div>outer inner</div>');
    expect(renderAtom(atom, frame, new Map([[1, '<b>inner</b>']]))).toBe('<div>outer <b>inner</b></div>');
  });

  it('should leave an embed without a rendered atom literally', () => {
    expect(renderAtom(atom, frame)).toBe('<div>outer [atom:1]</div>');
  });
});

describe('template.ts - markdown fields', () => {
  const post: AtomType = {
    id: 5,
    name: 'post',
    schema: {
      type: 'object',
      properties: {
        title: { type: 'string' },
        body: { type: 'string', markdown: true },
        notes: { type: 'array', items: { type: 'string', markdown: true } },
      },
    },
    template: '<h2>[title]</h2><div>[body]</div><ul>{{ for note in [notes] }}<li>[note]</li>{{ endfor }}</ul>',
    version: 1,
  };

  it('should render marked fields to HTML and escape the rest', () => {
    const atom: Atom = {
      id: 8,
      key: null,
      type: 5,
      content: '{"title":"Q & A","body":"Hello **{name}**","notes":["*one*"]}',
      version: 1,
    };

    expect(renderAtom(atom, post)).toBe(
      '<h2>Q &amp; A</h2><div><p>Hello <strong>{name}</strong></p>\n</div><ul><li><p><em>one</em></p>\n</li></ul>'
    );
  });

  it('should follow properties and items through the schema', () => {
    const rendered = applyMarkdown({ title: 'plain', body: '*b*', notes: ['x'], extra: '*e*' }, post.schema);

    expect(rendered).toEqual({
      title: 'plain',
      body: new SafeHtml('<p><em>b</em></p>\n'),
      notes: [new SafeHtml('<p>x</p>\n')],
      extra: '*e*',
    });
  });

  it('should render a markdown root value', () => {
    expect(templateValues('# Title', { type: 'string', markdown: true })).toEqual({
      root: new SafeHtml('<h1>Title</h1>\n'),
    });
  });
});
