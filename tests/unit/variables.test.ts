/**
 * Unit tests for variables.ts
 * Placeholder scanning, the tier chain, precedence and collision reports
 */

import {
  extractTags,
  joinSegments,
  lookupTag,
  mergeCollisions,
  resolveWithChain,
  scan,
  TierMapping,
  VariableResolver,
} from '../../src/variables.js';
import { MemoryStore } from '../../src/store/memory-store.js';
import { StoreUnavailableError } from '../../src/errors.js';
import { VariableTier } from '../../src/types.js';

describe('variables.ts - scanning', () => {
  it('should split text into literal and tag segments', () => {
    expect(scan('Hi {name}!')).toEqual([
      { kind: 'text', value: 'Hi ' },
      { kind: 'tag', tag: 'name', placeholder: '{name}' },
      { kind: 'text', value: '!' },
    ]);
  });

  it('should accept dotted, dashed and colon tags', () => {
    expect(extractTags('{site.title} {a-b} {ns:key} {x} {x}')).toEqual(['site.title', 'a-b', 'ns:key', 'x']);
  });

  it('should ignore braces that are not placeholders', () => {
    expect(extractTags('{ spaced } {1abc} {} {"json":1}')).toEqual([]);
  });

  it('should join unresolved tags as their placeholder', () => {
    expect(joinSegments(scan('a {b} c'))).toBe('a {b} c');
  });
});

describe('variables.ts - lookup chain', () => {
  const chain: TierMapping[] = [
    { tier: VariableTier.Cacheable, values: { name: 'Cached' } },
    { tier: VariableTier.Global, values: { name: 'Global', site: 'Site' } },
  ];

  it('should return the first tier holding the tag', () => {
    expect(lookupTag(chain, 'name')).toEqual({
      value: 'Cached',
      tier: VariableTier.Cacheable,
      foundIn: [VariableTier.Cacheable, VariableTier.Global],
    });
  });

  it('should return undefined for an unknown tag', () => {
    expect(lookupTag(chain, 'missing')).toBeUndefined();
  });

  it('should not treat inherited object properties as variables', () => {
    expect(lookupTag(chain, 'toString')).toBeUndefined();
    expect(resolveWithChain('{constructor}', chain).result.text).toBe('{constructor}');
  });

  it('should substitute every occurrence and report the collision once', () => {
    const { result, collisions } = resolveWithChain('{name} and {name} at {site} {nope}', chain);
    expect(result.text).toBe('Cached and Cached at Site {nope}');
    expect(collisions).toEqual([
      { tag: 'name', tiers: [VariableTier.Cacheable, VariableTier.Global], chosen: VariableTier.Cacheable },
    ]);
  });

  it('should substitute empty values', () => {
    const { result } = resolveWithChain('[{x}]', [{ tier: VariableTier.Global, values: { x: '' } }]);
    expect(result.text).toBe('[]');
  });

  it('should not rescan substituted values for placeholders', () => {
    const { result } = resolveWithChain('{a}', [{ tier: VariableTier.Global, values: { a: '{b}', b: 'B' } }]);
    expect(result.text).toBe('{b}');
  });
});

describe('variables.ts - VariableResolver', () => {
  const createStore = () =>
    new MemoryStore({
      variables: [
        { client: 1, tag: 'name', value: 'Global', version: 1 },
        { client: 1, tag: 'year', value: '1999', version: 1 },
        { client: 2, tag: 'name', value: 'Elsewhere', version: 1 },
      ],
    });

  it('should resolve globals for the requested client only', async () => {
    const resolver = new VariableResolver(createStore());
    const { result } = await resolver.resolveGlobalAndCacheable('Hi {name}', 2);
    expect(result.text).toBe('Hi Elsewhere');
  });

  it('should let cacheable variables beat globals', async () => {
    const resolver = new VariableResolver(createStore());
    const { result, collisions } = await resolver.resolveGlobalAndCacheable('{name}/{year}', 1, { name: 'Cached' });
    expect(result.text).toBe('Cached/1999');
    expect(collisions).toEqual([
      { tag: 'name', tiers: [VariableTier.Cacheable, VariableTier.Global], chosen: VariableTier.Cacheable },
    ]);
  });

  it('should let uncacheable variables override values resolved in the first pass', async () => {
    const resolver = new VariableResolver(createStore());
    const { result } = await resolver.resolveGlobalAndCacheable('{name} {year} {day}', 1, { name: 'Cached' });

    const second = resolver.resolveUncacheable(result, { name: 'Request', day: 'Monday' });
    expect(second.text).toBe('Request 1999 Monday');
    expect(second.collisions).toEqual([
      { tag: 'name', tiers: [VariableTier.Uncacheable, VariableTier.Cacheable], chosen: VariableTier.Uncacheable },
    ]);

    // The first pass result is not modified
    expect(result.text).toBe('Cached 1999 {day}');
    expect(resolver.resolveUncacheable(result, {}).text).toBe('Cached 1999 {day}');
  });

  it('should read globals once for several fragments', async () => {
    const store = createStore();
    const spy = jest.spyOn(store, 'getGlobalVariables');
    const resolver = new VariableResolver(store);

    const { results } = await resolver.resolveAllGlobalAndCacheable(['{name}', '{year}', 'plain'], 1);

    expect(results.map(result => result.text)).toEqual(['Global', '1999', 'plain']);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('should wrap store failures', async () => {
    const store = createStore();
    jest.spyOn(store, 'getGlobalVariables').mockRejectedValue(new Error('connection reset'));
    const resolver = new VariableResolver(store);

    await expect(resolver.resolveGlobalAndCacheable('{name}', 1)).rejects.toThrow(StoreUnavailableError);
  });
});

describe('variables.ts - mergeCollisions', () => {
  it('should combine reports for one tag in tier order', () => {
    const merged = mergeCollisions(
      [{ tag: 'name', tiers: [VariableTier.Cacheable, VariableTier.Global], chosen: VariableTier.Cacheable }],
      [{ tag: 'name', tiers: [VariableTier.Uncacheable, VariableTier.Cacheable], chosen: VariableTier.Uncacheable }]
    );
    expect(merged).toEqual([
      {
        tag: 'name',
        tiers: [VariableTier.Uncacheable, VariableTier.Cacheable, VariableTier.Global],
        chosen: VariableTier.Uncacheable,
      },
    ]);
  });

  it('should keep reports for different tags apart', () => {
    const merged = mergeCollisions(
      [{ tag: 'a', tiers: [VariableTier.Cacheable, VariableTier.Global], chosen: VariableTier.Cacheable }],
      [{ tag: 'b', tiers: [VariableTier.Uncacheable, VariableTier.Global], chosen: VariableTier.Uncacheable }]
    );
    expect(merged.map(collision => collision.tag)).toEqual(['a', 'b']);
  });
});
