/**
 * Variable Resolver
 *
 * Substitutes `{tag}` placeholders from three tiers of variables:
 *
 * - global:      stored per client
 * - cacheable:   supplied by the caller, stable for a collection
 * - uncacheable: supplied by the caller for one request
 *
 * Tiers are consulted as an ordered chain, nearest to the request first, so
 * uncacheable beats cacheable beats global. Unknown tags stay in the output
 * as literal placeholders.
 *
 * The first pass (global + cacheable) produces segments rather than a flat
 * string. Each resolved tag keeps its placeholder, which is what lets the
 * later uncacheable pass override a stored value even though the first pass
 * result was cached without knowing the request.
 */

import { callStore } from './errors.js';
import type { ContentStore } from './store/types.js';
import {
  Segment,
  SubstitutedText,
  SubstitutionAmbiguous,
  VariableMap,
  VariableTier,
} from './types.js';

export const PLACEHOLDER_PATTERN = /\{([A-Za-z_][\w.:-]*)\}/g;

export interface TierMapping {
  tier: VariableTier;
  values: VariableMap;
}

// ============================================
// Placeholder Scanning
// ============================================

/**
 * Split text into literal and placeholder segments
 */
export function scan(text: string): Segment[] {
  const segments: Segment[] = [];
  let cursor = 0;

  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const index = match.index ?? 0;
    const tag = match[1];
    if (tag === undefined) continue;
    if (index > cursor) {
      segments.push({ kind: 'text', value: text.slice(cursor, index) });
    }
    segments.push({ kind: 'tag', tag, placeholder: match[0] });
    cursor = index + match[0].length;
  }

  if (cursor < text.length) {
    segments.push({ kind: 'text', value: text.slice(cursor) });
  }
  return segments;
}

export function extractTags(text: string): string[] {
  const tags = new Set<string>();
  for (const segment of scan(text)) {
    if (segment.kind === 'tag') tags.add(segment.tag);
  }
  return [...tags];
}

/**
 * Join segments back into text. Resolved tags contribute their value,
 * unresolved tags their original placeholder.
 */
export function joinSegments(segments: Segment[]): string {
  let text = '';
  for (const segment of segments) {
    if (segment.kind === 'text') {
      text += segment.value;
    } else {
      text += segment.resolved ? segment.resolved.value : segment.placeholder;
    }
  }
  return text;
}

// ============================================
// Lookup Chain
// ============================================

function hasTag(values: VariableMap, tag: string): boolean {
  return Object.prototype.hasOwnProperty.call(values, tag);
}

/**
 * Find a tag in an ordered list of tiers. The first tier holding it wins;
 * every tier holding it is reported so collisions can be surfaced.
 */
export function lookupTag(
  chain: TierMapping[],
  tag: string
): { value: string; tier: VariableTier; foundIn: VariableTier[] } | undefined {
  const foundIn = chain.filter(mapping => hasTag(mapping.values, tag));
  const nearest = foundIn[0];
  if (!nearest) {
    return undefined;
  }
  const value = nearest.values[tag];
  if (value === undefined) {
    return undefined;
  }
  return { value, tier: nearest.tier, foundIn: foundIn.map(mapping => mapping.tier) };
}

/**
 * Resolve segments against a chain of tiers.
 *
 * A segment already resolved by an earlier pass keeps its value unless a tier
 * in this chain also holds the tag; the earlier tier then counts as one more
 * tier behind this chain.
 */
export function applyChain(
  segments: Segment[],
  chain: TierMapping[],
  collisions: Map<string, SubstitutionAmbiguous>
): Segment[] {
  return segments.map(segment => {
    if (segment.kind === 'text') {
      return segment;
    }

    const hit = lookupTag(chain, segment.tag);
    const earlier = segment.resolved;
    if (!hit) {
      return segment;
    }

    const tiers = earlier ? [...hit.foundIn, earlier.tier] : hit.foundIn;
    if (tiers.length > 1 && !collisions.has(segment.tag)) {
      collisions.set(segment.tag, { tag: segment.tag, tiers, chosen: hit.tier });
    }
    return { ...segment, resolved: { value: hit.value, tier: hit.tier } };
  });
}

// ============================================
// Resolver
// ============================================

export class VariableResolver {
  constructor(private readonly store: ContentStore) {}

  /**
   * First pass: global and cacheable tiers. The result may be cached.
   *
   * Global variables are read from the store for the client; the cacheable
   * set sits in front of them in the chain.
   */
  async resolveGlobalAndCacheable(
    content: string,
    clientId: number,
    cacheableVars: VariableMap = {}
  ): Promise<{ result: SubstitutedText; collisions: SubstitutionAmbiguous[] }> {
    const { results, collisions } = await this.resolveAllGlobalAndCacheable([content], clientId, cacheableVars);
    const [result] = results;
    return { result: result ?? { segments: [], text: '' }, collisions };
  }

  /**
   * First pass over several fragments, reading the client's globals once
   */
  async resolveAllGlobalAndCacheable(
    contents: string[],
    clientId: number,
    cacheableVars: VariableMap = {}
  ): Promise<{ results: SubstitutedText[]; collisions: SubstitutionAmbiguous[] }> {
    const globals = await callStore('getGlobalVariables', () =>
      this.store.getGlobalVariables(clientId)
    );
    const chain: TierMapping[] = [
      { tier: VariableTier.Cacheable, values: cacheableVars },
      { tier: VariableTier.Global, values: globals },
    ];

    const results: SubstitutedText[] = [];
    const reports: SubstitutionAmbiguous[][] = [];
    for (const content of contents) {
      const { result, collisions } = resolveWithChain(content, chain);
      results.push(result);
      reports.push(collisions);
    }
    return { results, collisions: mergeCollisions(...reports) };
  }

  /**
   * Final pass: the uncacheable tier, in memory, on the first pass result
   */
  resolveUncacheable(
    content: SubstitutedText,
    uncacheableVars: VariableMap = {}
  ): { text: string; collisions: SubstitutionAmbiguous[] } {
    const collisions = new Map<string, SubstitutionAmbiguous>();
    const segments = applyChain(
      content.segments,
      [{ tier: VariableTier.Uncacheable, values: uncacheableVars }],
      collisions
    );
    return { text: joinSegments(segments), collisions: [...collisions.values()] };
  }
}

/**
 * Resolve plain text against an explicit chain of tiers
 */
export function resolveWithChain(
  content: string,
  chain: TierMapping[]
): { result: SubstitutedText; collisions: SubstitutionAmbiguous[] } {
  const collisions = new Map<string, SubstitutionAmbiguous>();
  const segments = applyChain(scan(content), chain, collisions);
  return {
    result: { segments, text: joinSegments(segments) },
    collisions: [...collisions.values()],
  };
}

const TIER_ORDER: VariableTier[] = [VariableTier.Uncacheable, VariableTier.Cacheable, VariableTier.Global];

/**
 * Merge collision reports from several passes or fragments.
 * Reports for the same tag are combined; the nearest chosen tier wins.
 */
export function mergeCollisions(...reports: SubstitutionAmbiguous[][]): SubstitutionAmbiguous[] {
  const merged = new Map<string, SubstitutionAmbiguous>();
  for (const report of reports) {
    for (const collision of report) {
      const existing = merged.get(collision.tag);
      if (!existing) {
        merged.set(collision.tag, { ...collision, tiers: [...collision.tiers] });
        continue;
      }
      const tiers = TIER_ORDER.filter(
        tier => existing.tiers.includes(tier) || collision.tiers.includes(tier)
      );
      const chosen = TIER_ORDER.find(tier => tier === existing.chosen || tier === collision.chosen) ?? collision.chosen;
      merged.set(collision.tag, { tag: collision.tag, tiers, chosen });
    }
  }
  return [...merged.values()];
}
