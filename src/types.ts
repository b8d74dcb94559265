import { z } from 'zod';

// ============================================
// Enums
// ============================================

export enum OutputFormat {
  Text = 'text',
  Json = 'json',
  Raw = 'raw',
}

/**
 * Variable tiers, ordered from the most request-specific to the least.
 * The lookup chain walks tiers in this order, so the first hit wins.
 */
export enum VariableTier {
  Uncacheable = 'uncacheable',
  Cacheable = 'cacheable',
  Global = 'global',
}

export enum RenderMode {
  Rendered = 'rendered',
  Raw = 'raw',
}

export type CacheOutcome = 'hit' | 'miss' | 'coalesced';

// ============================================
// Content Graph Entities
// ============================================

/**
 * Field definitions of an atom type.
 * A subset of JSON schema: objects list `properties`, arrays describe `items`.
 */
export interface FieldSchema {
  type?: string;
  description?: string;
  properties?: Record<string, FieldSchema>;
  items?: FieldSchema;
  /** String values are written in markdown and rendered to HTML before the template runs */
  markdown?: boolean;
}

export interface AtomType {
  id: number;
  name: string;
  schema: FieldSchema;
  template: string;
  version: number;
}

export interface Atom {
  id: number;
  key: string | null;
  content: string;
  type: number;
  version: number;
}

export interface Article {
  id: number;
  name: string;
  client: number;
  version: number;
}

/** Association record: an atom placed in an article at a sort position */
export interface ArticleAtomRef {
  atom: number;
  sortorder: number;
}

export interface Collection {
  id: number;
  name: string;
  client: number;
}

/** Association record: an article placed in a collection */
export interface CollectionArticleRef {
  article: number;
  sortorder: number;
  url: string | null;
  template: string;
  meta: string;
}

export interface Menu {
  id: number;
  name: string;
  client: number;
  collection: number;
}

export interface MenuArticleRef {
  article: number;
  sortorder: number;
  name: string | null;
}

export interface Variable {
  client: number;
  tag: string;
  value: string;
  version: number;
}

export type VariableMap = Record<string, string>;

// ============================================
// Composition Types
// ============================================

export interface Fragment {
  atomId: number;
  key: string | null;
  typeName: string;
  sortorder: number;
  content: string;
}

export interface ComposedArticle {
  article: Pick<Article, 'id' | 'name'>;
  fragments: Fragment[];
  /** Concatenation of all fragment contents, in order */
  content: string;
  version: number;
}

// ============================================
// Substitution Types
// ============================================

/**
 * A piece of substituted text.
 * Tag segments remember their placeholder so a later, nearer tier can still
 * override the value chosen by an earlier pass.
 */
export type Segment =
  | { kind: 'text'; value: string }
  | {
      kind: 'tag';
      tag: string;
      placeholder: string;
      resolved?: { value: string; tier: VariableTier };
    };

export interface SubstitutedText {
  segments: Segment[];
  /** Text with every resolved tag applied and unresolved placeholders kept */
  text: string;
}

/**
 * A tag defined in more than one tier. Never an error: the nearest tier wins,
 * and callers may log the collision.
 */
export interface SubstitutionAmbiguous {
  tag: string;
  tiers: VariableTier[];
  chosen: VariableTier;
}

// ============================================
// Render Types
// ============================================

export interface CollectionSlot {
  collectionId: number;
  articleId: number;
  url: string | null;
  template: string;
  meta: unknown;
  sortorder: number;
}

export interface MenuEntry {
  articleId: number;
  displayName: string;
  url: string | null;
  sortorder: number;
}

/** What the render cache stores: global and cacheable tiers applied */
export interface ResolvedArticle {
  article: Pick<Article, 'id' | 'name'>;
  fragments: Array<Omit<Fragment, 'content'> & { content: SubstitutedText }>;
  version: string;
  collisions: SubstitutionAmbiguous[];
}

export interface RenderRequest {
  clientId: number;
  articleId?: number;
  collectionId?: number;
  url?: string;
  cacheable?: VariableMap;
  uncacheable?: VariableMap;
  raw?: boolean;
  signal?: AbortSignal;
}

export interface RenderedAtom {
  id: number;
  key: string | null;
  type: string;
  sortorder: number;
  content: string;
}

export interface RenderResult {
  article: Pick<Article, 'id' | 'name'>;
  slot: CollectionSlot | null;
  content: string;
  atoms: RenderedAtom[];
  /** Position of each keyed atom in `atoms` */
  byKey: Record<string, number>;
  /** Position of each atom id in `atoms` */
  byId: Record<string, number>;
  version: string;
  cache: CacheOutcome;
  collisions: SubstitutionAmbiguous[];
}

export interface CollectionDescription {
  collection: Collection;
  articles: Array<CollectionSlot & { name: string }>;
  menus: Record<string, MenuEntry[]>;
}

// ============================================
// Engine Configuration
// ============================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const CacheConfigSchema = z.object({
  max_entries: z.number().int().positive().default(500),
  max_bytes: z.number().int().positive().optional(),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

export const EngineConfigSchema = z.object({
  cache: CacheConfigSchema.default({}),
  log_level: LogLevelSchema.default('info'),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

// ============================================
// CLI Option Types
// ============================================

export interface RenderCommandOptions {
  content: string;
  client: number;
  article?: number;
  collection?: number;
  url?: string;
  var?: string[];
  requestVar?: string[];
  raw?: boolean;
  repeat?: number;
  format?: string;
  verbose?: boolean;
}

export interface MenuCommandOptions {
  content: string;
  client: number;
  menu: number;
  format?: string;
}

export interface CollectionCommandOptions {
  content: string;
  client: number;
  collection: number;
  format?: string;
}

export interface ValidateCommandOptions {
  content: string;
  format?: string;
}
