import { Assembler } from './assembler.js';
import { Composer } from './composer.js';
import { callStore, NotFoundError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import {
  CacheKey,
  CacheStats,
  formatVersionToken,
  RenderCache,
  signVariables,
} from './render-cache.js';
import type { ContentStore } from './store/types.js';
import {
  CollectionDescription,
  CollectionSlot,
  EngineConfig,
  EngineConfigSchema,
  MenuEntry,
  RenderedAtom,
  RenderMode,
  RenderRequest,
  RenderResult,
  ResolvedArticle,
  SubstitutionAmbiguous,
  VariableMap,
} from './types.js';
import { mergeCollisions, VariableResolver } from './variables.js';

export interface ContentEngineOptions {
  store: ContentStore;
  config?: Partial<EngineConfig>;
  logger?: Logger;
  /** Clock used for cache entry timestamps */
  now?: () => number;
}

interface RenderTarget {
  articleId: number;
  slot: CollectionSlot | null;
}

/**
 * Content Engine
 *
 * Caller-facing entry point. A render runs:
 *
 * 1. Assembler: which article (and collection slot) the request is for
 * 2. Version lookup: content and global-variable version tokens
 * 3. Render cache: on a miss, compose the article and apply the global and
 *    cacheable tiers; concurrent misses on one key share that work
 * 4. Uncacheable tier, in memory, on the (possibly cached) result
 *
 * The engine owns its render cache for its whole lifetime; create one engine
 * per process and share it between requests.
 */
export class ContentEngine {
  private readonly store: ContentStore;
  private readonly logger: Logger;
  private readonly composer: Composer;
  private readonly variables: VariableResolver;
  private readonly assembler: Assembler;
  private readonly cache: RenderCache<ResolvedArticle>;
  readonly config: EngineConfig;

  constructor(options: ContentEngineOptions) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.config = EngineConfigSchema.parse(options.config ?? {});
    this.composer = new Composer(this.store);
    this.variables = new VariableResolver(this.store);
    this.assembler = new Assembler(this.store);
    this.cache = new RenderCache<ResolvedArticle>({
      maxEntries: this.config.cache.max_entries,
      maxBytes: this.config.cache.max_bytes,
      now: options.now,
      logger: this.logger,
    });
  }

  /**
   * Render an article, directly or through a collection slot
   *
   * @throws NotFoundError for unknown or foreign articles, collections and urls
   * @throws IntegrityError when the article references missing atoms or types
   * @throws StoreUnavailableError when a store call fails
   */
  async render(request: RenderRequest): Promise<RenderResult> {
    const target = await this.resolveTarget(request);
    const mode = request.raw ? RenderMode.Raw : RenderMode.Rendered;
    const cacheable = request.cacheable ?? {};

    const article = await callStore('getArticle', () => this.store.getArticle(target.articleId));
    if (!article || article.client !== request.clientId) {
      throw new NotFoundError('article', target.articleId);
    }

    const [contentVersion, variablesVersion] = await Promise.all([
      callStore('getArticleVersion', () => this.store.getArticleVersion(target.articleId)),
      callStore('getVariablesVersion', () => this.store.getVariablesVersion(request.clientId)),
    ]);
    if (contentVersion === undefined) {
      throw new NotFoundError('article', target.articleId);
    }

    const key: CacheKey = {
      collectionId: target.slot?.collectionId ?? null,
      articleId: target.articleId,
      mode,
      version: formatVersionToken(contentVersion, variablesVersion),
      signature: signVariables(cacheable),
    };

    const { value: resolved, outcome } = await this.cache.getOrCompute(
      key,
      () => this.resolveArticle(target.articleId, request.clientId, cacheable, mode, key.version),
      { signal: request.signal }
    );
    this.logger.debug(`Render article ${target.articleId} (${outcome}) version ${key.version}`);

    const result = this.applyUncacheable(resolved, request.uncacheable ?? {});
    this.reportCollisions(target.articleId, result.collisions);

    return {
      ...result,
      article: resolved.article,
      slot: target.slot,
      version: resolved.version,
      cache: outcome,
    };
  }

  /**
   * Navigation entries of a menu
   */
  async listMenu(clientId: number, menuId: number): Promise<MenuEntry[]> {
    return this.assembler.resolveMenu(clientId, menuId);
  }

  /**
   * A collection with its ordered articles and its menus
   */
  async describeCollection(clientId: number, collectionId: number): Promise<CollectionDescription> {
    const collection = await this.assembler.getCollection(clientId, collectionId);
    const slots = await this.assembler.listCollectionArticles(clientId, collectionId);

    const articles: CollectionDescription['articles'] = [];
    for (const slot of slots) {
      const article = await callStore('getArticle', () => this.store.getArticle(slot.articleId));
      if (!article) continue;
      articles.push({ ...slot, name: article.name });
    }

    return {
      collection,
      articles,
      menus: await this.assembler.listCollectionMenus(clientId, collectionId),
    };
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  dispose(): void {
    this.cache.clear();
  }

  // ============================================
  // Internals
  // ============================================

  private async resolveTarget(request: RenderRequest): Promise<RenderTarget> {
    if (request.collectionId === undefined) {
      if (request.articleId === undefined) {
        throw new TypeError('A render request needs an articleId or a collectionId');
      }
      return { articleId: request.articleId, slot: null };
    }

    let slot: CollectionSlot;
    if (request.url !== undefined) {
      slot = await this.assembler.resolveCollectionArticle(request.clientId, request.collectionId, request.url);
    } else if (request.articleId !== undefined) {
      slot = await this.assembler.resolveCollectionSlot(request.clientId, request.collectionId, request.articleId);
    } else {
      const [first] = await this.assembler.listCollectionArticles(request.clientId, request.collectionId);
      if (!first) {
        throw new NotFoundError('article', `first of collection ${request.collectionId}`);
      }
      slot = first;
    }
    return { articleId: slot.articleId, slot };
  }

  /**
   * Compose and apply the global and cacheable tiers: the cached part of a render
   */
  private async resolveArticle(
    articleId: number,
    clientId: number,
    cacheable: VariableMap,
    mode: RenderMode,
    version: string
  ): Promise<ResolvedArticle> {
    const composed = await this.composer.compose(articleId, { raw: mode === RenderMode.Raw });
    const { results, collisions } = await this.variables.resolveAllGlobalAndCacheable(
      composed.fragments.map(fragment => fragment.content),
      clientId,
      cacheable
    );

    return {
      article: composed.article,
      fragments: composed.fragments.map((fragment, index) => ({
        atomId: fragment.atomId,
        key: fragment.key,
        typeName: fragment.typeName,
        sortorder: fragment.sortorder,
        content: results[index] ?? { segments: [], text: '' },
      })),
      version,
      collisions,
    };
  }

  private applyUncacheable(
    resolved: ResolvedArticle,
    uncacheable: VariableMap
  ): Pick<RenderResult, 'content' | 'atoms' | 'byKey' | 'byId' | 'collisions'> {
    const atoms: RenderedAtom[] = [];
    const byKey: Record<string, number> = {};
    const byId: Record<string, number> = {};
    const reports: SubstitutionAmbiguous[][] = [resolved.collisions];

    for (const fragment of resolved.fragments) {
      const { text, collisions } = this.variables.resolveUncacheable(fragment.content, uncacheable);
      reports.push(collisions);
      const position = atoms.length;
      if (fragment.key) {
        byKey[fragment.key] = position;
      }
      byId[String(fragment.atomId)] = position;
      atoms.push({
        id: fragment.atomId,
        key: fragment.key,
        type: fragment.typeName,
        sortorder: fragment.sortorder,
        content: text,
      });
    }

    return {
      content: atoms.map(atom => atom.content).join(''),
      atoms,
      byKey,
      byId,
      collisions: mergeCollisions(...reports),
    };
  }

  private reportCollisions(articleId: number, collisions: SubstitutionAmbiguous[]): void {
    for (const collision of collisions) {
      this.logger.warn(
        `Variable {${collision.tag}} in article ${articleId} is defined in ${collision.tiers.join(', ')}; using ${collision.chosen}`
      );
    }
  }
}
