import { callStore, NotFoundError } from './errors.js';
import type { ContentStore } from './store/types.js';
import type {
  Collection,
  CollectionArticleRef,
  CollectionSlot,
  Menu,
  MenuEntry,
} from './types.js';

/**
 * Parse a slot's meta text. Meta that is empty or not valid JSON is `null`.
 */
export function parseMeta(meta: string): unknown {
  if (!meta) return null;
  try {
    return JSON.parse(meta);
  } catch {
    return null;
  }
}

function toSlot(collectionId: number, ref: CollectionArticleRef): CollectionSlot {
  return {
    collectionId,
    articleId: ref.article,
    url: ref.url,
    template: ref.template,
    meta: parseMeta(ref.meta),
    sortorder: ref.sortorder,
  };
}

/**
 * Collection/Menu Assembler
 *
 * Works out which article a request is for and lists navigation entries.
 * Purely structural: no substitution, no caching.
 */
export class Assembler {
  constructor(private readonly store: ContentStore) {}

  /**
   * Load a collection owned by the client
   *
   * @throws NotFoundError for an unknown collection or one owned by another client
   */
  async getCollection(clientId: number, collectionId: number): Promise<Collection> {
    const collection = await callStore('getCollection', () => this.store.getCollection(collectionId));
    if (!collection || collection.client !== clientId) {
      throw new NotFoundError('collection', collectionId);
    }
    return collection;
  }

  /**
   * Slots of a collection, by sortorder then article id
   */
  async listCollectionArticles(clientId: number, collectionId: number): Promise<CollectionSlot[]> {
    await this.getCollection(clientId, collectionId);
    const refs = await callStore('getCollectionArticles', () =>
      this.store.getCollectionArticles(collectionId)
    );
    return refs
      .map(ref => toSlot(collectionId, ref))
      .sort((a, b) => a.sortorder - b.sortorder || a.articleId - b.articleId);
  }

  /**
   * Find the article published under a url within a collection
   *
   * @throws NotFoundError when the collection or the url is unknown
   */
  async resolveCollectionArticle(clientId: number, collectionId: number, url: string): Promise<CollectionSlot> {
    const slots = await this.listCollectionArticles(clientId, collectionId);
    const slot = slots.find(candidate => candidate.url === url);
    if (!slot) {
      throw new NotFoundError('url', `${collectionId}:${url}`);
    }
    return slot;
  }

  /**
   * Find the slot of an explicit article within a collection
   *
   * @throws NotFoundError when the article is not part of the collection
   */
  async resolveCollectionSlot(clientId: number, collectionId: number, articleId: number): Promise<CollectionSlot> {
    const slots = await this.listCollectionArticles(clientId, collectionId);
    const slot = slots.find(candidate => candidate.articleId === articleId);
    if (!slot) {
      throw new NotFoundError('article', articleId);
    }
    return slot;
  }

  async getMenu(clientId: number, menuId: number): Promise<Menu> {
    const menu = await callStore('getMenu', () => this.store.getMenu(menuId));
    if (!menu || menu.client !== clientId) {
      throw new NotFoundError('menu', menuId);
    }
    return menu;
  }

  /**
   * Navigation entries of a menu, by sortorder then article id.
   *
   * Only articles that are part of the menu's collection are listed; the
   * display name is the menu's override, falling back to the article name.
   */
  async resolveMenu(clientId: number, menuId: number): Promise<MenuEntry[]> {
    const menu = await this.getMenu(clientId, menuId);
    return this.menuEntries(menu);
  }

  /**
   * Menus of a collection with their entries, keyed by menu name
   */
  async listCollectionMenus(clientId: number, collectionId: number): Promise<Record<string, MenuEntry[]>> {
    await this.getCollection(clientId, collectionId);
    const menus = await callStore('getCollectionMenus', () => this.store.getCollectionMenus(collectionId));

    const byName: Record<string, MenuEntry[]> = {};
    for (const menu of menus.filter(candidate => candidate.client === clientId)) {
      byName[menu.name] = await this.menuEntries(menu);
    }
    return byName;
  }

  private async menuEntries(menu: Menu): Promise<MenuEntry[]> {
    const [refs, slots] = await Promise.all([
      callStore('getMenuArticles', () => this.store.getMenuArticles(menu.id)),
      callStore('getCollectionArticles', () => this.store.getCollectionArticles(menu.collection)),
    ]);
    const urls = new Map(slots.map(slot => [slot.article, slot.url]));

    const entries: MenuEntry[] = [];
    for (const ref of refs) {
      if (!urls.has(ref.article)) continue;
      const article = await callStore('getArticle', () => this.store.getArticle(ref.article));
      if (!article) continue;
      entries.push({
        articleId: ref.article,
        displayName: ref.name ?? article.name,
        url: urls.get(ref.article) ?? null,
        sortorder: ref.sortorder,
      });
    }

    return entries.sort((a, b) => a.sortorder - b.sortorder || a.articleId - b.articleId);
  }
}
