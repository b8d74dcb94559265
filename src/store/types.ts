import type {
  Article,
  ArticleAtomRef,
  Atom,
  AtomType,
  Collection,
  CollectionArticleRef,
  Menu,
  MenuArticleRef,
  VariableMap,
} from '../types.js';

/**
 * Read-only view of the content graph.
 *
 * The engine never writes through this interface. Lookups of a single entity
 * resolve to `undefined` when it does not exist; the engine decides whether
 * that means NotFound or an integrity problem. Any rejection is reported to
 * callers as StoreUnavailableError.
 */
export interface ContentStore {
  getArticle(articleId: number): Promise<Article | undefined>;

  /** Atom references of an article, in no particular order */
  getArticleAtoms(articleId: number): Promise<ArticleAtomRef[]>;

  /**
   * Version token of an article's composed content: the max of the article's
   * own version and the versions of its atoms and their types, including
   * atoms embedded by those types' templates.
   * Resolves to `undefined` for an unknown article.
   */
  getArticleVersion(articleId: number): Promise<number | undefined>;

  getAtom(atomId: number): Promise<Atom | undefined>;

  /** An atom, if some article of the client places it */
  getClientAtom(atomId: number, clientId: number): Promise<Atom | undefined>;

  getType(typeId: number): Promise<AtomType | undefined>;

  getCollection(collectionId: number): Promise<Collection | undefined>;

  getCollectionArticles(collectionId: number): Promise<CollectionArticleRef[]>;

  getCollectionMenus(collectionId: number): Promise<Menu[]>;

  getMenu(menuId: number): Promise<Menu | undefined>;

  getMenuArticles(menuId: number): Promise<MenuArticleRef[]>;

  getGlobalVariables(clientId: number): Promise<VariableMap>;

  /** Latest version among a client's global variables (0 when it has none) */
  getVariablesVersion(clientId: number): Promise<number>;
}
