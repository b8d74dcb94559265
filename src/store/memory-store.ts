import type {
  Article,
  ArticleAtomRef,
  Atom,
  AtomType,
  Collection,
  CollectionArticleRef,
  Menu,
  MenuArticleRef,
  Variable,
  VariableMap,
} from '../types.js';
import { embeddedAtomIds } from '../template.js';
import type { ContentStore } from './types.js';

/**
 * Plain-data form of a content graph, as loaded from content files
 */
export interface ContentSnapshot {
  types: AtomType[];
  atoms: Atom[];
  articles: Array<Article & { atoms: ArticleAtomRef[] }>;
  collections: Array<Collection & { articles: CollectionArticleRef[] }>;
  menus: Array<Menu & { articles: MenuArticleRef[] }>;
  variables: Variable[];
}

/**
 * Version tokens are millisecond timestamps. An edit always moves a token
 * forward, even when the clock has not advanced since the previous edit.
 */
export function nextVersion(previous: number): number {
  return Math.max(previous + 1, Date.now());
}

/**
 * In-process content store.
 *
 * Holds the whole graph in maps keyed by id. Association records
 * (article → atoms, collection → articles, menu → articles) are stored per
 * parent, so sharing an atom or article between parents is just another
 * reference. Edit helpers bump version tokens the way the database's
 * last-modified columns would.
 */
export class MemoryStore implements ContentStore {
  private readonly types = new Map<number, AtomType>();
  private readonly atoms = new Map<number, Atom>();
  private readonly articles = new Map<number, Article>();
  private readonly articleAtoms = new Map<number, ArticleAtomRef[]>();
  private readonly collections = new Map<number, Collection>();
  private readonly collectionArticles = new Map<number, CollectionArticleRef[]>();
  private readonly menus = new Map<number, Menu>();
  private readonly menuArticles = new Map<number, MenuArticleRef[]>();
  private readonly variables = new Map<number, Map<string, Variable>>();
  private readonly variableClock = new Map<number, number>();

  constructor(snapshot?: Partial<ContentSnapshot>) {
    if (snapshot) {
      this.load(snapshot);
    }
  }

  load(snapshot: Partial<ContentSnapshot>): void {
    for (const type of snapshot.types ?? []) {
      this.types.set(type.id, { ...type });
    }
    for (const atom of snapshot.atoms ?? []) {
      this.atoms.set(atom.id, { ...atom });
    }
    for (const { atoms, ...article } of snapshot.articles ?? []) {
      this.articles.set(article.id, article);
      this.articleAtoms.set(article.id, atoms.map(ref => ({ ...ref })));
    }
    for (const { articles, ...collection } of snapshot.collections ?? []) {
      this.collections.set(collection.id, collection);
      this.collectionArticles.set(collection.id, articles.map(ref => ({ ...ref })));
    }
    for (const { articles, ...menu } of snapshot.menus ?? []) {
      this.menus.set(menu.id, menu);
      this.menuArticles.set(menu.id, articles.map(ref => ({ ...ref })));
    }
    for (const variable of snapshot.variables ?? []) {
      this.clientVariables(variable.client).set(variable.tag, { ...variable });
    }
  }

  snapshot(): ContentSnapshot {
    return {
      types: [...this.types.values()].map(type => ({ ...type })),
      atoms: [...this.atoms.values()].map(atom => ({ ...atom })),
      articles: [...this.articles.values()].map(article => ({
        ...article,
        atoms: (this.articleAtoms.get(article.id) ?? []).map(ref => ({ ...ref })),
      })),
      collections: [...this.collections.values()].map(collection => ({
        ...collection,
        articles: (this.collectionArticles.get(collection.id) ?? []).map(ref => ({ ...ref })),
      })),
      menus: [...this.menus.values()].map(menu => ({
        ...menu,
        articles: (this.menuArticles.get(menu.id) ?? []).map(ref => ({ ...ref })),
      })),
      variables: [...this.variables.values()].flatMap(byTag => [...byTag.values()].map(v => ({ ...v }))),
    };
  }

  // ============================================
  // ContentStore
  // ============================================

  async getArticle(articleId: number): Promise<Article | undefined> {
    const article = this.articles.get(articleId);
    return article ? { ...article } : undefined;
  }

  async getArticleAtoms(articleId: number): Promise<ArticleAtomRef[]> {
    return (this.articleAtoms.get(articleId) ?? []).map(ref => ({ ...ref }));
  }

  async getArticleVersion(articleId: number): Promise<number | undefined> {
    const article = this.articles.get(articleId);
    if (!article) {
      return undefined;
    }
    let version = article.version;
    const seen = new Set<number>();
    for (const ref of this.articleAtoms.get(articleId) ?? []) {
      const atom = this.atoms.get(ref.atom);
      if (!atom) continue;
      version = Math.max(version, this.atomVersion(atom, article.client, seen));
    }
    return version;
  }

  async getAtom(atomId: number): Promise<Atom | undefined> {
    const atom = this.atoms.get(atomId);
    return atom ? { ...atom } : undefined;
  }

  async getClientAtom(atomId: number, clientId: number): Promise<Atom | undefined> {
    const atom = this.clientAtom(atomId, clientId);
    return atom ? { ...atom } : undefined;
  }

  async getType(typeId: number): Promise<AtomType | undefined> {
    const type = this.types.get(typeId);
    return type ? { ...type } : undefined;
  }

  async getCollection(collectionId: number): Promise<Collection | undefined> {
    const collection = this.collections.get(collectionId);
    return collection ? { ...collection } : undefined;
  }

  async getCollectionArticles(collectionId: number): Promise<CollectionArticleRef[]> {
    return (this.collectionArticles.get(collectionId) ?? []).map(ref => ({ ...ref }));
  }

  async getCollectionMenus(collectionId: number): Promise<Menu[]> {
    return [...this.menus.values()]
      .filter(menu => menu.collection === collectionId)
      .map(menu => ({ ...menu }));
  }

  async getMenu(menuId: number): Promise<Menu | undefined> {
    const menu = this.menus.get(menuId);
    return menu ? { ...menu } : undefined;
  }

  async getMenuArticles(menuId: number): Promise<MenuArticleRef[]> {
    return (this.menuArticles.get(menuId) ?? []).map(ref => ({ ...ref }));
  }

  async getGlobalVariables(clientId: number): Promise<VariableMap> {
    const variables: VariableMap = {};
    for (const variable of this.variables.get(clientId)?.values() ?? []) {
      variables[variable.tag] = variable.value;
    }
    return variables;
  }

  async getVariablesVersion(clientId: number): Promise<number> {
    return this.variablesVersion(clientId);
  }

  // ============================================
  // Edit helpers
  // ============================================

  putType(type: AtomType): void {
    this.types.set(type.id, { ...type });
  }

  putAtom(atom: Atom): void {
    this.atoms.set(atom.id, { ...atom });
  }

  /**
   * Replace an atom's content, producing a new version token
   */
  updateAtomContent(atomId: number, content: string): Atom {
    const atom = this.atoms.get(atomId);
    if (!atom) {
      throw new Error(`Cannot update unknown atom ${atomId}`);
    }
    const updated = { ...atom, content, version: nextVersion(atom.version) };
    this.atoms.set(atomId, updated);
    return { ...updated };
  }

  /**
   * Delete an atom. Articles that still reference it get a new version, so
   * their next render reports the dangling reference instead of a cached page.
   * Types whose template embeds it get a new version too.
   */
  removeAtom(atomId: number): void {
    if (!this.atoms.delete(atomId)) return;
    for (const [articleId, refs] of this.articleAtoms) {
      const article = this.articles.get(articleId);
      if (article && refs.some(ref => ref.atom === atomId)) {
        this.articles.set(articleId, { ...article, version: nextVersion(article.version) });
      }
    }
    for (const type of this.types.values()) {
      if (embeddedAtomIds(type.template).includes(atomId)) {
        this.types.set(type.id, { ...type, version: nextVersion(type.version) });
      }
    }
  }

  putArticle(article: Article, atoms: ArticleAtomRef[] = []): void {
    this.articles.set(article.id, { ...article });
    this.articleAtoms.set(article.id, atoms.map(ref => ({ ...ref })));
  }

  /**
   * Place an atom in an article (or move it), bumping the article's version
   */
  placeAtom(articleId: number, atomId: number, sortorder: number): void {
    const article = this.articles.get(articleId);
    if (!article) {
      throw new Error(`Cannot place atom in unknown article ${articleId}`);
    }
    const refs = (this.articleAtoms.get(articleId) ?? []).filter(ref => ref.atom !== atomId);
    refs.push({ atom: atomId, sortorder });
    this.articleAtoms.set(articleId, refs);
    this.articles.set(articleId, { ...article, version: nextVersion(article.version) });
  }

  putCollection(collection: Collection, articles: CollectionArticleRef[] = []): void {
    this.collections.set(collection.id, { ...collection });
    this.collectionArticles.set(collection.id, articles.map(ref => ({ ...ref })));
  }

  putMenu(menu: Menu, articles: MenuArticleRef[] = []): void {
    this.menus.set(menu.id, { ...menu });
    this.menuArticles.set(menu.id, articles.map(ref => ({ ...ref })));
  }

  putVariable(client: number, tag: string, value: string): void {
    const version = nextVersion(this.variablesVersion(client));
    this.clientVariables(client).set(tag, { client, tag, value, version });
    this.variableClock.set(client, version);
  }

  removeVariable(client: number, tag: string): void {
    if (this.clientVariables(client).delete(tag)) {
      this.variableClock.set(client, nextVersion(this.variablesVersion(client)));
    }
  }

  private clientAtom(atomId: number, client: number): Atom | undefined {
    const atom = this.atoms.get(atomId);
    if (!atom) return undefined;
    for (const [articleId, refs] of this.articleAtoms) {
      if (this.articles.get(articleId)?.client === client && refs.some(ref => ref.atom === atomId)) {
        return atom;
      }
    }
    return undefined;
  }

  private atomVersion(atom: Atom, client: number, seen: Set<number>): number {
    seen.add(atom.id);
    const type = this.types.get(atom.type);
    let version = Math.max(atom.version, type?.version ?? 0);
    for (const id of embeddedAtomIds(type?.template ?? '')) {
      const inner = seen.has(id) ? undefined : this.clientAtom(id, client);
      if (inner) {
        version = Math.max(version, this.atomVersion(inner, client, seen));
      }
    }
    return version;
  }

  private variablesVersion(client: number): number {
    let version = this.variableClock.get(client) ?? 0;
    for (const variable of this.variables.get(client)?.values() ?? []) {
      version = Math.max(version, variable.version);
    }
    return version;
  }

  private clientVariables(client: number): Map<string, Variable> {
    let byTag = this.variables.get(client);
    if (!byTag) {
      byTag = new Map();
      this.variables.set(client, byTag);
    }
    return byTag;
  }
}
