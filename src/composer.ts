import { callStore, IntegrityError, NotFoundError } from './errors.js';
import type { ContentStore } from './store/types.js';
import { embeddedAtomIds, renderAtom, TemplateSyntaxError, UNKNOWN_ATOM } from './template.js';
import type { ArticleAtomRef, Atom, AtomType, ComposedArticle, Fragment } from './types.js';

export interface ComposeOptions {
  /** Emit each atom's stored content without applying its type template */
  raw?: boolean;
}

/**
 * Order atom references by sortorder, breaking ties by atom id
 */
export function orderAtomRefs(refs: ArticleAtomRef[]): ArticleAtomRef[] {
  return [...refs].sort((a, b) => a.sortorder - b.sortorder || a.atom - b.atom);
}

interface RenderContext {
  clientId: number;
  types: Map<number, AtomType>;
  /** Atoms being rendered on the way down to this one */
  trail: number[];
}

interface RenderedFragment {
  content: string;
  version: number;
}

/**
 * Composition Resolver
 *
 * Builds an article's content from its atoms, in order, on every call.
 * Nothing is cached here: the render cache one layer up keys on the version
 * token this returns, so any content change shows up as a new key.
 */
export class Composer {
  constructor(private readonly store: ContentStore) {}

  /**
   * Compose an article
   *
   * @throws NotFoundError when the article does not exist
   * @throws IntegrityError when a referenced atom or its type is missing, or
   * a type template does not parse
   */
  async compose(articleId: number, options: ComposeOptions = {}): Promise<ComposedArticle> {
    const article = await callStore('getArticle', () => this.store.getArticle(articleId));
    if (!article) {
      throw new NotFoundError('article', articleId);
    }

    const refs = orderAtomRefs(
      await callStore('getArticleAtoms', () => this.store.getArticleAtoms(articleId))
    );

    const types = new Map<number, AtomType>();
    const fragments: Fragment[] = [];
    let version = article.version;

    for (const ref of refs) {
      const atom = await callStore('getAtom', () => this.store.getAtom(ref.atom));
      if (!atom) {
        throw new IntegrityError(
          `Article ${articleId} references missing atom ${ref.atom}`,
          { entity: 'article', id: articleId },
          { entity: 'atom', id: ref.atom }
        );
      }

      const type = await this.loadType(atom, types);
      const rendered = options.raw
        ? { content: atom.content, version: Math.max(atom.version, type.version) }
        : await this.renderFragment(atom, type, { clientId: article.client, types, trail: [atom.id] });

      fragments.push({
        atomId: atom.id,
        key: atom.key,
        typeName: type.name,
        sortorder: ref.sortorder,
        content: rendered.content,
      });
      version = Math.max(version, rendered.version);
    }

    return {
      article: { id: article.id, name: article.name },
      fragments,
      content: fragments.map(fragment => fragment.content).join(''),
      version,
    };
  }

  private async loadType(atom: Atom, types: Map<number, AtomType>): Promise<AtomType> {
    const cached = types.get(atom.type);
    if (cached) {
      return cached;
    }
    const type = await callStore('getType', () => this.store.getType(atom.type));
    if (!type) {
      throw new IntegrityError(
        `Atom ${atom.id} has missing type ${atom.type}`,
        { entity: 'atom', id: atom.id },
        { entity: 'type', id: atom.type }
      );
    }
    types.set(atom.type, type);
    return type;
  }

  /**
   * Render one atom, first rendering the atoms its template embeds.
   * An embedded atom that is missing, belongs to another client or is already
   * being rendered further up shows as UNKNOWN_ATOM.
   */
  private async renderFragment(atom: Atom, type: AtomType, context: RenderContext): Promise<RenderedFragment> {
    const embedded = new Map<number, string>();
    let version = Math.max(atom.version, type.version);

    for (const id of embeddedAtomIds(type.template)) {
      const inner = context.trail.includes(id)
        ? undefined
        : await callStore('getClientAtom', () => this.store.getClientAtom(id, context.clientId));
      if (!inner) {
        embedded.set(id, UNKNOWN_ATOM);
        continue;
      }
      const innerType = await this.loadType(inner, context.types);
      const rendered = await this.renderFragment(inner, innerType, {
        ...context,
        trail: [...context.trail, inner.id],
      });
      embedded.set(id, rendered.content);
      version = Math.max(version, rendered.version);
    }

    try {
      return { content: renderAtom(atom, type, embedded), version };
    } catch (error) {
      if (error instanceof TemplateSyntaxError) {
        throw new IntegrityError(
          `Atom ${atom.id} cannot be rendered: template of type ${type.id} is invalid (${error.message})`,
          { entity: 'atom', id: atom.id },
          { entity: 'type', id: atom.type }
        );
      }
      throw error;
    }
  }
}
