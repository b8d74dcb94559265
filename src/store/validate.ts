import { embeddedAtomIds, parseTemplate, TemplateSyntaxError, UNKNOWN_ATOM } from '../template.js';
import type { EntityKind } from '../errors.js';
import type { ContentSnapshot } from './memory-store.js';

export type IssueSeverity = 'error' | 'warning';

export interface ValidationIssue {
  severity: IssueSeverity;
  entity: EntityKind;
  id: number;
  message: string;
}

export interface ValidationReport {
  valid: boolean;
  issues: ValidationIssue[];
  counts: Record<'types' | 'atoms' | 'articles' | 'collections' | 'menus' | 'variables', number>;
}

function duplicates<T>(items: T[]): T[] {
  const seen = new Set<T>();
  const repeated = new Set<T>();
  for (const item of items) {
    if (seen.has(item)) repeated.add(item);
    seen.add(item);
  }
  return [...repeated];
}

/**
 * Check a content graph for problems a render would hit.
 *
 * Errors are references a render cannot resolve (missing atoms, types and
 * articles, broken templates, clashing urls). Warnings are orderings that
 * fall back to the id tie-break and menu entries that will be left out.
 */
export function validateSnapshot(snapshot: ContentSnapshot): ValidationReport {
  const issues: ValidationIssue[] = [];
  const error = (entity: EntityKind, id: number, message: string) =>
    issues.push({ severity: 'error', entity, id, message });
  const warning = (entity: EntityKind, id: number, message: string) =>
    issues.push({ severity: 'warning', entity, id, message });

  const typeIds = new Set(snapshot.types.map(type => type.id));
  const atomIds = new Set(snapshot.atoms.map(atom => atom.id));
  const articles = new Map(snapshot.articles.map(article => [article.id, article]));
  const collections = new Map(snapshot.collections.map(collection => [collection.id, collection]));

  for (const type of snapshot.types) {
    try {
      parseTemplate(type.template);
    } catch (caught) {
      if (!(caught instanceof TemplateSyntaxError)) throw caught;
      error('type', type.id, `Template of type "${type.name}" does not parse: ${caught.message}`);
    }
    for (const id of embeddedAtomIds(type.template)) {
      if (!atomIds.has(id)) {
        warning('type', type.id, `Template of type "${type.name}" embeds missing atom ${id}; it renders as ${UNKNOWN_ATOM}`);
      }
    }
  }

  for (const atom of snapshot.atoms) {
    if (!typeIds.has(atom.type)) {
      error('atom', atom.id, `Atom references missing type ${atom.type}`);
    }
  }

  for (const article of snapshot.articles) {
    for (const ref of article.atoms) {
      if (!atomIds.has(ref.atom)) {
        error('article', article.id, `Article references missing atom ${ref.atom}`);
      }
    }
    for (const sortorder of duplicates(article.atoms.map(ref => ref.sortorder))) {
      warning('article', article.id, `Several atoms share sortorder ${sortorder}; they are ordered by atom id`);
    }
  }

  for (const collection of snapshot.collections) {
    for (const ref of collection.articles) {
      const article = articles.get(ref.article);
      if (!article) {
        error('collection', collection.id, `Collection references missing article ${ref.article}`);
      } else if (article.client !== collection.client) {
        error('collection', collection.id, `Article ${ref.article} belongs to client ${article.client}, not ${collection.client}`);
      }
    }
    const urls = collection.articles.flatMap(ref => (ref.url === null ? [] : [ref.url]));
    for (const url of duplicates(urls)) {
      error('collection', collection.id, `Several articles are published under url ${url}`);
    }
  }

  for (const menu of snapshot.menus) {
    const collection = collections.get(menu.collection);
    if (!collection) {
      error('menu', menu.id, `Menu references missing collection ${menu.collection}`);
      continue;
    }
    if (collection.client !== menu.client) {
      error('menu', menu.id, `Collection ${collection.id} belongs to client ${collection.client}, not ${menu.client}`);
    }
    const inCollection = new Set(collection.articles.map(ref => ref.article));
    for (const ref of menu.articles) {
      if (!inCollection.has(ref.article)) {
        warning('menu', menu.id, `Article ${ref.article} is not part of collection ${collection.id} and will not be listed`);
      }
    }
  }

  return {
    valid: issues.every(issue => issue.severity !== 'error'),
    issues,
    counts: {
      types: snapshot.types.length,
      atoms: snapshot.atoms.length,
      articles: snapshot.articles.length,
      collections: snapshot.collections.length,
      menus: snapshot.menus.length,
      variables: snapshot.variables.length,
    },
  };
}
