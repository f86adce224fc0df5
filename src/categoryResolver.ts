import type { ProductApi, WooCategory } from './api/wooCommerceClient.js';
import { describeError } from './errors.js';

export interface CategoryResolution {
  ids: number[];
  unresolved: string[];
  usedDefault: boolean;
  error?: string;
}

export interface CategoryResolver {
  resolve(names: readonly string[]): Promise<CategoryResolution>;
}

export interface CategoryNode {
  category: WooCategory;
  depth: number;
  children: CategoryNode[];
}

interface CategoryIndex {
  byId: Map<number, WooCategory>;
  byKey: Map<string, WooCategory[]>;
}

export function categoryKey(value: string): string {
  return value.replace(/&amp;/g, '&').trim().toLowerCase();
}

function buildIndex(categories: readonly WooCategory[]): CategoryIndex {
  const byId = new Map<number, WooCategory>();
  const byKey = new Map<string, WooCategory[]>();
  const add = (key: string, category: WooCategory) => {
    const list = byKey.get(key) ?? [];
    if (!list.includes(category)) {
      list.push(category);
    }
    byKey.set(key, list);
  };
  for (const category of categories) {
    byId.set(category.id, category);
    add(categoryKey(category.name), category);
    add(categoryKey(category.slug), category);
  }
  return { byId, byKey };
}

function matchesChain(index: CategoryIndex, category: WooCategory, ancestors: string[]): boolean {
  let current = category;
  for (let i = ancestors.length - 1; i >= 0; i -= 1) {
    const parent = index.byId.get(current.parent);
    if (!parent) {
      return false;
    }
    const key = ancestors[i];
    if (categoryKey(parent.name) !== key && categoryKey(parent.slug) !== key) {
      return false;
    }
    current = parent;
  }
  return true;
}

function lookup(index: CategoryIndex, name: string): WooCategory | undefined {
  const idMatch = name.trim().match(/^#?(\d+)$/);
  if (idMatch) {
    return index.byId.get(Number.parseInt(idMatch[1], 10));
  }

  const segments = name.split('>').map(categoryKey).filter(Boolean);
  const leaf = segments.pop();
  if (!leaf) {
    return undefined;
  }
  const candidates = index.byKey.get(leaf) ?? [];
  if (segments.length === 0) {
    return candidates.find(category => category.parent === 0) ?? candidates[0];
  }
  return candidates.find(category => matchesChain(index, category, segments));
}

/**
 * Maps category names from the spreadsheet to store category ids. The
 * category list is fetched once; a failed fetch is retried on the next call.
 */
export class WooCategoryResolver implements CategoryResolver {
  private index: Promise<CategoryIndex> | null = null;

  constructor(
    private source: Pick<ProductApi, 'listCategories'>,
    private defaultCategoryId?: number
  ) {}

  async resolve(names: readonly string[]): Promise<CategoryResolution> {
    if (names.length === 0) {
      return this.fallback([]);
    }

    let index: CategoryIndex;
    try {
      index = await this.load();
    } catch (error) {
      this.index = null;
      return this.fallback(names, describeError(error));
    }

    const ids: number[] = [];
    const unresolved: string[] = [];
    for (const name of names) {
      const category = lookup(index, name);
      if (!category) {
        unresolved.push(name);
      } else if (!ids.includes(category.id)) {
        ids.push(category.id);
      }
    }

    if (ids.length === 0) {
      return this.fallback(unresolved);
    }
    return { ids, unresolved, usedDefault: false };
  }

  /** Forces the next resolve to fetch the category list again. */
  refresh(): void {
    this.index = null;
  }

  private load(): Promise<CategoryIndex> {
    if (!this.index) {
      this.index = this.source.listCategories().then(buildIndex);
    }
    return this.index;
  }

  private fallback(unresolved: readonly string[], error?: string): CategoryResolution {
    const usedDefault = this.defaultCategoryId !== undefined;
    return {
      ids: this.defaultCategoryId !== undefined ? [this.defaultCategoryId] : [],
      unresolved: [...unresolved],
      usedDefault,
      error
    };
  }
}

export function buildCategoryTree(categories: readonly WooCategory[]): CategoryNode[] {
  const known = new Set(categories.map(category => category.id));
  const build = (parentId: number, depth: number): CategoryNode[] =>
    categories
      .filter(category =>
        parentId === 0 ? category.parent === 0 || !known.has(category.parent) : category.parent === parentId
      )
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(category => ({
        category,
        depth,
        children: build(category.id, depth + 1)
      }));
  return build(0, 0);
}

export function flattenCategoryTree(tree: readonly CategoryNode[]): Array<{ display: string; id: number }> {
  const lines: Array<{ display: string; id: number }> = [];
  const walk = (nodes: readonly CategoryNode[]) => {
    for (const node of nodes) {
      lines.push({
        display: `${'  '.repeat(node.depth)}${node.category.name.replace(/&amp;/g, '&')} (ID: ${node.category.id})`,
        id: node.category.id
      });
      walk(node.children);
    }
  };
  walk(tree);
  return lines;
}
