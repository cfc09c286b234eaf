/**
 * Category index: category tag → Application links declaring it
 *
 * Holds non-owning references. The primary index owns every link listed
 * here, so nothing is unreferenced on removal or teardown. Empty tags are
 * deleted.
 */

import type { Link } from "./link.js";

export class CategoryIndex {
  #categories = new Map<string, Set<Link>>();

  add(category: string, link: Link): void {
    let links = this.#categories.get(category);
    if (!links) {
      links = new Set();
      this.#categories.set(category, links);
    }
    links.add(link);
  }

  remove(category: string, link: Link): void {
    const links = this.#categories.get(category);
    if (!links) return;

    links.delete(link);
    if (links.size === 0) {
      this.#categories.delete(category);
    }
  }

  /**
   * Links in a category, in insertion order; empty for an unknown tag
   */
  lookup(category: string): Link[] {
    const links = this.#categories.get(category);
    return links ? [...links] : [];
  }

  has(category: string, link: Link): boolean {
    return this.#categories.get(category)?.has(link) ?? false;
  }

  tags(): string[] {
    return [...this.#categories.keys()];
  }

  get size(): number {
    return this.#categories.size;
  }

  /**
   * Forget every entry without touching link references
   */
  clear(): void {
    this.#categories.clear();
  }
}
