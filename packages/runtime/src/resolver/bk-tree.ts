// BK-tree
//
// Metric tree over strings. Every child edge is labelled with its distance
// to the parent, so a search can skip subtrees the triangle inequality
// rules out.

import { levenshtein } from './levenshtein.js';

export type Metric = (a: string, b: string) => number;

export type BkMatch = {
  term: string;
  distance: number;
};

type BkNode = {
  term: string;
  children: Map<number, BkNode>;
};

export class BkTree {
  private root: BkNode | undefined;
  private count = 0;

  constructor(private readonly metric: Metric = levenshtein) {}

  get size(): number {
    return this.count;
  }

  /**
   * Insert a term. Duplicates are ignored.
   *
   * @returns Whether the term was new
   */
  add(term: string): boolean {
    if (!this.root) {
      this.root = { term, children: new Map() };
      this.count = 1;
      return true;
    }

    let node = this.root;
    for (;;) {
      const distance = this.metric(term, node.term);
      if (distance === 0) {
        return false;
      }
      const child = node.children.get(distance);
      if (!child) {
        node.children.set(distance, { term, children: new Map() });
        this.count++;
        return true;
      }
      node = child;
    }
  }

  /**
   * Every term within the radius of the query, closest first.
   */
  search(query: string, radius: number): BkMatch[] {
    const matches: BkMatch[] = [];
    const stack = this.root ? [this.root] : [];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;

      const distance = this.metric(query, node.term);
      if (distance <= radius) {
        matches.push({ term: node.term, distance });
      }

      for (const [edge, child] of node.children) {
        if (edge >= distance - radius && edge <= distance + radius) {
          stack.push(child);
        }
      }
    }

    return matches.sort(
      (a, b) => a.distance - b.distance || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0)
    );
  }

  static from(terms: Iterable<string>, metric?: Metric): BkTree {
    const tree = new BkTree(metric);
    for (const term of terms) {
      tree.add(term);
    }
    return tree;
  }
}
