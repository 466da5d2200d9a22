/**
 * Groups a flat brush list into the hierarchy implied by the dotted names
 */

import { containerParts } from './brush-name.js';
import type { BrushRecord, TreeItem } from './types.js';

export function createTreeItem<T>(name: string): TreeItem<T> {
  return { name, children: [], values: [] };
}

/**
 * Build a tree whose nodes are container segments and whose values are the
 * brushes ending at each node.
 *
 * Children keep first-seen order and values keep input order, so sorted input
 * produces a lexically ordered tree. Duplicate names are not collapsed.
 */
export function buildBrushTree(brushes: readonly BrushRecord[]): TreeItem<BrushRecord> {
  const root = createTreeItem<BrushRecord>('');

  for (const brush of brushes) {
    let current = root;
    for (const part of containerParts(brush.name)) {
      let child = current.children.find(item => item.name === part);
      if (!child) {
        child = createTreeItem<BrushRecord>(part);
        current.children.push(child);
      }
      current = child;
    }
    current.values.push(brush);
  }

  return root;
}

/**
 * Depth-first visit of every node, parents before children
 */
export function* walkTree<T>(item: TreeItem<T>, path: string[] = []): Generator<{ item: TreeItem<T>; path: string[] }> {
  yield { item, path };
  for (const child of item.children) {
    yield* walkTree(child, [...path, child.name]);
  }
}
