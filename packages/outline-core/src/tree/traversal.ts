/**
 * Lazy tree walks shared by the live tree and detached subtrees. Each call returns a fresh
 * single-pass generator; children are resolved only when their parent is expanded.
 */
import type { TraversalOrder } from "../types";

export type ChildResolver<T> = (node: T) => ReadonlyArray<T>;

interface PendingEntry<T> {
  readonly node: T;
  readonly expanded: boolean;
}

/**
 * Yields every descendant before the node itself. A node's children are read when the node
 * is expanded, so callers may forget a node as soon as it has been yielded.
 */
export function* postOrder<T>(start: T, getChildren: ChildResolver<T>): Generator<T, void, undefined> {
  const stack: PendingEntry<T>[] = [{ node: start, expanded: false }];
  for (let entry = stack.pop(); entry; entry = stack.pop()) {
    if (entry.expanded) {
      yield entry.node;
      continue;
    }
    stack.push({ node: entry.node, expanded: true });
    const children = getChildren(entry.node);
    for (let index = children.length - 1; index >= 0; index -= 1) {
      stack.push({ node: children[index], expanded: false });
    }
  }
}

/**
 * Breadth-first: all bullets of one depth, in document order, before any deeper bullet.
 */
export function* levelOrder<T>(start: T, getChildren: ChildResolver<T>): Generator<T, void, undefined> {
  const queue: T[] = [start];
  for (let head = 0; head < queue.length; head += 1) {
    const node = queue[head];
    yield node;
    queue.push(...getChildren(node));
  }
}

export const traverse = <T>(
  start: T,
  order: TraversalOrder,
  getChildren: ChildResolver<T>
): Generator<T, void, undefined> => {
  return order === "post-order" ? postOrder(start, getChildren) : levelOrder(start, getChildren);
};
