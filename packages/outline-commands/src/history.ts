/**
 * Clipboard and undo log. Both hold detached subtrees, so later edits of the tree never change
 * what gets pasted or restored.
 */
import {
  ROOT_NODE_ID,
  UnknownIdentityError,
  type NodeId,
  type OutlineTree,
  type Subtree
} from "@sprig/outline-core";

import type { CommandCursor } from "./cursor";

export interface HistoryEntry {
  readonly subtree: Subtree;
  /** Cursor at the moment the bullet was removed. */
  readonly cursor: CommandCursor;
}

export class UndoLog {
  private readonly entries: HistoryEntry[] = [];

  get size(): number {
    return this.entries.length;
  }

  push(entry: HistoryEntry): void {
    this.entries.push(entry);
  }

  pop(): HistoryEntry | null {
    return this.entries.pop() ?? null;
  }
}

export class Clipboard {
  private content: Subtree | null = null;

  get contents(): Subtree | null {
    return this.content;
  }

  get isEmpty(): boolean {
    return this.content === null;
  }

  set(subtree: Subtree): void {
    this.content = subtree;
  }

  clear(): void {
    this.content = null;
  }
}

/**
 * Puts a removed subtree back where it was taken from, using only public tree operations:
 * below its former above sibling while that sibling is live, otherwise as the first child of
 * its former parent. Returns the identity of the restored root, which is now active.
 */
export const restoreSubtree = (tree: OutlineTree, subtree: Subtree): NodeId => {
  const { formerAboveSiblingId, formerParentId } = subtree;
  if (formerAboveSiblingId !== null && tree.hasNode(formerAboveSiblingId)) {
    tree.activate(formerAboveSiblingId);
    return tree.insertSubtree(subtree, "below");
  }

  if (formerParentId !== ROOT_NODE_ID && !tree.hasNode(formerParentId)) {
    throw new UnknownIdentityError(formerParentId);
  }
  const siblings = tree.getChildIds(formerParentId);
  if (siblings.length > 0) {
    tree.activate(siblings[0]);
    return tree.insertSubtree(subtree, "above");
  }

  // Childless parents are never the root: the root always keeps a child.
  tree.activate(formerParentId);
  const restoredId = tree.insertSubtree(subtree, "below");
  tree.indent("first");
  return restoredId;
};
