/**
 * Shared type definitions for the outline tree. Records inside the tree are mutable; everything
 * handed to callers is a readonly snapshot so external code cannot bypass the invariants.
 */
import type { NodeId } from "./ids";

export type SiblingPlacement = "above" | "below";

export type ChildPosition = "first" | "last";

export type TraversalOrder = "post-order" | "level";

/**
 * Read-only surface of a document consumed by renderers: enough to walk the structure in
 * document order and read each bullet's text.
 */
export interface OutlineView {
  readonly rootId: NodeId;
  getChildIds(id: NodeId): ReadonlyArray<NodeId>;
  getContent(id: NodeId): string;
}
