/**
 * Sprig outline-core owns the document tree: identity allocation, structural mutations guarded
 * by the outline invariants, subtree extraction and remapping, and lazy traversals.
 */
export {
  createSequentialIdSource,
  isRootNode,
  ROOT_NODE_ID,
  type IdSource,
  type NodeId
} from "./ids";

export {
  CorruptTreeError,
  IdentityCollisionError,
  OutlineError,
  StructuralLimitError,
  UnknownIdentityError,
  isOutlineError,
  type OutlineErrorKind,
  type StructuralLimitReason
} from "./errors";

export type {
  ChildPosition,
  OutlineView,
  SiblingPlacement,
  TraversalOrder
} from "./types";

export { OutlineTree, createOutlineTree } from "./tree/outlineTree";
export { Subtree, createSubtreeNode, type SubtreeNode } from "./tree/subtree";
export { levelOrder, postOrder, traverse, type ChildResolver } from "./tree/traversal";
export { formatOutlineTree } from "./tree/format";
export { collectInvariantViolations } from "./tree/invariants";
