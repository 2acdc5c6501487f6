/**
 * Detached subtree values used for copy, cut and undo. A subtree is a deep copy: it shares no
 * state with the tree it came from, and its identities stay foreign until {@link Subtree.remap}
 * assigns fresh ones from the receiving tree's source.
 */
import type { IdSource, NodeId } from "../ids";
import type { TraversalOrder } from "../types";
import { traverse } from "./traversal";

export interface SubtreeNode {
  readonly id: NodeId;
  readonly content: string;
  readonly children: ReadonlyArray<SubtreeNode>;
}

const childrenOf = (node: SubtreeNode): ReadonlyArray<SubtreeNode> => node.children;

export class Subtree {
  /**
   * @param formerParentId - parent of the copied node at extraction time
   * @param formerAboveSiblingId - sibling directly above the copied node, if it had one
   */
  constructor(
    readonly root: SubtreeNode,
    readonly formerParentId: NodeId,
    readonly formerAboveSiblingId: NodeId | null
  ) {}

  traverse(order: TraversalOrder): Generator<SubtreeNode, void, undefined> {
    return traverse(this.root, order, childrenOf);
  }

  /** Identities in level order, outer bullets first. */
  ids(): NodeId[] {
    return Array.from(this.traverse("level"), (node) => node.id);
  }

  get size(): number {
    let count = 0;
    for (const _node of this.traverse("level")) {
      count += 1;
    }
    return count;
  }

  /**
   * Returns a copy with every identity replaced by a fresh one. Identities are drawn in
   * post-order, so a parent always receives a larger id than its descendants when the source
   * counts up. Former parent and sibling anchors are kept as they were.
   */
  remap(idSource: IdSource): Subtree {
    return new Subtree(remapNode(this.root, idSource), this.formerParentId, this.formerAboveSiblingId);
  }
}

const remapNode = (node: SubtreeNode, idSource: IdSource): SubtreeNode => {
  const children = node.children.map((child) => remapNode(child, idSource));
  return { id: idSource.next(), content: node.content, children };
};

export const createSubtreeNode = (
  id: NodeId,
  content: string,
  children: ReadonlyArray<SubtreeNode> = []
): SubtreeNode => ({ id, content, children });
