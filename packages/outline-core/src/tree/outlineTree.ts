/**
 * The outline document. Nodes live in an arena keyed by identity; parent and child links are
 * identities resolved through that arena, never object references. Every public mutation
 * validates its preconditions before it touches the arena, so a thrown error always leaves
 * the tree exactly as it was.
 *
 * Invariants:
 * - exactly one active node, never the root
 * - the root has at least one child
 * - identities are unique
 * - every non-root node appears exactly once in its parent's child list
 */
import {
  CorruptTreeError,
  IdentityCollisionError,
  StructuralLimitError,
  UnknownIdentityError
} from "../errors";
import { createSequentialIdSource, ROOT_NODE_ID, type IdSource, type NodeId } from "../ids";
import type {
  ChildPosition,
  OutlineView,
  SiblingPlacement,
  TraversalOrder
} from "../types";
import { Subtree, type SubtreeNode } from "./subtree";
import { levelOrder, traverse } from "./traversal";

interface NodeRecord {
  readonly id: NodeId;
  parentId: NodeId | null;
  readonly childIds: NodeId[];
  content: string;
}

const subtreeChildren = (node: SubtreeNode): ReadonlyArray<SubtreeNode> => node.children;

export class OutlineTree implements OutlineView {
  readonly rootId: NodeId = ROOT_NODE_ID;

  private readonly nodes = new Map<NodeId, NodeRecord>();
  private readonly idSource: IdSource;
  private active: NodeId;

  constructor(idSource: IdSource = createSequentialIdSource()) {
    this.idSource = idSource;
    this.nodes.set(ROOT_NODE_ID, { id: ROOT_NODE_ID, parentId: null, childIds: [], content: "" });

    const firstId = this.takeFreshId();
    this.nodes.set(firstId, { id: firstId, parentId: ROOT_NODE_ID, childIds: [], content: "" });
    this.requireRecord(ROOT_NODE_ID).childIds.push(firstId);
    this.active = firstId;
  }

  get activeId(): NodeId {
    return this.active;
  }

  /** Number of bullets, root excluded. */
  get size(): number {
    return this.nodes.size - 1;
  }

  hasNode(id: NodeId): boolean {
    return id !== ROOT_NODE_ID && this.nodes.has(id);
  }

  getChildIds(id: NodeId): ReadonlyArray<NodeId> {
    return [...this.requireRecord(id).childIds];
  }

  getParentId(id: NodeId): NodeId | null {
    return this.requireRecord(id).parentId;
  }

  getContent(id: NodeId): string {
    return this.requireRecord(id).content;
  }

  getSiblingId(id: NodeId, placement: SiblingPlacement): NodeId | null {
    const record = this.requireRecord(id);
    if (record.parentId === null) {
      return null;
    }
    const siblings = this.requireRecord(record.parentId).childIds;
    const index = this.indexInParent(record);
    const siblingIndex = placement === "below" ? index + 1 : index - 1;
    return siblingIndex >= 0 && siblingIndex < siblings.length ? siblings[siblingIndex] : null;
  }

  getActiveContent(): string {
    return this.requireRecord(this.active).content;
  }

  setActiveContent(content: string): void {
    this.requireRecord(this.active).content = content;
  }

  activate(id: NodeId): void {
    if (!this.hasNode(id)) {
      throw new UnknownIdentityError(id);
    }
    this.active = id;
  }

  /**
   * Adds an empty bullet right above or below the active one, under the same parent, and
   * makes it active.
   */
  createSibling(placement: SiblingPlacement): NodeId {
    const id = this.takeFreshId();
    this.spliceNextToActive({ id, parentId: null, childIds: [], content: "" }, placement);
    this.active = id;
    return id;
  }

  /**
   * Moves the active bullet under its above sibling, as that sibling's first or last child.
   */
  indent(position: ChildPosition): void {
    const record = this.requireRecord(this.active);
    const parent = this.parentOf(record);
    const index = this.indexInParent(record);
    if (index === 0) {
      throw new StructuralLimitError("no-above-sibling");
    }

    const newParent = this.requireRecord(parent.childIds[index - 1]);
    parent.childIds.splice(index, 1);
    if (position === "first") {
      newParent.childIds.unshift(record.id);
    } else {
      newParent.childIds.push(record.id);
    }
    record.parentId = newParent.id;
  }

  /**
   * Moves the active bullet into its grandparent's child list, directly below its former
   * parent.
   */
  unindent(): void {
    const record = this.requireRecord(this.active);
    const parent = this.parentOf(record);
    if (parent.id === ROOT_NODE_ID) {
      throw new StructuralLimitError("top-level");
    }

    const grandparent = this.parentOf(parent);
    const parentIndex = this.indexInParent(parent);
    parent.childIds.splice(this.indexInParent(record), 1);
    grandparent.childIds.splice(parentIndex + 1, 0, record.id);
    record.parentId = grandparent.id;
  }

  /**
   * Removes the active bullet with all of its descendants and returns the new active id:
   * the sibling below, else the sibling above, else the parent.
   */
  delete(): NodeId {
    const record = this.requireRecord(this.active);
    const parent = this.parentOf(record);
    const index = this.indexInParent(record);

    let successor: NodeId;
    if (index + 1 < parent.childIds.length) {
      successor = parent.childIds[index + 1];
    } else if (index > 0) {
      successor = parent.childIds[index - 1];
    } else if (parent.id !== ROOT_NODE_ID) {
      successor = parent.id;
    } else {
      throw new StructuralLimitError("last-bullet");
    }

    parent.childIds.splice(index, 1);
    // Post-order expands a node before yielding it, so dropping each yielded record is safe.
    for (const id of this.traverse("post-order", record.id)) {
      this.nodes.delete(id);
    }
    this.active = successor;
    return successor;
  }

  /**
   * Deep-copies the active bullet and its descendants along with the anchors needed to put
   * the copy back where it came from.
   */
  getSubtree(): Subtree {
    const record = this.requireRecord(this.active);
    const parent = this.parentOf(record);
    const index = this.indexInParent(record);
    const aboveSiblingId = index > 0 ? parent.childIds[index - 1] : null;
    return new Subtree(this.copyNode(record), parent.id, aboveSiblingId);
  }

  /**
   * Remaps `subtree` to fresh identities, splices its root next to the active bullet and
   * activates it. Returns the new root identity.
   */
  insertSubtree(subtree: Subtree, placement: SiblingPlacement): NodeId {
    const remapped = subtree.remap(this.idSource);
    const incoming = new Set<NodeId>();
    for (const node of remapped.traverse("level")) {
      if (node.id === ROOT_NODE_ID || this.nodes.has(node.id) || incoming.has(node.id)) {
        throw new IdentityCollisionError(node.id);
      }
      incoming.add(node.id);
    }

    const root = remapped.root;
    const rootRecord: NodeRecord = {
      id: root.id,
      parentId: null,
      childIds: root.children.map((child) => child.id),
      content: root.content
    };
    this.spliceNextToActive(rootRecord, placement);

    const parentIds = new Map<NodeId, NodeId>();
    for (const node of levelOrder(root, subtreeChildren)) {
      if (node !== root) {
        const parentId = parentIds.get(node.id);
        if (parentId === undefined) {
          throw new CorruptTreeError(node.id, "has no parent in the inserted subtree");
        }
        this.nodes.set(node.id, {
          id: node.id,
          parentId,
          childIds: node.children.map((child) => child.id),
          content: node.content
        });
      }
      for (const child of node.children) {
        parentIds.set(child.id, node.id);
      }
    }

    this.active = root.id;
    return root.id;
  }

  /**
   * Walks `startId` and its descendants. Each call starts a new pass.
   */
  traverse(order: TraversalOrder, startId: NodeId = ROOT_NODE_ID): Generator<NodeId, void, undefined> {
    this.requireRecord(startId);
    return traverse(startId, order, (id) => this.nodes.get(id)?.childIds ?? []);
  }

  private takeFreshId(): NodeId {
    const id = this.idSource.next();
    if (id === ROOT_NODE_ID || this.nodes.has(id)) {
      throw new IdentityCollisionError(id);
    }
    return id;
  }

  private spliceNextToActive(record: NodeRecord, placement: SiblingPlacement): void {
    const active = this.requireRecord(this.active);
    const parent = this.parentOf(active);
    const index = this.indexInParent(active);
    parent.childIds.splice(placement === "below" ? index + 1 : index, 0, record.id);
    record.parentId = parent.id;
    this.nodes.set(record.id, record);
  }

  private copyNode(record: NodeRecord): SubtreeNode {
    return {
      id: record.id,
      content: record.content,
      children: record.childIds.map((childId) => this.copyNode(this.requireRecord(childId)))
    };
  }

  private requireRecord(id: NodeId): NodeRecord {
    const record = this.nodes.get(id);
    if (!record) {
      throw new UnknownIdentityError(id);
    }
    return record;
  }

  private parentOf(record: NodeRecord): NodeRecord {
    if (record.parentId === null) {
      throw new CorruptTreeError(record.id, "has no parent");
    }
    return this.requireRecord(record.parentId);
  }

  private indexInParent(record: NodeRecord): number {
    const index = this.parentOf(record).childIds.indexOf(record.id);
    if (index === -1) {
      throw new CorruptTreeError(record.id, "is missing from its parent");
    }
    return index;
  }
}

export const createOutlineTree = (idSource?: IdSource): OutlineTree => new OutlineTree(idSource);
