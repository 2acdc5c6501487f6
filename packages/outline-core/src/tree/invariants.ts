/**
 * Structural self-check used by tests and debug builds. Returns a human-readable entry per
 * violated invariant; an empty list means the tree is consistent.
 */
import { ROOT_NODE_ID, type NodeId } from "../ids";
import type { OutlineTree } from "./outlineTree";

export const collectInvariantViolations = (tree: OutlineTree): string[] => {
  const violations: string[] = [];

  if (tree.activeId === ROOT_NODE_ID) {
    violations.push("root is active");
  } else if (!tree.hasNode(tree.activeId)) {
    violations.push(`active node ${tree.activeId} is not registered`);
  }

  if (tree.getChildIds(ROOT_NODE_ID).length === 0) {
    violations.push("root has no children");
  }

  const seen = new Set<NodeId>();
  for (const id of tree.traverse("level")) {
    if (seen.has(id)) {
      violations.push(`identity ${id} appears more than once`);
      continue;
    }
    seen.add(id);

    const parentId = tree.getParentId(id);
    if (id === ROOT_NODE_ID) {
      if (parentId !== null) {
        violations.push("root has a parent");
      }
      continue;
    }
    if (parentId === null) {
      violations.push(`node ${id} has no parent`);
      continue;
    }
    const occurrences = tree.getChildIds(parentId).filter((childId) => childId === id).length;
    if (occurrences !== 1) {
      violations.push(`node ${id} appears ${occurrences} times under ${parentId}`);
    }
  }

  if (seen.size !== tree.size + 1) {
    violations.push(`${tree.size + 1 - seen.size} registered nodes are unreachable from the root`);
  }

  return violations;
};
