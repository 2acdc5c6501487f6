import type { OutlineTree } from "./outlineTree";
import type { NodeId } from "../ids";

/**
 * Debug dump of the whole document in document order: one line per node, tab-indented by
 * depth, the root included at depth 0.
 *
 * @example
 * ```
 * 0. 
 * \t1. ACTIVE groceries
 * \t\t2. milk
 * ```
 */
export const formatOutlineTree = (tree: OutlineTree): string => {
  const lines: string[] = [];
  const visit = (id: NodeId, depth: number): void => {
    const marker = id === tree.activeId ? "ACTIVE " : "";
    lines.push(`${"\t".repeat(depth)}${id}. ${marker}${tree.getContent(id)}`);
    for (const childId of tree.getChildIds(id)) {
      visit(childId, depth + 1);
    }
  };
  visit(tree.rootId, 0);
  return lines.join("\n");
};
