import { describe, expect, it } from "vitest";

import {
  createOutlineTree,
  collectInvariantViolations,
  ROOT_NODE_ID,
  UnknownIdentityError,
  type NodeId,
  type OutlineTree
} from "@sprig/outline-core";

import { commandCursor } from "./cursor";
import { Clipboard, restoreSubtree, UndoLog } from "./history";

interface Shape {
  readonly content: string;
  readonly children: Shape[];
}

const shapeOf = (tree: OutlineTree, id: NodeId = ROOT_NODE_ID): Shape => ({
  content: tree.getContent(id),
  children: tree.getChildIds(id).map((childId) => shapeOf(tree, childId))
});

const flatTree = (...contents: string[]): OutlineTree => {
  const tree = createOutlineTree();
  contents.forEach((content, index) => {
    if (index > 0) {
      tree.createSibling("below");
    }
    tree.setActiveContent(content);
  });
  return tree;
};

/**
 * n1
 * n2
 *     n3
 *     n4
 *         n5
 *     n6
 * n7
 * n8
 *     n9
 *     n10
 */
const labelledDeepTree = (): OutlineTree => {
  const tree = createOutlineTree();
  const steps: Array<() => void> = [
    () => tree.createSibling("below"),
    () => tree.createSibling("below"),
    () => tree.indent("last"),
    () => tree.createSibling("below"),
    () => tree.createSibling("below"),
    () => tree.indent("last"),
    () => tree.createSibling("below"),
    () => tree.unindent(),
    () => tree.createSibling("below"),
    () => tree.unindent(),
    () => tree.createSibling("below"),
    () => tree.createSibling("below"),
    () => tree.indent("last"),
    () => tree.createSibling("below")
  ];
  steps.forEach((step) => step());
  for (let id = 1; id <= 10; id += 1) {
    tree.activate(id);
    tree.setActiveContent(`n${id}`);
  }
  return tree;
};

describe("restoreSubtree", () => {
  it("puts the subtree back below its former above sibling", () => {
    const tree = flatTree("milk", "eggs", "bread");
    tree.activate(2);
    const subtree = tree.getSubtree();
    tree.delete();

    const restoredId = restoreSubtree(tree, subtree);

    expect(restoredId).toBe(4);
    expect(tree.activeId).toBe(4);
    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([1, 4, 3]);
    expect(tree.getContent(4)).toBe("eggs");
  });

  it("restores a former first child above the current first child", () => {
    const tree = createOutlineTree();
    tree.createSibling("below"); // 2
    tree.indent("last");
    tree.createSibling("below"); // 3
    tree.activate(2);
    const subtree = tree.getSubtree();
    tree.delete();

    const restoredId = restoreSubtree(tree, subtree);

    expect(tree.getChildIds(1)).toEqual([restoredId, 3]);
  });

  it("restores the only child of a parent that became childless", () => {
    const tree = createOutlineTree();
    tree.createSibling("below"); // 2
    tree.indent("last");
    const subtree = tree.getSubtree();
    tree.delete();
    expect(tree.getChildIds(1)).toEqual([]);

    const restoredId = restoreSubtree(tree, subtree);

    expect(tree.getChildIds(1)).toEqual([restoredId]);
    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([1]);
    expect(tree.activeId).toBe(restoredId);
  });

  it("falls back to the parent when the above sibling is gone", () => {
    const tree = flatTree("milk", "eggs", "bread");
    tree.activate(2);
    const subtree = tree.getSubtree();
    tree.delete();
    tree.activate(1);
    tree.delete();

    const restoredId = restoreSubtree(tree, subtree);

    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([restoredId, 3]);
  });

  it("refuses when the former parent no longer exists", () => {
    const tree = createOutlineTree();
    tree.createSibling("below"); // 2
    tree.indent("last");
    tree.activate(1);
    tree.createSibling("below"); // 3
    tree.activate(2);
    const subtree = tree.getSubtree();
    tree.delete();
    tree.activate(1);
    tree.delete();

    expect(() => restoreSubtree(tree, subtree)).toThrow(UnknownIdentityError);
    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([3]);
  });

  it("undoes the delete of any bullet", () => {
    for (let id = 1; id <= 10; id += 1) {
      const tree = labelledDeepTree();
      const before = shapeOf(tree);

      tree.activate(id);
      const subtree = tree.getSubtree();
      tree.delete();
      restoreSubtree(tree, subtree);

      expect(shapeOf(tree)).toEqual(before);
      expect(collectInvariantViolations(tree)).toEqual([]);
    }
  });
});

describe("UndoLog", () => {
  it("returns entries last in, first out", () => {
    const tree = flatTree("milk", "eggs");
    const log = new UndoLog();
    const first = { subtree: tree.getSubtree(), cursor: commandCursor({ row: 1, col: 2 }) };
    tree.activate(1);
    const second = { subtree: tree.getSubtree(), cursor: commandCursor({ row: 0, col: 2 }) };

    log.push(first);
    log.push(second);

    expect(log.size).toBe(2);
    expect(log.pop()).toBe(second);
    expect(log.pop()).toBe(first);
    expect(log.pop()).toBeNull();
  });
});

describe("Clipboard", () => {
  it("holds one subtree at a time", () => {
    const tree = flatTree("milk", "eggs");
    const clipboard = new Clipboard();
    expect(clipboard.isEmpty).toBe(true);

    const eggs = tree.getSubtree();
    clipboard.set(eggs);
    tree.activate(1);
    const milk = tree.getSubtree();
    clipboard.set(milk);

    expect(clipboard.contents).toBe(milk);
    clipboard.clear();
    expect(clipboard.contents).toBeNull();
  });
});
