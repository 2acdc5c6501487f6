import { describe, expect, it } from "vitest";

import {
  IdentityCollisionError,
  StructuralLimitError,
  UnknownIdentityError,
  collectInvariantViolations,
  createSequentialIdSource,
  formatOutlineTree,
  OutlineTree,
  ROOT_NODE_ID,
  type IdSource
} from "../index";

const newTree = (): OutlineTree => new OutlineTree(createSequentialIdSource());

/**
 * 1.
 * 2.
 *     3.
 *     4.
 *         5.
 *     6.
 * 7.
 * 8.
 *     9.
 *     10.
 */
const newDeepTree = (): OutlineTree => {
  const tree = newTree();
  tree.createSibling("below"); // 2
  tree.createSibling("below"); // 3
  tree.indent("last");
  tree.createSibling("below"); // 4
  tree.createSibling("below"); // 5
  tree.indent("last");
  tree.createSibling("below"); // 6
  tree.unindent();
  tree.createSibling("below"); // 7
  tree.unindent();
  tree.createSibling("below"); // 8
  tree.createSibling("below"); // 9
  tree.indent("last");
  tree.createSibling("below"); // 10
  return tree;
};

const expectStructuralLimit = (action: () => void, reason: StructuralLimitError["reason"]): void => {
  let caught: unknown = null;
  try {
    action();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(StructuralLimitError);
  expect(caught instanceof StructuralLimitError ? caught.reason : null).toBe(reason);
};

describe("outline tree construction", () => {
  it("starts with a single active bullet under the root", () => {
    const tree = newTree();

    expect(tree.activeId).toBe(1);
    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([1]);
    expect(tree.getParentId(1)).toBe(ROOT_NODE_ID);
    expect(tree.size).toBe(1);
    expect(collectInvariantViolations(tree)).toEqual([]);
  });
});

describe("creating siblings", () => {
  it("inserts below the active bullet in the middle of a child list", () => {
    const tree = newTree();
    tree.createSibling("below"); // 2
    tree.createSibling("below"); // 3
    tree.indent("last"); // 3 under 2
    tree.createSibling("below"); // 4 under 2
    tree.createSibling("below"); // 5 under 2
    tree.activate(4);
    const created = tree.createSibling("below"); // 6 between 4 and 5

    expect(created).toBe(6);
    expect(tree.activeId).toBe(6);
    expect(tree.getChildIds(2)).toEqual([3, 4, 6, 5]);
    expect(tree.getSiblingId(6, "below")).toBe(5);
    expect(tree.getSiblingId(6, "above")).toBe(4);
  });

  it("inserts above the active bullet", () => {
    const tree = newTree();
    tree.createSibling("above"); // 2
    tree.createSibling("above"); // 3
    tree.createSibling("above"); // 4
    tree.activate(1);
    tree.indent("last"); // 1 under 2
    tree.createSibling("above"); // 5
    tree.createSibling("below"); // 6

    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([4, 3, 2]);
    expect(tree.getChildIds(2)).toEqual([5, 6, 1]);
  });
});

describe("indent and unindent", () => {
  it("rejects indenting the first bullet of a list without changing the tree", () => {
    const tree = newTree();
    const before = formatOutlineTree(tree);

    expectStructuralLimit(() => tree.indent("last"), "no-above-sibling");
    expect(formatOutlineTree(tree)).toBe(before);
  });

  it("indents under the above sibling as first or last child", () => {
    const tree = newTree();
    tree.createSibling("below"); // 2
    tree.indent("last");
    tree.activate(1);
    tree.createSibling("below"); // 3, root [1, 3]
    tree.indent("first");

    expect(tree.getChildIds(1)).toEqual([3, 2]);
    expect(tree.getParentId(3)).toBe(1);
    expect(tree.activeId).toBe(3);
  });

  it("unindents back to the original position", () => {
    const tree = newTree();
    tree.createSibling("below"); // 2
    const before = tree.getChildIds(ROOT_NODE_ID);

    tree.activate(2);
    tree.indent("last");
    expect(tree.getChildIds(1)).toEqual([2]);
    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([1]);

    tree.unindent();
    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual(before);
    expect(tree.getParentId(2)).toBe(ROOT_NODE_ID);
    expect(tree.getChildIds(1)).toEqual([]);
  });

  it("places the unindented bullet right after its former parent", () => {
    const tree = newTree();
    tree.createSibling("below"); // 2
    tree.indent("last");
    tree.createSibling("below"); // 3
    tree.createSibling("below"); // 4
    tree.activate(1);
    tree.createSibling("below"); // 5, root [1, 5]

    tree.activate(3);
    tree.unindent();

    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([1, 3, 5]);
    expect(tree.getChildIds(1)).toEqual([2, 4]);
  });

  it("rejects unindenting a top level bullet", () => {
    const tree = newTree();
    tree.createSibling("below");
    const before = formatOutlineTree(tree);

    expectStructuralLimit(() => tree.unindent(), "top-level");
    expect(formatOutlineTree(tree)).toBe(before);
  });
});

describe("activation", () => {
  it("rejects unknown identities and the root", () => {
    const tree = newTree();

    expect(() => tree.activate(99)).toThrow(UnknownIdentityError);
    expect(() => tree.activate(ROOT_NODE_ID)).toThrow(UnknownIdentityError);
    expect(tree.activeId).toBe(1);
  });
});

describe("delete", () => {
  it("prefers the sibling below, then falls back to the parent", () => {
    // root -> [A -> [B, C]]
    const tree = newTree(); // A = 1
    tree.createSibling("below"); // B = 2
    tree.indent("last");
    tree.createSibling("below"); // C = 3

    tree.activate(2);
    expect(tree.delete()).toBe(3);
    expect(tree.activeId).toBe(3);
    expect(tree.getChildIds(1)).toEqual([3]);

    expect(tree.delete()).toBe(1);
    expect(tree.activeId).toBe(1);
    expect(tree.getChildIds(1)).toEqual([]);
  });

  it("uses the sibling above when there is none below", () => {
    const tree = newTree();
    tree.createSibling("below"); // 2
    tree.createSibling("below"); // 3

    expect(tree.delete()).toBe(2);
    expect(tree.hasNode(3)).toBe(false);
    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([1, 2]);
  });

  it("refuses to delete the last bullet", () => {
    const tree = newTree();

    expectStructuralLimit(() => tree.delete(), "last-bullet");
    expect(tree.activeId).toBe(1);
    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([1]);
  });

  it("forgets every identity of the deleted subtree", () => {
    const tree = newTree();
    tree.createSibling("below"); // 2
    tree.createSibling("below"); // 3
    tree.indent("last"); // 3 under 2
    tree.createSibling("below"); // 4 under 2
    tree.createSibling("below"); // 5 under 2
    tree.createSibling("below"); // 6
    tree.indent("last"); // 6 under 5
    tree.createSibling("below"); // 7
    tree.indent("last"); // 7 under 6

    tree.activate(2);
    tree.delete();

    for (const id of [2, 3, 4, 5, 6, 7]) {
      expect(tree.hasNode(id)).toBe(false);
    }
    expect(() => tree.activate(5)).toThrow(UnknownIdentityError);
    expect(tree.activeId).toBe(1);
    expect(tree.size).toBe(1);
    expect(collectInvariantViolations(tree)).toEqual([]);
  });
});

describe("traversal", () => {
  it("visits descendants before their parent in post-order", () => {
    const tree = newDeepTree();

    expect([...tree.traverse("post-order")]).toEqual([1, 3, 5, 4, 6, 2, 7, 9, 10, 8, 0]);
  });

  it("visits outer bullets first in level order", () => {
    const tree = newDeepTree();

    expect([...tree.traverse("level")]).toEqual([0, 1, 2, 7, 8, 3, 4, 6, 9, 10, 5]);
  });

  it("restarts when a new traversal is requested", () => {
    const tree = newDeepTree();
    const first = [...tree.traverse("post-order", 2)];
    const second = [...tree.traverse("post-order", 2)];

    expect(first).toEqual([3, 5, 4, 6, 2]);
    expect(second).toEqual(first);
  });
});

describe("subtrees", () => {
  it("copies the active bullet without touching the tree", () => {
    const tree = newTree();
    tree.createSibling("below"); // 2
    tree.indent("last");
    tree.createSibling("below"); // 3
    tree.createSibling("below"); // 4
    tree.createSibling("below"); // 5
    tree.activate(3);
    tree.indent("last"); // 3 under 2
    tree.activate(1);
    const before = formatOutlineTree(tree);

    const subtree = tree.getSubtree();

    expect(subtree.ids()).toEqual([1, 2, 4, 5, 3]);
    expect(subtree.formerParentId).toBe(ROOT_NODE_ID);
    expect(subtree.formerAboveSiblingId).toBeNull();
    expect(formatOutlineTree(tree)).toBe(before);
  });

  it("records the sibling above the copied bullet", () => {
    const tree = newTree();
    tree.createSibling("below"); // 2

    const subtree = tree.getSubtree();

    expect(subtree.formerAboveSiblingId).toBe(1);
    expect(subtree.formerParentId).toBe(ROOT_NODE_ID);
  });

  it("inserts a foreign subtree with fresh identities", () => {
    const tree = newDeepTree();

    const source = newTree();
    source.createSibling("below"); // 2
    source.indent("last");
    source.createSibling("below"); // 3
    source.createSibling("below"); // 4
    source.createSibling("below"); // 5
    source.activate(1);
    const subtree = source.getSubtree();

    tree.activate(7);
    const rootId = tree.insertSubtree(subtree, "below");

    expect(rootId).toBe(15);
    expect(tree.activeId).toBe(15);
    expect([...tree.traverse("level")]).toEqual([
      0,
      1, 2, 7, 15, 8,
      3, 4, 6, 11, 12, 13, 14, 9, 10,
      5
    ]);
    expect(collectInvariantViolations(tree)).toEqual([]);
  });

  it("pastes a copy of the active bullet next to itself", () => {
    const tree = newTree();
    const subtree = tree.getSubtree();
    tree.insertSubtree(subtree, "below");

    expect([...tree.traverse("level")]).toEqual([0, 1, 2]);
  });

  it("reproduces shape and content when reinserting a copy", () => {
    const tree = newTree();
    tree.setActiveContent("parent");
    tree.createSibling("below"); // 2
    tree.indent("last");
    tree.setActiveContent("first child");
    tree.createSibling("below"); // 3
    tree.setActiveContent("second child");
    tree.activate(1);

    const subtree = tree.getSubtree();
    const copyId = tree.insertSubtree(subtree, "above");

    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([copyId, 1]);
    expect(tree.getContent(copyId)).toBe("parent");
    const copiedChildren = tree.getChildIds(copyId);
    expect(copiedChildren.map((id) => tree.getContent(id))).toEqual(["first child", "second child"]);
    expect(copiedChildren.every((id) => id !== 2 && id !== 3)).toBe(true);
    expect(subtree.root.content).toBe("parent");
    expect(subtree.root.children.map((child) => child.content)).toEqual(["first child", "second child"]);
  });

  it("allows the same clipboard contents to be pasted repeatedly", () => {
    const tree = newTree();
    tree.createSibling("below"); // 2
    tree.indent("last");
    tree.activate(1);
    const clipboard = tree.getSubtree();

    const first = tree.insertSubtree(clipboard, "below");
    const second = tree.insertSubtree(clipboard, "below");

    expect(first).not.toBe(second);
    expect(tree.getChildIds(ROOT_NODE_ID)).toEqual([1, first, second]);
    expect(collectInvariantViolations(tree)).toEqual([]);
  });
});

describe("identity source discipline", () => {
  it("refuses a repeated identity without changing the tree", () => {
    const stuck: IdSource = { next: () => 1 };
    const tree = new OutlineTree(stuck);
    const before = formatOutlineTree(tree);

    expect(() => tree.createSibling("below")).toThrow(IdentityCollisionError);
    expect(formatOutlineTree(tree)).toBe(before);
  });
});

describe("invariant preservation", () => {
  it("holds after every operation of a long mixed edit sequence", () => {
    const tree = newTree();
    let seed = 7;
    const nextRandom = (bound: number): number => {
      seed = (seed * 16807) % 2147483647;
      return seed % bound;
    };

    for (let step = 0; step < 400; step += 1) {
      try {
        switch (nextRandom(8)) {
          case 0:
            tree.createSibling("below");
            break;
          case 1:
            tree.createSibling("above");
            break;
          case 2:
            tree.indent(nextRandom(2) === 0 ? "first" : "last");
            break;
          case 3:
            tree.unindent();
            break;
          case 4:
            tree.delete();
            break;
          case 5:
            if (tree.size < 120) {
              tree.insertSubtree(tree.getSubtree(), nextRandom(2) === 0 ? "above" : "below");
            }
            break;
          default: {
            const ids = [...tree.traverse("level")].filter((id) => id !== ROOT_NODE_ID);
            tree.activate(ids[nextRandom(ids.length)]);
          }
        }
      } catch (error) {
        if (!(error instanceof StructuralLimitError)) {
          throw error;
        }
      }
      expect(collectInvariantViolations(tree)).toEqual([]);
    }
  });
});

describe("formatOutlineTree", () => {
  it("prints one tab-indented line per node with the active marker", () => {
    const tree = newTree();
    tree.setActiveContent("groceries");
    tree.createSibling("below");
    tree.indent("last");
    tree.setActiveContent("milk");

    expect(formatOutlineTree(tree)).toBe("0. \n\t1. groceries\n\t\t2. ACTIVE milk");
  });
});
