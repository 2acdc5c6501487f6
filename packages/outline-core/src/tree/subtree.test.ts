import { describe, expect, it } from "vitest";

import { createSequentialIdSource } from "../ids";
import { Subtree, createSubtreeNode } from "./subtree";
import { levelOrder, postOrder } from "./traversal";

interface Branch {
  readonly name: string;
  readonly children: readonly Branch[];
}

const branch = (name: string, ...children: Branch[]): Branch => ({ name, children });

const sample = (): Subtree =>
  new Subtree(
    createSubtreeNode(1, "plan", [
      createSubtreeNode(2, "draft", [createSubtreeNode(4, "outline")]),
      createSubtreeNode(3, "review")
    ]),
    0,
    null
  );

describe("generic traversals", () => {
  const tree = branch("a", branch("b", branch("d"), branch("e")), branch("c"));
  const childrenOf = (node: Branch): readonly Branch[] => node.children;

  it("walks children before parents in post-order", () => {
    expect(Array.from(postOrder(tree, childrenOf), (node) => node.name)).toEqual(["d", "e", "b", "c", "a"]);
  });

  it("walks outer levels first in level order", () => {
    expect(Array.from(levelOrder(tree, childrenOf), (node) => node.name)).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("is lazy and stops when the consumer stops", () => {
    const seen: string[] = [];
    for (const node of levelOrder(tree, childrenOf)) {
      seen.push(node.name);
      if (node.name === "b") {
        break;
      }
    }
    expect(seen).toEqual(["a", "b"]);
  });
});

describe("Subtree", () => {
  it("lists identities in level order and counts its nodes", () => {
    const subtree = sample();

    expect(subtree.ids()).toEqual([1, 2, 3, 4]);
    expect(subtree.size).toBe(4);
  });

  it("remaps identities in post-order and keeps its anchors", () => {
    const subtree = new Subtree(sample().root, 7, 5);
    const remapped = subtree.remap(createSequentialIdSource(20));

    expect(remapped.ids()).toEqual([23, 21, 22, 20]);
    expect(remapped.root.content).toBe("plan");
    expect(remapped.formerParentId).toBe(7);
    expect(remapped.formerAboveSiblingId).toBe(5);
    expect(subtree.ids()).toEqual([1, 2, 3, 4]);
  });

  it("never hands out the same identity twice across remaps", () => {
    const source = createSequentialIdSource(10);
    const subtree = sample();
    const first = subtree.remap(source).ids();
    const second = subtree.remap(source).ids();
    const original = subtree.ids();

    const all = [...original, ...first, ...second];
    expect(new Set(all).size).toBe(all.length);
  });
});
