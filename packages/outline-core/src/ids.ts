/**
 * Identifier utilities for the outline tree. Node identities are plain integers handed out by
 * an injected {@link IdSource}; the sentinel root always owns identity 0.
 */
export type NodeId = number;

export const ROOT_NODE_ID: NodeId = 0;

/**
 * Capability that produces identities never returned before by the same source. The tree
 * calls it for every created node and for every node of a pasted subtree.
 */
export interface IdSource {
  next(): NodeId;
}

/**
 * Counts up from `start`. The default skips 0 so generated ids never collide with the root.
 */
export const createSequentialIdSource = (start: NodeId = ROOT_NODE_ID + 1): IdSource => {
  let current = start;
  return {
    next() {
      const id = current;
      current += 1;
      return id;
    }
  };
};

export const isRootNode = (id: NodeId): boolean => id === ROOT_NODE_ID;
