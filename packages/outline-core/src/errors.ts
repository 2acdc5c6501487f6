import type { NodeId } from "./ids";

export type OutlineErrorKind = "structural-limit" | "unknown-identity" | "identity-collision";

export class OutlineError extends Error {
  readonly kind: OutlineErrorKind;

  constructor(kind: OutlineErrorKind, message: string) {
    super(message);
    this.name = "OutlineError";
    this.kind = kind;
  }
}

export type StructuralLimitReason = "no-above-sibling" | "top-level" | "last-bullet";

const STRUCTURAL_LIMIT_MESSAGES: Record<StructuralLimitReason, string> = {
  "no-above-sibling": "already at max indentation level",
  "top-level": "cannot unindent further",
  "last-bullet": "cannot delete the last bullet"
};

/**
 * Raised when a structural edit would break a tree invariant. The tree is left untouched.
 */
export class StructuralLimitError extends OutlineError {
  readonly reason: StructuralLimitReason;

  constructor(reason: StructuralLimitReason) {
    super("structural-limit", STRUCTURAL_LIMIT_MESSAGES[reason]);
    this.name = "StructuralLimitError";
    this.reason = reason;
  }
}

export class UnknownIdentityError extends OutlineError {
  readonly nodeId: NodeId;

  constructor(nodeId: NodeId) {
    super("unknown-identity", `Node ${nodeId} not found`);
    this.name = "UnknownIdentityError";
    this.nodeId = nodeId;
  }
}

/**
 * The injected id source handed out an identity that is already registered. Only a broken
 * source can trigger this; the tree refuses the mutation before changing anything.
 */
export class IdentityCollisionError extends OutlineError {
  readonly nodeId: NodeId;

  constructor(nodeId: NodeId) {
    super("identity-collision", `Identity ${nodeId} is already in use`);
    this.name = "IdentityCollisionError";
    this.nodeId = nodeId;
  }
}

/**
 * The arena no longer matches its own links. Not an {@link OutlineError}: no caller input can
 * produce it, so command layers treat it as a bug.
 */
export class CorruptTreeError extends Error {
  readonly nodeId: NodeId;

  constructor(nodeId: NodeId, detail: string) {
    super(`Node ${nodeId} ${detail}`);
    this.name = "CorruptTreeError";
    this.nodeId = nodeId;
  }
}

export const isOutlineError = (error: unknown): error is OutlineError => error instanceof OutlineError;
