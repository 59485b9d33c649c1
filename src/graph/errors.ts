import type { NodeId } from "./types.js";

/** Stable error codes raised by the graph registry and its adapters. */
export const GRAPH_ERROR_CODES = {
  DUPLICATE_ID: "E-GRAPH-DUPLICATE-ID",
  LENGTH_MISMATCH: "E-GRAPH-LENGTH-MISMATCH",
  UNKNOWN_ENDPOINT: "E-GRAPH-UNKNOWN-ENDPOINT",
  NOT_FOUND: "E-GRAPH-NOT-FOUND",
  INVALID_KEY: "E-GRAPH-INVALID-KEY",
  INVALID_ATTRIBUTE: "E-GRAPH-INVALID-ATTRIBUTE",
  INVALID_DOCUMENT: "E-IMPORT-INVALID-DOCUMENT",
} as const;

export type GraphErrorCode = (typeof GRAPH_ERROR_CODES)[keyof typeof GRAPH_ERROR_CODES];

/**
 * Base error used by the registry. Every subclass carries a stable `code`, an
 * operator `hint` and structured `details` describing the offending input.
 */
export class RegistryError extends Error {
  public readonly code: GraphErrorCode;
  public readonly hint?: string;
  public readonly details: Record<string, unknown>;

  constructor(code: GraphErrorCode, message: string, details: Record<string, unknown> = {}, hint?: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.details = details;
    this.hint = hint;
  }
}

/** Raised when a node identity is inserted twice. */
export class DuplicateIdentityError extends RegistryError {
  constructor(readonly nodeId: NodeId) {
    super(
      GRAPH_ERROR_CODES.DUPLICATE_ID,
      `node '${String(nodeId)}' already exists`,
      { nodeId },
      "node identities must be unique within a graph",
    );
    this.name = "DuplicateIdentityError";
  }
}

/** Raised when a bulk attribute sequence does not match the id sequence. */
export class LengthMismatchError extends RegistryError {
  constructor(readonly key: string, readonly expected: number, readonly received: number) {
    super(
      GRAPH_ERROR_CODES.LENGTH_MISMATCH,
      `attribute '${key}' has ${received} values but ${expected} nodes were supplied`,
      { key, expected, received },
      "supply exactly one value per node",
    );
    this.name = "LengthMismatchError";
  }
}

/** Raised when an edge references a node that is not registered. */
export class UnknownEndpointError extends RegistryError {
  constructor(readonly nodeId: NodeId, readonly source: NodeId, readonly target: NodeId) {
    super(
      GRAPH_ERROR_CODES.UNKNOWN_ENDPOINT,
      `edge '${String(source)}' -> '${String(target)}' references unknown node '${String(nodeId)}'`,
      { nodeId, source, target },
      "add the node first or enable autoCreateEndpoints",
    );
    this.name = "UnknownEndpointError";
  }
}

/** Raised when a lookup misses. */
export class NodeNotFoundError extends RegistryError {
  constructor(readonly nodeId: NodeId) {
    super(GRAPH_ERROR_CODES.NOT_FOUND, `node '${String(nodeId)}' not found`, { nodeId });
    this.name = "NodeNotFoundError";
  }
}

/** Raised when a bulk insertion names a key outside the allow-list. */
export class InvalidAttributeKeyError extends RegistryError {
  constructor(readonly key: string, readonly allowed: readonly string[]) {
    super(
      GRAPH_ERROR_CODES.INVALID_KEY,
      `invalid attribute key '${key}'`,
      { key, allowed: [...allowed] },
      `use one of: ${allowed.join(", ")}`,
    );
    this.name = "InvalidAttributeKeyError";
  }
}

/** Raised when an attribute value falls outside the accepted value kinds. */
export class InvalidAttributeError extends RegistryError {
  constructor(readonly path: string, reason: string) {
    super(GRAPH_ERROR_CODES.INVALID_ATTRIBUTE, `invalid attribute at '${path}': ${reason}`, { path });
    this.name = "InvalidAttributeError";
  }
}

/** Raised when a JSON graph document fails schema validation. */
export class InvalidGraphDocumentError extends RegistryError {
  constructor(readonly issues: string[]) {
    super(
      GRAPH_ERROR_CODES.INVALID_DOCUMENT,
      `invalid graph document: ${issues.join("; ")}`,
      { issues },
      "documents need a nodes array of { id } and an edges array of { from, to }",
    );
    this.name = "InvalidGraphDocumentError";
  }
}
