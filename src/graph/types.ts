/**
 * Shared type definitions describing the in-memory representation of the
 * graphs handed to the HTML exporter. Node and edge records are plain attribute
 * mappings so they can be serialised verbatim into the `vis-network` data sets.
 */

/** Identity of a node. `1` and `"1"` are distinct identities. */
export type NodeId = string | number;

/** Closed set of value kinds accepted inside attribute bags. */
export type AttributeValue =
  | string
  | number
  | boolean
  | AttributeValue[]
  | { [key: string]: AttributeValue };

/** Open attribute bag attached to nodes and edges. */
export type AttributeBag = Record<string, AttributeValue>;

/** Node shape used when the caller does not pick one. */
export const DEFAULT_NODE_SHAPE = "dot";

/** Node record as consumed by `vis-network`. */
export interface NodeRecord extends AttributeBag {
  id: NodeId;
  label: AttributeValue;
  shape: AttributeValue;
}

/** Edge record as consumed by `vis-network`. */
export interface EdgeRecord extends AttributeBag {
  from: NodeId;
  to: NodeId;
}

/** Keys accepted by the bulk node insertion helper. */
export const BULK_NODE_ATTRIBUTE_KEYS = ["size", "value", "title", "x", "y", "label", "color"] as const;

export type BulkNodeAttributeKey = (typeof BULK_NODE_ATTRIBUTE_KEYS)[number];

/** Per-node attribute sequences supplied to {@link GraphRegistry.addNodes}. */
export type BulkNodeAttributes = Partial<Record<BulkNodeAttributeKey, readonly AttributeValue[]>>;

/** Edge tuple accepted by the bulk edge helper; the third slot is the width. */
export type EdgeTuple = readonly [NodeId, NodeId] | readonly [NodeId, NodeId, number];

/** Adjacency view derived from the edge sequence. */
export type AdjacencyList = Map<NodeId, NodeId[]>;
