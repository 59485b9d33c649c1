import { isDeepStrictEqual } from "node:util";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { assertNodeId, parseAttributeBag, parseAttributeValue } from "./attributes.js";
import {
  DuplicateIdentityError,
  InvalidAttributeKeyError,
  LengthMismatchError,
  NodeNotFoundError,
  UnknownEndpointError,
} from "./errors.js";
import type { ExternalGraphSource } from "./source.js";
import { omitKeys } from "../utils/object.js";
import {
  BULK_NODE_ATTRIBUTE_KEYS,
  DEFAULT_NODE_SHAPE,
  type AdjacencyList,
  type AttributeBag,
  type AttributeValue,
  type BulkNodeAttributeKey,
  type BulkNodeAttributes,
  type EdgeRecord,
  type EdgeTuple,
  type NodeId,
  type NodeRecord,
} from "./types.js";

/** Options accepted when constructing a {@link GraphRegistry}. */
export interface GraphRegistryOptions {
  /** Directed registries only record `source -> target` adjacency and draw arrows. */
  directed?: boolean;
  /** When true, edges referencing unknown nodes create bare endpoints instead of failing. */
  autoCreateEndpoints?: boolean;
}

/** Counters returned after an import. */
export interface GraphImportSummary {
  nodesAdded: number;
  edgesAdded: number;
}

/** Options tweaking {@link GraphRegistry.annotateNeighbors}. */
export interface NeighborAnnotationOptions {
  /** Store the neighbour count in the `value` attribute (default: true). */
  includeValue?: boolean;
  /** Separator placed between neighbour labels (default: `<br>`). */
  separator?: string;
}

const BULK_KEYS: ReadonlySet<string> = new Set(BULK_NODE_ATTRIBUTE_KEYS);

function isBulkKey(key: string): key is BulkNodeAttributeKey {
  return BULK_KEYS.has(key);
}

function cloneNode(record: NodeRecord): NodeRecord {
  return structuredClone(record);
}

function cloneEdge(record: EdgeRecord): EdgeRecord {
  return structuredClone(record);
}

/**
 * Staging area shared by every mutation. Records are accumulated here and only
 * appended to the registry once the whole operation validated, so a failure
 * never leaves a partially applied batch behind.
 */
class PendingBatch {
  readonly nodes: NodeRecord[] = [];
  readonly edges: EdgeRecord[] = [];
  private readonly staged = new Map<NodeId, NodeRecord>();

  constructor(private readonly committed: ReadonlyMap<NodeId, NodeRecord>) {}

  has(id: NodeId): boolean {
    return this.committed.has(id) || this.staged.has(id);
  }

  stagedNode(id: NodeId): NodeRecord | undefined {
    return this.staged.get(id);
  }

  stageNode(record: NodeRecord): void {
    this.staged.set(record.id, record);
    this.nodes.push(record);
  }

  stageEdge(record: EdgeRecord): void {
    this.edges.push(record);
  }
}

/**
 * In-memory registry of the nodes and edges declared by the caller. Insertion
 * order is preserved because it drives the rendering order of the exported
 * document. Registries are independent values: nothing is shared between
 * instances.
 */
export class GraphRegistry {
  readonly directed: boolean;
  readonly autoCreateEndpoints: boolean;
  private readonly nodes: NodeRecord[] = [];
  private readonly edges: EdgeRecord[] = [];
  private readonly index = new Map<NodeId, NodeRecord>();

  constructor(options: GraphRegistryOptions = {}) {
    this.directed = options.directed ?? false;
    this.autoCreateEndpoints = options.autoCreateEndpoints ?? false;
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  hasNode(id: NodeId): boolean {
    return this.index.has(id);
  }

  /**
   * Inserts one node. Missing `label` defaults to the stringified id and
   * missing `shape` to `"dot"`.
   */
  addNode(id: NodeId, attributes: AttributeBag = {}): NodeRecord {
    const batch = this.openBatch();
    const record = this.stageNode(batch, id, attributes);
    this.commit(batch);
    return cloneNode(record);
  }

  /**
   * Bulk form of {@link addNode}. A plain string is iterated character by
   * character, so `addNodes("abc")` declares three nodes. Attribute sequences
   * are restricted to {@link BULK_NODE_ATTRIBUTE_KEYS} and must match the id
   * count. The batch is all-or-nothing. An id repeated inside the batch
   * resolves to its first occurrence, so `addNodes("hello")` returns five
   * records for four nodes; a repeat whose bulk values differ from the first
   * occurrence's fails with {@link DuplicateIdentityError}.
   */
  addNodes(ids: Iterable<NodeId>, attributes: BulkNodeAttributes = {}): NodeRecord[] {
    const list: NodeId[] = Array.from(ids);
    list.forEach((id, position) => assertNodeId(id, `ids[${position}]`));

    const columns: Array<[BulkNodeAttributeKey, readonly AttributeValue[]]> = [];
    for (const [key, values] of Object.entries(attributes)) {
      if (!isBulkKey(key)) {
        throw new InvalidAttributeKeyError(key, BULK_NODE_ATTRIBUTE_KEYS);
      }
      if (values === undefined) {
        continue;
      }
      if (values.length !== list.length) {
        throw new LengthMismatchError(key, list.length, values.length);
      }
      columns.push([key, values]);
    }

    const batch = this.openBatch();
    const results: NodeRecord[] = [];
    const firstPositions = new Map<NodeId, number>();
    list.forEach((id, position) => {
      const repeated = batch.stagedNode(id);
      const first = firstPositions.get(id);
      if (repeated && first !== undefined) {
        if (columns.some(([, values]) => !isDeepStrictEqual(values[position], values[first]))) {
          throw new DuplicateIdentityError(id);
        }
        results.push(repeated);
        return;
      }
      firstPositions.set(id, position);
      const bag: AttributeBag = {};
      for (const [key, values] of columns) {
        bag[key] = parseAttributeValue(values[position], `${key}[${position}]`);
      }
      results.push(this.stageNode(batch, id, bag));
    });
    this.commit(batch);
    return results.map(cloneNode);
  }

  /** Exact-match lookup. Throws {@link NodeNotFoundError} on a miss. */
  getNode(id: NodeId): NodeRecord {
    const record = this.index.get(id);
    if (!record) {
      throw new NodeNotFoundError(id);
    }
    return cloneNode(record);
  }

  /** Non-throwing variant of {@link getNode}. */
  findNode(id: NodeId): NodeRecord | undefined {
    const record = this.index.get(id);
    return record ? cloneNode(record) : undefined;
  }

  /**
   * Inserts one edge. Parallel edges are kept. Unknown endpoints fail with
   * {@link UnknownEndpointError} unless the registry auto-creates them.
   */
  addEdge(source: NodeId, target: NodeId, attributes: AttributeBag = {}): EdgeRecord {
    const batch = this.openBatch();
    const record = this.stageEdge(batch, source, target, attributes);
    this.commit(batch);
    return cloneEdge(record);
  }

  /** Bulk edges; a third tuple element is stored as the edge `width`. */
  addEdges(tuples: Iterable<EdgeTuple>): EdgeRecord[] {
    const batch = this.openBatch();
    const results: EdgeRecord[] = [];
    for (const tuple of tuples) {
      const attributes: AttributeBag = tuple.length === 3 ? { width: tuple[2] } : {};
      results.push(this.stageEdge(batch, tuple[0], tuple[1], attributes));
    }
    this.commit(batch);
    return results.map(cloneEdge);
  }

  listNodes(): NodeRecord[] {
    return this.nodes.map(cloneNode);
  }

  listEdges(): EdgeRecord[] {
    return this.edges.map(cloneEdge);
  }

  listNodeIds(): NodeId[] {
    return this.nodes.map((node) => node.id);
  }

  /**
   * Derives the adjacency list. Every node gets a row (in node insertion
   * order) listing its neighbours in edge insertion order without repetition.
   * Undirected registries record both directions.
   */
  getAdjacencyList(): AdjacencyList {
    const rows = new Map<NodeId, Set<NodeId>>();
    for (const node of this.nodes) {
      rows.set(node.id, new Set());
    }
    for (const edge of this.edges) {
      rows.get(edge.from)?.add(edge.to);
      if (!this.directed) {
        rows.get(edge.to)?.add(edge.from);
      }
    }
    const adjacency: AdjacencyList = new Map();
    for (const [id, neighbours] of rows) {
      adjacency.set(id, Array.from(neighbours));
    }
    return adjacency;
  }

  /** Adjacency row of a single node. */
  neighbors(id: NodeId): NodeId[] {
    if (!this.index.has(id)) {
      throw new NodeNotFoundError(id);
    }
    return this.getAdjacencyList().get(id) ?? [];
  }

  /**
   * Ingests an external graph. Nodes are staged first (imported nodes without
   * a `title` receive their stringified id), then edges. Attributes are copied
   * verbatim, including keys the exporter does not know about.
   */
  importGraph(source: ExternalGraphSource): GraphImportSummary {
    const batch = this.openBatch();
    for (const [id, attributes] of source.nodes()) {
      const bag = parseAttributeBag(attributes, `nodes[${String(id)}]`);
      if (bag.title === undefined) {
        bag.title = String(id);
      }
      this.stageNode(batch, id, bag);
    }
    for (const [from, to, attributes] of source.edges()) {
      this.stageEdge(batch, from, to, attributes);
    }
    const summary: GraphImportSummary = {
      nodesAdded: batch.nodes.length,
      edgesAdded: batch.edges.length,
    };
    this.commit(batch);
    return summary;
  }

  /**
   * Writes a neighbour summary into each node's `title` and, unless disabled,
   * the neighbour count into `value` so `vis-network` scales busy nodes.
   */
  annotateNeighbors(options: NeighborAnnotationOptions = {}): void {
    const separator = options.separator ?? "<br>";
    const includeValue = options.includeValue ?? true;
    const adjacency = this.getAdjacencyList();
    for (const node of this.nodes) {
      const neighbours = adjacency.get(node.id) ?? [];
      const labels = neighbours.map((id) => String(this.index.get(id)?.label ?? id));
      const prefix = typeof node.title === "string" && node.title.length > 0 ? `${node.title} ` : "";
      node.title = `${prefix}Neighbors:${separator}${labels.join(separator)}`;
      if (includeValue) {
        node.value = neighbours.length;
      }
    }
  }

  private openBatch(): PendingBatch {
    return new PendingBatch(this.index);
  }

  private stageNode(batch: PendingBatch, id: NodeId, attributes: AttributeBag): NodeRecord {
    assertNodeId(id, "id");
    if (batch.has(id)) {
      throw new DuplicateIdentityError(id);
    }
    const bag = parseAttributeBag(attributes, `nodes[${String(id)}]`);
    const record: NodeRecord = {
      ...omitKeys(bag, ["id", "label", "shape"]),
      id,
      label: bag.label ?? String(id),
      shape: bag.shape ?? DEFAULT_NODE_SHAPE,
    };
    batch.stageNode(record);
    return record;
  }

  private stageEdge(batch: PendingBatch, source: NodeId, target: NodeId, attributes: unknown): EdgeRecord {
    assertNodeId(source, "from");
    assertNodeId(target, "to");
    const bag = parseAttributeBag(attributes, `edges[${String(source)}->${String(target)}]`);

    for (const endpoint of source === target ? [source] : [source, target]) {
      if (batch.has(endpoint)) {
        continue;
      }
      if (!this.autoCreateEndpoints) {
        throw new UnknownEndpointError(endpoint, source, target);
      }
      this.stageNode(batch, endpoint, {});
    }

    const record: EdgeRecord = { ...omitKeys(bag, ["from", "to"]), from: source, to: target };
    if (this.directed && record.arrows === undefined) {
      record.arrows = "to";
    }
    batch.stageEdge(record);
    return record;
  }

  private commit(batch: PendingBatch): void {
    for (const node of batch.nodes) {
      this.nodes.push(node);
      this.index.set(node.id, node);
    }
    for (const edge of batch.edges) {
      this.edges.push(edge);
    }
  }
}
