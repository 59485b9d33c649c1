import { resolveDisplayConfig, type DisplayConfig, type DisplayConfigInput } from "./config/display.js";
import { renderInlineFrame, renderNetworkHtml } from "./export/html.js";
import { writeNetworkHtml } from "./export/writer.js";
import {
  GraphRegistry,
  type GraphImportSummary,
  type NeighborAnnotationOptions,
} from "./graph/registry.js";
import {
  graphDocumentSource,
  isDirectedDot,
  isSerializedGraph,
  parseDotSource,
  parseGraphDocument,
  serializedGraphSource,
  type ExternalGraphSource,
} from "./graph/source.js";
import type {
  AdjacencyList,
  AttributeBag,
  BulkNodeAttributes,
  EdgeRecord,
  EdgeTuple,
  NodeId,
  NodeRecord,
} from "./graph/types.js";
import { createDefaultLogger, type StructuredLogger } from "./logger.js";
import { NetworkOptions, type EdgeSmoothType } from "./options/networkOptions.js";
import type {
  BarnesHutParameters,
  ForceAtlas2BasedParameters,
  HierarchicalRepulsionParameters,
  RepulsionParameters,
} from "./options/physics.js";

/** Construction options of a {@link Network}. */
export interface NetworkInit extends DisplayConfigInput {
  /** Create bare endpoint nodes when an edge references an unknown id. */
  autoCreateEndpoints?: boolean;
  logger?: StructuredLogger;
}

/** Data handed to the templating step. */
export interface NetworkData {
  nodes: NodeRecord[];
  edges: EdgeRecord[];
  height: string;
  width: string;
  options: Record<string, unknown>;
  /** Present when the network renders DOT text instead of its registry. */
  dot?: string;
}

/** Outcome of {@link Network.show}: a written file, or an inline fragment in notebook mode. */
export type ShowResult =
  | { mode: "file"; path: string; bytes: number }
  | { mode: "inline"; html: string };

/**
 * Entry point of the library: accumulates nodes and edges, carries the
 * `vis-network` options and the display configuration, and exports the
 * result as a self-contained HTML document.
 */
export class Network {
  readonly registry: GraphRegistry;
  readonly options = new NetworkOptions();
  readonly display: DisplayConfig;
  private readonly logger: StructuredLogger;
  private dotSource?: string;

  constructor(init: NetworkInit = {}) {
    const { autoCreateEndpoints, logger, ...display } = init;
    this.display = resolveDisplayConfig(display);
    this.registry = new GraphRegistry({ directed: this.display.directed, autoCreateEndpoints });
    this.logger = logger ?? createDefaultLogger();
    if (this.display.layout === "hierarchical") {
      this.options.setHierarchicalLayout(true);
    }
  }

  /**
   * Builds a network from a parsed JSON payload: either a netcanvas graph
   * document or a graphology export. The payload's `directed` flag applies
   * unless {@link init} sets one.
   */
  static fromJson(payload: unknown, init: NetworkInit = {}): Network {
    if (isSerializedGraph(payload)) {
      const source = serializedGraphSource(payload);
      const network = new Network({ directed: source.directed, ...init });
      network.importGraph(source);
      return network;
    }
    const document = parseGraphDocument(payload);
    const network = new Network({ directed: document.directed, ...init });
    network.importGraph(graphDocumentSource(document));
    if (document.options) {
      network.setOptions(document.options);
    }
    return network;
  }

  /**
   * Builds a network rendered from DOT text. The text is parsed in the browser
   * by `vis.parseDOTNetwork`, so the exported document ignores the registry.
   * A `digraph` marks the network directed unless {@link init} sets it.
   */
  static fromDot(text: string, init: NetworkInit = {}): Network {
    const dot = parseDotSource(text);
    const network = new Network({ directed: isDirectedDot(dot), ...init });
    network.dotSource = dot;
    network.logger.info("network_dot_loaded", { bytes: dot.length });
    return network;
  }

  /** DOT text rendered in place of the registry, if any. */
  get dot(): string | undefined {
    return this.dotSource;
  }

  get directed(): boolean {
    return this.registry.directed;
  }

  addNode(id: NodeId, attributes?: AttributeBag): NodeRecord {
    return this.registry.addNode(id, attributes);
  }

  addNodes(ids: Iterable<NodeId>, attributes?: BulkNodeAttributes): NodeRecord[] {
    return this.registry.addNodes(ids, attributes);
  }

  addEdge(source: NodeId, target: NodeId, attributes?: AttributeBag): EdgeRecord {
    return this.registry.addEdge(source, target, attributes);
  }

  addEdges(edges: Iterable<EdgeTuple>): EdgeRecord[] {
    return this.registry.addEdges(edges);
  }

  getNode(id: NodeId): NodeRecord {
    return this.registry.getNode(id);
  }

  getNodes(): NodeId[] {
    return this.registry.listNodeIds();
  }

  getEdges(): EdgeRecord[] {
    return this.registry.listEdges();
  }

  numNodes(): number {
    return this.registry.nodeCount;
  }

  numEdges(): number {
    return this.registry.edgeCount;
  }

  getAdjacencyList(): AdjacencyList {
    return this.registry.getAdjacencyList();
  }

  neighbors(id: NodeId): NodeId[] {
    return this.registry.neighbors(id);
  }

  annotateNeighbors(options?: NeighborAnnotationOptions): this {
    this.registry.annotateNeighbors(options);
    return this;
  }

  importGraph(source: ExternalGraphSource): GraphImportSummary {
    const summary = this.registry.importGraph(source);
    this.logger.info("network_graph_imported", {
      nodes_added: summary.nodesAdded,
      edges_added: summary.edgesAdded,
    });
    return summary;
  }

  barnesHut(parameters: Partial<BarnesHutParameters> = {}): this {
    this.options.useSolver("barnesHut", parameters);
    return this;
  }

  repulsion(parameters: Partial<RepulsionParameters> = {}): this {
    this.options.useSolver("repulsion", parameters);
    return this;
  }

  hierarchicalRepulsion(parameters: Partial<HierarchicalRepulsionParameters> = {}): this {
    this.options.useSolver("hierarchicalRepulsion", parameters);
    return this;
  }

  forceAtlas2Based(parameters: Partial<ForceAtlas2BasedParameters> = {}): this {
    this.options.useSolver("forceAtlas2Based", parameters);
    return this;
  }

  togglePhysics(enabled: boolean): this {
    this.options.togglePhysics(enabled);
    return this;
  }

  toggleStabilization(enabled: boolean): this {
    this.options.toggleStabilization(enabled);
    return this;
  }

  toggleDragNodes(enabled: boolean): this {
    this.options.toggleDragNodes(enabled);
    return this;
  }

  toggleHideEdgesOnDrag(enabled: boolean): this {
    this.options.toggleHideEdgesOnDrag(enabled);
    return this;
  }

  toggleHideNodesOnDrag(enabled: boolean): this {
    this.options.toggleHideNodesOnDrag(enabled);
    return this;
  }

  inheritEdgeColors(enabled: boolean): this {
    this.options.inheritEdgeColors(enabled);
    return this;
  }

  setEdgeSmooth(type: EdgeSmoothType): this {
    this.options.setEdgeSmooth(type);
    return this;
  }

  showButtons(filter?: readonly string[] | true): this {
    this.options.showButtons(filter);
    return this;
  }

  setOptions(options: string | Record<string, unknown>): this {
    this.options.setOptions(options);
    return this;
  }

  getNetworkData(): NetworkData {
    return {
      nodes: this.registry.listNodes(),
      edges: this.registry.listEdges(),
      height: this.display.height,
      width: this.display.width,
      options: this.options.toJSON(),
      ...(this.dotSource !== undefined ? { dot: this.dotSource } : {}),
    };
  }

  generateHtml(): string {
    const data = this.getNetworkData();
    return renderNetworkHtml({
      nodes: data.nodes,
      edges: data.edges,
      options: data.options,
      display: this.display,
      dot: data.dot,
    });
  }

  /** Writes the document to {@link path}, which must name an `.html` file. */
  async writeHtml(path: string): Promise<number> {
    const bytes = await writeNetworkHtml(path, this.generateHtml());
    this.logger.info("network_html_written", {
      path,
      bytes,
      nodes: this.registry.nodeCount,
      edges: this.registry.edgeCount,
    });
    return bytes;
  }

  /**
   * Surfaces the document: written to {@link path}, or returned as an inline
   * iframe fragment when the network was created in notebook mode.
   */
  async show(path: string): Promise<ShowResult> {
    if (this.display.notebook) {
      const html = renderInlineFrame(this.generateHtml(), this.display);
      this.logger.info("network_inline_rendered", { bytes: html.length });
      return { mode: "inline", html };
    }
    const bytes = await this.writeHtml(path);
    return { mode: "file", path, bytes };
  }

  toJSON(): Record<string, unknown> {
    return {
      ...this.getNetworkData(),
      directed: this.directed,
    };
  }
}
