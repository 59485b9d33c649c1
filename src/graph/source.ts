import { z, type ZodIssue } from "zod";

import { AttributeBagSchema, NodeIdSchema } from "./attributes.js";
import { InvalidGraphDocumentError } from "./errors.js";
import type { NodeId } from "./types.js";
import { omitKeys } from "../utils/object.js";

/** Attribute mapping handed over by an external graph. Values are validated on import. */
export type ExternalAttributes = Readonly<Record<string, unknown>>;

/**
 * Capability interface describing any graph the registry can ingest: an
 * enumerable collection of nodes with attributes and an enumerable collection
 * of `(source, target)` pairs with attributes. Nothing else is assumed.
 */
export interface ExternalGraphSource {
  nodes(): Iterable<readonly [NodeId, ExternalAttributes]>;
  edges(): Iterable<readonly [NodeId, NodeId, ExternalAttributes]>;
  /** Optional hint used by callers that size a registry after the source. */
  readonly directed?: boolean;
}

const DocumentNodeSchema = z.object({ id: NodeIdSchema }).catchall(z.unknown());

const DocumentEdgeSchema = z.object({ from: NodeIdSchema, to: NodeIdSchema }).catchall(z.unknown());

/** JSON graph document accepted by {@link graphDocumentSource} and the CLI. */
export const GraphDocumentSchema = z.object({
  directed: z.boolean().optional(),
  nodes: z.array(DocumentNodeSchema).default([]),
  edges: z.array(DocumentEdgeSchema).default([]),
  options: AttributeBagSchema.optional(),
});

export type GraphDocument = z.output<typeof GraphDocumentSchema>;

function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}

/** Validates an untrusted JSON payload against {@link GraphDocumentSchema}. */
export function parseGraphDocument(payload: unknown): GraphDocument {
  const parsed = GraphDocumentSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidGraphDocumentError(formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

/**
 * Adapts a JSON graph document (`{ nodes: [{ id, ...attrs }], edges: [{ from, to, ...attrs }] }`).
 * Every key besides the identity fields is forwarded as an attribute.
 */
export function graphDocumentSource(payload: unknown): ExternalGraphSource {
  const document = parseGraphDocument(payload);
  return {
    directed: document.directed,
    nodes: () => document.nodes.map((node) => [node.id, omitKeys<unknown>(node, ["id"])] as const),
    edges: () => document.edges.map((edge) => [edge.from, edge.to, omitKeys<unknown>(edge, ["from", "to"])] as const),
  };
}

const SerializedNodeSchema = z.object({
  key: NodeIdSchema,
  attributes: z.record(z.unknown()).optional(),
});

const SerializedEdgeSchema = z.object({
  key: z.string().optional(),
  source: NodeIdSchema,
  target: NodeIdSchema,
  attributes: z.record(z.unknown()).optional(),
  undirected: z.boolean().optional(),
});

/** Shape produced by graphology's `graph.export()`. */
export const SerializedGraphSchema = z.object({
  attributes: z.record(z.unknown()).optional(),
  options: z
    .object({
      type: z.enum(["mixed", "directed", "undirected"]).optional(),
      multi: z.boolean().optional(),
      allowSelfLoops: z.boolean().optional(),
    })
    .optional(),
  nodes: z.array(SerializedNodeSchema),
  edges: z.array(SerializedEdgeSchema).default([]),
});

export type SerializedGraph = z.output<typeof SerializedGraphSchema>;

/**
 * Adapts the serialisation format emitted by graphology (`graph.export()`),
 * so graphs built with that library can be rendered without a runtime
 * dependency on it. Mixed graphs are reported as undirected.
 */
export function serializedGraphSource(payload: unknown): ExternalGraphSource {
  const parsed = SerializedGraphSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidGraphDocumentError(formatIssues(parsed.error.issues));
  }
  const graph = parsed.data;
  return {
    directed: graph.options?.type === "directed",
    nodes: () => graph.nodes.map((node) => [node.key, node.attributes ?? {}] as const),
    edges: () => graph.edges.map((edge) => [edge.source, edge.target, edge.attributes ?? {}] as const),
  };
}

const GraphTypeMarkerSchema = z.object({
  options: z.object({ type: z.enum(["mixed", "directed", "undirected"]) }),
});

function hasItems(value: unknown, predicate: (item: object) => boolean): boolean {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((item: unknown) => typeof item === "object" && item !== null && predicate(item))
  );
}

/**
 * Tells graphology exports apart from graph documents: a graph `options.type`,
 * `key`ed nodes, or `source`/`target` edges. Empty exports carry the
 * `options.type` marker only.
 */
export function isSerializedGraph(payload: unknown): boolean {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    return false;
  }
  if (GraphTypeMarkerSchema.safeParse(payload).success) {
    return true;
  }
  return (
    hasItems(Reflect.get(payload, "nodes"), (node) => "key" in node && !("id" in node)) ||
    hasItems(Reflect.get(payload, "edges"), (edge) => "source" in edge && "target" in edge && !("from" in edge))
  );
}

/** DOT text: an optional `strict`, then `graph` or `digraph`, then a body in braces. */
const DotSourceSchema = z
  .string()
  .trim()
  .regex(/^(strict\s+)?(di)?graph\b[^{]*\{[\s\S]*\}$/i, "expected a graph or digraph statement");

/** Validates DOT text before it is embedded for the browser-side DOT parser. */
export function parseDotSource(text: string): string {
  const parsed = DotSourceSchema.safeParse(text);
  if (!parsed.success) {
    throw new InvalidGraphDocumentError(formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

/** Whether DOT text declares a `digraph`. */
export function isDirectedDot(text: string): boolean {
  return /^(strict\s+)?digraph\b/i.test(text.trim());
}
