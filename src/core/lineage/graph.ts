// CHANGE: Build the lineage graph from model records as an immutable arena
// WHY: Nodes indexed by name, edges as id pairs, adjacency computed once per graph
// REF: lineage-graph
// SOURCE: n/a
// FORMAT THEOREM: ∀r ∈ records, ∀ref ∈ r.references: (ref, r.name) ∈ edges(buildGraph(records))
// PURITY: CORE
// INVARIANT: Mutation is local to the builder; the returned graph is never mutated
// COMPLEXITY: O(n + m) where n = |records|, m = Σ|references|

import { Either } from "effect";

import { InvalidModelRecordError } from "../errors.js";
import type {
	LineageEdge,
	LineageGraph,
	LineageNode,
	ModelRecord,
	NodeId,
} from "../types/lineage.js";

interface MutableNode {
	readonly name: string;
	metadataExists: boolean;
	declared: boolean;
}

interface GraphBuilder {
	readonly nodes: MutableNode[];
	readonly index: Map<string, NodeId>;
	readonly edges: LineageEdge[];
	readonly edgeKeys: Set<string>;
}

function createBuilder(): GraphBuilder {
	return { nodes: [], index: new Map(), edges: [], edgeKeys: new Set() };
}

/**
 * Returns the id of `name`, creating a dangling placeholder when absent.
 *
 * @invariant placeholders start with metadataExists = false, declared = false
 */
function ensureNode(builder: GraphBuilder, name: string): NodeId {
	const existing = builder.index.get(name);
	if (existing !== undefined) return existing;
	const id = builder.nodes.length;
	builder.nodes.push({ name, metadataExists: false, declared: false });
	builder.index.set(name, id);
	return id;
}

function addEdge(builder: GraphBuilder, from: NodeId, to: NodeId): void {
	const key = `${from}:${to}`;
	if (builder.edgeKeys.has(key)) return;
	builder.edgeKeys.add(key);
	builder.edges.push([from, to]);
}

function isBlank(name: string): boolean {
	return name.trim().length === 0;
}

/**
 * Validates one record; returns the offending detail or null.
 */
function recordProblem(record: ModelRecord): string | null {
	if (isBlank(record.name)) return "model name is empty";
	const position = record.references.findIndex(isBlank);
	if (position !== -1) {
		return `reference #${position} of model "${record.name}" is empty`;
	}
	return null;
}

function freeze(builder: GraphBuilder): LineageGraph {
	const predecessors: NodeId[][] = builder.nodes.map(() => []);
	const successors: NodeId[][] = builder.nodes.map(() => []);
	for (const [from, to] of builder.edges) {
		successors[from]?.push(to);
		predecessors[to]?.push(from);
	}
	const nodes: LineageNode[] = builder.nodes.map((node) => ({
		name: node.name,
		metadataExists: node.metadataExists,
		declared: node.declared,
	}));
	return {
		nodes,
		index: new Map(builder.index),
		edges: [...builder.edges],
		predecessors,
		successors,
	};
}

/**
 * Builds the lineage graph; an edge A→B means B references A.
 *
 * @param records - Models with their metadata flag and `ref()` targets
 * @returns The graph, or InvalidModelRecordError for an empty model/reference name
 *
 * @pure true
 * @invariant A record's own hasMetadata overrides a dangling placeholder
 * @invariant Duplicate record names: last writer wins for metadataExists
 * @invariant Duplicate references collapse to one edge
 * @complexity O(n + m)
 *
 * @example
 * ```ts
 * const graph = buildGraph([
 *   { name: "customers", hasMetadata: true, references: [] },
 *   { name: "orders_summary", hasMetadata: false, references: ["customers"] },
 * ]);
 * // Either.right(graph) with edges [[0, 1]]
 * ```
 */
export function buildGraph(
	records: readonly ModelRecord[],
): Either.Either<LineageGraph, InvalidModelRecordError> {
	const builder = createBuilder();
	for (const [index, record] of records.entries()) {
		const detail = recordProblem(record);
		if (detail !== null) {
			return Either.left(new InvalidModelRecordError({ index, detail }));
		}
		const target = ensureNode(builder, record.name);
		const node = builder.nodes[target];
		if (node !== undefined) {
			node.metadataExists = record.hasMetadata;
			node.declared = true;
		}
		for (const reference of record.references) {
			addEdge(builder, ensureNode(builder, reference), target);
		}
	}
	return Either.right(freeze(builder));
}

/**
 * Looks up a node by name.
 */
export function getNode(
	graph: LineageGraph,
	name: string,
): LineageNode | undefined {
	const id = graph.index.get(name);
	return id === undefined ? undefined : graph.nodes[id];
}

export function hasNode(graph: LineageGraph, name: string): boolean {
	return graph.index.has(name);
}

function namesOf(graph: LineageGraph, ids: readonly NodeId[]): string[] {
	return ids.flatMap((id) => {
		const node = graph.nodes[id];
		return node === undefined ? [] : [node.name];
	});
}

/**
 * Direct dependencies of `name` in edge insertion order ([] for unknown names).
 *
 * @complexity O(k) where k = in-degree
 */
export function predecessorsOf(
	graph: LineageGraph,
	name: string,
): readonly string[] {
	const id = graph.index.get(name);
	if (id === undefined) return [];
	return namesOf(graph, graph.predecessors[id] ?? []);
}

/**
 * Direct dependents of `name` in edge insertion order ([] for unknown names).
 */
export function successorsOf(
	graph: LineageGraph,
	name: string,
): readonly string[] {
	const id = graph.index.get(name);
	if (id === undefined) return [];
	return namesOf(graph, graph.successors[id] ?? []);
}

/**
 * Node names in first-seen order.
 */
export function nodeNames(graph: LineageGraph): readonly string[] {
	return graph.nodes.map((node) => node.name);
}

/**
 * Edges as `[dependency, dependent]` name pairs, in insertion order.
 */
export function edgeNames(
	graph: LineageGraph,
): readonly (readonly [string, string])[] {
	return graph.edges.flatMap(([from, to]) => {
		const source = graph.nodes[from];
		const target = graph.nodes[to];
		return source === undefined || target === undefined
			? []
			: [[source.name, target.name] as const];
	});
}
