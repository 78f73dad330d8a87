// CHANGE: Read-only lineage queries over a built graph
// WHY: Callers ask "what feeds this model" / "what breaks if it changes" and which nodes lack metadata
// REF: user-request-model-impact
// PURITY: CORE
// INVARIANT: Results list each name at most once, nearest first
// COMPLEXITY: O(n + m) per traversal

import { Either } from "effect";

import { UnknownModelError } from "../errors.js";
import type { LineageGraph, NodeId } from "../types/lineage.js";

type Adjacency = LineageGraph["predecessors"];

/**
 * Breadth-first closure from `start`, excluding `start` itself.
 */
function closure(
	graph: LineageGraph,
	adjacency: Adjacency,
	start: NodeId,
): readonly string[] {
	const seen = new Set<NodeId>([start]);
	const queue: NodeId[] = [start];
	const names: string[] = [];
	for (let cursor = 0; cursor < queue.length; cursor++) {
		const current = queue[cursor] ?? start;
		for (const next of adjacency[current] ?? []) {
			if (seen.has(next)) continue;
			seen.add(next);
			queue.push(next);
			names.push(graph.nodes[next]?.name ?? "");
		}
	}
	return names;
}

function traverse(
	graph: LineageGraph,
	name: string,
	adjacency: Adjacency,
): Either.Either<readonly string[], UnknownModelError> {
	const id = graph.index.get(name);
	if (id === undefined) return Either.left(new UnknownModelError({ name }));
	return Either.right(closure(graph, adjacency, id));
}

/**
 * All transitive dependencies of `name`, nearest first.
 *
 * @example
 * ```ts
 * // raw -> staging -> mart
 * upstreamOf(graph, "mart"); // Either.right(["staging", "raw"])
 * ```
 */
export function upstreamOf(
	graph: LineageGraph,
	name: string,
): Either.Either<readonly string[], UnknownModelError> {
	return traverse(graph, name, graph.predecessors);
}

/**
 * All transitive dependents of `name`, nearest first.
 */
export function downstreamOf(
	graph: LineageGraph,
	name: string,
): Either.Either<readonly string[], UnknownModelError> {
	return traverse(graph, name, graph.successors);
}

/**
 * Declared models whose metadata is missing, in node order.
 */
export function missingMetadata(graph: LineageGraph): readonly string[] {
	return graph.nodes
		.filter((node) => node.declared && !node.metadataExists)
		.map((node) => node.name);
}

/**
 * Referenced names without a model record, in node order.
 */
export function danglingReferences(graph: LineageGraph): readonly string[] {
	return graph.nodes.filter((node) => !node.declared).map((node) => node.name);
}
