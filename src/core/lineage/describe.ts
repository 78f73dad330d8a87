// CHANGE: Deterministic topological ordering and lineage description
// WHY: Output must be reproducible; ready nodes are taken in first-inserted order
// REF: lineage-description
// SOURCE: Kahn, "Topological sorting of large networks" (1962)
// FORMAT THEOREM: ∀(u,v) ∈ edges: pos(u) < pos(v) in topologicalOrder(graph)
// PURITY: CORE
// INVARIANT: Cycles are reported as CyclicGraphError, never as a partial order
// COMPLEXITY: O((n + m) log n) where n = |nodes|, m = |edges|

import { Either } from "effect";

import { CyclicGraphError } from "../errors.js";
import type {
	LineageDescription,
	LineageGraph,
	NodeId,
} from "../types/lineage.js";
import { predecessorsOf } from "./graph.js";

/**
 * Inserts `id` into an ascending array, keeping it sorted.
 *
 * @complexity O(k) where k = |ready|
 */
function insertSorted(ready: NodeId[], id: NodeId): void {
	let low = 0;
	let high = ready.length;
	while (low < high) {
		const mid = (low + high) >>> 1;
		if ((ready[mid] ?? 0) < id) low = mid + 1;
		else high = mid;
	}
	ready.splice(low, 0, id);
}

/**
 * Walks predecessors inside the unresolved set until a node repeats.
 *
 * Every unresolved node keeps at least one unresolved predecessor after Kahn's
 * algorithm stops, so the walk always closes a cycle.
 */
function findCycle(
	graph: LineageGraph,
	unresolved: ReadonlySet<NodeId>,
	start: NodeId,
): readonly string[] {
	const path: NodeId[] = [];
	const seenAt = new Map<NodeId, number>();
	let current: NodeId | undefined = start;
	while (current !== undefined && !seenAt.has(current)) {
		seenAt.set(current, path.length);
		path.push(current);
		current = (graph.predecessors[current] ?? []).find((id) =>
			unresolved.has(id),
		);
	}
	if (current === undefined) return [];
	const loop = path.slice(seenAt.get(current) ?? 0);
	// predecessors walk backwards; reverse so the path follows edge direction
	const forward = [...loop].reverse();
	const names = forward.map((id) => graph.nodes[id]?.name ?? "");
	return [...names, names[0] ?? ""];
}

function cyclicError(
	graph: LineageGraph,
	inDegree: readonly number[],
): CyclicGraphError {
	const remaining: NodeId[] = [];
	inDegree.forEach((degree, id) => {
		if (degree > 0) remaining.push(id);
	});
	const unresolvedSet = new Set(remaining);
	const first = remaining[0] ?? 0;
	return new CyclicGraphError({
		cycle: findCycle(graph, unresolvedSet, first),
		unresolved: remaining.map((id) => graph.nodes[id]?.name ?? ""),
	});
}

/**
 * Computes a topological ordering with Kahn's algorithm.
 *
 * @param graph - Lineage graph
 * @returns Node names, dependencies before dependents, or CyclicGraphError
 *
 * @pure true
 * @invariant Among ready nodes the smallest insertion index is emitted first
 * @postcondition result.length === graph.nodes.length
 * @complexity O((n + m) log n)
 */
export function topologicalOrder(
	graph: LineageGraph,
): Either.Either<readonly string[], CyclicGraphError> {
	const inDegree = graph.predecessors.map((parents) => parents.length);
	const ready: NodeId[] = [];
	inDegree.forEach((degree, id) => {
		if (degree === 0) ready.push(id);
	});

	const order: string[] = [];
	let next = ready.shift();
	while (next !== undefined) {
		order.push(graph.nodes[next]?.name ?? "");
		for (const child of graph.successors[next] ?? []) {
			const remaining = (inDegree[child] ?? 0) - 1;
			inDegree[child] = remaining;
			if (remaining === 0) insertSorted(ready, child);
		}
		next = ready.shift();
	}

	if (order.length !== graph.nodes.length) {
		return Either.left(cyclicError(graph, inDegree));
	}
	return Either.right(order);
}

/**
 * Formats the lineage line for a single node.
 *
 * @pure true
 * @example
 * ```ts
 * formatLineageLine("orders", ["customers", "payments"]);
 * // "orders depends on customers, payments"
 * formatLineageLine("customers", []);
 * // "customers is a root node"
 * ```
 */
export function formatLineageLine(
	name: string,
	parents: readonly string[],
): string {
	return parents.length === 0
		? `${name} is a root node`
		: `${name} depends on ${parents.join(", ")}`;
}

/**
 * Renders one line per node in topological order.
 *
 * @param graph - Lineage graph
 * @returns Description (text ends with "\n" unless empty) or CyclicGraphError
 *
 * @pure true
 * @invariant Same graph ⇒ byte-identical text
 * @invariant No partial text on cycles
 * @complexity O((n + m) log n)
 */
export function describeLineage(
	graph: LineageGraph,
): Either.Either<LineageDescription, CyclicGraphError> {
	return Either.map(topologicalOrder(graph), (ordering) => {
		const lines = ordering.map((name) =>
			formatLineageLine(name, predecessorsOf(graph, name)),
		);
		const text = lines.map((line) => `${line}\n`).join("");
		return { ordering, lines, text };
	});
}
