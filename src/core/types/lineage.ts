// CHANGE: Introduce lineage domain types (records, arena graph, description)
// WHY: Graph and description must be immutable values owned by CORE
// REF: lineage-graph
// PURITY: CORE
// INVARIANT: All structures are readonly; a graph is never mutated after construction
// COMPLEXITY: O(1) - type declarations only

/**
 * A model as seen by the graph builder.
 *
 * @property name Unique, non-empty model name
 * @property hasMetadata Whether a YAML `models:` entry documents this model
 * @property references Names passed to `ref()` in the model's SQL, in order; may repeat or dangle
 */
export interface ModelRecord {
	readonly name: string;
	readonly hasMetadata: boolean;
	readonly references: readonly string[];
}

/**
 * Numeric node identifier: position of the node in {@link LineageGraph.nodes}.
 */
export type NodeId = number;

/**
 * A node of the lineage graph.
 *
 * @property declared False for dangling references (no record carries this name)
 */
export interface LineageNode {
	readonly name: string;
	readonly metadataExists: boolean;
	readonly declared: boolean;
}

/**
 * Directed edge `[dependency, dependent]` expressed as node ids.
 */
export type LineageEdge = readonly [from: NodeId, to: NodeId];

/**
 * Arena-style lineage graph.
 *
 * @remarks
 * - @invariant nodes[index.get(n)].name === n
 * - @invariant edges contain no duplicates
 * - @invariant predecessors/successors are derived from edges in edge order
 */
export interface LineageGraph {
	readonly nodes: readonly LineageNode[];
	readonly index: ReadonlyMap<string, NodeId>;
	readonly edges: readonly LineageEdge[];
	readonly predecessors: readonly (readonly NodeId[])[];
	readonly successors: readonly (readonly NodeId[])[];
}

/**
 * Rendered lineage, one line per node in topological order.
 *
 * @invariant lines.length === ordering.length
 */
export interface LineageDescription {
	readonly ordering: readonly string[];
	readonly lines: readonly string[];
	readonly text: string;
}
