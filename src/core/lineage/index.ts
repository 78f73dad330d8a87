// CHANGE: Central export file for the lineage engine
// WHY: Single import point for graph builder, describer and queries

export { describeLineage, formatLineageLine, topologicalOrder } from "./describe.js";
export {
	buildGraph,
	edgeNames,
	getNode,
	hasNode,
	nodeNames,
	predecessorsOf,
	successorsOf,
} from "./graph.js";
export {
	danglingReferences,
	downstreamOf,
	missingMetadata,
	upstreamOf,
} from "./query.js";
