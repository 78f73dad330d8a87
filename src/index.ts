// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and the pure CORE engine; hide SHELL internals
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed errors or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Project inspection for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runLineage } from "model-lineage";
 *
 * const exitCode = await Effect.runPromise(
 *   runLineage({
 *     projectPath: "analytics/",
 *     format: "text",
 *     metadataOnly: false,
 *     strict: true,
 *     noPreflight: false,
 *   }),
 * );
 * ```
 *
 * @pure false - Orchestrates SHELL effects (file I/O, console)
 */
export { inspectProject, runLineage } from "./app/runLineage.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (Pure lineage engine)
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode } from "./core/decision.js";
export {
	type AppError,
	CyclicGraphError,
	FSError,
	InvalidModelRecordError,
	type LineageError,
	ProjectNotFoundError,
	UnknownModelError,
	YamlParseError,
} from "./core/errors.js";
export { describeError } from "./core/format/errors.js";
export {
	formatCoverageLine,
	renderJsonReport,
	renderTextReport,
} from "./core/format/report.js";
export {
	buildGraph,
	danglingReferences,
	describeLineage,
	downstreamOf,
	edgeNames,
	formatLineageLine,
	getNode,
	hasNode,
	missingMetadata,
	nodeNames,
	predecessorsOf,
	successorsOf,
	topologicalOrder,
	upstreamOf,
} from "./core/lineage/index.js";
export type { DecisionState, ExitCode } from "./core/models.js";
export {
	buildColumnCoverage,
	buildCoverageReport,
	buildTestCoverage,
	documentedModelNames,
	extractModelRefs,
	modelNameFromPath,
	modelPropertiesOf,
} from "./core/project/index.js";
export type {
	CLIOptions,
	ColumnCoverageReport,
	CoverageReport,
	InspectionReport,
	LineageDescription,
	LineageEdge,
	LineageGraph,
	LineageNode,
	ModelRecord,
	ModelSelection,
	NodeId,
	OutputFormat,
	ProjectScan,
	ScannedModel,
	TestCoverageReport,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (Project scanning)
// ═══════════════════════════════════════════════════════════════════════════════

export { scanProject } from "./shell/project/index.js";
