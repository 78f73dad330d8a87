// CHANGE: Application layer orchestration (APP) separated from SHELL and CORE
// WHY: APP composes the pure lineage engine with the project scan and console printer
// REF: user-request-lineage-report
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; no termination side effects
// COMPLEXITY: O(n + m) where n = project files, m = references

import { Effect } from "effect";

import { computeExitCode } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import {
	buildGraph,
	danglingReferences,
	describeLineage,
	downstreamOf,
	upstreamOf,
} from "../core/lineage/index.js";
import type { ExitCode } from "../core/models.js";
import {
	buildColumnCoverage,
	buildCoverageReport,
	buildTestCoverage,
	toModelRecords,
} from "../core/project/index.js";
import type {
	CLIOptions,
	InspectionReport,
	LineageGraph,
	ModelSelection,
} from "../core/types/index.js";
import { checkAndReportPreflight } from "../shell/analysis/index.js";
import { parseCLIArgs } from "../shell/config/index.js";
import { printFailure, printReport } from "../shell/output/index.js";
import { scanProject } from "../shell/project/index.js";
import { path } from "../shell/utils/node-mods.js";

function selectModel(
	graph: LineageGraph,
	model: string,
): Effect.Effect<ModelSelection, AppError> {
	return Effect.gen(function* () {
		const upstream = yield* upstreamOf(graph, model);
		const downstream = yield* downstreamOf(graph, model);
		return { model, upstream, downstream };
	});
}

/**
 * Scans the project and builds the inspection report.
 *
 * CHANGE: Compose Either-returning CORE steps inside Effect.gen
 * WHY: The first failing step (invalid record, cycle, unknown model) short-circuits with a typed error
 *
 * @param options - Parsed CLI options
 * @returns Effect<InspectionReport, AppError>
 *
 * @pure false (reads the filesystem)
 * @invariant Metadata-only runs carry no lineage and no selection
 */
export function inspectProject(
	options: CLIOptions,
): Effect.Effect<InspectionReport, AppError> {
	return Effect.gen(function* (_) {
		const scan = yield* _(
			scanProject(options.projectPath, { metadataOnly: options.metadataOnly }),
		);
		const names = scan.models.map((model) => model.name);
		const base = {
			project: scan.root,
			models: scan.models,
			coverage: buildCoverageReport(scan.models),
			columns: buildColumnCoverage(names, scan.metadataFiles),
			tests: buildTestCoverage(names, scan.metadataFiles),
		};
		if (options.metadataOnly) {
			return { ...base, danglingReferences: [] };
		}

		// Either values are yieldable inside Effect.gen
		const graph = yield* buildGraph(toModelRecords(scan.models));
		const lineage = yield* describeLineage(graph);
		const report: InspectionReport = {
			...base,
			lineage,
			danglingReferences: danglingReferences(graph),
		};
		if (options.model === undefined) return report;
		const selection = yield* _(selectModel(graph, options.model));
		return { ...report, selection };
	});
}

/**
 * Preflight validation. Returns boolean success instead of terminating.
 *
 * @pure false (reads environment, console output)
 */
function preflightOk(options: CLIOptions): boolean {
	if (options.noPreflight) return true;
	const root = path.resolve(process.cwd(), options.projectPath);
	return checkAndReportPreflight(root).ok;
}

/**
 * Orchestrates an inspection and returns ExitCode as value (no process.exit).
 *
 * @param options - Parsed CLI options
 * @returns Effect<ExitCode, never>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @effect Effect<ExitCode, never> - errors are reported and mapped to 1
 * @invariant ExitCode ∈ {0,1}
 * @postcondition (failure ∨ (strict ∧ missing metadata)) → 1 else 0
 */
export function runLineage(options: CLIOptions): Effect.Effect<ExitCode> {
	return Effect.gen(function* (_) {
		if (!preflightOk(options)) return 1;

		if (options.metadataOnly && options.model !== undefined) {
			console.warn(
				`⚠️  --model ${options.model} is ignored with --metadata-only (no lineage graph is built).`,
			);
		}

		if (options.format === "text") {
			console.log(`🔍 Inspecting dbt project: ${options.projectPath}`);
		}

		return yield* _(
			inspectProject(options).pipe(
				Effect.map((report) => {
					printReport(report, options.format);
					return computeExitCode({
						hasMissingMetadata: report.coverage.missingMetadata.length > 0,
						strict: options.strict,
					});
				}),
				Effect.catchAll((error) =>
					Effect.sync((): ExitCode => {
						printFailure(error);
						return 1;
					}),
				),
			),
		);
	});
}

/**
 * Main entry point for the application.
 *
 * @returns Effect<ExitCode, never>
 * @pure false (coordinates effects)
 */
export function main(
	args: readonly string[] = process.argv.slice(2),
): Effect.Effect<ExitCode> {
	return runLineage(parseCLIArgs(args));
}
