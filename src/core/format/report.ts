// CHANGE: Pure rendering of the inspection report (text lines and JSON document)
// WHY: SHELL printer only writes lines; wording and ordering live in CORE
// REF: user-request-lineage-report
// PURITY: CORE
// INVARIANT: Same report ⇒ identical output
// COMPLEXITY: O(n) where n = |models| + |lineage lines|

import { pipe } from "effect";

import type {
	ColumnCoverageReport,
	CoverageReport,
	InspectionReport,
	ModelSelection,
	TestCoverageReport,
} from "../types/index.js";

function formatNameList(names: readonly string[]): string {
	return names.length === 0 ? "(none)" : names.join(", ");
}

/**
 * Coverage summary line.
 *
 * @example
 * ```ts
 * formatCoverageLine({ totalModels: 3, documentedModels: 2, missingMetadata: ["b"], coveragePercent: 66.7 });
 * // "Metadata coverage: 2/3 models (66.7%)"
 * ```
 */
export function formatCoverageLine(coverage: CoverageReport): string {
	return `Metadata coverage: ${coverage.documentedModels}/${coverage.totalModels} models (${coverage.coveragePercent}%)`;
}

function missingMetadataLines(coverage: CoverageReport): readonly string[] {
	if (coverage.missingMetadata.length === 0) {
		return ["All models have associated metadata."];
	}
	return [
		"The following models are missing metadata:",
		...coverage.missingMetadata.map((name) => `  - ${name}`),
	];
}

function columnLines(columns: ColumnCoverageReport): readonly string[] {
	const summary = `Column documentation: ${columns.documentedColumns}/${columns.totalColumns} columns (${columns.coveragePercent}%)`;
	if (columns.undocumentedByModel.length === 0) return [summary];
	return [
		summary,
		"Undocumented columns:",
		...columns.undocumentedByModel.map(
			({ model, columns: names }) => `  - ${model}: ${names.join(", ")}`,
		),
	];
}

function testLines(tests: TestCoverageReport): readonly string[] {
	const lines = [
		`Test coverage: ${tests.testedModels}/${tests.totalModels} models (${tests.modelCoveragePercent}%)`,
		`Column test coverage: ${tests.testedColumns}/${tests.totalColumns} columns (${tests.columnCoveragePercent}%)`,
	];
	return tests.untestedModels.length === 0
		? lines
		: [...lines, `Untested models: ${tests.untestedModels.join(", ")}`];
}

function selectionLines(selection: ModelSelection): readonly string[] {
	return [
		`Upstream of ${selection.model}: ${formatNameList(selection.upstream)}`,
		`Downstream of ${selection.model}: ${formatNameList(selection.downstream)}`,
	];
}

/**
 * Renders the human-readable report.
 *
 * @pure true
 * @invariant Sections are separated by exactly one empty line
 */
export function renderTextReport(report: InspectionReport): readonly string[] {
	const sections: (readonly string[])[] = [];
	if (report.lineage !== undefined) {
		sections.push(["Lineage description:", ...report.lineage.lines]);
	}
	if (report.selection !== undefined) {
		sections.push(selectionLines(report.selection));
	}
	if (report.danglingReferences.length > 0) {
		sections.push([
			`Referenced but not declared: ${formatNameList(report.danglingReferences)}`,
		]);
	}
	sections.push([formatCoverageLine(report.coverage)]);
	sections.push(missingMetadataLines(report.coverage));
	sections.push(columnLines(report.columns));
	sections.push(testLines(report.tests));
	return pipe(
		sections,
		(parts) => parts.flatMap((part, index) => (index === 0 ? part : ["", ...part])),
	);
}

/**
 * Renders the machine-readable report as pretty-printed JSON.
 *
 * @pure true
 */
export function renderJsonReport(report: InspectionReport): string {
	const document = {
		project: report.project,
		models: report.models.map((model) => ({
			name: model.name,
			path: model.relativePath,
			hasMetadata: model.hasMetadata,
			references: model.references,
		})),
		coverage: report.coverage,
		columns: report.columns,
		tests: report.tests,
		lineage:
			report.lineage === undefined
				? null
				: { ordering: report.lineage.ordering, lines: report.lineage.lines },
		danglingReferences: report.danglingReferences,
		...(report.selection === undefined ? {} : { selection: report.selection }),
	};
	return JSON.stringify(document, null, 2);
}
