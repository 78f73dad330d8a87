// CHANGE: Metadata, column and test coverage reports; record projection for the graph builder
// WHY: Coverage summaries must be derived purely from scanned models and parsed property files
// REF: user-request-metadata-coverage
// FORMAT THEOREM: percent(part, total) = round1(100 · part / total), 0 when total = 0
// PURITY: CORE
// INVARIANT: Models are counted by distinct name; name lists are sorted and free of duplicates
// COMPLEXITY: O(n log n + c) where n = |models|, c = declared columns

import type { ModelRecord } from "../types/lineage.js";
import type {
	ColumnCoverageReport,
	ColumnProperties,
	CoverageReport,
	MetadataFile,
	ScannedModel,
	TestCoverageReport,
	UndocumentedColumns,
} from "../types/project.js";

type CoverageInput = Pick<ModelRecord, "name" | "hasMetadata">;

function percentOf(part: number, total: number): number {
	return total === 0 ? 0 : Math.round((part / total) * 1000) / 10;
}

function byName(a: string, b: string): number {
	return a.localeCompare(b);
}

function distinctSorted(names: readonly string[]): readonly string[] {
	return [...new Set(names)].sort(byName);
}

/**
 * Summarizes which models lack metadata.
 *
 * @pure true
 * @invariant documentedModels + missingMetadata.length === totalModels
 * @example
 * ```ts
 * buildCoverageReport([
 *   { name: "a", hasMetadata: true },
 *   { name: "b", hasMetadata: false },
 *   { name: "c", hasMetadata: true },
 * ]);
 * // { totalModels: 3, documentedModels: 2, missingMetadata: ["b"], coveragePercent: 66.7 }
 * ```
 */
export function buildCoverageReport(
	models: readonly CoverageInput[],
): CoverageReport {
	// same-named files in different directories are one dbt model
	const documented = new Map<string, boolean>();
	for (const model of models) {
		documented.set(model.name, (documented.get(model.name) ?? false) || model.hasMetadata);
	}
	const missingMetadata = [...documented]
		.filter(([, hasMetadata]) => !hasMetadata)
		.map(([name]) => name)
		.sort(byName);
	const totalModels = documented.size;
	const documentedModels = totalModels - missingMetadata.length;
	return {
		totalModels,
		documentedModels,
		missingMetadata,
		coveragePercent: percentOf(documentedModels, totalModels),
	};
}

interface MergedModel {
	tested: boolean;
	readonly columns: Map<string, ColumnProperties>;
}

/**
 * Merges every `models:` entry of `name` across files.
 *
 * @invariant Columns keep first-declaration order; flags are OR-ed
 */
function mergeProperties(
	name: string,
	files: readonly MetadataFile[],
): MergedModel {
	const merged: MergedModel = { tested: false, columns: new Map() };
	for (const file of files) {
		for (const entry of file.modelProperties) {
			if (entry.name !== name) continue;
			merged.tested = merged.tested || entry.tested;
			for (const column of entry.columns) {
				const known = merged.columns.get(column.name);
				merged.columns.set(column.name, {
					name: column.name,
					documented: (known?.documented ?? false) || column.documented,
					tested: (known?.tested ?? false) || column.tested,
				});
			}
		}
	}
	return merged;
}

function mergeAll(
	modelNames: readonly string[],
	files: readonly MetadataFile[],
): readonly (readonly [string, MergedModel])[] {
	return distinctSorted(modelNames).map((name) => [name, mergeProperties(name, files)] as const);
}

/**
 * Column description coverage of the scanned models.
 *
 * @param modelNames - Names of the scanned models
 * @param files - Parsed property files
 *
 * @pure true
 * @invariant Columns of property entries without a scanned model are not counted
 * @example
 * ```ts
 * // orders declares id (described) and status (no description)
 * buildColumnCoverage(["orders"], files);
 * // { totalColumns: 2, documentedColumns: 1, coveragePercent: 50,
 * //   undocumentedByModel: [{ model: "orders", columns: ["status"] }] }
 * ```
 */
export function buildColumnCoverage(
	modelNames: readonly string[],
	files: readonly MetadataFile[],
): ColumnCoverageReport {
	let totalColumns = 0;
	let documentedColumns = 0;
	const undocumentedByModel: UndocumentedColumns[] = [];
	for (const [model, merged] of mergeAll(modelNames, files)) {
		const undocumented: string[] = [];
		for (const column of merged.columns.values()) {
			totalColumns += 1;
			if (column.documented) documentedColumns += 1;
			else undocumented.push(column.name);
		}
		if (undocumented.length > 0) undocumentedByModel.push({ model, columns: undocumented });
	}
	return {
		totalColumns,
		documentedColumns,
		coveragePercent: percentOf(documentedColumns, totalColumns),
		undocumentedByModel,
	};
}

/**
 * Data test coverage of the scanned models and their declared columns.
 *
 * A model counts as tested when it declares a model-level test or any of its
 * columns declares one.
 *
 * @pure true
 * @invariant testedModels + untestedModels.length === totalModels
 */
export function buildTestCoverage(
	modelNames: readonly string[],
	files: readonly MetadataFile[],
): TestCoverageReport {
	const untestedModels: string[] = [];
	let totalColumns = 0;
	let testedColumns = 0;
	const merged = mergeAll(modelNames, files);
	for (const [model, properties] of merged) {
		let columnTested = false;
		for (const column of properties.columns.values()) {
			totalColumns += 1;
			if (column.tested) {
				testedColumns += 1;
				columnTested = true;
			}
		}
		if (!properties.tested && !columnTested) untestedModels.push(model);
	}
	const totalModels = merged.length;
	const testedModels = totalModels - untestedModels.length;
	return {
		totalModels,
		testedModels,
		untestedModels,
		modelCoveragePercent: percentOf(testedModels, totalModels),
		totalColumns,
		testedColumns,
		columnCoveragePercent: percentOf(testedColumns, totalColumns),
	};
}

/**
 * Projects scanned models onto graph builder input.
 */
export function toModelRecords(
	models: readonly ScannedModel[],
): readonly ModelRecord[] {
	return models.map(({ name, hasMetadata, references }) => ({
		name,
		hasMetadata,
		references,
	}));
}
