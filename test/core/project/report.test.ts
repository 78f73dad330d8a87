// CHANGE: Unit tests for metadata, column and test coverage reports
// WHY: Coverage numbers are printed and drive strict mode
// REF: user-request-metadata-coverage

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	buildColumnCoverage,
	buildCoverageReport,
	buildTestCoverage,
	toModelRecords,
} from "../../../src/core/project/index.js";
import type { MetadataFile } from "../../../src/core/types/index.js";

describe("buildCoverageReport", () => {
	it("rounds coverage to one decimal", () => {
		expect(
			buildCoverageReport([
				{ name: "a", hasMetadata: true },
				{ name: "b", hasMetadata: false },
				{ name: "c", hasMetadata: true },
			]),
		).toEqual({
			totalModels: 3,
			documentedModels: 2,
			missingMetadata: ["b"],
			coveragePercent: 66.7,
		});
	});

	it("reports zero coverage for an empty project", () => {
		expect(buildCoverageReport([])).toEqual({
			totalModels: 0,
			documentedModels: 0,
			missingMetadata: [],
			coveragePercent: 0,
		});
	});

	it("counts same-named models once", () => {
		// models/a/orders.sql and models/b/orders.sql
		expect(
			buildCoverageReport([
				{ name: "orders", hasMetadata: false },
				{ name: "orders", hasMetadata: false },
			]),
		).toEqual({
			totalModels: 1,
			documentedModels: 0,
			missingMetadata: ["orders"],
			coveragePercent: 0,
		});
	});

	it("sorts missing names", () => {
		const report = buildCoverageReport([
			{ name: "b", hasMetadata: false },
			{ name: "a", hasMetadata: false },
			{ name: "c", hasMetadata: true },
		]);
		expect(report.missingMetadata).toEqual(["a", "b"]);
		expect(report.coveragePercent).toBe(33.3);
	});

	it("keeps documented + missing equal to total", () => {
		const models = fc.array(
			fc.record({
				name: fc.constantFrom("a", "b", "c", "d"),
				hasMetadata: fc.boolean(),
			}),
			{ maxLength: 10 },
		);
		fc.assert(
			fc.property(models, (input) => {
				const report = buildCoverageReport(input);
				expect(report.documentedModels + report.missingMetadata.length).toBe(
					report.totalModels,
				);
			}),
		);
	});
});

const files: readonly MetadataFile[] = [
	{
		relativePath: "models/staging/_staging.yml",
		documentedModels: ["stg_orders", "retired_model"],
		modelProperties: [
			{
				name: "stg_orders",
				tested: false,
				columns: [
					{ name: "order_id", documented: true, tested: true },
					{ name: "status", documented: false, tested: false },
				],
			},
			{
				name: "retired_model",
				tested: true,
				columns: [{ name: "id", documented: false, tested: true }],
			},
		],
	},
	{
		relativePath: "models/marts/_marts.yml",
		documentedModels: ["orders", "stg_orders"],
		modelProperties: [
			{
				name: "orders",
				tested: true,
				columns: [{ name: "amount", documented: false, tested: false }],
			},
			{
				name: "stg_orders",
				tested: false,
				columns: [{ name: "status", documented: true, tested: false }],
			},
		],
	},
];

describe("buildColumnCoverage", () => {
	it("merges column entries across files and lists undocumented columns", () => {
		expect(
			buildColumnCoverage(["stg_orders", "orders", "customers"], files),
		).toEqual({
			totalColumns: 3,
			documentedColumns: 2,
			coveragePercent: 66.7,
			undocumentedByModel: [{ model: "orders", columns: ["amount"] }],
		});
	});

	it("reports zero for models without declared columns", () => {
		expect(buildColumnCoverage(["customers"], files)).toEqual({
			totalColumns: 0,
			documentedColumns: 0,
			coveragePercent: 0,
			undocumentedByModel: [],
		});
	});
});

describe("buildTestCoverage", () => {
	it("counts model-level and column tests", () => {
		expect(
			buildTestCoverage(["stg_orders", "orders", "customers", "orders"], files),
		).toEqual({
			totalModels: 3,
			testedModels: 2,
			untestedModels: ["customers"],
			modelCoveragePercent: 66.7,
			totalColumns: 3,
			testedColumns: 1,
			columnCoveragePercent: 33.3,
		});
	});

	it("reports zero for an empty project", () => {
		expect(buildTestCoverage([], files)).toEqual({
			totalModels: 0,
			testedModels: 0,
			untestedModels: [],
			modelCoveragePercent: 0,
			totalColumns: 0,
			testedColumns: 0,
			columnCoveragePercent: 0,
		});
	});
});

describe("toModelRecords", () => {
	it("drops file paths", () => {
		expect(
			toModelRecords([
				{
					name: "orders",
					relativePath: "models/orders.sql",
					hasMetadata: true,
					references: ["stg_orders"],
				},
			]),
		).toEqual([{ name: "orders", hasMetadata: true, references: ["stg_orders"] }]);
	});
});
