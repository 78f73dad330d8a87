// CHANGE: Tests for the console printer
// WHY: Reports go to stdout line by line, failures to stderr with a hint
// REF: user-request-lineage-report

import { describe, expect, it, vi } from "vitest";

import { UnknownModelError } from "../../../src/core/errors.js";
import type { InspectionReport } from "../../../src/core/types/index.js";
import { printFailure, printReport } from "../../../src/shell/output/index.js";

const report: InspectionReport = {
	project: "/work/shop",
	models: [
		{ name: "orders", relativePath: "models/orders.sql", hasMetadata: true, references: [] },
	],
	coverage: {
		totalModels: 1,
		documentedModels: 1,
		missingMetadata: [],
		coveragePercent: 100,
	},
	columns: {
		totalColumns: 1,
		documentedColumns: 1,
		coveragePercent: 100,
		undocumentedByModel: [],
	},
	tests: {
		totalModels: 1,
		testedModels: 1,
		untestedModels: [],
		modelCoveragePercent: 100,
		totalColumns: 1,
		testedColumns: 1,
		columnCoveragePercent: 100,
	},
	lineage: {
		ordering: ["orders"],
		lines: ["orders is a root node"],
		text: "orders is a root node\n",
	},
	danglingReferences: [],
};

describe("printReport", () => {
	it("logs one text line per call", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		printReport(report, "text");
		expect(log.mock.calls.map((call) => call[0])).toEqual([
			"Lineage description:",
			"orders is a root node",
			"",
			"Metadata coverage: 1/1 models (100%)",
			"",
			"All models have associated metadata.",
			"",
			"Column documentation: 1/1 columns (100%)",
			"",
			"Test coverage: 1/1 models (100%)",
			"Column test coverage: 1/1 columns (100%)",
		]);
	});

	it("logs JSON as a single document", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		printReport(report, "json");
		expect(log).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toMatchObject({
			project: "/work/shop",
			lineage: { ordering: ["orders"] },
		});
	});
});

describe("printFailure", () => {
	it("prints message and hint to stderr", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		printFailure(new UnknownModelError({ name: "payments" }));
		expect(error.mock.calls.map((call) => call[0])).toEqual([
			"❌ Unknown model: payments",
			"   Pass a model name that appears in the lineage description.",
		]);
	});
});
