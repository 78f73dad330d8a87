// CHANGE: Unit tests for metadata detection over decoded YAML
// WHY: Malformed property files must contribute nothing rather than fail the scan
// REF: dbt model properties

import { describe, expect, it } from "vitest";

import {
	documentedModelNames,
	hasMetadata,
	isYamlMapping,
	isYamlSequence,
	modelNameFromPath,
	modelPropertiesOf,
} from "../../../src/core/project/index.js";

describe("modelNameFromPath", () => {
	it("strips directories and the .sql extension", () => {
		expect(modelNameFromPath("models/staging/stg_orders.sql")).toBe("stg_orders");
	});

	it("accepts backslashes and an upper-case extension", () => {
		expect(modelNameFromPath("models\\marts\\Customers.SQL")).toBe("Customers");
	});

	it("keeps names without an extension", () => {
		expect(modelNameFromPath("README")).toBe("README");
	});
});

describe("documentedModelNames", () => {
	it("reads names under the top-level models key", () => {
		const document = {
			version: 2,
			models: [{ name: "orders", description: "One row per order" }, { name: "customers" }],
		};
		expect(documentedModelNames(document)).toEqual(["orders", "customers"]);
	});

	it("skips entries without a usable name", () => {
		const document = {
			models: [{ name: "" }, { name: 7 }, "orders", null, { name: "ok" }],
		};
		expect(documentedModelNames(document)).toEqual(["ok"]);
	});

	it("returns nothing for documents without a models sequence", () => {
		expect(documentedModelNames(null)).toEqual([]);
		expect(documentedModelNames("models")).toEqual([]);
		expect(documentedModelNames([{ name: "orders" }])).toEqual([]);
		expect(documentedModelNames({ models: { name: "orders" } })).toEqual([]);
		expect(documentedModelNames({ sources: [{ name: "raw" }] })).toEqual([]);
	});
});

describe("modelPropertiesOf", () => {
	it("reads model tests and column descriptions and tests", () => {
		const document = {
			models: [
				{
					name: "orders",
					tests: [{ "dbt_utils.expression_is_true": { expression: "amount >= 0" } }],
					columns: [
						{ name: "order_id", description: "Primary key", data_tests: ["unique"] },
						{ name: "status", description: "   ", tests: [] },
						{ name: "" },
						"amount",
					],
				},
				{ name: "customers", columns: { name: "id" } },
			],
		};
		expect(modelPropertiesOf(document)).toEqual([
			{
				name: "orders",
				tested: true,
				columns: [
					{ name: "order_id", documented: true, tested: true },
					{ name: "status", documented: false, tested: false },
				],
			},
			{ name: "customers", tested: false, columns: [] },
		]);
	});

	it("agrees with documentedModelNames", () => {
		const document = { models: [{ name: "a" }, { name: 1 }, { name: "b" }] };
		expect(modelPropertiesOf(document).map((m) => m.name)).toEqual(
			documentedModelNames(document),
		);
	});
});

describe("YAML guards", () => {
	it("distinguishes mappings from sequences and scalars", () => {
		expect(isYamlMapping({})).toBe(true);
		expect(isYamlMapping([])).toBe(false);
		expect(isYamlMapping(null)).toBe(false);
		expect(isYamlMapping(undefined)).toBe(false);
		expect(isYamlSequence([])).toBe(true);
		expect(isYamlSequence({})).toBe(false);
		expect(isYamlSequence("a")).toBe(false);
	});
});

describe("hasMetadata", () => {
	const files = [
		{ relativePath: "models/schema.yml", documentedModels: ["orders"] },
		{ relativePath: "models/marts/_marts.yml", documentedModels: ["customers"] },
	];

	it("is true when any file documents the model", () => {
		expect(hasMetadata("customers", files)).toBe(true);
	});

	it("is false otherwise", () => {
		expect(hasMetadata("payments", files)).toBe(false);
		expect(hasMetadata("orders", [])).toBe(false);
	});
});
