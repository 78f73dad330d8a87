// CHANGE: Unit tests for upstream/downstream closures and node filters
// WHY: Impact queries must list each model once, nearest first
// REF: user-request-model-impact

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { UnknownModelError } from "../../../src/core/errors.js";
import {
	danglingReferences,
	downstreamOf,
	missingMetadata,
	upstreamOf,
} from "../../../src/core/lineage/index.js";
import { graphOf, leftOf, model } from "../../utils/builders.js";

describe("upstreamOf / downstreamOf", () => {
	const chain = graphOf([model("mart", ["staging"]), model("staging", ["raw"])]);

	it("walks a chain nearest first", () => {
		expect(Either.getOrThrow(upstreamOf(chain, "mart"))).toEqual([
			"staging",
			"raw",
		]);
		expect(Either.getOrThrow(downstreamOf(chain, "raw"))).toEqual([
			"staging",
			"mart",
		]);
	});

	it("returns an empty closure at the ends of the chain", () => {
		expect(Either.getOrThrow(upstreamOf(chain, "raw"))).toEqual([]);
		expect(Either.getOrThrow(downstreamOf(chain, "mart"))).toEqual([]);
	});

	it("visits a shared ancestor once", () => {
		const diamond = graphOf([
			model("d", ["b", "c"]),
			model("b", ["a"]),
			model("c", ["a"]),
			model("a"),
		]);
		expect(Either.getOrThrow(upstreamOf(diamond, "d"))).toEqual(["b", "c", "a"]);
		expect(Either.getOrThrow(downstreamOf(diamond, "a"))).toEqual([
			"b",
			"c",
			"d",
		]);
	});

	it("terminates on cycles and excludes the start model", () => {
		const cyclic = graphOf([model("A", ["B"]), model("B", ["A"])]);
		expect(Either.getOrThrow(upstreamOf(cyclic, "A"))).toEqual(["B"]);
	});

	it("fails with UnknownModelError for a name outside the graph", () => {
		const error = leftOf(downstreamOf(chain, "orders"));
		expect(error).toBeInstanceOf(UnknownModelError);
		expect(error.name).toBe("orders");
	});
});

describe("missingMetadata / danglingReferences", () => {
	const graph = graphOf([
		model("a", [], false),
		model("b", ["ghost"], true),
		model("c", [], false),
	]);

	it("lists declared models without metadata in node order", () => {
		expect(missingMetadata(graph)).toEqual(["a", "c"]);
	});

	it("lists referenced names that no record declares", () => {
		expect(danglingReferences(graph)).toEqual(["ghost"]);
	});
});
