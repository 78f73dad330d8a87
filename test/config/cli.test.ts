// CHANGE: Unit tests for CLI argument parsing
// WHY: Ensure flags and positional arguments are parsed deterministically with strict typing
// REF: user-request-cli
// SOURCE: n/a

import { describe, expect, it } from "vitest";

import type { CLIOptions } from "../../src/core/types/index.js";
import { parseCLIArgs } from "../../src/shell/config/index.js";

/**
 * Safely set process.argv for the duration of a test and restore afterwards.
 *
 * Invariants:
 * - Always restore original argv to avoid cross-test contamination.
 */
function withArgv<T>(args: readonly string[], fn: () => T): T {
	const original = process.argv.slice();
	try {
		// First two entries are node and script placeholders
		process.argv = [original[0] ?? "node", original[1] ?? "script.js", ...args];
		return fn();
	} finally {
		process.argv = original;
	}
}

const defaults: CLIOptions = {
	projectPath: ".",
	format: "text",
	metadataOnly: false,
	strict: false,
	noPreflight: false,
};

describe("parseCLIArgs: defaults and positional", () => {
	it("returns defaults when no args provided", (): void => {
		expect(withArgv([], () => parseCLIArgs())).toEqual(defaults);
	});

	it("parses single positional as projectPath", (): void => {
		const opts = withArgv(["analytics"], () => parseCLIArgs());
		expect(opts.projectPath).toBe("analytics");
	});

	it("ignores empty string arguments", (): void => {
		const opts = withArgv(["", "analytics"], () => parseCLIArgs());
		expect(opts.projectPath).toBe("analytics");
	});

	it("keeps the last positional", (): void => {
		expect(parseCLIArgs(["first", "second"]).projectPath).toBe("second");
	});
});

describe("parseCLIArgs: value flags", () => {
	it("reads project path, format and model", (): void => {
		expect(
			parseCLIArgs(["-f", "warehouse", "--format", "json", "--model", "orders"]),
		).toEqual({ ...defaults, projectPath: "warehouse", format: "json", model: "orders" });
	});

	it("accepts the long project path flag", (): void => {
		expect(parseCLIArgs(["--dbt-project-path", "dbt"]).projectPath).toBe("dbt");
	});

	it("falls back to text for unknown formats", (): void => {
		expect(parseCLIArgs(["--format", "yaml"]).format).toBe("text");
	});

	it("ignores a value flag without a value", (): void => {
		expect(parseCLIArgs(["--model"])).toEqual(defaults);
	});
});

describe("parseCLIArgs: boolean flags", () => {
	it("enables metadata-only, strict and no-preflight", (): void => {
		expect(
			parseCLIArgs(["--metadata-only", "--strict", "--no-preflight"]),
		).toEqual({ ...defaults, metadataOnly: true, strict: true, noPreflight: true });
	});

	it("ignores unknown flags", (): void => {
		expect(parseCLIArgs(["--verbose", "dbt"])).toEqual({
			...defaults,
			projectPath: "dbt",
		});
	});
});
