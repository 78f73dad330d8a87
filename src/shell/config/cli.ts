// CHANGE: CLI argument parsing for the lineage inspector
// WHY: Lookup tables for value/boolean flags keep the parser flat
// REF: user-request-cli
// SOURCE: n/a

import type { CLIOptions, OutputFormat } from "../../core/types/index.js";

type ParseState = {
	-readonly [K in keyof CLIOptions]: CLIOptions[K];
};

interface ArgProcessResult {
	readonly state: ParseState;
	readonly skipNext: boolean;
}

type ValueFlagHandler = (value: string, current: ParseState) => ParseState;

function toOutputFormat(value: string): OutputFormat {
	return value === "json" ? "json" : "text";
}

const setProjectPath: ValueFlagHandler = (value, current) => ({
	...current,
	projectPath: value,
});

// CHANGE: Handlers for flags that consume the next token
// WHY: Eliminates branching in processArgument
const valueHandlers = new Map<string, ValueFlagHandler>([
	["-f", setProjectPath],
	["--dbt-project-path", setProjectPath],
	["--format", (value, current) => ({ ...current, format: toOutputFormat(value) })],
	["--model", (value, current) => ({ ...current, model: value })],
]);

type BooleanOption = "metadataOnly" | "strict" | "noPreflight";

const booleanFlags = new Map<string, BooleanOption>([
	["--metadata-only", "metadataOnly"],
	["--strict", "strict"],
	["--no-preflight", "noPreflight"],
]);

function enableOption(current: ParseState, option: BooleanOption): ParseState {
	const next = { ...current };
	next[option] = true;
	return next;
}

function processArgument(
	arg: string,
	next: string | undefined,
	current: ParseState,
): ArgProcessResult {
	const handler = valueHandlers.get(arg);
	if (handler !== undefined) {
		if (next === undefined) return { state: current, skipNext: false };
		return { state: handler(next, current), skipNext: true };
	}

	const option = booleanFlags.get(arg);
	if (option !== undefined) {
		return { state: enableOption(current, option), skipNext: false };
	}

	// Handle positional argument
	if (!arg.startsWith("-")) {
		return { state: { ...current, projectPath: arg }, skipNext: false };
	}

	return { state: current, skipNext: false };
}

/**
 * Parses command-line arguments.
 *
 * @param args - Arguments without the node binary and script path
 * @returns CLI options (unknown flags are ignored)
 *
 * @example
 * ```ts
 * // Command: model-lineage ./analytics --format json --model orders
 * const options = parseCLIArgs();
 * // Returns: { projectPath: "./analytics", format: "json", model: "orders", ... }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let state: ParseState = {
		projectPath: ".",
		format: "text",
		metadataOnly: false,
		strict: false,
		noPreflight: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args.at(i + 1), state);
		state = result.state;
		if (result.skipNext) {
			i++;
		}
	}
	return state;
}
