// CHANGE: CLI option types for the lineage inspector
// WHY: Options are parsed in SHELL and consumed by APP as an immutable value
// PURITY: CORE
// COMPLEXITY: O(1) - type declarations only

/**
 * Output format of the report.
 */
export type OutputFormat = "text" | "json";

/**
 * Command-line options.
 *
 * @property projectPath dbt project directory
 * @property format Report format written to stdout
 * @property model Model whose upstream/downstream closure is printed
 * @property metadataOnly Skip reference extraction and lineage
 * @property strict Fail (exit 1) when any model lacks metadata
 * @property noPreflight Skip project layout checks
 */
export interface CLIOptions {
	readonly projectPath: string;
	readonly format: OutputFormat;
	readonly model?: string;
	readonly metadataOnly: boolean;
	readonly strict: boolean;
	readonly noPreflight: boolean;
}
