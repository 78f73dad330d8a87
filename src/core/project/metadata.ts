// CHANGE: Detect documented models from parsed YAML property files
// WHY: A model "has metadata" when some YAML `models:` list names it
// REF: dbt model properties
// SOURCE: https://docs.getdbt.com/reference/model-properties
// PURITY: CORE
// INVARIANT: Malformed documents contribute no names instead of failing
// COMPLEXITY: O(k) where k = entries under `models:`

import type {
	ColumnProperties,
	MetadataFile,
	ModelProperties,
	YamlValue,
} from "../types/project.js";

export type YamlMapping = { readonly [key: string]: YamlValue };

export function isYamlMapping(
	value: YamlValue | undefined,
): value is YamlMapping {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isYamlSequence(
	value: YamlValue | undefined,
): value is readonly YamlValue[] {
	return Array.isArray(value);
}

/**
 * Model name derived from a model file path.
 *
 * @example
 * ```ts
 * modelNameFromPath("models/staging/stg_orders.sql"); // "stg_orders"
 * ```
 */
export function modelNameFromPath(relativePath: string): string {
	const segments = relativePath.replace(/\\/g, "/").split("/");
	const base = segments.at(-1) ?? relativePath;
	return base.toLowerCase().endsWith(".sql") ? base.slice(0, -4) : base;
}

function nameOf(entry: YamlMapping): string | null {
	const name = entry["name"];
	return typeof name === "string" && name.length > 0 ? name : null;
}

function hasNonEmptySequence(value: YamlValue | undefined): boolean {
	return isYamlSequence(value) && value.length > 0;
}

// dbt 1.8 renamed `tests` to `data_tests`; both are accepted
function declaresTests(entry: YamlMapping): boolean {
	return (
		hasNonEmptySequence(entry["tests"]) || hasNonEmptySequence(entry["data_tests"])
	);
}

function columnPropertiesOf(value: YamlValue | undefined): readonly ColumnProperties[] {
	if (!isYamlSequence(value)) return [];
	return value.flatMap((entry) => {
		if (!isYamlMapping(entry)) return [];
		const name = nameOf(entry);
		if (name === null) return [];
		const description = entry["description"];
		return [
			{
				name,
				documented:
					typeof description === "string" && description.trim().length > 0,
				tested: declaresTests(entry),
			},
		];
	});
}

/**
 * Entries under the top-level `models:` key of a YAML document.
 *
 * @param document - Output of a YAML parser (`null` for empty files)
 * @returns One entry per mapping with a non-empty string `name`, in document order
 *
 * @pure true
 * @example
 * ```ts
 * modelPropertiesOf({ models: [{ name: "orders", columns: [{ name: "id", tests: ["unique"] }] }] });
 * // [{ name: "orders", tested: false, columns: [{ name: "id", documented: false, tested: true }] }]
 * ```
 */
export function modelPropertiesOf(document: YamlValue): readonly ModelProperties[] {
	if (!isYamlMapping(document)) return [];
	const models = document["models"];
	if (!isYamlSequence(models)) return [];
	return models.flatMap((entry) => {
		if (!isYamlMapping(entry)) return [];
		const name = nameOf(entry);
		if (name === null) return [];
		return [
			{
				name,
				tested: declaresTests(entry),
				columns: columnPropertiesOf(entry["columns"]),
			},
		];
	});
}

/**
 * Names listed under the top-level `models:` key of a YAML document.
 *
 * @pure true
 */
export function documentedModelNames(document: YamlValue): readonly string[] {
	return modelPropertiesOf(document).map((model) => model.name);
}

/**
 * Whether any metadata file documents `name`.
 */
export function hasMetadata(
	name: string,
	files: readonly Pick<MetadataFile, "documentedModels">[],
): boolean {
	return files.some((file) => file.documentedModels.includes(name));
}
