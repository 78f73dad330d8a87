// CHANGE: Load model directories from dbt_project.yml
// WHY: dbt projects may keep models outside "models/" via `model-paths`
// REF: dbt project configuration
// SOURCE: https://docs.getdbt.com/reference/project-configs/model-paths
// PURITY: SHELL
// EFFECT: Effect<ProjectConfig, YamlParseError>
// INVARIANT: modelPaths.length > 0 (defaults to ["models"])
// COMPLEXITY: O(n) where n = size of dbt_project.yml

import { Effect } from "effect";

import type { YamlParseError } from "../../core/errors.js";
import {
	isYamlMapping,
	isYamlSequence,
} from "../../core/project/metadata.js";
import type { ProjectConfig, YamlValue } from "../../core/types/index.js";
import { fs, path } from "../utils/node-mods.js";
import { readYamlFile } from "../utils/yaml.js";

export const PROJECT_FILE = "dbt_project.yml";
export const DEFAULT_MODEL_PATHS: readonly string[] = ["models"];

function stringList(value: YamlValue | undefined): readonly string[] {
	if (!isYamlSequence(value)) return [];
	return value.filter(
		(item): item is string => typeof item === "string" && item.length > 0,
	);
}

/**
 * Extracts project settings from a decoded dbt_project.yml.
 *
 * @pure true
 * @invariant `model-paths` wins over the legacy `source-paths`
 */
export function projectConfigFromDocument(document: YamlValue): ProjectConfig {
	if (!isYamlMapping(document)) {
		return { modelPaths: DEFAULT_MODEL_PATHS };
	}
	const mapping = document;
	const modelPaths = stringList(mapping["model-paths"]);
	const legacyPaths = stringList(mapping["source-paths"]);
	const resolved =
		modelPaths.length > 0
			? modelPaths
			: legacyPaths.length > 0
				? legacyPaths
				: DEFAULT_MODEL_PATHS;
	const name = mapping["name"];
	return typeof name === "string"
		? { name, modelPaths: resolved }
		: { modelPaths: resolved };
}

/**
 * Loads the project configuration; a missing dbt_project.yml means defaults.
 *
 * @effect Effect<ProjectConfig, YamlParseError>
 */
export function loadProjectConfig(
	projectRoot: string,
): Effect.Effect<ProjectConfig, YamlParseError> {
	const file = path.join(projectRoot, PROJECT_FILE);
	if (!fs.existsSync(file)) {
		return Effect.succeed({ modelPaths: DEFAULT_MODEL_PATHS });
	}
	return readYamlFile(file).pipe(
		Effect.map(projectConfigFromDocument),
		Effect.catchTag("FS", (error) => {
			console.warn(`⚠️  Unable to read ${PROJECT_FILE}: ${error.detail}`);
			return Effect.succeed<ProjectConfig>({ modelPaths: DEFAULT_MODEL_PATHS });
		}),
	);
}
