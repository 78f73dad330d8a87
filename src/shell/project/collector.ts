// CHANGE: Shell collector for dbt model and property files
// WHY: Separate IO-bound traversal from pure reference/metadata logic
// REF: user-request-metadata-coverage
// SOURCE: n/a
// FORMAT THEOREM: scan(root).models = { m | m ∈ modelPaths/**/*.sql }, each with refs(sql) and hasMetadata
// PURITY: SHELL
// EFFECT: Effect<ProjectScan, ProjectNotFoundError | YamlParseError>
// INVARIANT: Directory entries visited in sorted order; unreadable files skipped with a warning
// COMPLEXITY: O(n) where n = files under the project root

import { Effect } from "effect";

import { ProjectNotFoundError, type YamlParseError } from "../../core/errors.js";
import {
	documentedModelNames,
	extractModelRefs,
	hasMetadata,
	modelNameFromPath,
	modelPropertiesOf,
} from "../../core/project/index.js";
import type {
	MetadataFile,
	ProjectConfig,
	ProjectScan,
	ScannedModel,
} from "../../core/types/index.js";
import { loadProjectConfig } from "../config/project.js";
import { fs, path } from "../utils/node-mods.js";
import { readTextFile, readYamlFile } from "../utils/yaml.js";

const fsPromises = fs.promises;

const IGNORED_DIRECTORIES = new Set([
	".git",
	"node_modules",
	"target",
	"dbt_packages",
	"dbt_modules",
	"logs",
]);

/**
 * Options for a project scan.
 *
 * @property metadataOnly Skip ref() extraction (references stay empty)
 */
export interface ScanOptions {
	readonly metadataOnly: boolean;
}

type FileFilter = (name: string) => boolean;

const isSqlFile: FileFilter = (name) => name.toLowerCase().endsWith(".sql");
const isYamlFile: FileFilter = (name) => /\.ya?ml$/iu.test(name);

/**
 * CHANGE: Normalize relative path inside the project root.
 * WHY: Collector always emits POSIX separators for CORE.
 * INVARIANT: Never starts/ends with "/"
 * COMPLEXITY: O(1)
 */
function joinRelative(base: string, name: string): string {
	if (base.length === 0) return name;
	return `${base}/${name}`;
}

function normalizeModelPath(modelPath: string): string {
	return modelPath
		.replace(/\\/g, "/")
		.replace(/^\.\/+/u, "")
		.replace(/\/+$/u, "");
}

/**
 * Recursively lists files accepted by `filter`, relative to the project root.
 *
 * @effect Effect<readonly string[], never>
 * @invariant Missing or unreadable directories yield []
 */
function walkFiles(
	absoluteDir: string,
	relativeBase: string,
	filter: FileFilter,
): Effect.Effect<readonly string[]> {
	return Effect.gen(function* (_) {
		const dirents = yield* _(
			Effect.tryPromise({
				try: () => fsPromises.readdir(absoluteDir, { withFileTypes: true }),
				catch: (error) => (error instanceof Error ? error : new Error(String(error))),
			}),
		);

		const files: string[] = [];
		const sorted = [...dirents].sort((a, b) => a.name.localeCompare(b.name));
		for (const dirent of sorted) {
			const relativePath = joinRelative(relativeBase, dirent.name);
			if (dirent.isDirectory()) {
				if (IGNORED_DIRECTORIES.has(dirent.name)) continue;
				const nested = yield* _(
					walkFiles(path.join(absoluteDir, dirent.name), relativePath, filter),
				);
				files.push(...nested);
			} else if (dirent.isFile() && filter(dirent.name)) {
				files.push(relativePath);
			}
		}
		return files;
	}).pipe(
		Effect.catchAll((error) => {
			console.warn(`⚠️  Unable to read directory ${absoluteDir}: ${error.message}`);
			return Effect.succeed<readonly string[]>([]);
		}),
	);
}

/**
 * Reads every YAML file and records the models it documents.
 *
 * @invariant Files that fail to read or parse are skipped with a warning
 */
function collectMetadataFiles(
	root: string,
): Effect.Effect<readonly MetadataFile[]> {
	return Effect.gen(function* (_) {
		const yamlPaths = yield* _(walkFiles(root, "", isYamlFile));
		const files: MetadataFile[] = [];
		for (const relativePath of yamlPaths) {
			const document = yield* _(
				readYamlFile(path.join(root, relativePath)).pipe(
					Effect.map((value) => ({ ok: true as const, value })),
					Effect.catchAll((error) => {
						console.warn(`⚠️  Skipped ${relativePath} (${error.detail})`);
						return Effect.succeed({ ok: false as const });
					}),
				),
			);
			if (document.ok) {
				files.push({
					relativePath,
					documentedModels: documentedModelNames(document.value),
				});
			}
		}
		return files;
	});
}

/**
 * Lists model SQL files under every configured model directory.
 *
 * @invariant Result sorted by relative path, without duplicates
 */
function collectModelPaths(
	root: string,
	config: ProjectConfig,
): Effect.Effect<readonly string[]> {
	return Effect.gen(function* (_) {
		const found = new Set<string>();
		for (const modelPath of config.modelPaths) {
			const relativeBase = normalizeModelPath(modelPath);
			const absoluteDir = path.join(root, relativeBase);
			if (!fs.existsSync(absoluteDir)) continue;
			const files = yield* _(walkFiles(absoluteDir, relativeBase, isSqlFile));
			for (const file of files) found.add(file);
		}
		return [...found].sort((a, b) => a.localeCompare(b));
	});
}

function scanModel(
	root: string,
	relativePath: string,
	metadataFiles: readonly MetadataFile[],
	options: ScanOptions,
): Effect.Effect<ScannedModel | null> {
	const name = modelNameFromPath(relativePath);
	return readTextFile(path.join(root, relativePath)).pipe(
		Effect.map(
			(sql): ScannedModel => ({
				name,
				relativePath,
				hasMetadata: hasMetadata(name, metadataFiles),
				references: options.metadataOnly ? [] : extractModelRefs(sql),
			}),
		),
		Effect.catchAll((error) => {
			console.warn(`⚠️  Skipped ${relativePath} (${error.detail})`);
			return Effect.succeed(null);
		}),
	);
}

function ensureProjectDirectory(
	root: string,
): Effect.Effect<void, ProjectNotFoundError> {
	return Effect.tryPromise({
		try: () => fsPromises.stat(root),
		catch: () => new ProjectNotFoundError({ path: root }),
	}).pipe(
		Effect.flatMap((stats) =>
			stats.isDirectory()
				? Effect.void
				: Effect.fail(new ProjectNotFoundError({ path: root })),
		),
	);
}

/**
 * CHANGE: Collect models and metadata of a dbt project under Effect discipline.
 * WHY: Expose safe API for runLineage; only a missing project or a broken dbt_project.yml fails.
 * SOURCE: n/a
 * PURITY: SHELL
 * EFFECT: Effect<ProjectScan, ProjectNotFoundError | YamlParseError>
 * COMPLEXITY: O(n)
 *
 * @param projectPath - Project directory, relative to cwd or absolute
 * @param options - Scan options
 */
export function scanProject(
	projectPath: string,
	options: ScanOptions,
): Effect.Effect<ProjectScan, ProjectNotFoundError | YamlParseError> {
	return Effect.gen(function* (_) {
		const root = path.resolve(process.cwd(), projectPath);
		yield* _(ensureProjectDirectory(root));
		const config = yield* _(loadProjectConfig(root));
		const metadataFiles = yield* _(collectMetadataFiles(root));
		const modelPaths = yield* _(collectModelPaths(root, config));

		const models: ScannedModel[] = [];
		for (const relativePath of modelPaths) {
			const model = yield* _(
				scanModel(root, relativePath, metadataFiles, options),
			);
			if (model !== null) models.push(model);
		}
		return { root, config, models, metadataFiles };
	});
}
