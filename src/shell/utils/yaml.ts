// CHANGE: Effect wrappers for reading text files and decoding YAML
// WHY: Collector and config loader share the same read → parse pipeline with typed errors
// PURITY: SHELL
// EFFECT: Effect<YamlValue, FSError | YamlParseError>
// INVARIANT: Empty documents decode to null
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";
import { parse } from "yaml";

import { FSError, YamlParseError } from "../../core/errors.js";
import type { YamlValue } from "../../core/types/index.js";
import { fs } from "./node-mods.js";

function errorDetail(error: Error | string): string {
	return error instanceof Error ? error.message : error;
}

/**
 * Reads a UTF-8 file.
 *
 * @effect Effect<string, FSError>
 */
export function readTextFile(absolutePath: string): Effect.Effect<string, FSError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(absolutePath, "utf8"),
		catch: (error) =>
			new FSError({
				detail: errorDetail(error instanceof Error ? error : String(error)),
				path: absolutePath,
			}),
	});
}

/**
 * Decodes one YAML document (YAML 1.2 core schema).
 *
 * @param text - File content
 * @param filePath - Path used in the error value
 * @effect Effect<YamlValue, YamlParseError>
 */
export function parseYamlDocument(
	text: string,
	filePath: string,
): Effect.Effect<YamlValue, YamlParseError> {
	return Effect.try({
		try: (): YamlValue => parse(text) ?? null,
		catch: (error) =>
			new YamlParseError({
				path: filePath,
				detail: errorDetail(error instanceof Error ? error : String(error)),
			}),
	});
}

/**
 * Reads and decodes a YAML file.
 */
export function readYamlFile(
	absolutePath: string,
): Effect.Effect<YamlValue, FSError | YamlParseError> {
	return readTextFile(absolutePath).pipe(
		Effect.flatMap((text) => parseYamlDocument(text, absolutePath)),
	);
}
