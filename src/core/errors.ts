// CHANGE: Typed domain error ADT for the lineage core and the project shell
// WHY: Errors are values in signatures (Either in CORE, Effect in SHELL), never bare throws
// REF: Effect Data API
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * The graph has no topological order.
 *
 * @pure true (Data class)
 * @invariant cycle.length >= 2 ∧ cycle[0] === cycle[cycle.length - 1]
 * @invariant unresolved ⊇ cycle
 */
export class CyclicGraphError extends Data.TaggedError("CyclicGraphError")<{
	readonly cycle: readonly string[];
	readonly unresolved: readonly string[];
}> {}

/**
 * A model record cannot become a graph node.
 *
 * @pure true (Data class)
 * @invariant index >= 0
 */
export class InvalidModelRecordError extends Data.TaggedError(
	"InvalidModelRecordError",
)<{
	readonly index: number;
	readonly detail: string;
}> {}

/**
 * A lineage query named a model that is not in the graph.
 */
export class UnknownModelError extends Data.TaggedError("UnknownModelError")<{
	readonly name: string;
}> {}

/**
 * Project path does not exist or is not a directory.
 */
export class ProjectNotFoundError extends Data.TaggedError(
	"ProjectNotFoundError",
)<{
	readonly path: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * A YAML file (`dbt_project.yml` or a properties file) cannot be decoded.
 */
export class YamlParseError extends Data.TaggedError("YamlParseError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Errors produced by the pure lineage core.
 */
export type LineageError =
	| CyclicGraphError
	| InvalidModelRecordError
	| UnknownModelError;

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| LineageError
	| ProjectNotFoundError
	| FSError
	| YamlParseError;
