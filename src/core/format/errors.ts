// CHANGE: Map typed errors to user-facing message + remediation hint
// WHY: APP reports every failure the same way; exhaustive over AppError
// PURITY: CORE
// INVARIANT: ∀ e ∈ AppError: describeError(e).message.length > 0
// COMPLEXITY: O(n) for cycle rendering

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";

export interface ErrorDescription {
	readonly message: string;
	readonly hint: string;
}

/**
 * Describes an application error.
 *
 * @pure true
 * @example
 * ```ts
 * describeError(new UnknownModelError({ name: "orders" })).message;
 * // "Unknown model: orders"
 * ```
 */
export function describeError(error: AppError): ErrorDescription {
	return match(error)
		.with({ _tag: "CyclicGraphError" }, (e) => ({
			message: `Dependency cycle detected: ${e.cycle.join(" -> ")}`,
			hint: "Remove one of the ref() calls that close the cycle.",
		}))
		.with({ _tag: "InvalidModelRecordError" }, (e) => ({
			message: `Invalid model record at position ${e.index}: ${e.detail}`,
			hint: "Every model and every ref() target needs a non-empty name.",
		}))
		.with({ _tag: "UnknownModelError" }, (e) => ({
			message: `Unknown model: ${e.name}`,
			hint: "Pass a model name that appears in the lineage description.",
		}))
		.with({ _tag: "ProjectNotFoundError" }, (e) => ({
			message: `dbt project directory not found: ${e.path}`,
			hint: "Pass the directory that contains dbt_project.yml.",
		}))
		.with({ _tag: "FS" }, (e) => ({
			message: e.path === undefined ? e.detail : `${e.path}: ${e.detail}`,
			hint: "Check file permissions.",
		}))
		.with({ _tag: "YamlParseError" }, (e) => ({
			message: `Cannot parse ${e.path}: ${e.detail}`,
			hint: `Fix the YAML syntax of ${e.path}.`,
		}))
		.exhaustive();
}
