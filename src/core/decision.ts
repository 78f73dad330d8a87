// CHANGE: Pure decision function computing the exit code
// WHY: Centralize termination logic in Functional Core with Effect composition support
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀s ∈ State: (s.strict ∧ s.hasMissingMetadata) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from the inspection state (pure function).
 *
 * @param state - Immutable flags computed from the project scan
 * @returns 1 when strict mode is on and some model lacks metadata; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ hasMissingMetadata: true, strict: false }); // 0
 * computeExitCode({ hasMissingMetadata: true, strict: true }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.strict && s.hasMissingMetadata,
		(failed): ExitCode => (failed ? 1 : 0),
	);

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 * @complexity O(1)
 */
export const computeExitCodeEffect = (
	state: DecisionState,
): Effect.Effect<ExitCode> => pipe(state, computeExitCode, Effect.succeed);
