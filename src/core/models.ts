// CHANGE: Functional Core domain models (pure, immutable)
// WHY: Exit code is decided in CORE from flags computed by APP
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the CLI process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing exit code from a project inspection.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 * - @complexity O(1)
 */
export interface DecisionState {
	readonly hasMissingMetadata: boolean;
	readonly strict: boolean;
}
