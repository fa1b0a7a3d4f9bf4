// CHANGE: Introduce Functional Core domain models (pure, immutable)
// WHY: Establish FCIS separation: CORE contains only pure types/functions and invariants
// REF: Architecture plan (Iteration 1 scaffolding)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the analyzer process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing exit code from an analysis run.
 *
 * @remarks
 * - @pure true
 * - @precondition flags are computed from results deterministically
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly hasAccessFailures: boolean;
	readonly hasIssues: boolean;
	readonly failOnIssues: boolean;
}
