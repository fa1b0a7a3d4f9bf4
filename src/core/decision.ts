// CHANGE: Pure decision function to compute exit code
// WHY: Centralize termination logic in Functional Core
// REF: FCIS plan, core decision
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀s: (s.hasAccessFailures ∨ (s.failOnIssues ∧ s.hasIssues)) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from run state (pure function).
 *
 * Issues are data, not failures: they only fail the run when the caller
 * opted in with `failOnIssues`. Unreadable inputs always fail it.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ hasAccessFailures: false, hasIssues: true, failOnIssues: false });
 * // 0
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.hasAccessFailures || (s.failOnIssues && s.hasIssues),
		(failed): ExitCode => (failed ? 1 : 0),
	);
