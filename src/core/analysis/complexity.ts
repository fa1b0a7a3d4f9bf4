// CHANGE: Cyclomatic complexity derivation and final record assembly
// WHY: Terminal step of the pipeline; the record is frozen here
// REF: REQ-METRICS-ENGINE
// SOURCE: https://en.wikipedia.org/wiki/Cyclomatic_complexity
// FORMAT THEOREM: ∀c: cyclomaticComplexity(c) = c.conditionals + c.loops + 1 ≥ 1
// PURITY: CORE
// INVARIANT: At most one high-complexity issue per record
// COMPLEXITY: O(i) where i = |issues|

import type { SegmentationMode } from "../types/construct.js";
import type {
	ConstructCounts,
	HighComplexityIssue,
	Issue,
	MetricsRecord,
	Thresholds,
} from "../types/metrics.js";

/**
 * Each independent decision point (one if/then unit, one loop opener)
 * contributes one path.
 *
 * @pure true
 * @invariant result ≥ 1
 */
export function cyclomaticComplexity(
	counts: Pick<ConstructCounts, "conditionals" | "loops">,
): number {
	return counts.conditionals + counts.loops + 1;
}

export function highComplexityIssue(
	score: number,
	threshold: number,
): HighComplexityIssue {
	return {
		kind: "high-complexity",
		score,
		threshold,
		message: `Cyclomatic complexity ${score} exceeds threshold ${threshold}`,
	};
}

export interface CalculationInput {
	readonly name: string;
	readonly mode: SegmentationMode;
	readonly lines: number;
	readonly counts: ConstructCounts;
	readonly maxNestingDepth: number;
	readonly macroNames: readonly string[];
	readonly issues: readonly Issue[];
}

/**
 * Compute the score, append the threshold issue and freeze the record.
 *
 * @pure true
 * @postcondition score > maxComplexity ⇔ issues ends with a high-complexity issue
 */
export function calculateMetrics(
	input: CalculationInput,
	thresholds: Thresholds,
): MetricsRecord {
	const score = cyclomaticComplexity(input.counts);
	const issues =
		score > thresholds.maxComplexity
			? [...input.issues, highComplexityIssue(score, thresholds.maxComplexity)]
			: [...input.issues];

	return Object.freeze({
		name: input.name,
		mode: input.mode,
		lines: input.lines,
		...input.counts,
		maxNestingDepth: input.maxNestingDepth,
		cyclomaticComplexity: score,
		macroNames: Object.freeze([...input.macroNames]),
		issues: Object.freeze(issues.map((issue) => Object.freeze(issue))),
	});
}
