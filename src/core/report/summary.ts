// CHANGE: Pure batch summary across metrics records
// WHY: Console printer and Markdown index show the same totals
// REF: REQ-METRICS-REPORT
// SOURCE: n/a
// FORMAT THEOREM: ∀records: summarize(records).totalIssues = Σ |r.issues|
// PURITY: CORE
// INVARIANT: Independent of record order except for ties on mostComplex (first wins)
// COMPLEXITY: O(n) where n = |records|

import type { MetricsRecord } from "../types/metrics.js";

export interface ComplexityLeader {
	readonly name: string;
	readonly score: number;
}

export interface BatchSummary {
	readonly files: number;
	readonly lines: number;
	readonly conditionals: number;
	readonly loops: number;
	readonly macroDefinitions: number;
	readonly macroCalls: number;
	readonly totalIssues: number;
	readonly filesWithIssues: number;
	readonly mostComplex: ComplexityLeader | null;
}

const EMPTY_SUMMARY: BatchSummary = {
	files: 0,
	lines: 0,
	conditionals: 0,
	loops: 0,
	macroDefinitions: 0,
	macroCalls: 0,
	totalIssues: 0,
	filesWithIssues: 0,
	mostComplex: null,
};

function pickLeader(
	current: ComplexityLeader | null,
	record: MetricsRecord,
): ComplexityLeader {
	if (current !== null && current.score >= record.cyclomaticComplexity) {
		return current;
	}
	return { name: record.name, score: record.cyclomaticComplexity };
}

/**
 * @pure true
 * @invariant summarize([]).mostComplex = null
 */
export function summarize(records: readonly MetricsRecord[]): BatchSummary {
	return records.reduce<BatchSummary>(
		(acc, record) => ({
			files: acc.files + 1,
			lines: acc.lines + record.lines,
			conditionals: acc.conditionals + record.conditionals,
			loops: acc.loops + record.loops,
			macroDefinitions: acc.macroDefinitions + record.macroDefinitions,
			macroCalls: acc.macroCalls + record.macroCalls,
			totalIssues: acc.totalIssues + record.issues.length,
			filesWithIssues: acc.filesWithIssues + (record.issues.length > 0 ? 1 : 0),
			mostComplex: pickLeader(acc.mostComplex, record),
		}),
		EMPTY_SUMMARY,
	);
}
