// CHANGE: Plain-text console lines for records and batch summaries
// WHY: Shell printer only writes lines; wording is testable in CORE
// REF: REQ-METRICS-REPORT
// PURITY: CORE
// INVARIANT: One header line per record, one line per issue
// COMPLEXITY: O(|issues|)

import type { MetricsRecord } from "../types/metrics.js";
import type { SourceFailure } from "../types/sources.js";
import type { BatchSummary } from "./summary.js";

/**
 * @pure true
 *
 * @example
 * ```ts
 * formatRecordLines(record);
 * // ["📄 etl/load.sas — complexity 2, max depth 0, 0 issue(s)"]
 * ```
 */
export function formatRecordLines(record: MetricsRecord): readonly string[] {
	const header = `📄 ${record.name} — complexity ${record.cyclomaticComplexity}, max depth ${record.maxNestingDepth}, ${record.issues.length} issue(s)`;
	return [
		header,
		...record.issues.map((issue) => `   ⚠️  ${issue.kind}: ${issue.message}`),
	];
}

/**
 * @pure true
 */
export function formatSummaryLines(summary: BatchSummary): readonly string[] {
	const lines = [
		`📊 Analyzed ${summary.files} file(s), ${summary.lines} line(s): ${summary.conditionals} conditional(s), ${summary.loops} loop(s), ${summary.macroDefinitions} macro definition(s), ${summary.macroCalls} macro call(s)`,
	];
	if (summary.mostComplex !== null) {
		lines.push(
			`🔝 Most complex: ${summary.mostComplex.name} (${summary.mostComplex.score})`,
		);
	}
	lines.push(
		summary.totalIssues === 0
			? "✅ No issues found!"
			: `⚠️  ${summary.totalIssues} issue(s) in ${summary.filesWithIssues} file(s)`,
	);
	return lines;
}

/**
 * @pure true
 */
export function formatFailureLine(failure: SourceFailure): string {
	return `❌ Unable to read ${failure.path}: ${failure.detail}`;
}
