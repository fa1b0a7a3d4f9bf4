// CHANGE: Markdown rendering of metrics records
// WHY: Rendering is pure string building; the shell only decides where it goes
// REF: REQ-METRICS-REPORT
// SOURCE: https://github.github.com/gfm/#tables-extension-
// FORMAT THEOREM: ∀r: r.issues = [] → renderMetricsMarkdown(r) contains NO_ISSUES_MARKER
// PURITY: CORE
// INVARIANT: Output ends with exactly one "\n"
// COMPLEXITY: O(|issues| + |macroNames|) per record

import { match } from "ts-pattern";

import type { Issue, MetricsRecord } from "../types/metrics.js";
import { summarize } from "./summary.js";

export const NO_ISSUES_MARKER = "_No issues found._";

/**
 * Escape characters that break a GFM table cell.
 *
 * @pure true
 */
export function escapeTableCell(value: string): string {
	return value.replace(/\|/g, "\\|");
}

export function renderIssue(issue: Issue): string {
	return match(issue)
		.with(
			{ kind: "excess-macro-parameters" },
			(i) => `- **${i.kind}** (line ${i.line}): ${i.message}`,
		)
		.with({ kind: "high-complexity" }, (i) => `- **${i.kind}**: ${i.message}`)
		.exhaustive();
}

function metricRows(record: MetricsRecord): readonly (readonly [string, number])[] {
	return [
		["Lines", record.lines],
		["DATA steps", record.dataSteps],
		["PROC steps", record.procSteps],
		["Macro definitions", record.macroDefinitions],
		["Macro calls", record.macroCalls],
		["Conditionals", record.conditionals],
		["Loops", record.loops],
		["MERGE statements", record.merges],
		["PROC SQL blocks", record.sqlBlocks],
		["Max nesting depth", record.maxNestingDepth],
		["Cyclomatic complexity", record.cyclomaticComplexity],
	];
}

/**
 * Render one record as a standalone Markdown document.
 *
 * @pure true
 * @complexity O(|issues| + |macroNames|)
 */
export function renderMetricsMarkdown(record: MetricsRecord): string {
	const lines: string[] = [
		`# Complexity Metrics: ${record.name}`,
		"",
		`Segmentation mode: \`${record.mode}\``,
		"",
		"| Metric | Value |",
		"| --- | --- |",
		...metricRows(record).map(([label, value]) => `| ${label} | ${value} |`),
		"",
		"## Defined Macros",
		"",
	];

	if (record.macroNames.length === 0) {
		lines.push("_None._");
	} else {
		lines.push(...record.macroNames.map((name) => `- \`${name}\``));
	}

	lines.push("", "## Issues", "");
	if (record.issues.length === 0) {
		lines.push(NO_ISSUES_MARKER);
	} else {
		lines.push(...record.issues.map(renderIssue));
	}

	return `${lines.join("\n")}\n`;
}

/**
 * Render the batch index: one table row per record plus totals.
 *
 * @pure true
 * @complexity O(n)
 */
export function renderSummaryMarkdown(records: readonly MetricsRecord[]): string {
	const summary = summarize(records);
	const lines: string[] = [
		"# Complexity Summary",
		"",
		`Analyzed ${summary.files} file(s), ${summary.lines} line(s).`,
		"",
		"| File | Lines | Conditionals | Loops | Max depth | Complexity | Issues |",
		"| --- | --- | --- | --- | --- | --- | --- |",
		...records.map(
			(r) =>
				`| ${escapeTableCell(r.name)} | ${r.lines} | ${r.conditionals} | ${r.loops} | ${r.maxNestingDepth} | ${r.cyclomaticComplexity} | ${r.issues.length} |`,
		),
		"",
		`Total issues: ${summary.totalIssues} in ${summary.filesWithIssues} file(s)`,
	];

	if (summary.mostComplex !== null) {
		lines.push(
			`Most complex: ${summary.mostComplex.name} (${summary.mostComplex.score})`,
		);
	}

	return `${lines.join("\n")}\n`;
}
