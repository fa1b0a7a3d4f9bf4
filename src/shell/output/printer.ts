// CHANGE: Console printer for analysis results
// WHY: Logging confined to SHELL; wording comes from CORE formatters
// REF: REQ-METRICS-REPORT
// SOURCE: n/a
// PURITY: SHELL
// EFFECT: Effect<void, never>
// INVARIANT: stdout for results, stderr for failures
// COMPLEXITY: O(n + i) where n = records, i = issues

import { Effect } from "effect";

import { summarize } from "../../core/report/summary.js";
import {
	formatFailureLine,
	formatRecordLines,
	formatSummaryLines,
} from "../../core/report/text.js";
import type { MetricsRecord, SourceFailure } from "../../core/types/index.js";

/**
 * Print per-record lines followed by the batch summary.
 *
 * @pure false (console output)
 */
export function printResultsEffect(
	records: readonly MetricsRecord[],
): Effect.Effect<void> {
	return Effect.sync(() => {
		for (const record of records) {
			for (const line of formatRecordLines(record)) {
				console.log(line);
			}
		}
		console.log("");
		for (const line of formatSummaryLines(summarize(records))) {
			console.log(line);
		}
	});
}

/**
 * Print records as a JSON array (machine-readable mode).
 *
 * @pure false (console output)
 */
export function printJsonEffect(
	records: readonly MetricsRecord[],
): Effect.Effect<void> {
	return Effect.sync(() => {
		console.log(JSON.stringify(records, null, 2));
	});
}

/**
 * @pure false (console output)
 */
export function printFailuresEffect(
	failures: readonly SourceFailure[],
): Effect.Effect<void> {
	return Effect.sync(() => {
		for (const failure of failures) {
			console.error(formatFailureLine(failure));
		}
	});
}
