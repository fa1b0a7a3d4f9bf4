// CHANGE: Write Markdown reports for analyzed sources to an output directory
// WHY: Rendering stays in CORE; this module only owns the destination
// REF: REQ-METRICS-REPORT
// SOURCE: n/a
// PURITY: SHELL
// EFFECT: Effect<readonly string[], ReportWriteError>
// INVARIANT: One distinct file per record plus SUMMARY.md; returns written paths in write order
// COMPLEXITY: O(n) where n = |records|

import { Effect } from "effect";

import { describeError, ReportWriteError } from "../../core/errors.js";
import {
	renderMetricsMarkdown,
	renderSummaryMarkdown,
} from "../../core/report/markdown.js";
import {
	assignReportFileNames,
	SUMMARY_FILE_NAME,
} from "../../core/report/naming.js";
import type { MetricsRecord } from "../../core/types/index.js";
import { fs, path } from "../utils/node-mods.js";

function ensureDirectory(dir: string): Effect.Effect<void, ReportWriteError> {
	return Effect.tryPromise({
		try: () => fs.promises.mkdir(dir, { recursive: true }),
		catch: (error) =>
			new ReportWriteError({ path: dir, detail: describeError(error) }),
	}).pipe(Effect.asVoid);
}

function writeFile(
	filePath: string,
	content: string,
): Effect.Effect<string, ReportWriteError> {
	return Effect.tryPromise({
		try: () => fs.promises.writeFile(filePath, content, "utf8"),
		catch: (error) =>
			new ReportWriteError({ path: filePath, detail: describeError(error) }),
	}).pipe(Effect.as(filePath));
}

/**
 * Write one report per record and the batch summary.
 *
 * @param records Finalized metrics records
 * @param outputDir Destination directory (created when missing)
 * @effect Effect<readonly string[], ReportWriteError>
 */
export function writeReportsEffect(
	records: readonly MetricsRecord[],
	outputDir: string,
): Effect.Effect<readonly string[], ReportWriteError> {
	return Effect.gen(function* (_) {
		yield* _(ensureDirectory(outputDir));

		const written = yield* _(
			Effect.forEach(assignReportFileNames(records), ([record, fileName]) =>
				writeFile(path.join(outputDir, fileName), renderMetricsMarkdown(record)),
			),
		);

		const summaryPath = yield* _(
			writeFile(
				path.join(outputDir, SUMMARY_FILE_NAME),
				renderSummaryMarkdown(records),
			),
		);

		return [...written, summaryPath];
	});
}
