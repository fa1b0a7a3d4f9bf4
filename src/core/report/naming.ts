// CHANGE: Deterministic report file names for analyzed sources
// WHY: Sources in different directories may share a basename; the flattened
//      relative path keeps one report per source
// REF: REQ-METRICS-REPORT
// FORMAT THEOREM: reportFileName("a/b.sas") = "a__b.sas.md"
// PURITY: CORE
// COMPLEXITY: O(k)

export const SUMMARY_FILE_NAME = "SUMMARY.md";

const REPORT_EXTENSION = ".md";

/**
 * @pure true
 * @invariant result ends with ".md" and contains no path separator
 */
export function reportFileName(sourceName: string): string {
	const flattened = sourceName
		.replace(/^[/\\]+/, "")
		.replace(/[/\\]+/g, "__")
		.replace(/[^\w.-]/g, "_");
	const base = flattened.length === 0 ? "source" : flattened;
	return `${base}${REPORT_EXTENSION}`;
}

/**
 * Pair every source with its own report file name, in input order.
 *
 * Flattening can map different sources to the same name ("a/b.sas" and
 * "a__b.sas"), so later duplicates get a "-2", "-3", ... suffix before ".md".
 * SUMMARY.md is reserved. Names are compared case-insensitively so that
 * reports stay distinct on case-insensitive filesystems.
 *
 * @pure true
 * @invariant result.length = sources.length ∧ file names pairwise distinct
 * @complexity O(n) expected
 *
 * @example
 * ```ts
 * assignReportFileNames([{ name: "a/b.sas" }, { name: "a__b.sas" }]);
 * // [[{ name: "a/b.sas" }, "a__b.sas.md"], [{ name: "a__b.sas" }, "a__b.sas-2.md"]]
 * ```
 */
export function assignReportFileNames<T extends { readonly name: string }>(
	sources: readonly T[],
): ReadonlyArray<readonly [T, string]> {
	const used = new Set<string>([SUMMARY_FILE_NAME.toLowerCase()]);
	return sources.map((source) => {
		const preferred = reportFileName(source.name);
		const stem = preferred.slice(0, -REPORT_EXTENSION.length);
		let candidate = preferred;
		for (let suffix = 2; used.has(candidate.toLowerCase()); suffix++) {
			candidate = `${stem}-${suffix}${REPORT_EXTENSION}`;
		}
		used.add(candidate.toLowerCase());
		return [source, candidate] as const;
	});
}
