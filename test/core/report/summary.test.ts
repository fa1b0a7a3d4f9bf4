// CHANGE: Tests for batch summaries and console line formatting
// REF: REQ-METRICS-REPORT
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { analyzeSource } from "../../../src/core/analysis/engine.js";
import {
	assignReportFileNames,
	reportFileName,
} from "../../../src/core/report/naming.js";
import { summarize } from "../../../src/core/report/summary.js";
import {
	formatFailureLine,
	formatRecordLines,
	formatSummaryLines,
} from "../../../src/core/report/text.js";
import { conditionalLines } from "../../utils/tempProject.js";

const simple = analyzeSource({ name: "a.sas", text: "if a then b = 1;" });
const tie = analyzeSource({ name: "b.sas", text: "do while (x);\nend;" });
const complex = analyzeSource({ name: "c.sas", text: conditionalLines(11) });

describe("summarize", () => {
	it("returns zeros and no leader for an empty batch", () => {
		expect(summarize([])).toEqual({
			files: 0,
			lines: 0,
			conditionals: 0,
			loops: 0,
			macroDefinitions: 0,
			macroCalls: 0,
			totalIssues: 0,
			filesWithIssues: 0,
			mostComplex: null,
		});
	});

	it("adds up records and picks the most complex one", () => {
		expect(summarize([simple, tie, complex])).toEqual({
			files: 3,
			lines: 14,
			conditionals: 12,
			loops: 1,
			macroDefinitions: 0,
			macroCalls: 0,
			totalIssues: 1,
			filesWithIssues: 1,
			mostComplex: { name: "c.sas", score: 12 },
		});
	});

	it("keeps the first record on a complexity tie", () => {
		expect(summarize([simple, tie]).mostComplex).toEqual({
			name: "a.sas",
			score: 2,
		});
	});
});

describe("console formatting", () => {
	it("formats a record header and one line per issue", () => {
		expect(formatRecordLines(complex)).toEqual([
			"📄 c.sas — complexity 12, max depth 0, 1 issue(s)",
			"   ⚠️  high-complexity: Cyclomatic complexity 12 exceeds threshold 10",
		]);
	});

	it("formats a clean summary", () => {
		expect(formatSummaryLines(summarize([simple]))).toEqual([
			"📊 Analyzed 1 file(s), 1 line(s): 1 conditional(s), 0 loop(s), 0 macro definition(s), 0 macro call(s)",
			"🔝 Most complex: a.sas (2)",
			"✅ No issues found!",
		]);
	});

	it("formats a summary with issues", () => {
		const lines = formatSummaryLines(summarize([simple, complex]));
		expect(lines.at(-1)).toBe("⚠️  1 issue(s) in 1 file(s)");
	});

	it("formats an access failure", () => {
		expect(formatFailureLine({ path: "x.sas", detail: "EACCES" })).toBe(
			"❌ Unable to read x.sas: EACCES",
		);
	});
});

describe("reportFileName", () => {
	it("flattens relative paths", () => {
		expect(reportFileName("a/b.sas")).toBe("a__b.sas.md");
		expect(reportFileName("/abs/p.sas")).toBe("abs__p.sas.md");
		expect(reportFileName("C:\\x\\y.sas")).toBe("C___x__y.sas.md");
	});

	it("replaces unsafe characters and handles empty names", () => {
		expect(reportFileName("my file.sas")).toBe("my_file.sas.md");
		expect(reportFileName("")).toBe("source.md");
	});
});

describe("assignReportFileNames", () => {
	const fileNames = (names: readonly string[]) =>
		assignReportFileNames(names.map((name) => ({ name }))).map(
			([, fileName]) => fileName,
		);

	it("keeps the flattened name when it is unique", () => {
		expect(fileNames(["a/b.sas", "c.sas"])).toEqual(["a__b.sas.md", "c.sas.md"]);
	});

	it("suffixes sources whose flattened names collide", () => {
		expect(fileNames(["a/b.sas", "a__b.sas", "a\\b.sas"])).toEqual([
			"a__b.sas.md",
			"a__b.sas-2.md",
			"a__b.sas-3.md",
		]);
		expect(fileNames(["my file.sas", "my_file.sas"])).toEqual([
			"my_file.sas.md",
			"my_file.sas-2.md",
		]);
	});

	it("compares names case-insensitively and reserves SUMMARY.md", () => {
		expect(fileNames(["A.sas", "a.sas"])).toEqual(["A.sas.md", "a.sas-2.md"]);
		expect(fileNames(["SUMMARY", "summary"])).toEqual([
			"SUMMARY-2.md",
			"summary-3.md",
		]);
	});

	it("does not reuse a name taken by an earlier suffix", () => {
		expect(fileNames(["x.sas-2", "x.sas", "x/sas"])).toEqual([
			"x.sas-2.md",
			"x.sas.md",
			"x__sas.md",
		]);
		expect(fileNames(["b.sas", "b.sas-2", "b.sas"])).toEqual([
			"b.sas.md",
			"b.sas-2.md",
			"b.sas-3.md",
		]);
	});

	it("returns pairwise distinct names for any batch", () => {
		fc.assert(
			fc.property(
				fc.array(fc.constantFrom("a/b.sas", "a__b.sas", "A__B.sas", "SUMMARY", "a b.sas")),
				(names) => {
					const assigned = fileNames(names).map((name) => name.toLowerCase());
					expect(new Set(assigned).size).toBe(names.length);
					expect(assigned).not.toContain("summary.md");
				},
			),
		);
	});
});
