// CHANGE: End-to-end tests for the metric-extraction engine
// WHY: Pin the documented counting rules, threshold policy and state isolation
// REF: REQ-METRICS-ENGINE, REQ-METRICS-STATEMENT-MODE
// PURITY: CORE
// FORMAT THEOREM: ∀u: analyzeSource(u) ≡ analyzeSource(u) ∧ cc = conditionals + loops + 1 ≥ 1

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { DEFAULT_THRESHOLDS } from "../../../src/core/analysis/constants.js";
import {
	analyzeSource,
	analyzeSources,
	classifySource,
} from "../../../src/core/analysis/engine.js";
import { conditionalLines } from "../../utils/tempProject.js";

const unit = (text: string, name = "unit.sas") => ({ name, text });

const statementMode = { mode: "statement" as const, thresholds: DEFAULT_THRESHOLDS };

describe("analyzeSource: complexity", () => {
	it("scores 1 for a source without conditionals or loops", () => {
		const record = analyzeSource(unit("x = 1;\ny = 2;"));
		expect(record.conditionals).toBe(0);
		expect(record.loops).toBe(0);
		expect(record.cyclomaticComplexity).toBe(1);
		expect(record.issues).toEqual([]);
	});

	it("scores 2 for a single if/then line", () => {
		const record = analyzeSource(unit("if x > 0 then y = 1;"));
		expect(record.conditionals).toBe(1);
		expect(record.loops).toBe(0);
		expect(record.cyclomaticComplexity).toBe(2);
		expect(record.issues).toEqual([]);
	});

	it("scores N + 1 for N independent conditional lines", () => {
		fc.assert(
			fc.property(fc.integer({ min: 0, max: 30 }), (n) => {
				const record = analyzeSource(unit(conditionalLines(n)));
				expect(record.conditionals).toBe(n);
				expect(record.cyclomaticComplexity).toBe(n + 1);
				expect(record.issues.length).toBe(n + 1 > 10 ? 1 : 0);
			}),
		);
	});

	it("counts else-if as one more decision point", () => {
		const record = analyzeSource(
			unit("if a then x = 1;\nelse if b then x = 2;\nelse x = 3;"),
		);
		expect(record.conditionals).toBe(2);
		expect(record.cyclomaticComplexity).toBe(3);
	});

	it("emits exactly one high-complexity issue above 10", () => {
		const record = analyzeSource(unit(conditionalLines(11)));
		expect(record.issues).toEqual([
			{
				kind: "high-complexity",
				score: 12,
				threshold: 10,
				message: "Cyclomatic complexity 12 exceeds threshold 10",
			},
		]);
	});

	it("emits no issue at exactly 10", () => {
		const record = analyzeSource(unit(conditionalLines(9)));
		expect(record.cyclomaticComplexity).toBe(10);
		expect(record.issues).toEqual([]);
	});

	it("applies a custom complexity threshold", () => {
		const record = analyzeSource(unit(conditionalLines(2)), {
			mode: "line",
			thresholds: { maxComplexity: 2, maxMacroParameters: 3 },
		});
		expect(record.issues.map((issue) => issue.kind)).toEqual([
			"high-complexity",
		]);
	});
});

describe("analyzeSource: nesting", () => {
	it("reaches depth 1 for one loop followed by end", () => {
		const text = "do while (i < 3);\nend;";
		expect(analyzeSource(unit(text)).maxNestingDepth).toBe(1);
		expect(classifySource(text, "line").nesting.depth).toBe(0);
	});

	it("keeps depth 1 for two sequential loops", () => {
		const text = "do while (a);\nend;\ndo until (b);\nend;";
		const record = analyzeSource(unit(text));
		expect(record.loops).toBe(2);
		expect(record.maxNestingDepth).toBe(1);
	});

	it("reaches depth 2 for nested loops", () => {
		const text = "do i = 1 to 3;\n  do j = 1 to 3;\n  end;\nend;";
		expect(analyzeSource(unit(text)).maxNestingDepth).toBe(2);
		expect(classifySource(text, "line").nesting.depth).toBe(0);
	});

	it("tracks macro %do / %end blocks", () => {
		const record = analyzeSource(unit("%do i = 1 %to 3;\n%end;"));
		expect(record.loops).toBe(1);
		expect(record.maxNestingDepth).toBe(1);
	});
});

describe("analyzeSource: constructs", () => {
	it("reports a macro declaring four parameters", () => {
		const record = analyzeSource(unit("%macro wide(a, b, c, d);\n%mend wide;"));
		expect(record.macroDefinitions).toBe(1);
		expect(record.macroNames).toEqual(["wide"]);
		expect(record.issues).toEqual([
			{
				kind: "excess-macro-parameters",
				macro: "wide",
				parameterCount: 4,
				line: 1,
				message: "Macro 'wide' declares 4 parameters (limit 3)",
			},
		]);
	});

	it("counts lines of a file ending in a newline", () => {
		expect(analyzeSource(unit("x = 1;\n")).lines).toBe(1);
		expect(analyzeSource(unit("data a;\nrun;\n")).lines).toBe(2);
	});

	it("counts steps, merges, sql blocks and macro calls", () => {
		const text = [
			"data work.joined;",
			"  merge work.a work.b;",
			"  by id;",
			"run;",
			"proc sql;",
			"  create table t as select * from work.joined;",
			"quit;",
			"%report(work.joined);",
		].join("\n");
		const record = analyzeSource(unit(text));
		expect(record).toMatchObject({
			lines: 8,
			dataSteps: 1,
			procSteps: 1,
			merges: 1,
			sqlBlocks: 1,
			macroCalls: 1,
		});
	});
});

describe("analyzeSource: multi-line constructs", () => {
	const text = [
		"data work.out;",
		"  do i = 1 to 3;",
		"    if i > 1",
		"      then flag = 1;",
		"  end;",
		"run;",
	].join("\n");

	it("misses a conditional split across lines in line mode", () => {
		const record = analyzeSource(unit(text));
		expect(record).toMatchObject({
			dataSteps: 1,
			loops: 1,
			conditionals: 0,
			maxNestingDepth: 1,
			cyclomaticComplexity: 2,
		});
	});

	it("counts the split conditional in statement mode", () => {
		const record = analyzeSource(unit(text), statementMode);
		expect(record).toMatchObject({
			mode: "statement",
			dataSteps: 1,
			loops: 1,
			conditionals: 1,
			maxNestingDepth: 1,
			cyclomaticComplexity: 3,
		});
	});

	it("counts a macro parameter list spanning lines in statement mode", () => {
		const record = analyzeSource(
			unit("%macro wide(a,\n  b,\n  c,\n  d);\n%mend;"),
			statementMode,
		);
		expect(record.issues.map((issue) => issue.kind)).toEqual([
			"excess-macro-parameters",
		]);
	});
});

describe("analyzeSource: isolation and determinism", () => {
	it("does not carry open blocks from one unit into the next", () => {
		analyzeSource(unit("do;\ndo;\ndo;"));
		const record = analyzeSource(unit("do;\nend;"));
		expect(record.maxNestingDepth).toBe(1);
	});

	it("produces byte-identical records for the same input", () => {
		fc.assert(
			fc.property(fc.string(), (text) => {
				const first = analyzeSource(unit(text));
				const second = analyzeSource(unit(text));
				expect(JSON.stringify(first)).toBe(JSON.stringify(second));
			}),
		);
	});

	it("keeps the record invariants for arbitrary text", () => {
		fc.assert(
			fc.property(
				fc.string(),
				fc.constantFrom("line" as const, "statement" as const),
				(text, mode) => {
					const record = analyzeSource(unit(text), {
						mode,
						thresholds: DEFAULT_THRESHOLDS,
					});
					expect(record.cyclomaticComplexity).toBe(
						record.conditionals + record.loops + 1,
					);
					expect(record.cyclomaticComplexity).toBeGreaterThanOrEqual(1);
					expect(record.maxNestingDepth).toBeGreaterThanOrEqual(0);
				},
			),
		);
	});

	it("analyzes batches independently of order", () => {
		const a = unit("if a then b = 1;", "a.sas");
		const b = unit("do;\ndo;\nend;\nend;", "b.sas");
		const forward = analyzeSources([a, b]);
		const backward = analyzeSources([b, a]);
		expect(forward).toEqual([...backward].reverse());
	});
});
