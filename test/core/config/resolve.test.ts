// CHANGE: Tests for settings precedence
// REF: REQ-METRICS-CONFIG
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { resolveOptions, toAnalysisOptions } from "../../../src/core/config/resolve.js";
import type { CLIOptions } from "../../../src/core/types/index.js";

const baseCli: CLIOptions = {
	targetPath: "programs",
	outputDir: undefined,
	extensions: [],
	mode: undefined,
	maxComplexity: undefined,
	maxMacroParameters: undefined,
	configPath: undefined,
	json: false,
	failOnIssues: false,
};

describe("resolveOptions", () => {
	it("falls back to defaults without CLI values or config", () => {
		expect(resolveOptions(baseCli, null)).toEqual({
			targetPath: "programs",
			outputDir: undefined,
			extensions: [".sas"],
			mode: "line",
			thresholds: { maxComplexity: 10, maxMacroParameters: 3 },
			json: false,
			failOnIssues: false,
		});
	});

	it("takes config values over defaults", () => {
		const resolved = resolveOptions(baseCli, {
			mode: "statement",
			extensions: [".inc"],
			thresholds: { maxMacroParameters: 5 },
		});
		expect(resolved.mode).toBe("statement");
		expect(resolved.extensions).toEqual([".inc"]);
		expect(resolved.thresholds).toEqual({
			maxComplexity: 10,
			maxMacroParameters: 5,
		});
	});

	it("takes CLI values over config values", () => {
		const resolved = resolveOptions(
			{
				...baseCli,
				extensions: [".sas", ".mac"],
				mode: "line",
				maxComplexity: 4,
				maxMacroParameters: 0,
			},
			{
				mode: "statement",
				extensions: [".inc"],
				thresholds: { maxComplexity: 20, maxMacroParameters: 5 },
			},
		);
		expect(resolved.mode).toBe("line");
		expect(resolved.extensions).toEqual([".sas", ".mac"]);
		expect(resolved.thresholds).toEqual({
			maxComplexity: 4,
			maxMacroParameters: 0,
		});
	});

	it("projects the engine options", () => {
		expect(toAnalysisOptions(resolveOptions(baseCli, null))).toEqual({
			mode: "line",
			thresholds: { maxComplexity: 10, maxMacroParameters: 3 },
		});
	});
});
