// CHANGE: Introduce metrics domain types for one analyzed source unit
// WHY: Reporting collaborators consume a plain immutable record produced by CORE
// REF: REQ-METRICS-ENGINE
// SOURCE: n/a
// FORMAT THEOREM: ∀r: MetricsRecord → r.cyclomaticComplexity = r.conditionals + r.loops + 1
// PURITY: CORE
// INVARIANT: All counts are non-negative integers; record is frozen after calculation
// COMPLEXITY: O(1) - type declarations only

import type { SegmentationMode } from "./construct.js";

/**
 * Исходный текст одного анализируемого файла.
 *
 * @property name Путь или имя, под которым вызывающая сторона знает файл
 * @property text Полное содержимое файла
 */
export interface SourceUnit {
	readonly name: string;
	readonly text: string;
}

/**
 * Threshold policy applied by the aggregator and the complexity calculator.
 *
 * @invariant maxComplexity ≥ 1 ∧ maxMacroParameters ≥ 0
 */
export interface Thresholds {
	readonly maxComplexity: number;
	readonly maxMacroParameters: number;
}

export interface AnalysisOptions {
	readonly mode: SegmentationMode;
	readonly thresholds: Thresholds;
}

export interface ExcessMacroParametersIssue {
	readonly kind: "excess-macro-parameters";
	readonly macro: string;
	readonly parameterCount: number;
	readonly line: number;
	readonly message: string;
}

export interface HighComplexityIssue {
	readonly kind: "high-complexity";
	readonly score: number;
	readonly threshold: number;
	readonly message: string;
}

/**
 * Diagnostic emitted when a measured value crosses a policy threshold.
 */
export type Issue = ExcessMacroParametersIssue | HighComplexityIssue;

export type IssueKind = Issue["kind"];

/**
 * Construct counts accumulated during a scan.
 *
 * @invariant every field ≥ 0 and never decreases during a scan
 */
export interface ConstructCounts {
	readonly dataSteps: number;
	readonly procSteps: number;
	readonly macroDefinitions: number;
	readonly macroCalls: number;
	readonly conditionals: number;
	readonly loops: number;
	readonly merges: number;
	readonly sqlBlocks: number;
}

/**
 * Final metrics for one SourceUnit.
 *
 * @property lines Physical line count of the unit
 * @property maxNestingDepth Largest number of concurrently open blocks
 * @property macroNames Names of defined macros, in definition order
 * @property issues Threshold diagnostics, in emission order
 */
export interface MetricsRecord extends ConstructCounts {
	readonly name: string;
	readonly mode: SegmentationMode;
	readonly lines: number;
	readonly maxNestingDepth: number;
	readonly cyclomaticComplexity: number;
	readonly macroNames: readonly string[];
	readonly issues: readonly Issue[];
}
