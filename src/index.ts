// CHANGE: Create public API entry point for library consumers
// WHY: Enforce FCIS - export APP orchestration and CORE utilities, hide SHELL internals
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect values
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Analyzer orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { parseCLIArgs, runAnalysis } from "sas-metrics";
 *
 * const exitCode = await Effect.runPromise(
 *   runAnalysis(parseCLIArgs(["programs/", "--output", "reports"])),
 * );
 * ```
 */
export {
	type AnalysisRun,
	analyzeCollection,
	analyzeTargetEffect,
	runAnalysis,
} from "./app/runAnalysis.js";
export { parseCLIArgs } from "./shell/config/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode } from "./core/models.js";
export type {
	AnalysisOptions,
	AnalyzerConfig,
	CLIOptions,
	ConstructCounts,
	ConstructEvent,
	ConstructKind,
	Issue,
	IssueKind,
	MetricsRecord,
	SegmentationMode,
	SourceSegment,
	SourceUnit,
	Thresholds,
} from "./core/types/index.js";
export type { AppError } from "./core/errors.js";
export { ConfigError, FSError, ReportWriteError } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Metric-extraction engine.
 *
 * @pure true
 * @complexity O(n) where n = |text|
 */
export { analyzeSource, analyzeSources } from "./core/analysis/engine.js";
export { classifySegment } from "./core/analysis/classifier.js";
export { segmentSource } from "./core/analysis/segmenter.js";
export {
	DEFAULT_ANALYSIS_OPTIONS,
	DEFAULT_THRESHOLDS,
} from "./core/analysis/constants.js";
export { cyclomaticComplexity } from "./core/analysis/complexity.js";

/**
 * Report rendering.
 *
 * @pure true
 */
export {
	NO_ISSUES_MARKER,
	renderMetricsMarkdown,
	renderSummaryMarkdown,
} from "./core/report/markdown.js";
export { type BatchSummary, summarize } from "./core/report/summary.js";
