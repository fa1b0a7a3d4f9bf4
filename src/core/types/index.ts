// CHANGE: Created central export file for all type definitions
// WHY: Provides a single import point for all types used across modules
// REF: REQ-METRICS-ENGINE
// SOURCE: n/a

export type { AnalyzerConfig, CLIOptions, ResolvedOptions } from "./config.js";
export type {
	BlockCloseEvent,
	ConditionalEvent,
	ConstructEvent,
	ConstructKind,
	DataMergeEvent,
	LoopOpenEvent,
	MacroCallEvent,
	MacroDefinitionEvent,
	QueryBlockEvent,
	SegmentationMode,
	SourceSegment,
	StepEvent,
	StepFamily,
} from "./construct.js";
export type {
	AnalysisOptions,
	ConstructCounts,
	ExcessMacroParametersIssue,
	HighComplexityIssue,
	Issue,
	IssueKind,
	MetricsRecord,
	SourceUnit,
	Thresholds,
} from "./metrics.js";
export type {
	CollectedSource,
	CollectionResult,
	SourceFailure,
} from "./sources.js";
