// CHANGE: Central defaults for threshold policy and source discovery
// REF: REQ-METRICS-ENGINE
// PURITY: CORE

import type { SegmentationMode } from "../types/construct.js";
import type { AnalysisOptions, Thresholds } from "../types/metrics.js";

export const DEFAULT_THRESHOLDS: Thresholds = {
	maxComplexity: 10,
	maxMacroParameters: 3,
};

export const DEFAULT_MODE: SegmentationMode = "line";

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
	mode: DEFAULT_MODE,
	thresholds: DEFAULT_THRESHOLDS,
};

export const DEFAULT_EXTENSIONS: readonly string[] = [".sas"];
