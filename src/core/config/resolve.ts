// CHANGE: Merge defaults, config file and CLI flags into one settings value
// WHY: Precedence rules are pure and testable without touching the filesystem
// REF: REQ-METRICS-CONFIG
// FORMAT THEOREM: ∀k: resolved[k] = cli[k] ?? config[k] ?? default[k]
// PURITY: CORE
// COMPLEXITY: O(|extensions|)

import {
	DEFAULT_EXTENSIONS,
	DEFAULT_MODE,
	DEFAULT_THRESHOLDS,
} from "../analysis/constants.js";
import type {
	AnalysisOptions,
	AnalyzerConfig,
	CLIOptions,
	ResolvedOptions,
} from "../types/index.js";

/**
 * @pure true
 * @invariant result.extensions.length > 0
 */
export function resolveOptions(
	cli: CLIOptions,
	config: AnalyzerConfig | null,
): ResolvedOptions {
	const extensions =
		cli.extensions.length > 0
			? cli.extensions
			: (config?.extensions ?? DEFAULT_EXTENSIONS);

	return {
		targetPath: cli.targetPath,
		outputDir: cli.outputDir,
		extensions: extensions.length > 0 ? extensions : DEFAULT_EXTENSIONS,
		mode: cli.mode ?? config?.mode ?? DEFAULT_MODE,
		thresholds: {
			maxComplexity:
				cli.maxComplexity ??
				config?.thresholds?.maxComplexity ??
				DEFAULT_THRESHOLDS.maxComplexity,
			maxMacroParameters:
				cli.maxMacroParameters ??
				config?.thresholds?.maxMacroParameters ??
				DEFAULT_THRESHOLDS.maxMacroParameters,
		},
		json: cli.json,
		failOnIssues: cli.failOnIssues,
	};
}

/**
 * Project resolved settings onto what the engine needs.
 *
 * @pure true
 */
export function toAnalysisOptions(options: ResolvedOptions): AnalysisOptions {
	return { mode: options.mode, thresholds: options.thresholds };
}
