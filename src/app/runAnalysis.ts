// CHANGE: Application layer orchestration (APP) separated from SHELL and CORE
// WHY: APP composes the pure engine with shell IO and returns an ExitCode value
// REF: Architecture plan (FCIS)
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every unit is analyzed by its own analyzeSource call; no shared engine state
// COMPLEXITY: O(n) where n = total characters across collected sources

import { Effect } from "effect";
import { match } from "ts-pattern";

import { analyzeSource } from "../core/analysis/engine.js";
import { resolveOptions, toAnalysisOptions } from "../core/config/resolve.js";
import { computeExitCode } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import type {
	CLIOptions,
	CollectionResult,
	MetricsRecord,
	ResolvedOptions,
} from "../core/types/index.js";
import { loadAnalyzerConfig } from "../shell/config/index.js";
import {
	printFailuresEffect,
	printJsonEffect,
	printResultsEffect,
} from "../shell/output/printer.js";
import { writeReportsEffect } from "../shell/report/writer.js";
import { collectSourcesEffect } from "../shell/sources/collector.js";
import { path } from "../shell/utils/node-mods.js";

/**
 * Records and access failures produced by one run.
 */
export interface AnalysisRun {
	readonly options: ResolvedOptions;
	readonly records: readonly MetricsRecord[];
	readonly collection: CollectionResult;
}

/**
 * Analyze every collected source independently.
 *
 * @pure true
 * @complexity O(n)
 */
export function analyzeCollection(
	collection: CollectionResult,
	options: ResolvedOptions,
): readonly MetricsRecord[] {
	const analysisOptions = toAnalysisOptions(options);
	return collection.sources.map((source) =>
		analyzeSource(
			{ name: source.relativePath, text: source.text },
			analysisOptions,
		),
	);
}

/**
 * Resolve settings, collect sources and analyze them without printing.
 *
 * @effect Effect<AnalysisRun, AppError>
 */
export function analyzeTargetEffect(
	cliOptions: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<AnalysisRun, AppError> {
	return Effect.gen(function* (_) {
		const config = yield* _(loadAnalyzerConfig(cliOptions.configPath, cwd));
		const options = resolveOptions(cliOptions, config);
		const collection = yield* _(
			collectSourcesEffect(options.targetPath, options.extensions, cwd),
		);
		return {
			options,
			records: analyzeCollection(collection, options),
			collection,
		};
	});
}

function reportAppError(error: AppError): Effect.Effect<ExitCode> {
	return Effect.sync(() => {
		const label = match(error._tag)
			.with("Config", () => "Invalid configuration")
			.with("ReportWrite", () => "Unable to write report")
			.with("FS", () => "Unable to read")
			.exhaustive();
		console.error(`❌ ${label} ${error.path}: ${error.detail}`);
		return 1 as const;
	});
}

function emitResults(run: AnalysisRun): Effect.Effect<void> {
	return Effect.gen(function* (_) {
		const { options, records, collection } = run;
		if (records.length === 0 && collection.failures.length === 0 && !options.json) {
			console.warn(
				`⚠️  No source files matching ${options.extensions.join(", ")} under ${options.targetPath}`,
			);
		}
		yield* _(
			options.json ? printJsonEffect(records) : printResultsEffect(records),
		);
		yield* _(printFailuresEffect(collection.failures));
	});
}

/**
 * Orchestrates the analyzer run and returns ExitCode as value (no process.exit).
 *
 * @param cliOptions - Parsed CLI options
 * @param cwd - Directory relative paths resolve against
 * @returns Effect<ExitCode, never>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 * @postcondition (access failures ∨ (failOnIssues ∧ issues)) → 1 else 0
 */
export function runAnalysis(
	cliOptions: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<ExitCode> {
	return Effect.gen(function* (_) {
		if (!cliOptions.json) {
			console.log(`🔍 Analyzing: ${cliOptions.targetPath}`);
		}

		const run = yield* _(analyzeTargetEffect(cliOptions, cwd));
		yield* _(emitResults(run));

		const { outputDir } = run.options;
		if (outputDir !== undefined) {
			const written = yield* _(
				writeReportsEffect(run.records, path.resolve(cwd, outputDir)),
			);
			if (!run.options.json) {
				console.log(`📝 Wrote ${written.length} report file(s) to ${outputDir}`);
			}
		}

		return computeExitCode({
			hasAccessFailures: run.collection.failures.length > 0,
			hasIssues: run.records.some((record) => record.issues.length > 0),
			failOnIssues: run.options.failOnIssues,
		});
	}).pipe(Effect.catchAll(reportAppError));
}
