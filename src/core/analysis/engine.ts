// CHANGE: Pure metric-extraction pipeline from SourceUnit to MetricsRecord
// WHY: No state survives between calls, so analyses of different files cannot leak into each other
// REF: REQ-METRICS-ENGINE
// SOURCE: n/a
// FORMAT THEOREM: ∀u, o: analyzeSource(u, o) ≡ analyzeSource(u, o) (structural equality)
// PURITY: CORE
// INVARIANT: segment → classify → (nesting ∥ aggregate) → calculate; total over any text
// COMPLEXITY: O(n) where n = |unit.text|

import { pipe } from "effect";

import type { ConstructEvent } from "../types/construct.js";
import type {
	AnalysisOptions,
	MetricsRecord,
	SourceUnit,
} from "../types/metrics.js";
import { aggregateEvents } from "./aggregator.js";
import { classifySegment } from "./classifier.js";
import { calculateMetrics } from "./complexity.js";
import { DEFAULT_ANALYSIS_OPTIONS } from "./constants.js";
import { INITIAL_NESTING, type NestingState, trackNesting } from "./nesting.js";
import { countLines, segmentSource } from "./segmenter.js";

interface ClassificationPass {
	readonly events: readonly ConstructEvent[];
	readonly nesting: NestingState;
}

/**
 * Classify every segment, threading the open-block count through the scan
 * so that block-close is recognized only while something is open.
 *
 * @pure true
 * @complexity O(n)
 */
export function classifySource(
	text: string,
	mode: AnalysisOptions["mode"],
): ClassificationPass {
	const events: ConstructEvent[] = [];
	let nesting = INITIAL_NESTING;
	for (const segment of segmentSource(text, mode)) {
		const classified = classifySegment(segment, nesting.depth);
		nesting = trackNesting(classified, nesting);
		events.push(...classified);
	}
	return { events, nesting };
}

/**
 * Analyze one source unit.
 *
 * @param unit Immutable text and name of the file
 * @param options Segmentation mode and thresholds (defaults: line mode, 10 / 3)
 * @returns Frozen MetricsRecord
 *
 * @pure true
 * @invariant result.cyclomaticComplexity = result.conditionals + result.loops + 1
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const record = analyzeSource({ name: "etl.sas", text: "if x then y = 1;" });
 * // record.conditionals === 1, record.cyclomaticComplexity === 2, record.issues === []
 * ```
 */
export function analyzeSource(
	unit: SourceUnit,
	options: AnalysisOptions = DEFAULT_ANALYSIS_OPTIONS,
): MetricsRecord {
	return pipe(
		classifySource(unit.text, options.mode),
		({ events, nesting }) => ({
			aggregate: aggregateEvents(events, options.thresholds),
			maxNestingDepth: nesting.maxDepth,
		}),
		({ aggregate, maxNestingDepth }) =>
			calculateMetrics(
				{
					name: unit.name,
					mode: options.mode,
					lines: countLines(unit.text),
					counts: aggregate.counts,
					maxNestingDepth,
					macroNames: aggregate.macroNames,
					issues: aggregate.issues,
				},
				options.thresholds,
			),
	);
}

/**
 * Analyze several units independently; result order follows input order.
 *
 * @pure true
 * @complexity O(Σ |unit.text|)
 */
export function analyzeSources(
	units: readonly SourceUnit[],
	options: AnalysisOptions = DEFAULT_ANALYSIS_OPTIONS,
): readonly MetricsRecord[] {
	return units.map((unit) => analyzeSource(unit, options));
}
