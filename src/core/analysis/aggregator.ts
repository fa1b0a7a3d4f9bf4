// CHANGE: Fold classified events into construct counts and parameter issues
// WHY: Counting is independent from nesting and from the complexity policy
// REF: REQ-METRICS-ENGINE
// SOURCE: https://github.com/gvergnaud/ts-pattern
// FORMAT THEOREM: ∀events: aggregate(events).counts[k] = |{e ∈ events : kind(e) ↦ k}|
// PURITY: CORE
// INVARIANT: Counts are non-decreasing across the fold; issue order = event order
// COMPLEXITY: O(n) where n = |events|

import { match } from "ts-pattern";

import type { ConstructEvent, MacroDefinitionEvent } from "../types/construct.js";
import type {
	ConstructCounts,
	ExcessMacroParametersIssue,
	Issue,
	Thresholds,
} from "../types/metrics.js";

export interface AggregateState {
	readonly counts: ConstructCounts;
	readonly macroNames: readonly string[];
	readonly issues: readonly Issue[];
}

export const EMPTY_COUNTS: ConstructCounts = {
	dataSteps: 0,
	procSteps: 0,
	macroDefinitions: 0,
	macroCalls: 0,
	conditionals: 0,
	loops: 0,
	merges: 0,
	sqlBlocks: 0,
};

export const INITIAL_AGGREGATE: AggregateState = {
	counts: EMPTY_COUNTS,
	macroNames: [],
	issues: [],
};

const increment = (
	state: AggregateState,
	key: keyof ConstructCounts,
): AggregateState => ({
	...state,
	counts: { ...state.counts, [key]: state.counts[key] + 1 },
});

/**
 * Build the issue for a macro declaring more parameters than allowed.
 *
 * @pure true
 * @precondition event.parameterCount > limit
 */
export function excessMacroParametersIssue(
	event: MacroDefinitionEvent,
	limit: number,
): ExcessMacroParametersIssue {
	return {
		kind: "excess-macro-parameters",
		macro: event.name,
		parameterCount: event.parameterCount,
		line: event.line,
		message: `Macro '${event.name}' declares ${event.parameterCount} parameters (limit ${limit})`,
	};
}

function recordMacroDefinition(
	state: AggregateState,
	event: MacroDefinitionEvent,
	thresholds: Thresholds,
): AggregateState {
	const next = increment(state, "macroDefinitions");
	const issues =
		event.parameterCount > thresholds.maxMacroParameters
			? [
					...next.issues,
					excessMacroParametersIssue(event, thresholds.maxMacroParameters),
				]
			: next.issues;
	return { ...next, macroNames: [...next.macroNames, event.name], issues };
}

/**
 * Apply one event to the aggregate.
 *
 * @pure true
 * @complexity O(1) amortized
 */
export function applyEvent(
	state: AggregateState,
	event: ConstructEvent,
	thresholds: Thresholds,
): AggregateState {
	return match(event)
		.with({ kind: "step", family: "data" }, () =>
			increment(state, "dataSteps"),
		)
		.with({ kind: "step", family: "proc" }, () =>
			increment(state, "procSteps"),
		)
		.with({ kind: "macro-definition" }, (definition) =>
			recordMacroDefinition(state, definition, thresholds),
		)
		.with({ kind: "macro-call" }, () => increment(state, "macroCalls"))
		.with({ kind: "conditional" }, () => increment(state, "conditionals"))
		.with({ kind: "loop-open" }, () => increment(state, "loops"))
		.with({ kind: "data-merge" }, () => increment(state, "merges"))
		.with({ kind: "query-block" }, () => increment(state, "sqlBlocks"))
		.with({ kind: "block-close" }, () => state)
		.exhaustive();
}

/**
 * Aggregate a full event stream from an empty state.
 *
 * @pure true
 * @complexity O(n)
 */
export function aggregateEvents(
	events: readonly ConstructEvent[],
	thresholds: Thresholds,
): AggregateState {
	return events.reduce(
		(state, event) => applyEvent(state, event, thresholds),
		INITIAL_AGGREGATE,
	);
}
