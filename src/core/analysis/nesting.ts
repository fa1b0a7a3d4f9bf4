// CHANGE: Depth counter for concurrently open blocks
// WHY: A single "in block" flag cannot represent nested blocks
// REF: REQ-METRICS-ENGINE
// SOURCE: n/a
// FORMAT THEOREM: ∀events: fold(applyNesting, INITIAL) ⇒ maxDepth ≥ depth ≥ 0 at every step
// PURITY: CORE
// INVARIANT: depth is floored at 0; maxDepth never decreases
// COMPLEXITY: O(1) per event

import type { ConstructEvent } from "../types/construct.js";

export interface NestingState {
	readonly depth: number;
	readonly maxDepth: number;
}

export const INITIAL_NESTING: NestingState = { depth: 0, maxDepth: 0 };

/**
 * Apply one event to the nesting state.
 *
 * loop-open increments depth; block-close decrements it (an unmatched close
 * at depth 0 is ignored). Other events leave the state unchanged.
 *
 * @pure true
 * @complexity O(1)
 */
export function applyNesting(
	state: NestingState,
	event: ConstructEvent,
): NestingState {
	if (event.kind === "loop-open") {
		const depth = state.depth + 1;
		return { depth, maxDepth: Math.max(state.maxDepth, depth) };
	}
	if (event.kind === "block-close") {
		return { ...state, depth: Math.max(0, state.depth - 1) };
	}
	return state;
}

/**
 * Fold an event stream into the nesting state, starting fresh by default.
 * The engine resumes from the previous segment's state.
 *
 * @pure true
 * @complexity O(n)
 */
export function trackNesting(
	events: readonly ConstructEvent[],
	from: NestingState = INITIAL_NESTING,
): NestingState {
	return events.reduce(applyNesting, from);
}
