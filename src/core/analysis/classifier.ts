// CHANGE: Lexical construct classifier for macro-driven SAS sources
// WHY: Single source of truth for keyword detection; engine and tests share it
// REF: REQ-METRICS-ENGINE
// SOURCE: n/a
// FORMAT THEOREM: ∀segment, open ≥ 0: classifySegment(segment, open) is total and deterministic
// PURITY: CORE
// INVARIANT: Never throws; matching is case-insensitive and local to one segment
// COMPLEXITY: O(k) per segment where k = |segment.text|

import type {
	ConstructEvent,
	MacroCallEvent,
	SourceSegment,
} from "../types/construct.js";

const IF_KEYWORD = /\bif\b/i;
const THEN_KEYWORD = /\bthen\b/i;
const DO_KEYWORD = /\bdo\b/i;
const ITERATION_KEYWORD = /\b(?:while|until)\b/i;
const BLOCK_END = /\bend\s*;/i;
// A single class after the name start keeps unterminated lines linear.
const DATA_STEP = /^\s*data\s+[a-z_&][^;]*;/i;
const PROC_STEP = /^\s*proc\s+[a-z_]\w*/i;
const MACRO_DEFINITION = /%macro\s+([a-z_]\w*)\s*(?:\(([^)]*))?/i;
const MACRO_CALL = /%([a-z_]\w*)\(/gi;
const MERGE_KEYWORD = /\bmerge\b/i;
const QUERY_BLOCK = /\bproc\s+sql\b/i;

/**
 * Count declared macro parameters in a raw parameter list.
 *
 * @param list Text between "(" and ")" (or end of segment when unterminated)
 * @returns commas + 1 for a non-empty list, 0 otherwise
 *
 * @pure true
 * @invariant result ≥ 0
 * @complexity O(k)
 */
export function countMacroParameters(list: string | undefined): number {
	if (list === undefined || list.trim().length === 0) return 0;
	return list.split(",").length;
}

function isConditional(text: string): boolean {
	return IF_KEYWORD.test(text) && THEN_KEYWORD.test(text);
}

function isLoopOpen(text: string): boolean {
	return (
		DO_KEYWORD.test(text) &&
		(ITERATION_KEYWORD.test(text) || text.includes(";"))
	);
}

function macroCalls(segment: SourceSegment): MacroCallEvent[] {
	return Array.from(segment.text.matchAll(MACRO_CALL), (found) => ({
		kind: "macro-call" as const,
		name: found[1] ?? "",
		line: segment.line,
	}));
}

/**
 * Classify one segment into construct events.
 *
 * @param segment Unit of source text (physical line or statement)
 * @param openBlocks Number of blocks open before this segment
 * @returns Events in a fixed order: step, macro-definition, conditional,
 *          loop-open, block-close, data-merge, query-block, macro-calls
 *
 * @pure true
 * @precondition openBlocks ≥ 0
 * @postcondition block-close emitted only when openBlocks + (loop-open ? 1 : 0) > 0
 * @complexity O(k)
 *
 * @example
 * ```ts
 * classifySegment({ text: "if x > 1 then do;", line: 4 }, 0);
 * // [{ kind: "conditional", line: 4 }, { kind: "loop-open", line: 4 }]
 * ```
 */
export function classifySegment(
	segment: SourceSegment,
	openBlocks: number,
): readonly ConstructEvent[] {
	const { text, line } = segment;
	const events: ConstructEvent[] = [];

	if (DATA_STEP.test(text)) {
		events.push({ kind: "step", family: "data", line });
	} else if (PROC_STEP.test(text)) {
		events.push({ kind: "step", family: "proc", line });
	}

	const definition = MACRO_DEFINITION.exec(text);
	if (definition !== null) {
		events.push({
			kind: "macro-definition",
			name: definition[1] ?? "",
			parameterCount: countMacroParameters(definition[2]),
			line,
		});
	}

	if (isConditional(text)) {
		events.push({ kind: "conditional", line });
	}

	const opensLoop = isLoopOpen(text);
	if (opensLoop) {
		events.push({ kind: "loop-open", line });
	}

	const openAfterSegment = openBlocks + (opensLoop ? 1 : 0);
	if (openAfterSegment > 0 && BLOCK_END.test(text)) {
		events.push({ kind: "block-close", line });
	}

	if (MERGE_KEYWORD.test(text)) {
		events.push({ kind: "data-merge", line });
	}

	if (QUERY_BLOCK.test(text)) {
		events.push({ kind: "query-block", line });
	}

	events.push(...macroCalls(segment));
	return events;
}
