// CHANGE: Model classified constructs as a tagged union
// WHY: Aggregator and nesting tracker dispatch on `kind` instead of ad hoc string checks
// REF: REQ-METRICS-ENGINE
// SOURCE: n/a
// PURITY: CORE
// INVARIANT: Every event carries the 1-based line where its unit starts
// COMPLEXITY: O(1) - type declarations only

/**
 * Семейство структурного шага: DATA step или PROC step.
 */
export type StepFamily = "data" | "proc";

/**
 * Режим сегментации исходного текста.
 *
 * - `line`: одна единица на физическую строку
 * - `statement`: одна единица на оператор, завершённый `;`
 */
export type SegmentationMode = "line" | "statement";

/**
 * Unit of source text handed to the classifier.
 *
 * @property text Content of the unit (a physical line or a joined statement)
 * @property line 1-based line number where the unit starts
 */
export interface SourceSegment {
	readonly text: string;
	readonly line: number;
}

interface BaseEvent {
	readonly line: number;
}

export interface ConditionalEvent extends BaseEvent {
	readonly kind: "conditional";
}

export interface LoopOpenEvent extends BaseEvent {
	readonly kind: "loop-open";
}

export interface BlockCloseEvent extends BaseEvent {
	readonly kind: "block-close";
}

export interface StepEvent extends BaseEvent {
	readonly kind: "step";
	readonly family: StepFamily;
}

/**
 * @invariant parameterCount ≥ 0
 */
export interface MacroDefinitionEvent extends BaseEvent {
	readonly kind: "macro-definition";
	readonly name: string;
	readonly parameterCount: number;
}

export interface MacroCallEvent extends BaseEvent {
	readonly kind: "macro-call";
	readonly name: string;
}

export interface DataMergeEvent extends BaseEvent {
	readonly kind: "data-merge";
}

export interface QueryBlockEvent extends BaseEvent {
	readonly kind: "query-block";
}

/**
 * Classified construct emitted by the classifier, in document order.
 */
export type ConstructEvent =
	| ConditionalEvent
	| LoopOpenEvent
	| BlockCloseEvent
	| StepEvent
	| MacroDefinitionEvent
	| MacroCallEvent
	| DataMergeEvent
	| QueryBlockEvent;

export type ConstructKind = ConstructEvent["kind"];
