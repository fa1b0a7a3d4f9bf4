// CHANGE: Types exchanged between the source collector (SHELL) and APP
// WHY: Collector resolves paths and reads text; CORE only sees SourceUnit
// REF: REQ-METRICS-CLI
// SOURCE: n/a
// PURITY: CORE
// COMPLEXITY: O(1) - type declarations only

/**
 * Source file located and read by the collector.
 *
 * @property relativePath Path relative to the target root, "/"-separated
 * @property absolutePath Absolute filesystem path
 * @property text File content (UTF-8)
 */
export interface CollectedSource {
	readonly relativePath: string;
	readonly absolutePath: string;
	readonly text: string;
}

/**
 * Input-access failure surfaced to the driver.
 */
export interface SourceFailure {
	readonly path: string;
	readonly detail: string;
}

/**
 * @invariant sources sorted by relativePath
 */
export interface CollectionResult {
	readonly sources: readonly CollectedSource[];
	readonly failures: readonly SourceFailure[];
}
