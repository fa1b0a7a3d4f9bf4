// CHANGE: CLI argument parsing for the metrics analyzer
// WHY: Keeps argv handling out of APP orchestration
// REF: REQ-METRICS-CLI
// SOURCE: n/a

import type { CLIOptions, SegmentationMode } from "../../core/types/index.js";

// CHANGE: Result of processing one token
// WHY: Value flags consume the next token; parseCLIArgs skips it
interface ArgProcessResult {
	readonly state: CLIOptions;
	readonly skipNext: boolean;
}

type ValueFlagHandler = (value: string, current: CLIOptions) => CLIOptions;

/**
 * Normalize an extension flag value: ".SAS" / "sas" → ".sas".
 *
 * @pure true
 */
export function normalizeExtension(raw: string): string {
	const lower = raw.trim().toLowerCase();
	return lower.startsWith(".") ? lower : `.${lower}`;
}

function parseMode(value: string): SegmentationMode | undefined {
	const lower = value.toLowerCase();
	return lower === "line" || lower === "statement" ? lower : undefined;
}

// Digits only: "10abc", "1.5" and "-3" are rejected rather than truncated.
function parseIntAtLeast(value: string, min: number): number | undefined {
	if (!/^\d+$/.test(value)) return undefined;
	const parsed = Number.parseInt(value, 10);
	return Number.isSafeInteger(parsed) && parsed >= min ? parsed : undefined;
}

// CHANGE: Handler table for flags that take a value
// WHY: Eliminates branching in processArgument
const valueHandlers: Partial<Record<string, ValueFlagHandler>> = {
	"--output": (value, current) => ({ ...current, outputDir: value }),
	"--ext": (value, current) => ({
		...current,
		extensions: [...current.extensions, normalizeExtension(value)],
	}),
	"--mode": (value, current) => ({
		...current,
		mode: parseMode(value) ?? current.mode,
	}),
	"--max-complexity": (value, current) => ({
		...current,
		maxComplexity: parseIntAtLeast(value, 1) ?? current.maxComplexity,
	}),
	"--max-macro-params": (value, current) => ({
		...current,
		maxMacroParameters:
			parseIntAtLeast(value, 0) ?? current.maxMacroParameters,
	}),
	"--config": (value, current) => ({ ...current, configPath: value }),
};

function processArgument(
	arg: string,
	args: readonly string[],
	index: number,
	current: CLIOptions,
): ArgProcessResult {
	const handler = valueHandlers[arg];
	if (handler !== undefined) {
		const value = args[index + 1];
		if (value === undefined) return { state: current, skipNext: false };
		return { state: handler(value, current), skipNext: true };
	}

	if (arg === "--json") {
		return { state: { ...current, json: true }, skipNext: false };
	}
	if (arg === "--fail-on-issues") {
		return { state: { ...current, failOnIssues: true }, skipNext: false };
	}

	// Handle positional argument
	if (!arg.startsWith("--")) {
		return { state: { ...current, targetPath: arg }, skipNext: false };
	}

	return { state: current, skipNext: false };
}

/**
 * Парсит аргументы командной строки.
 *
 * @param args Tokens after the node binary and script (default: process.argv.slice(2))
 * @returns Parsed options; unknown flags and malformed values are ignored
 *
 * @example
 * ```ts
 * // Command: sas-metrics programs/ --mode statement --output reports
 * const options = parseCLIArgs();
 * // { targetPath: "programs/", mode: "statement", outputDir: "reports", ... }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let state: CLIOptions = {
		targetPath: ".",
		outputDir: undefined,
		extensions: [],
		mode: undefined,
		maxComplexity: undefined,
		maxMacroParameters: undefined,
		configPath: undefined,
		json: false,
		failOnIssues: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args, i, state);
		state = result.state;
		if (result.skipNext) {
			i++;
		}
	}

	return state;
}
