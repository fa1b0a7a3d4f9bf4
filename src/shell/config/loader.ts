// CHANGE: Load analyzer configuration from sas-metrics.config.json
// WHY: Thresholds, mode and extensions can be pinned per project instead of per invocation
// REF: REQ-METRICS-CONFIG
// SOURCE: n/a
// PURITY: SHELL
// EFFECT: Effect<AnalyzerConfig | null, ConfigError>
// INVARIANT: Missing default file ⇒ null; explicit file that cannot be used ⇒ ConfigError

import { Effect } from "effect";

import { ConfigError, describeError } from "../../core/errors.js";
import type {
	AnalyzerConfig,
	SegmentationMode,
	Thresholds,
} from "../../core/types/index.js";
import { fs, path } from "../utils/node-mods.js";
import { normalizeExtension } from "./cli.js";

export const DEFAULT_CONFIG_FILE = "sas-metrics.config.json";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isIntegerAtLeast(
	value: JSONValue | undefined,
	min: number,
): value is number {
	return typeof value === "number" && Number.isInteger(value) && value >= min;
}

function isMode(value: JSONValue | undefined): value is SegmentationMode {
	return value === "line" || value === "statement";
}

/**
 * Validate the `thresholds` object; unknown keys are ignored.
 *
 * @returns null when a known key has a wrong type or is out of range
 *          (maxComplexity ≥ 1, maxMacroParameters ≥ 0)
 */
function validateThresholds(
	value: JSONValue | undefined,
): Partial<Thresholds> | null {
	if (value === undefined) return {};
	if (!isJSONObject(value)) return null;

	const { maxComplexity, maxMacroParameters } = value;
	if (maxComplexity !== undefined && !isIntegerAtLeast(maxComplexity, 1)) {
		return null;
	}
	if (
		maxMacroParameters !== undefined &&
		!isIntegerAtLeast(maxMacroParameters, 0)
	) {
		return null;
	}
	return {
		...(maxComplexity === undefined ? {} : { maxComplexity }),
		...(maxMacroParameters === undefined ? {} : { maxMacroParameters }),
	};
}

function validateExtensions(
	value: JSONValue | undefined,
): readonly string[] | null {
	if (value === undefined) return [];
	if (!Array.isArray(value)) return null;
	const extensions: string[] = [];
	for (const entry of value) {
		if (typeof entry !== "string" || entry.trim().length === 0) return null;
		extensions.push(normalizeExtension(entry));
	}
	return extensions;
}

/**
 * Validate parsed JSON into AnalyzerConfig.
 *
 * @pure true
 * @returns null when the document does not describe a valid config
 */
export function validateAnalyzerConfig(value: JSONValue): AnalyzerConfig | null {
	if (!isJSONObject(value)) return null;

	const mode = value["mode"];
	if (mode !== undefined && !isMode(mode)) return null;

	const thresholds = validateThresholds(value["thresholds"]);
	const extensions = validateExtensions(value["extensions"]);
	if (thresholds === null || extensions === null) return null;

	return {
		...(mode === undefined ? {} : { mode }),
		...(extensions.length === 0 ? {} : { extensions }),
		thresholds,
	};
}

function readConfigFile(configPath: string): Effect.Effect<string, ConfigError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(configPath, "utf8"),
		catch: (error) =>
			new ConfigError({ path: configPath, detail: describeError(error) }),
	});
}

function parseConfig(
	raw: string,
	configPath: string,
): Effect.Effect<AnalyzerConfig, ConfigError> {
	return Effect.try({
		try: (): JSONValue => JSON.parse(raw),
		catch: (error) =>
			new ConfigError({ path: configPath, detail: describeError(error) }),
	}).pipe(
		Effect.flatMap((parsed) => {
			const config = validateAnalyzerConfig(parsed);
			return config === null
				? Effect.fail(
						new ConfigError({
							path: configPath,
							detail: "expected { mode?, extensions?, thresholds? } with valid values",
						}),
					)
				: Effect.succeed(config);
		}),
	);
}

/**
 * Загружает конфигурацию анализатора.
 *
 * @param explicitPath Path passed with --config; when absent the default file
 *        in `cwd` is tried and silently skipped if it does not exist
 * @param cwd Directory the default file is resolved against
 *
 * @effect Effect<AnalyzerConfig | null, ConfigError>
 */
export function loadAnalyzerConfig(
	explicitPath: string | undefined,
	cwd: string = process.cwd(),
): Effect.Effect<AnalyzerConfig | null, ConfigError> {
	if (explicitPath !== undefined) {
		const configPath = path.resolve(cwd, explicitPath);
		return readConfigFile(configPath).pipe(
			Effect.flatMap((raw) => parseConfig(raw, configPath)),
		);
	}

	const defaultPath = path.resolve(cwd, DEFAULT_CONFIG_FILE);
	if (!fs.existsSync(defaultPath)) return Effect.succeed(null);
	return readConfigFile(defaultPath).pipe(
		Effect.flatMap((raw) => parseConfig(raw, defaultPath)),
	);
}
