// CHANGE: Barrel for shell configuration modules
// REF: REQ-METRICS-CLI

export { normalizeExtension, parseCLIArgs } from "./cli.js";
export {
	DEFAULT_CONFIG_FILE,
	loadAnalyzerConfig,
	validateAnalyzerConfig,
} from "./loader.js";
