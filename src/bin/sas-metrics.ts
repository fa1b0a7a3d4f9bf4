#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: Enforce Functional Core, Imperative Shell. APP returns ExitCode; BIN exits the process.
// FORMAT THEOREM: ∀run ∈ App: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { runAnalysis } from "../app/runAnalysis.js";
import { parseCLIArgs } from "../shell/config/index.js";

/**
 * CLI entry point for sas-metrics.
 *
 * @remarks
 * - @pure false (contains side effects: process termination and console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const cliOptions = parseCLIArgs();
		const code = await Effect.runPromise(runAnalysis(cliOptions));
		// Shell boundary: single process exit
		process.exit(code);
	} catch (error) {
		// Shell boundary: report fatal and exit with failure
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
