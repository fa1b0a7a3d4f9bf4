// CHANGE: Test helper to materialize isolated temporary source trees
// WHY: Collector, loader and APP tests need real files, not mocked fs calls
// REF: REQ-METRICS-CLI

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Result of creating a temporary project.
 *
 * Postconditions:
 * - cwd points to the root directory of the temporary project
 * - cleanup() removes the temporary directory recursively
 */
export interface TempProject {
	readonly cwd: string;
	readonly cleanup: () => void;
}

/**
 * Create a temporary directory populated with the given files.
 *
 * @param files Map of "/"-separated relative path → content
 */
export function createTempProject(
	files: Readonly<Record<string, string>>,
): TempProject {
	const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "sas-metrics-"));
	for (const [relative, content] of Object.entries(files)) {
		const target = path.join(cwd, ...relative.split("/"));
		fs.mkdirSync(path.dirname(target), { recursive: true });
		fs.writeFileSync(target, content, { encoding: "utf-8" });
	}
	return {
		cwd,
		cleanup: () => {
			fs.rmSync(cwd, { recursive: true, force: true });
		},
	};
}

/**
 * Build a source with `count` single-line if/then constructs.
 */
export function conditionalLines(count: number): string {
	return Array.from(
		{ length: count },
		(_, index) => `if x = ${index} then y = ${index};`,
	).join("\n");
}
