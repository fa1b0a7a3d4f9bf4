// CHANGE: Shell collector resolving a target path to source texts
// WHY: Separate IO-bound traversal from the pure metrics engine
// REF: REQ-METRICS-CLI
// SOURCE: n/a
// FORMAT THEOREM: collect(target) ⇒ sources ∪ failures covers every matching file exactly once
// PURITY: SHELL
// EFFECT: Effect<CollectionResult, FSError>
// INVARIANT: Unreadable target fails; unreadable entries below it are reported as failures
// COMPLEXITY: O(n) where n = files under the target directory

import { Effect } from "effect";

import { describeError, FSError } from "../../core/errors.js";
import type {
	CollectedSource,
	CollectionResult,
	SourceFailure,
} from "../../core/types/index.js";
import { fs, path } from "../utils/node-mods.js";

const fsPromises = fs.promises;

const IGNORED_DIRECTORIES = new Set([".git", "node_modules", ".svn"]);

interface WalkAccumulator {
	readonly sources: CollectedSource[];
	readonly failures: SourceFailure[];
}

/**
 * CHANGE: Normalize relative path inside target root.
 * WHY: Collector always emits POSIX separators.
 * INVARIANT: Never starts/ends with "/"
 * COMPLEXITY: O(1)
 */
function joinRelative(base: string, name: string): string {
	if (base.length === 0) return name;
	return `${base}/${name}`;
}

/**
 * @pure true
 */
export function hasSourceExtension(
	fileName: string,
	extensions: readonly string[],
): boolean {
	return extensions.includes(path.extname(fileName).toLowerCase());
}

function readSource(
	absolutePath: string,
	relativePath: string,
): Effect.Effect<CollectedSource, FSError> {
	return Effect.tryPromise({
		try: () => fsPromises.readFile(absolutePath, "utf8"),
		catch: (error) =>
			new FSError({ path: relativePath, detail: describeError(error) }),
	}).pipe(Effect.map((text) => ({ relativePath, absolutePath, text })));
}

/**
 * CHANGE: Recursively traverse directories with ignore set.
 * WHY: Deterministic ordering; heavy VCS/tooling directories are skipped
 * PURITY: SHELL
 * EFFECT: Effect<void, never>; failures land in the accumulator
 * INVARIANT: Dir entries sorted lexicographically
 * COMPLEXITY: O(n)
 */
function walkDirectory(
	absoluteDir: string,
	relativeBase: string,
	extensions: readonly string[],
	acc: WalkAccumulator,
): Effect.Effect<void> {
	return Effect.gen(function* (_) {
		const dirents = yield* _(
			Effect.tryPromise({
				try: () => fsPromises.readdir(absoluteDir, { withFileTypes: true }),
				catch: (error) =>
					new FSError({
						path: relativeBase.length === 0 ? "." : relativeBase,
						detail: describeError(error),
					}),
			}),
		);

		const sorted = [...dirents].sort((a, b) => a.name.localeCompare(b.name));

		for (const dirent of sorted) {
			const { name } = dirent;
			const relativePath = joinRelative(relativeBase, name);
			const absolutePath = path.join(absoluteDir, name);

			if (dirent.isDirectory()) {
				if (IGNORED_DIRECTORIES.has(name)) continue;
				yield* _(walkDirectory(absolutePath, relativePath, extensions, acc));
				continue;
			}

			if (dirent.isFile() && hasSourceExtension(name, extensions)) {
				const read = yield* _(
					Effect.either(readSource(absolutePath, relativePath)),
				);
				if (read._tag === "Right") {
					acc.sources.push(read.right);
				} else {
					acc.failures.push({ path: read.left.path, detail: read.left.detail });
				}
			}
		}
	}).pipe(
		Effect.catchAll((error) =>
			Effect.sync(() => {
				acc.failures.push({ path: error.path, detail: error.detail });
			}),
		),
	);
}

/**
 * CHANGE: Collect source texts under Effect discipline.
 * WHY: Single file → one source (extension not checked); directory → every
 *      file whose extension matches, recursively
 * PURITY: SHELL
 * EFFECT: Effect<CollectionResult, FSError>
 * INVARIANT: FSError only when the target itself cannot be accessed
 * COMPLEXITY: O(n)
 */
export function collectSourcesEffect(
	targetPath: string,
	extensions: readonly string[],
	cwd: string = process.cwd(),
): Effect.Effect<CollectionResult, FSError> {
	return Effect.gen(function* (_) {
		const absoluteTarget = path.resolve(cwd, targetPath);

		const stats = yield* _(
			Effect.tryPromise({
				try: () => fsPromises.stat(absoluteTarget),
				catch: (error) =>
					new FSError({ path: targetPath, detail: describeError(error) }),
			}),
		);

		if (stats.isFile()) {
			const single = yield* _(
				readSource(absoluteTarget, path.basename(absoluteTarget)),
			);
			return { sources: [single], failures: [] };
		}

		if (stats.isDirectory()) {
			const acc: WalkAccumulator = { sources: [], failures: [] };
			yield* _(walkDirectory(absoluteTarget, "", extensions, acc));
			return { sources: acc.sources, failures: acc.failures };
		}

		return yield* _(
			Effect.fail(
				new FSError({
					path: targetPath,
					detail: "target is neither a file nor a directory",
				}),
			),
		);
	});
}
