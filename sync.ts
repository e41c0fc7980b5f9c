import type { Stats } from "node:fs";
import { copyFile, lstat, mkdir, readdir, rm, stat, utimes } from "node:fs/promises";
import { isMissing, RootUnreadableError, toEntryFailure } from "./errors.js";
import { isWithinRelative, joinRelative, resolveEntry } from "./paths.js";
import type { EventSink } from "./sink.js";
import { collectTree, entryKind, type ExcludeMatcher, walkTree } from "./tree.js";
import type {
	ChangeKind,
	EntryFailure,
	EntryKind,
	PassResult,
	PassStatus,
	SyncEvent,
	SyncOperation,
} from "./types.js";

/**
 * Written timestamps are rounded to microseconds by the platform, so
 * differences this small are treated as equal.
 */
export const DEFAULT_MTIME_TOLERANCE_MS = 1;

export interface SyncExecutorOptions {
	/** Excluded entries are neither copied nor pruned. */
	exclude?: ExcludeMatcher;
	mtimeToleranceMs?: number;
}

class PassRecorder {
	readonly events: SyncEvent[] = [];
	readonly errors: EntryFailure[] = [];
	private readonly startedAt = performance.now();

	constructor(private readonly sink: EventSink) {}

	change(kind: ChangeKind, entryType: EntryKind, relativePath: string): void {
		const event: SyncEvent = { kind, entryType, relativePath };
		this.events.push(event);
		this.sink.change(event);
	}

	fail(failure: EntryFailure): void {
		this.errors.push(failure);
		this.sink.failure(failure);
	}

	finish(status: PassStatus): PassResult {
		const count = (kind: ChangeKind) =>
			this.events.filter((event) => event.kind === kind).length;
		const result: PassResult = {
			status,
			durationSeconds: (performance.now() - this.startedAt) / 1000,
			createdCount: count("created"),
			modifiedCount: count("modified"),
			removedCount: count("removed"),
			errorCount: this.errors.length,
			events: [...this.events],
			errors: [...this.errors],
		};
		this.sink.passCompleted(result);
		return result;
	}
}

async function destinationStats(absolutePath: string): Promise<Stats | null> {
	try {
		return await lstat(absolutePath);
	} catch (error) {
		if (isMissing(error)) return null;
		throw error;
	}
}

async function openRoot(root: string, create: boolean): Promise<void> {
	try {
		if (create) {
			await mkdir(root, { recursive: true });
		}
		await readdir(root);
	} catch (error) {
		throw new RootUnreadableError(root, error);
	}
}

async function copyEntry(
	sourcePath: string,
	targetPath: string,
	sourceStats: Stats,
): Promise<void> {
	await copyFile(sourcePath, targetPath);
	await utimes(targetPath, sourceStats.atimeMs / 1000, sourceStats.mtimeMs / 1000);
}

export class SyncExecutor {
	private readonly toleranceMs: number;

	constructor(
		private readonly sink: EventSink,
		private readonly options: SyncExecutorOptions = {},
	) {
		this.toleranceMs = options.mtimeToleranceMs ?? DEFAULT_MTIME_TOLERANCE_MS;
	}

	/**
	 * Makes `destRoot` mirror `sourceRoot`: creates and updates first, then
	 * prunes. Entry failures are recorded and skipped; an unreadable root
	 * aborts the pass.
	 */
	async runPass(sourceRoot: string, destRoot: string): Promise<PassResult> {
		this.sink.passStarted();
		const pass = new PassRecorder(this.sink);
		try {
			await openRoot(sourceRoot, false);
			await openRoot(destRoot, true);
			await this.createAndUpdate(pass, sourceRoot, destRoot);
			await this.prune(pass, sourceRoot, destRoot);
		} catch (error) {
			if (!(error instanceof RootUnreadableError)) throw error;
			pass.fail({
				...toEntryFailure(error.cause, "list", "", "root-unreadable"),
				message: error.message,
			});
			return pass.finish("aborted");
		}
		return pass.finish("completed");
	}

	private async createAndUpdate(
		pass: PassRecorder,
		sourceRoot: string,
		destRoot: string,
	): Promise<void> {
		const failedDirectories: string[] = [];
		const nodes = walkTree(sourceRoot, {
			exclude: this.options.exclude,
			onError: (failure) => pass.fail(failure),
		});

		for await (const node of nodes) {
			if (failedDirectories.some((dir) => isWithinRelative(node.relativePath, dir))) {
				continue;
			}
			for (const name of node.directories) {
				const relativePath = joinRelative(node.relativePath, name);
				const ready = await this.ensureDirectory(pass, destRoot, relativePath);
				if (!ready) {
					failedDirectories.push(relativePath);
				}
			}
			for (const name of node.files) {
				const relativePath = joinRelative(node.relativePath, name);
				await this.syncFile(pass, sourceRoot, destRoot, relativePath);
			}
		}
	}

	private async ensureDirectory(
		pass: PassRecorder,
		destRoot: string,
		relativePath: string,
	): Promise<boolean> {
		const targetPath = resolveEntry(destRoot, relativePath);
		let operation: SyncOperation = "stat";
		try {
			const existing = await destinationStats(targetPath);
			if (existing?.isDirectory()) return true;
			if (existing) {
				operation = "remove";
				await rm(targetPath, { force: true });
				pass.change("removed", "file", relativePath);
			}
			operation = "mkdir";
			await mkdir(targetPath, { recursive: true });
			pass.change("created", "directory", relativePath);
			return true;
		} catch (error) {
			pass.fail(toEntryFailure(error, operation, relativePath));
			return false;
		}
	}

	private async syncFile(
		pass: PassRecorder,
		sourceRoot: string,
		destRoot: string,
		relativePath: string,
	): Promise<void> {
		const sourcePath = resolveEntry(sourceRoot, relativePath);
		const targetPath = resolveEntry(destRoot, relativePath);
		let operation: SyncOperation = "stat";
		try {
			const sourceStats = await stat(sourcePath);
			const existing = await destinationStats(targetPath);

			if (existing?.isFile()) {
				// Staleness is judged by modification time only.
				if (sourceStats.mtimeMs - existing.mtimeMs <= this.toleranceMs) return;
				operation = "copy";
				await copyEntry(sourcePath, targetPath, sourceStats);
				pass.change("modified", "file", relativePath);
				return;
			}

			if (existing) {
				operation = "remove";
				const isDirectory = existing.isDirectory();
				await rm(targetPath, { recursive: isDirectory, force: true });
				pass.change("removed", isDirectory ? "directory" : "file", relativePath);
			}
			operation = "copy";
			await copyEntry(sourcePath, targetPath, sourceStats);
			pass.change("created", "file", relativePath);
		} catch (error) {
			pass.fail(toEntryFailure(error, operation, relativePath));
		}
	}

	private async prune(
		pass: PassRecorder,
		sourceRoot: string,
		destRoot: string,
	): Promise<void> {
		const snapshot = await collectTree(destRoot, {
			exclude: this.options.exclude,
			linksAsFiles: true,
			onError: (failure) => pass.fail(failure),
		});
		const removedDirectories: string[] = [];

		for (const node of snapshot) {
			if (removedDirectories.some((dir) => isWithinRelative(node.relativePath, dir))) {
				continue;
			}
			for (const name of node.files) {
				const relativePath = joinRelative(node.relativePath, name);
				await this.pruneEntry(pass, sourceRoot, destRoot, relativePath, "file");
			}
			for (const name of node.directories) {
				const relativePath = joinRelative(node.relativePath, name);
				const removed = await this.pruneEntry(
					pass,
					sourceRoot,
					destRoot,
					relativePath,
					"directory",
				);
				if (removed) {
					removedDirectories.push(relativePath);
				}
			}
		}
	}

	private async pruneEntry(
		pass: PassRecorder,
		sourceRoot: string,
		destRoot: string,
		relativePath: string,
		entryType: EntryKind,
	): Promise<boolean> {
		const targetPath = resolveEntry(destRoot, relativePath);
		let operation: SyncOperation = "stat";
		try {
			const sourceKind = await entryKind(resolveEntry(sourceRoot, relativePath));
			if (sourceKind === entryType) return false;
			// Gone already: nothing left to prune.
			if (!(await destinationStats(targetPath))) return false;
			operation = "remove";
			await rm(targetPath, { recursive: entryType === "directory", force: true });
			pass.change("removed", entryType, relativePath);
			return true;
		} catch (error) {
			pass.fail(toEntryFailure(error, operation, relativePath));
			return false;
		}
	}
}
