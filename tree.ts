import type { Dirent } from "node:fs";
import { lstat, readdir, stat } from "node:fs/promises";
import ignore, { type Ignore, type Options } from "ignore";
import { errnoCode, isMissing, RootUnreadableError, toEntryFailure } from "./errors.js";
import { joinRelative, resolveEntry } from "./paths.js";
import type { EntryFailure, EntryKind, TreeNode } from "./types.js";

export interface ExcludeMatcher {
	excludes(relativePath: string, isDirectory: boolean): boolean;
}

export interface WalkOptions {
	exclude?: ExcludeMatcher;
	/** List every symbolic link as a file instead of resolving it. */
	linksAsFiles?: boolean;
	onError?: (failure: EntryFailure) => void;
}

// `ignore` throws on paths it cannot treat as relative, such as "..." at the root.
const UNMATCHABLE_PATH = /^\.*\/|^\.+$/;

function createIgnore(options?: Options): Ignore {
	const factory = ignore as unknown as (opts?: Options) => Ignore;
	return factory(options);
}

export function createExcludeMatcher(patterns: readonly string[]): ExcludeMatcher {
	const matcher = createIgnore();
	matcher.add([...patterns]);
	return {
		excludes: (relativePath, isDirectory) => {
			if (!relativePath || UNMATCHABLE_PATH.test(relativePath)) return false;
			if (matcher.ignores(relativePath)) return true;
			if (isDirectory && matcher.ignores(`${relativePath}/`)) return true;
			return false;
		},
	};
}

async function resolveLink(absolutePath: string): Promise<EntryKind | null> {
	try {
		const target = await stat(absolutePath);
		return target.isFile() ? "file" : null;
	} catch (error) {
		const code = errnoCode(error);
		if (code === "ENOENT" || code === "ELOOP") return null;
		throw error;
	}
}

async function classify(
	absolutePath: string,
	entry: Dirent,
	linksAsFiles: boolean,
): Promise<EntryKind | null> {
	if (entry.isDirectory()) return "directory";
	if (entry.isFile()) return "file";
	if (entry.isSymbolicLink()) {
		return linksAsFiles ? "file" : resolveLink(absolutePath);
	}
	return null;
}

async function listDirectory(
	root: string,
	relativePath: string,
	options: WalkOptions,
): Promise<TreeNode> {
	const dirPath = resolveEntry(root, relativePath);
	const entries = await readdir(dirPath, { withFileTypes: true });
	entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

	const node: TreeNode = { relativePath, directories: [], files: [] };
	for (const entry of entries) {
		const childPath = joinRelative(relativePath, entry.name);
		let kind: EntryKind | null;
		try {
			kind = await classify(
				resolveEntry(root, childPath),
				entry,
				options.linksAsFiles ?? false,
			);
			if (kind && options.exclude?.excludes(childPath, kind === "directory")) {
				continue;
			}
		} catch (error) {
			options.onError?.(toEntryFailure(error, "stat", childPath));
			continue;
		}
		if (!kind) continue;
		if (kind === "directory") {
			node.directories.push(entry.name);
		} else {
			node.files.push(entry.name);
		}
	}
	return node;
}

/**
 * Lazily walks `root` top-down, depth first, in sorted name order. Links are
 * never descended into.
 */
export async function* walkTree(
	root: string,
	options: WalkOptions = {},
): AsyncGenerator<TreeNode> {
	let rootNode: TreeNode;
	try {
		rootNode = await listDirectory(root, "", options);
	} catch (error) {
		throw new RootUnreadableError(root, error);
	}

	const pending: string[] = [];
	let node: TreeNode | undefined = rootNode;
	while (node) {
		yield node;
		for (let index = node.directories.length - 1; index >= 0; index -= 1) {
			pending.push(joinRelative(node.relativePath, node.directories[index]));
		}

		node = undefined;
		let relativePath = pending.pop();
		while (relativePath !== undefined && !node) {
			try {
				node = await listDirectory(root, relativePath, options);
			} catch (error) {
				// A directory that vanished mid-walk needs nothing more.
				if (!isMissing(error)) {
					options.onError?.(toEntryFailure(error, "list", relativePath));
				}
				relativePath = pending.pop();
			}
		}
	}
}

export async function collectTree(
	root: string,
	options: WalkOptions = {},
): Promise<TreeNode[]> {
	const nodes: TreeNode[] = [];
	for await (const node of walkTree(root, options)) {
		nodes.push(node);
	}
	return nodes;
}

/** Kind of the entry at `absolutePath` under the listing rules, or null. */
export async function entryKind(absolutePath: string): Promise<EntryKind | null> {
	try {
		const stats = await lstat(absolutePath);
		if (stats.isDirectory()) return "directory";
		if (stats.isFile()) return "file";
		if (stats.isSymbolicLink()) return resolveLink(absolutePath);
		return null;
	} catch (error) {
		if (isMissing(error)) return null;
		throw error;
	}
}
