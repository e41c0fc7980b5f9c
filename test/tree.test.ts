import assert from "node:assert/strict";
import { rm, symlink } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { RootUnreadableError } from "../errors.js";
import { collectTree, createExcludeMatcher, entryKind, type ExcludeMatcher } from "../tree.js";
import type { EntryFailure } from "../types.js";
import { createTempDir, writeTree } from "./helpers.js";

test("walkTree visits parents before children in sorted order", async () => {
	const root = await createTempDir("treesync-walk-");
	try {
		await writeTree(root, {
			"z.txt": "z",
			"b/": "",
			"a/x.txt": "x",
			"a/c/": "",
		});

		const nodes = await collectTree(root);
		assert.deepEqual(nodes, [
			{ relativePath: "", directories: ["a", "b"], files: ["z.txt"] },
			{ relativePath: "a", directories: ["c"], files: ["x.txt"] },
			{ relativePath: "a/c", directories: [], files: [] },
			{ relativePath: "b", directories: [], files: [] },
		]);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("walkTree leaves out excluded entries", async () => {
	const root = await createTempDir("treesync-exclude-");
	try {
		await writeTree(root, {
			"keep.txt": "k",
			"debug.log": "d",
			"build/out.js": "o",
			"src/build.txt": "b",
		});

		const exclude = createExcludeMatcher(["*.log", "build/"]);
		const nodes = await collectTree(root, { exclude });
		assert.deepEqual(nodes, [
			{ relativePath: "", directories: ["src"], files: ["keep.txt"] },
			{ relativePath: "src", directories: [], files: ["build.txt"] },
		]);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("exclude matchers accept names made only of dots", () => {
	const exclude = createExcludeMatcher(["*.tmp"]);
	assert.equal(exclude.excludes("...", false), false);
	assert.equal(exclude.excludes("..../x.txt", false), false);
	assert.equal(exclude.excludes("dir/...", true), false);
	assert.equal(exclude.excludes("dir/a.tmp", false), true);
});

test("an exclude matcher that throws fails only its entry", async () => {
	const root = await createTempDir("treesync-exclude-");
	try {
		await writeTree(root, { "bad.txt": "b", "good.txt": "g" });
		const failures: EntryFailure[] = [];
		const exclude: ExcludeMatcher = {
			excludes: (relativePath) => {
				if (relativePath === "bad.txt") throw new Error("no match");
				return false;
			},
		};

		const nodes = await collectTree(root, {
			exclude,
			onError: (failure) => failures.push(failure),
		});

		assert.deepEqual(nodes, [{ relativePath: "", directories: [], files: ["good.txt"] }]);
		assert.deepEqual(failures, [
			{ code: "entry-io", operation: "stat", relativePath: "bad.txt", message: "no match" },
		]);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("walkTree lists file links and never descends into directory links", async () => {
	const root = await createTempDir("treesync-links-");
	try {
		await writeTree(root, { "real/data.txt": "data" });
		await symlink(path.join(root, "real", "data.txt"), path.join(root, "file-link"));
		await symlink(path.join(root, "real"), path.join(root, "dir-link"));
		await symlink(path.join(root, "missing"), path.join(root, "dangling"));

		const resolved = await collectTree(root);
		assert.deepEqual(resolved[0], {
			relativePath: "",
			directories: ["real"],
			files: ["file-link"],
		});

		const raw = await collectTree(root, { linksAsFiles: true });
		assert.deepEqual(raw[0], {
			relativePath: "",
			directories: ["real"],
			files: ["dangling", "dir-link", "file-link"],
		});
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});

test("walkTree rejects a missing root", async () => {
	const root = await createTempDir("treesync-missing-");
	await rm(root, { recursive: true, force: true });

	await assert.rejects(collectTree(root), (error: unknown) => {
		assert.ok(error instanceof RootUnreadableError);
		assert.equal(error.root, root);
		assert.equal(error.code, "ROOT_UNREADABLE");
		return true;
	});
});

test("entryKind reports files, directories and missing paths", async () => {
	const root = await createTempDir("treesync-kind-");
	try {
		await writeTree(root, { "dir/file.txt": "f" });
		await symlink(path.join(root, "dir"), path.join(root, "dir-link"));

		assert.equal(await entryKind(path.join(root, "dir")), "directory");
		assert.equal(await entryKind(path.join(root, "dir", "file.txt")), "file");
		assert.equal(await entryKind(path.join(root, "dir-link")), null);
		assert.equal(await entryKind(path.join(root, "nope")), null);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
});
