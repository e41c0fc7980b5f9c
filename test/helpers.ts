import { mkdir, mkdtemp, readdir, readFile, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

export async function createTempDir(prefix: string): Promise<string> {
	return mkdtemp(path.join(tmpdir(), prefix));
}

/**
 * Writes `files` under `root`. Keys ending in "/" become empty directories;
 * everything else is a file with the given content.
 */
export async function writeTree(
	root: string,
	files: Record<string, string>,
	mtimeSeconds?: number,
): Promise<void> {
	for (const [relativePath, content] of Object.entries(files)) {
		const absolutePath = path.join(root, relativePath);
		if (relativePath.endsWith("/")) {
			await mkdir(absolutePath, { recursive: true });
			continue;
		}
		await mkdir(path.dirname(absolutePath), { recursive: true });
		await writeFile(absolutePath, content, "utf-8");
		if (mtimeSeconds !== undefined) {
			await utimes(absolutePath, mtimeSeconds, mtimeSeconds);
		}
	}
}

/** Sorted listing: directories as "name/", files as "name=content". */
export async function readTree(root: string): Promise<string[]> {
	const listing: string[] = [];
	const walk = async (dirPath: string, prefix: string): Promise<void> => {
		const entries = await readdir(dirPath, { withFileTypes: true });
		for (const entry of entries) {
			const relativePath = `${prefix}${entry.name}`;
			const absolutePath = path.join(dirPath, entry.name);
			if (entry.isDirectory()) {
				listing.push(`${relativePath}/`);
				await walk(absolutePath, `${relativePath}/`);
				continue;
			}
			const content = await readFile(absolutePath, "utf-8");
			listing.push(`${relativePath}=${content}`);
		}
	};
	await walk(root, "");
	return listing.sort();
}
