import { homedir } from "node:os";
import path from "node:path";

const UNICODE_SPACES = /[\u00A0\u2000-\u200A\u202F\u205F\u3000]/g;

function normalizeUnicodeSpaces(value: string): string {
	return value.replace(UNICODE_SPACES, " ");
}

export function expandPath(filePath: string): string {
	const normalized = normalizeUnicodeSpaces(filePath);
	if (normalized === "~") {
		return homedir();
	}
	if (normalized.startsWith("~/")) {
		return homedir() + normalized.slice(1);
	}
	return normalized;
}

export function resolveUserPath(filePath: string, cwd: string): string {
	const expanded = expandPath(filePath);
	if (path.isAbsolute(expanded)) {
		return path.normalize(expanded);
	}
	return path.resolve(cwd, expanded);
}

export function fromPosix(value: string): string {
	return value.split("/").join(path.sep);
}

/** Joins a child name onto a relative path; the root is "". */
export function joinRelative(parent: string, name: string): string {
	return parent ? `${parent}/${name}` : name;
}

export function resolveEntry(root: string, relativePath: string): string {
	if (!relativePath) return root;
	return path.join(root, fromPosix(relativePath));
}

export function isWithinRoot(targetPath: string, rootPath: string): boolean {
	const relative = path.relative(rootPath, targetPath);
	return (
		relative === "" ||
		(!relative.startsWith("..") && !path.isAbsolute(relative))
	);
}

export function isWithinRelative(relativePath: string, ancestor: string): boolean {
	if (!ancestor) return true;
	return relativePath === ancestor || relativePath.startsWith(`${ancestor}/`);
}
