import { mkdir, stat } from "node:fs/promises";
import path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError, describeError, isMissing } from "./errors.js";
import { isWithinRoot, resolveUserPath } from "./paths.js";

export const DEFAULT_INTERVAL_SECONDS = 10;
export const DEFAULT_LOG_FILE = "sync_log.log";
/** Longest wait a single Node timer can hold. */
export const MAX_INTERVAL_SECONDS = 2_147_483;

export const SyncConfigSchema = Type.Object({
	source: Type.String({ minLength: 1 }),
	destination: Type.String({ minLength: 1 }),
	intervalSeconds: Type.Integer({ minimum: 1, maximum: MAX_INTERVAL_SECONDS }),
	logFile: Type.String({ minLength: 1 }),
	debug: Type.Boolean(),
	exclude: Type.Array(Type.String({ minLength: 1 })),
});

export type SyncConfig = Static<typeof SyncConfigSchema>;

export interface SyncConfigInput {
	source: string;
	destination: string;
	intervalSeconds?: number;
	logFile?: string;
	debug?: boolean;
	exclude?: string[];
}

/** Applies defaults, validates, and makes every path absolute against `cwd`. */
export function resolveConfig(input: SyncConfigInput, cwd: string): SyncConfig {
	const candidate = {
		source: input.source,
		destination: input.destination,
		intervalSeconds: input.intervalSeconds ?? DEFAULT_INTERVAL_SECONDS,
		logFile: input.logFile ?? DEFAULT_LOG_FILE,
		debug: input.debug ?? false,
		exclude: input.exclude ?? [],
	};

	if (!Value.Check(SyncConfigSchema, candidate)) {
		const problems = [...Value.Errors(SyncConfigSchema, candidate)].map(
			(error) => `${error.path}: ${error.message}`,
		);
		throw new ConfigurationError(`Invalid configuration (${problems.join("; ")})`);
	}

	return {
		...candidate,
		source: resolveUserPath(candidate.source, cwd),
		destination: resolveUserPath(candidate.destination, cwd),
		logFile: resolveUserPath(candidate.logFile, cwd),
	};
}

async function isDirectory(dirPath: string): Promise<boolean | null> {
	try {
		return (await stat(dirPath)).isDirectory();
	} catch (error) {
		if (isMissing(error)) return null;
		throw new ConfigurationError(`Cannot access ${dirPath}: ${describeError(error)}`, {
			cause: error,
		});
	}
}

/**
 * Startup checks: the source must be an existing directory, the destination
 * is created when missing, and neither root may contain the other.
 */
export async function prepareRoots(config: SyncConfig): Promise<void> {
	const { source, destination, logFile } = config;

	const sourceIsDirectory = await isDirectory(source);
	if (sourceIsDirectory === null) {
		throw new ConfigurationError(`Source directory does not exist: ${source}`);
	}
	if (!sourceIsDirectory) {
		throw new ConfigurationError(`Source is not a directory: ${source}`);
	}

	if (isWithinRoot(destination, source) || isWithinRoot(source, destination)) {
		throw new ConfigurationError(
			`Source and destination must not contain each other: ${source}, ${destination}`,
		);
	}
	if (isWithinRoot(logFile, destination)) {
		throw new ConfigurationError(
			`Log file must be outside the destination: ${logFile}`,
		);
	}

	try {
		await mkdir(destination, { recursive: true });
	} catch (error) {
		throw new ConfigurationError(
			`Cannot create destination ${destination}: ${describeError(error)}`,
			{ cause: error },
		);
	}
	if (!(await isDirectory(destination))) {
		throw new ConfigurationError(`Destination is not a directory: ${destination}`);
	}
}

export function describeConfig(config: SyncConfig): string {
	const parts = [
		`source=${config.source}`,
		`destination=${config.destination}`,
		`interval=${config.intervalSeconds}s`,
		`log=${path.basename(config.logFile)}`,
	];
	if (config.exclude.length > 0) {
		parts.push(`exclude=${config.exclude.join(",")}`);
	}
	return parts.join(" ");
}
