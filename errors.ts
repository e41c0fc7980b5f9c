import type { EntryFailure, FailureCode, SyncOperation } from "./types.js";

export class TreesyncError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = this.constructor.name;
	}
}

/** A source or destination root that cannot be listed. Fatal for one pass. */
export class RootUnreadableError extends TreesyncError {
	constructor(
		public readonly root: string,
		cause: unknown,
	) {
		super(`Cannot read root ${root}: ${describeError(cause)}`, "ROOT_UNREADABLE", {
			cause,
		});
	}
}

/** Invalid arguments or an unusable environment at startup. */
export class ConfigurationError extends TreesyncError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "CONFIGURATION", options);
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function errnoCode(error: unknown): string | undefined {
	if (!(error instanceof Error)) return undefined;
	const err = error as NodeJS.ErrnoException;
	return err.code;
}

export function isMissing(error: unknown): boolean {
	return errnoCode(error) === "ENOENT";
}

export function toEntryFailure(
	error: unknown,
	operation: SyncOperation,
	relativePath: string,
	code: FailureCode = "entry-io",
): EntryFailure {
	const failure: EntryFailure = {
		code,
		operation,
		relativePath,
		message: describeError(error),
	};
	const errno = errnoCode(error);
	if (errno) {
		failure.errno = errno;
	}
	return failure;
}
