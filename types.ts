export type EntryKind = "file" | "directory";

export type ChangeKind = "created" | "modified" | "removed";

export interface SyncEvent {
	kind: ChangeKind;
	entryType: EntryKind;
	/** Posix-style path relative to the tree root. */
	relativePath: string;
}

export type SyncOperation =
	| "list"
	| "stat"
	| "mkdir"
	| "copy"
	| "remove"
	| "pass";

export type FailureCode = "root-unreadable" | "entry-io" | "unexpected";

export interface EntryFailure {
	code: FailureCode;
	operation: SyncOperation;
	relativePath: string;
	message: string;
	errno?: string;
}

export interface TreeNode {
	relativePath: string;
	directories: string[];
	files: string[];
}

export interface PassSummary {
	durationSeconds: number;
	createdCount: number;
	modifiedCount: number;
	removedCount: number;
	errorCount: number;
}

export type PassStatus = "completed" | "aborted";

export interface PassResult extends PassSummary {
	status: PassStatus;
	events: SyncEvent[];
	errors: EntryFailure[];
}
