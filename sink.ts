import type { Logger } from "./logger.js";
import type { EntryFailure, PassResult, SyncEvent } from "./types.js";

/**
 * Receives what a pass does. Implementations decide how to render it; the
 * executor and scheduler only emit structured values.
 */
export interface EventSink {
	passStarted(): void;
	change(event: SyncEvent): void;
	failure(failure: EntryFailure): void;
	passCompleted(result: PassResult): void;
}

export class MemorySink implements EventSink {
	readonly events: SyncEvent[] = [];
	readonly failures: EntryFailure[] = [];
	readonly passes: PassResult[] = [];
	startedCount = 0;

	constructor(private readonly onPassCompleted?: (result: PassResult) => void) {}

	passStarted(): void {
		this.startedCount += 1;
	}

	change(event: SyncEvent): void {
		this.events.push(event);
	}

	failure(failure: EntryFailure): void {
		this.failures.push(failure);
	}

	passCompleted(result: PassResult): void {
		this.passes.push(result);
		this.onPassCompleted?.(result);
	}
}

const CHANGE_VERBS: Record<SyncEvent["kind"], string> = {
	created: "Created",
	modified: "Modified",
	removed: "Removed",
};

export function describeEvent(event: SyncEvent): string {
	return `${CHANGE_VERBS[event.kind]} ${event.entryType} ${event.relativePath}`;
}

export function describeFailure(failure: EntryFailure): string {
	switch (failure.code) {
		case "root-unreadable":
			return failure.message;
		case "unexpected":
			return `Sync pass failed: ${failure.message}`;
		case "entry-io":
			return `Failed to ${failure.operation} ${failure.relativePath || "."}: ${failure.message}`;
	}
}

export class LoggerSink implements EventSink {
	constructor(private readonly logger: Logger) {}

	passStarted(): void {
		this.logger.debug("Syncing...");
	}

	change(event: SyncEvent): void {
		this.logger.info(describeEvent(event));
	}

	failure(failure: EntryFailure): void {
		this.logger.error(describeFailure(failure));
	}

	passCompleted(result: PassResult): void {
		const duration = `Duration: ${result.durationSeconds.toFixed(4)} seconds.`;
		if (result.status === "aborted") {
			this.logger.error(`Syncing aborted, retrying next interval. ${duration}`);
			return;
		}
		if (result.errorCount > 0) {
			this.logger.warn(
				`Syncing completed with ${result.errorCount} error(s). ${duration}`,
			);
			return;
		}
		this.logger.debug(`Syncing completed successfully! ${duration}`);
	}
}
