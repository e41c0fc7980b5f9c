import { setTimeout as delay } from "node:timers/promises";
import { describeError } from "./errors.js";
import type { EventSink } from "./sink.js";
import type { PassResult } from "./types.js";

// Node fires timers longer than this after 1 ms.
const MAX_TIMER_MS = 2_147_483_647;

export interface PassRunner {
	runPass(sourceRoot: string, destRoot: string): Promise<PassResult>;
}

export interface SchedulerOptions {
	source: string;
	destination: string;
	intervalSeconds: number;
	signal: AbortSignal;
	executor: PassRunner;
	sink: EventSink;
}

export interface SchedulerStats {
	passes: number;
}

/**
 * Waits `ms`, waking early when `signal` aborts. Resolves true when the full
 * wait elapsed.
 */
export async function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
	let remaining = ms;
	do {
		if (signal.aborted) return false;
		const slice = Math.min(remaining, MAX_TIMER_MS);
		try {
			await delay(slice, undefined, { signal });
		} catch (error) {
			if (signal.aborted) return false;
			throw error;
		}
		remaining -= slice;
	} while (remaining > 0);
	return true;
}

/**
 * Runs passes back to back, `intervalSeconds` apart, until `signal` aborts.
 * A pass in progress always finishes.
 */
export async function runScheduler(options: SchedulerOptions): Promise<SchedulerStats> {
	const { source, destination, signal, executor, sink } = options;
	const intervalMs = options.intervalSeconds * 1000;
	let passes = 0;

	while (!signal.aborted) {
		try {
			await executor.runPass(source, destination);
		} catch (error) {
			sink.failure({
				code: "unexpected",
				operation: "pass",
				relativePath: "",
				message: describeError(error),
			});
		}
		passes += 1;
		if (!(await sleep(intervalMs, signal))) break;
	}

	return { passes };
}
