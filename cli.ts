import { Command, InvalidArgumentError } from "commander";
import {
	DEFAULT_INTERVAL_SECONDS,
	DEFAULT_LOG_FILE,
	describeConfig,
	prepareRoots,
	resolveConfig,
	type SyncConfig,
} from "./config.js";
import { describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { runScheduler } from "./scheduler.js";
import { LoggerSink } from "./sink.js";
import { SyncExecutor } from "./sync.js";
import { createExcludeMatcher } from "./tree.js";

interface CliOptions {
	interval: number;
	logFile: string;
	debug: boolean;
	exclude: string[];
}

function parseInterval(value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new InvalidArgumentError("Must be a whole number of seconds.");
	}
	return Number.parseInt(value, 10);
}

export function createProgram(): Command {
	return new Command()
		.name("treesync")
		.description(
			"One way synchronization of a destination directory to match a source directory.",
		)
		.argument("<source>", "source directory")
		.argument("<destination>", "destination directory")
		.option(
			"-i, --interval <seconds>",
			"sync interval in seconds",
			parseInterval,
			DEFAULT_INTERVAL_SECONDS,
		)
		.option("-l, --log-file <path>", "path to the log file", DEFAULT_LOG_FILE)
		.option("-d, --debug", "enable debug logging", false)
		.option(
			"-x, --exclude <pattern...>",
			"gitignore-style pattern left out of the sync",
			[],
		)
		.showHelpAfterError();
}

export function parseCliArgs(
	argv: readonly string[],
	cwd: string,
	program: Command = createProgram(),
): SyncConfig {
	program.parse([...argv], { from: "user" });
	const [source, destination] = program.args;
	const options = program.opts<CliOptions>();
	return resolveConfig(
		{
			source,
			destination,
			intervalSeconds: options.interval,
			logFile: options.logFile,
			debug: options.debug,
			exclude: options.exclude,
		},
		cwd,
	);
}

/** Runs until SIGINT or SIGTERM; resolves with the process exit code. */
export async function main(argv: readonly string[]): Promise<number> {
	let config: SyncConfig;
	let logger: Logger;
	try {
		config = parseCliArgs(argv, process.cwd());
		logger = createLogger({
			level: config.debug ? "debug" : "info",
			filePath: config.logFile,
		});
	} catch (error) {
		process.stderr.write(`Error: ${describeError(error)}\n`);
		return 1;
	}

	try {
		await prepareRoots(config);
	} catch (error) {
		logger.error(describeError(error));
		logger.close();
		return 1;
	}

	const controller = new AbortController();
	const stop = (signal: NodeJS.Signals) => {
		logger.info(`Received ${signal}, stopping after the current pass`);
		controller.abort();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	const sink = new LoggerSink(logger);
	const executor = new SyncExecutor(sink, {
		exclude: createExcludeMatcher(config.exclude),
	});
	logger.debug(`Starting ${describeConfig(config)}`);

	try {
		const { passes } = await runScheduler({
			source: config.source,
			destination: config.destination,
			intervalSeconds: config.intervalSeconds,
			signal: controller.signal,
			executor,
			sink,
		});
		logger.info(`Stopped after ${passes} pass(es)`);
		return 0;
	} finally {
		process.off("SIGINT", stop);
		process.off("SIGTERM", stop);
		logger.close();
	}
}
