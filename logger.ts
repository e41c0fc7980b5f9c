import { closeSync, openSync, writeSync } from "node:fs";
import { ConfigurationError, describeError } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
	debug: "DEBUG",
	info: "INFO",
	warn: "WARNING",
	error: "ERROR",
};

export interface Logger {
	readonly level: LogLevel;
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	close(): void;
}

export interface LogStream {
	write(chunk: string): unknown;
}

export interface LoggerOptions {
	level: LogLevel;
	/** Truncated when the logger is created. */
	filePath?: string;
	/** Mirror of every line; stderr unless set to false. */
	stream?: LogStream | false;
	now?: () => Date;
}

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
	return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}

export function formatLine(date: Date, level: LogLevel, message: string): string {
	return `${formatTimestamp(date)} - ${LEVEL_LABELS[level]}: ${message}\n`;
}

function openLogFile(filePath: string): number {
	try {
		return openSync(filePath, "w");
	} catch (error) {
		throw new ConfigurationError(
			`Cannot open log file ${filePath}: ${describeError(error)}`,
			{ cause: error },
		);
	}
}

export function createLogger(options: LoggerOptions): Logger {
	const { level } = options;
	const now = options.now ?? (() => new Date());
	const stream = options.stream === undefined ? process.stderr : options.stream;
	let fd = options.filePath === undefined ? null : openLogFile(options.filePath);

	const write = (lineLevel: LogLevel, message: string): void => {
		if (LEVEL_ORDER[lineLevel] < LEVEL_ORDER[level]) return;
		const line = formatLine(now(), lineLevel, message);
		if (fd !== null) {
			writeSync(fd, line);
		}
		if (stream) {
			stream.write(line);
		}
	};

	return {
		level,
		debug: (message) => write("debug", message),
		info: (message) => write("info", message),
		warn: (message) => write("warn", message),
		error: (message) => write("error", message),
		close: () => {
			if (fd === null) return;
			closeSync(fd);
			fd = null;
		},
	};
}
