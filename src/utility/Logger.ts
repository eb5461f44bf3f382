/**
 * Run Logger
 *
 * Each maintenance run writes one file, log_YYYY-MM-DD-HH-mm, to the log
 * directory. Only the latest `maxLogs` run files are kept.
 *
 * Entry format (one per line, parsed back by the report reader):
 *   [18-Oct-26 14:03:09 INFO] ::: message
 *
 * Until initialize() is called there is no file sink and entries are dropped.
 */

import * as fs from "node:fs";
import * as path from "node:path";

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

export interface LoggerOptions {
	logDir: string;
	maxLogs: number;
	level?: "debug" | "info" | "warn" | "error";
	now?: Date;
}

export const LOG_SEPARATOR = " ::: ";
const LOG_FILE_PATTERN = /^log_\d{4}-\d{2}-\d{2}-\d{2}-\d{2}$/;
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const LEVEL_NAMES = ["DEBUG", "INFO", "WARNING", "ERROR"];

const pad = (value: number, width = 2): string => value.toString().padStart(width, "0");

export function logFileName(date: Date): string {
	return `log_${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}-${pad(date.getHours())}-${pad(date.getMinutes())}`;
}

export function formatTimestamp(date: Date): string {
	const year = pad(date.getFullYear() % 100);
	return `${pad(date.getDate())}-${MONTHS[date.getMonth()]}-${year} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatEntry(level: LogLevel, message: string, date: Date): string {
	const prefix = `[${formatTimestamp(date)} ${LEVEL_NAMES[level]}]${LOG_SEPARATOR}`;
	return message
		.split("\n")
		.map((line) => `${prefix}${line}\n`)
		.join("");
}

/**
 * Run log files in a directory, oldest first
 */
export function listLogFiles(logDir: string): string[] {
	if (!fs.existsSync(logDir)) {
		return [];
	}
	return fs
		.readdirSync(logDir)
		.filter((name) => LOG_FILE_PATTERN.test(name))
		.sort()
		.map((name) => path.join(logDir, name));
}

export class Logger {
	private static instance: Logger;
	private currentLogPath: string | null = null;
	private writeStream: fs.WriteStream | null = null;
	private minLevel: LogLevel = LogLevel.INFO;

	private constructor() {}

	static getInstance(): Logger {
		if (!Logger.instance) {
			Logger.instance = new Logger();
		}
		return Logger.instance;
	}

	/**
	 * Open the run log file and drop run logs beyond `maxLogs`
	 */
	initialize(options: LoggerOptions): string {
		if (this.writeStream) {
			throw new Error(`Logger already writing to ${this.currentLogPath}`);
		}

		this.minLevel = toLogLevel(options.level ?? "info");

		fs.mkdirSync(options.logDir, { recursive: true });
		const logPath = path.join(options.logDir, logFileName(options.now ?? new Date()));
		fs.appendFileSync(logPath, "");
		this.rotateLogs(options.logDir, options.maxLogs);

		this.currentLogPath = logPath;
		this.writeStream = fs.createWriteStream(logPath, {
			flags: "a",
			encoding: "utf8",
		});
		this.writeStream.on("error", (error) => {
			// Use process.stderr.write directly to avoid recursion
			process.stderr.write(`Run log write error: ${error.message}\n`);
			this.writeStream = null;
		});

		return logPath;
	}

	/**
	 * Keep the newest `maxLogs` run logs (names sort chronologically)
	 */
	private rotateLogs(logDir: string, maxLogs: number): void {
		const files = listLogFiles(logDir);
		for (const stale of files.slice(0, Math.max(0, files.length - maxLogs))) {
			fs.unlinkSync(stale);
		}
	}

	private _log(level: LogLevel, message: string): void {
		if (level < this.minLevel) {
			return;
		}
		this.write(level, message);
	}

	/**
	 * Write an entry whatever the configured level. Console output goes
	 * through here so the report always finds its section markers.
	 */
	write(level: LogLevel, message: string): void {
		this.writeStream?.write(formatEntry(level, message, new Date()));
	}

	debug(message: string): void {
		this._log(LogLevel.DEBUG, message);
	}

	info(message: string): void {
		this._log(LogLevel.INFO, message);
	}

	warn(message: string): void {
		this._log(LogLevel.WARN, message);
	}

	error(message: string): void {
		this._log(LogLevel.ERROR, message);
	}

	/**
	 * Flush and close the run log
	 */
	close(): Promise<void> {
		const stream = this.writeStream;
		this.writeStream = null;
		if (!stream) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			stream.end(() => resolve());
		});
	}
}

function toLogLevel(level: "debug" | "info" | "warn" | "error"): LogLevel {
	switch (level) {
		case "debug":
			return LogLevel.DEBUG;
		case "info":
			return LogLevel.INFO;
		case "warn":
			return LogLevel.WARN;
		case "error":
			return LogLevel.ERROR;
	}
}

/**
 * Mirror console output into the run log, bypassing the level filter.
 * Returns a function restoring the original console methods.
 */
export function interceptConsole(logger: Logger = Logger.getInstance()): () => void {
	const originalLog = console.log;
	const originalError = console.error;
	const originalWarn = console.warn;

	console.log = (...args: unknown[]) => {
		logger.write(LogLevel.INFO, args.map((arg) => String(arg)).join(" "));
		originalLog.apply(console, args);
	};

	console.error = (...args: unknown[]) => {
		logger.write(LogLevel.ERROR, args.map((arg) => String(arg)).join(" "));
		originalError.apply(console, args);
	};

	console.warn = (...args: unknown[]) => {
		logger.write(LogLevel.WARN, args.map((arg) => String(arg)).join(" "));
		originalWarn.apply(console, args);
	};

	return () => {
		console.log = originalLog;
		console.error = originalError;
		console.warn = originalWarn;
	};
}
