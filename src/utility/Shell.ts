/**
 * Shell Utility - Run external tools and capture their output
 *
 * - argv-based spawn, no shell interpolation of arguments
 * - Optional timeout with SIGTERM (0 disables it)
 * - Line callbacks for live forwarding of stdout and stderr
 * - Interactive mode hands the terminal to the tool; nothing is captured
 */

import { spawn } from "node:child_process";
import { Logger } from "./Logger.js";

export interface ShellResult {
	exitCode: number;
	stdout: string;
	stderr: string;
	timedOut: boolean;
	command: string;
}

export interface ShellOptions {
	timeout?: number; // Timeout in milliseconds (default: 0, no timeout)
	onStdout?: (line: string) => void; // Callback for each stdout line
	onStderr?: (line: string) => void; // Callback for each stderr line
	cwd?: string;
	env?: Record<string, string>;
	logCommand?: boolean; // Log command execution (default: true)
	interactive?: boolean; // Inherit all stdio; callbacks are not called
}

/** Exit code reported when the executable cannot be started */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export function formatCommand(command: string, args: readonly string[]): string {
	return [command, ...args].join(" ");
}

/**
 * Splits streamed chunks into complete lines, holding back a trailing partial
 */
class LineBuffer {
	private pending = "";

	constructor(private readonly onLine?: (line: string) => void) {}

	push(text: string): void {
		if (!this.onLine) return;
		const lines = (this.pending + text).split("\n");
		this.pending = lines.pop() ?? "";
		for (const line of lines) {
			this.onLine(line.replace(/\r$/, ""));
		}
	}

	flush(): void {
		if (this.onLine && this.pending) {
			this.onLine(this.pending);
		}
		this.pending = "";
	}
}

export class Shell {
	private static logger = Logger.getInstance();

	private constructor() {
		// Prevent instantiation - this is a static utility class
	}

	/**
	 * Execute a command with its arguments
	 */
	static async execute(
		command: string,
		args: readonly string[] = [],
		options: ShellOptions = {},
	): Promise<ShellResult> {
		const { timeout = 0, onStdout, onStderr, cwd, env, logCommand = true, interactive = false } = options;
		const commandLine = formatCommand(command, args);

		if (interactive) {
			this.logger.info(`Executing interactively: ${commandLine}`);
		} else if (logCommand) {
			this.logger.debug(`Executing: ${commandLine}`);
		}

		return new Promise((resolve) => {
			const proc = spawn(command, [...args], {
				stdio: interactive ? "inherit" : ["inherit", "pipe", "pipe"],
				cwd,
				env: { ...process.env, ...env },
			});

			let stdout = "";
			let stderr = "";
			let completed = false;
			let timeoutHandle: NodeJS.Timeout | undefined;
			const stdoutLines = new LineBuffer(onStdout);
			const stderrLines = new LineBuffer(onStderr);

			if (timeout > 0) {
				timeoutHandle = setTimeout(() => {
					if (!completed) {
						completed = true;
						proc.kill("SIGTERM");
						this.logger.warn(`Command timed out after ${timeout}ms: ${commandLine}`);
						resolve({
							exitCode: -1,
							stdout,
							stderr: stderr || `Timed out after ${timeout}ms`,
							timedOut: true,
							command: commandLine,
						});
					}
				}, timeout);
			}

			proc.stdout?.on("data", (data: Buffer) => {
				const text = data.toString();
				stdout += text;
				stdoutLines.push(text);
			});

			proc.stderr?.on("data", (data: Buffer) => {
				const text = data.toString();
				stderr += text;
				stderrLines.push(text);
			});

			proc.on("close", (code, signal) => {
				if (!completed) {
					completed = true;
					if (timeoutHandle) clearTimeout(timeoutHandle);
					stdoutLines.flush();
					stderrLines.flush();
					// A process killed by a signal has no code; report it as a failure
					const exitCode = code ?? (signal ? 128 : 0);
					if (interactive) {
						this.logger.info(`${commandLine} exited with code ${exitCode}`);
					}
					resolve({
						exitCode,
						stdout,
						stderr,
						timedOut: false,
						command: commandLine,
					});
				}
			});

			proc.on("error", (err) => {
				if (!completed) {
					completed = true;
					if (timeoutHandle) clearTimeout(timeoutHandle);
					this.logger.error(`Command error: ${err.message}`);
					resolve({
						exitCode: SPAWN_FAILURE_EXIT_CODE,
						stdout,
						stderr: err.message,
						timedOut: false,
						command: commandLine,
					});
				}
			});
		});
	}
}
