/**
 * Errors that end a maintenance run. Each carries the process exit code.
 */

export class MaintenanceError extends Error {
	readonly exitCode: number;

	constructor(message: string, exitCode = 1) {
		super(message);
		this.name = new.target.name;
		this.exitCode = exitCode;
	}
}

export class InvalidUpgradeModeError extends MaintenanceError {
	constructor(readonly mode: string) {
		super(`Invalid upgrade mode: "${mode}" (expected "security" or "full")`);
	}
}

/**
 * A fatal step exited non-zero. The exit code of the tool becomes the exit
 * code of the run when it fits in 1..255.
 */
export class CommandFailedError extends MaintenanceError {
	constructor(
		readonly command: string,
		readonly commandExitCode: number,
		readonly stderr = "",
	) {
		super(
			`${command} exited with error code ${commandExitCode}`,
			commandExitCode >= 1 && commandExitCode <= 255 ? commandExitCode : 1,
		);
	}
}

export class LogNotFoundError extends MaintenanceError {
	constructor(readonly location: string) {
		super(`No run log found at ${location}`);
	}
}
