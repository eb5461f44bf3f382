#!/usr/bin/env node
/**
 * gentoo-maintain - Gentoo system maintenance runner
 *
 * Entry point: parse the command line, run, and map failures to an exit code.
 */

import { createProgram } from "./cli/program.js";
import { Logger } from "./utility/Logger.js";
import { MaintenanceError } from "./utility/errors.js";

const logger = Logger.getInstance();

try {
	await createProgram().parseAsync(process.argv);
} catch (error) {
	const message = error instanceof Error ? error.message : String(error);
	logger.error(`Error: ${message}`);
	console.error("Error:", message);
	process.exitCode = error instanceof MaintenanceError ? error.exitCode : 1;
} finally {
	await logger.close();
}
