/**
 * gentoo-maintain Configuration
 *
 * Paths and limits for a maintenance run, read from the environment
 */

import { z } from "zod";
import * as dotenv from "dotenv";

dotenv.config();

const MaintainConfigSchema = z.object({
	// Logging
	logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
	logDir: z.string().min(1).default("/var/log/gentoo-maintain"),
	maxLogs: z.number().int().positive().default(8),

	// Portage
	elogDir: z.string().min(1).default("/var/log/portage/elog"),
	elogWindowHours: z.number().positive().default(24),

	// External commands; 0 waits for as long as the tool runs
	commandTimeout: z.number().int().nonnegative().default(0),
});

export type MaintainConfig = z.infer<typeof MaintainConfigSchema>;

function toNumber(value: string | undefined): number | undefined {
	return value === undefined || value === "" ? undefined : Number(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MaintainConfig {
	const rawConfig = {
		logLevel: env.LOG_LEVEL?.toLowerCase() || undefined,
		logDir: env.GENTOO_MAINTAIN_LOG_DIR || undefined,
		maxLogs: toNumber(env.GENTOO_MAINTAIN_MAX_LOGS),
		elogDir: env.GENTOO_MAINTAIN_ELOG_DIR || undefined,
		elogWindowHours: toNumber(env.GENTOO_MAINTAIN_ELOG_HOURS),
		commandTimeout: toNumber(env.GENTOO_MAINTAIN_COMMAND_TIMEOUT),
	};

	try {
		return MaintainConfigSchema.parse(rawConfig);
	} catch (error) {
		if (error instanceof z.ZodError) {
			console.error("Configuration validation failed:");
			for (const issue of error.issues) {
				console.error(`  - ${issue.path.join(".")}: ${issue.message}`);
			}
		}
		throw error;
	}
}

export const config = loadConfig();
