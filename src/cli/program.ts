/**
 * gentoo-maintain command line
 *
 *   gentoo-maintain [run] <upgradeMode> [upgradeFlags] [configUpdateMode] [restart] [clean] [options]
 *   gentoo-maintain elogs [--hours <n>]
 *   gentoo-maintain report [logfile]
 */

import { Command, InvalidArgumentError } from "commander";
import { config, type MaintainConfig } from "../config/index.js";
import { printRecentElogs } from "../features/maintenance/ElogReader.js";
import { Maintenance, dryRunRunner } from "../features/maintenance/Maintenance.js";
import { ENABLED_FLAG, parseParameters } from "../features/maintenance/parameters.js";
import { buildReport, formatReport, readRunLog } from "../features/report/RunReport.js";
import { Logger, interceptConsole } from "../utility/Logger.js";

interface RunCommandOptions {
	upgradeFlag: string[];
	configUpdate?: string;
	restart?: boolean;
	clean?: boolean;
	dryRun?: boolean;
	logDir?: string;
	elogDir?: string;
}

interface ElogsCommandOptions {
	hours?: number;
	elogDir?: string;
}

interface ReportCommandOptions {
	logDir?: string;
}

const HOUR_MS = 60 * 60 * 1000;

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

function positiveNumber(value: string): number {
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Expected a positive number.");
	}
	return parsed;
}

export function createProgram(settings: MaintainConfig = config): Command {
	const program = new Command();
	const logger = Logger.getInstance();

	program
		.name("gentoo-maintain")
		.description("Sync, upgrade and tidy a Gentoo system, then review elogs and news");

	program
		.command("run", { isDefault: true })
		.description("Run every maintenance stage in order")
		.argument("[upgradeMode]", "security | full")
		.argument("[upgradeFlags]", "extra emerge flags for a full upgrade, space separated")
		.argument("[configUpdateMode]", "merge | interactive | dispatch | ignore")
		.argument("[restart]", "y restarts services with stale libraries, anything else lists them")
		.argument("[clean]", "y removes orphans, rebuilds reverse dependencies and cleans distfiles")
		.option("--upgrade-flag <flag>", "extra emerge flag, taken verbatim (repeatable)", collect, [])
		.option("--config-update <mode>", "config update mode, overrides the positional value")
		.option("--restart", "restart services with stale libraries")
		.option("--clean", "run the clean up stage")
		.option("--dry-run", "print commands instead of running them")
		.option("--log-dir <dir>", "directory for run logs", settings.logDir)
		.option("--elog-dir <dir>", "Portage elog directory", settings.elogDir)
		// emerge flags arrive as positionals and look like options
		.allowUnknownOption()
		.addHelpText("after", '\nExample:\n  gentoo-maintain full "--keep-going --verbose" merge n y')
		.action(
			async (
				upgradeMode: string | undefined,
				upgradeFlags: string | undefined,
				configUpdateMode: string | undefined,
				restart: string | undefined,
				clean: string | undefined,
				opts: RunCommandOptions,
			) => {
				const params = parseParameters({
					upgradeMode,
					upgradeFlags,
					extraUpgradeFlags: opts.upgradeFlag,
					configUpdateMode: opts.configUpdate ?? configUpdateMode,
					restart: opts.restart ? ENABLED_FLAG : restart,
					clean: opts.clean ? ENABLED_FLAG : clean,
				});

				const logPath = logger.initialize({
					logDir: opts.logDir ?? settings.logDir,
					maxLogs: settings.maxLogs,
					level: settings.logLevel,
				});
				const restoreConsole = interceptConsole(logger);

				try {
					await new Maintenance(params, {
						elogDir: opts.elogDir ?? settings.elogDir,
						elogWindowMs: settings.elogWindowHours * HOUR_MS,
						commandTimeout: settings.commandTimeout,
						runner: opts.dryRun ? dryRunRunner : undefined,
					}).run();
					console.log("gentoo-maintain completed its tasks!");
				} finally {
					console.log(`Log file can be found at: ${logPath}`);
					restoreConsole();
				}
			},
		);

	program
		.command("elogs")
		.description("Print elogs written during the review window")
		.option("--hours <n>", "review window in hours", positiveNumber, settings.elogWindowHours)
		.option("--elog-dir <dir>", "Portage elog directory", settings.elogDir)
		.action(async (opts: ElogsCommandOptions) => {
			await printRecentElogs(opts.elogDir ?? settings.elogDir, {
				windowMs: (opts.hours ?? settings.elogWindowHours) * HOUR_MS,
			});
		});

	program
		.command("report")
		.description("Summarize a run log (the latest one by default)")
		.argument("[logfile]", "path to a run log")
		.option("--log-dir <dir>", "directory for run logs", settings.logDir)
		.action((logfile: string | undefined, opts: ReportCommandOptions) => {
			const runLog = readRunLog(opts.logDir ?? settings.logDir, logfile);
			console.log(`Report for ${runLog.path}`);
			console.log(formatReport(buildReport(runLog.text)));
		});

	return program;
}
