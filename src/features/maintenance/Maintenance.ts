/**
 * Maintenance - one Gentoo maintenance pass
 *
 * Stages run strictly in order:
 * 1. Sync the Portage tree
 * 2. Security (GLSA) or full @world upgrade
 * 3. Reconcile configuration files
 * 4. Clean up (opt-in)
 * 5. Restart or list services with stale libraries
 * 6. Print recent elogs, then unread news
 *
 * A failing step throws CommandFailedError and no later stage runs. The
 * pretend check before a world upgrade is the one step allowed to fail.
 */

import { Logger } from "../../utility/Logger.js";
import { Shell, type ShellResult } from "../../utility/Shell.js";
import { CommandFailedError } from "../../utility/errors.js";
import * as commands from "./commands.js";
import { DEFAULT_ELOG_WINDOW_MS, printRecentElogs } from "./ElogReader.js";
import type { CommandRunner, CommandStep, MaintenanceParameters } from "./types.js";

export interface MaintenanceOptions {
	elogDir: string;
	elogWindowMs?: number;
	commandTimeout?: number;
	runner?: CommandRunner;
	clock?: () => number;
}

type StepPolicy = "fatal" | "guarded";

interface StepOptions {
	policy?: StepPolicy;
	forwardOutput?: boolean;
}

export const SECTION_TITLES = {
	sync: "SYNC PORTAGE TREE",
	security: "SECURITY UPGRADES",
	full: "SYSTEM UPGRADE",
	config: "UPDATE SYSTEM CONFIGURATION FILES",
	clean: "CLEAN UP",
	restart: "RESTART SERVICES",
	elogs: "READ ELOGS",
	news: "READ NEWS",
} as const;

export const OUTCOME_LINES = {
	pretendPassed: "emerge pretend was successful, upgrading...",
	pretendFailed: "emerge pretend has failed, not upgrading",
	worldUpdated: "update was successful",
	glsaUpdated: "glsa update was successful",
	noAdvisories: "No affected GLSAs found.",
} as const;

/**
 * Runner that prints each command instead of executing it
 */
export const dryRunRunner: CommandRunner = async (command, args) => {
	const line = [command, ...args].join(" ");
	console.log(`[dry-run] ${line}`);
	return { exitCode: 0, stdout: "", stderr: "", timedOut: false, command: line };
};

export class Maintenance {
	private logger = Logger.getInstance();
	private readonly runner: CommandRunner;
	private readonly clock: () => number;

	constructor(
		private readonly params: MaintenanceParameters,
		private readonly options: MaintenanceOptions,
	) {
		this.runner = options.runner ?? ((command, args, shellOptions) => Shell.execute(command, args, shellOptions));
		this.clock = options.clock ?? Date.now;
	}

	async run(): Promise<void> {
		const startTime = this.clock();
		this.logger.info(
			`Starting maintenance (upgrade: ${this.params.upgradeMode}, flags: [${this.params.upgradeFlags.join(", ")}])`,
		);

		try {
			await this.runStages();
		} catch (error) {
			const duration = this.clock() - startTime;
			const message = error instanceof Error ? error.message : String(error);
			this.logger.error(`Maintenance failed after ${(duration / 1000).toFixed(1)}s: ${message}`);
			throw error;
		}

		const duration = this.clock() - startTime;
		this.logger.info(`Maintenance completed in ${(duration / 1000).toFixed(1)}s`);
	}

	private async runStages(): Promise<void> {
		this.section(SECTION_TITLES.sync);
		await this.syncTree();

		if (this.params.upgradeMode === "security") {
			this.section(SECTION_TITLES.security);
			await this.upgradeSecurity();
		} else {
			this.section(SECTION_TITLES.full);
			await this.upgradeWorld();
		}

		this.section(SECTION_TITLES.config);
		await this.updateConfiguration();

		this.section(SECTION_TITLES.clean);
		await this.cleanUp();

		this.section(SECTION_TITLES.restart);
		await this.checkRestart();

		this.section(SECTION_TITLES.elogs);
		await this.readElogs();

		this.section(SECTION_TITLES.news);
		await this.readNews();
	}

	private section(title: string): void {
		console.log(`\n{{ ${title} }}\n`);
	}

	/**
	 * Run one step. Fatal steps throw on a non-zero exit; guarded steps hand
	 * the result back to the caller.
	 */
	private async exec(step: CommandStep, options: StepOptions = {}): Promise<ShellResult> {
		const { policy = "fatal", forwardOutput = true } = options;
		this.logger.debug(`Step: ${step.name}`);

		const result = await this.runner(step.command, step.args, {
			timeout: this.options.commandTimeout ?? 0,
			interactive: step.interactive ?? false,
			onStdout: forwardOutput ? (line) => console.log(line) : undefined,
			onStderr: (line) => console.error(line),
		});

		if (result.exitCode !== 0) {
			if (policy === "fatal") {
				throw new CommandFailedError(result.command, result.exitCode, result.stderr);
			}
			this.logger.warn(`${step.name} exited with code ${result.exitCode}`);
		}
		return result;
	}

	private async syncTree(): Promise<void> {
		console.log("Syncing Portage Tree");
		await this.exec(commands.syncTree);
	}

	private async upgradeSecurity(): Promise<void> {
		const affected = await this.exec(commands.listAffectedAdvisories, { forwardOutput: false });

		if (affected.stdout.trim() === "") {
			console.log(OUTCOME_LINES.noAdvisories);
			return;
		}

		console.log("Affected GLSAs found. Applying updates...");
		await this.exec(commands.fixAffectedAdvisories);
		console.log(OUTCOME_LINES.glsaUpdated);
	}

	private async upgradeWorld(): Promise<void> {
		console.log("Running Upgrade: Check Pretend First");
		const pretend = await this.exec(commands.pretendWorldUpgrade, { policy: "guarded" });

		if (pretend.exitCode !== 0) {
			console.warn(OUTCOME_LINES.pretendFailed);
			return;
		}

		console.log(OUTCOME_LINES.pretendPassed);
		await this.exec(commands.worldUpgrade(this.params.upgradeFlags));
		console.log(OUTCOME_LINES.worldUpdated);
	}

	private async updateConfiguration(): Promise<void> {
		const selection = this.params.configUpdate;
		if (selection.kind === "unrecognized") {
			console.error(`Invalid update mode: ${selection.value}`);
			console.error("Please set the config update mode to 'merge', 'interactive', 'dispatch' or 'ignore'.");
			return;
		}

		const step = commands.configUpdateSteps[selection.mode];
		if (!step) {
			console.log("Ignoring configuration update for now...");
			console.log("Please UPDATE IT MANUALLY LATER");
			return;
		}
		await this.exec(step);
	}

	private async cleanUp(): Promise<void> {
		if (!this.params.clean) {
			console.log("Clean up is not enabled.");
			return;
		}

		for (const step of commands.cleanUpSteps) {
			console.log(`${step.name}...`);
			await this.exec(step);
		}
	}

	private async checkRestart(): Promise<void> {
		console.log("Checking if any service needs a restart");
		await this.exec(commands.checkRestart(this.params.restartServices));
	}

	private async readElogs(): Promise<void> {
		const count = await printRecentElogs(this.options.elogDir, {
			now: this.clock(),
			windowMs: this.options.elogWindowMs ?? DEFAULT_ELOG_WINDOW_MS,
		});
		this.logger.debug(`Printed ${count} elog(s) from the review window`);
	}

	private async readNews(): Promise<void> {
		console.log("Getting important news");
		await this.exec(commands.readNews);
	}
}
