/**
 * Portage tool invocations used by the maintenance stages
 */

import type { CommandStep, ConfigUpdateMode } from "./types.js";

const WORLD_UPGRADE_ARGS = ["--update", "--newuse", "--deep"] as const;

export const syncTree: CommandStep = {
	name: "Syncing Portage tree",
	command: "emerge",
	args: ["--sync"],
};

export const listAffectedAdvisories: CommandStep = {
	name: "Listing affected GLSAs",
	command: "glsa-check",
	args: ["--list", "affected"],
};

export const fixAffectedAdvisories: CommandStep = {
	name: "Applying GLSA fixes",
	command: "glsa-check",
	args: ["--fix", "affected"],
};

export const pretendWorldUpgrade: CommandStep = {
	name: "Checking world upgrade (pretend)",
	command: "emerge",
	args: ["--pretend", ...WORLD_UPGRADE_ARGS, "@world"],
};

export function worldUpgrade(extraFlags: readonly string[]): CommandStep {
	return {
		name: "Upgrading @world",
		command: "emerge",
		args: ["--verbose", "--quiet-build", "y", ...WORLD_UPGRADE_ARGS, ...extraFlags, "@world"],
	};
}

/**
 * Steps per config update mode; "ignore" runs nothing
 */
export const configUpdateSteps: Record<ConfigUpdateMode, CommandStep | null> = {
	merge: { name: "Merging configuration files", command: "etc-update", args: ["--automode", "-5"] },
	interactive: {
		name: "Merging configuration files interactively",
		command: "etc-update",
		args: [],
		interactive: true,
	},
	dispatch: { name: "Dispatching configuration updates", command: "dispatch-conf", args: [], interactive: true },
	ignore: null,
};

export const cleanUpSteps: readonly CommandStep[] = [
	{ name: "Cleaning packages that are not part of the tree", command: "emerge", args: ["--depclean"] },
	{ name: "Checking reverse dependencies", command: "revdep-rebuild", args: [] },
	{ name: "Cleaning source archives", command: "eclean", args: ["--deep", "distfiles"] },
];

export function checkRestart(restart: boolean): CommandStep {
	return restart
		? { name: "Restarting services", command: "needrestart", args: ["-r", "a"] }
		: { name: "Listing services that need a restart", command: "needrestart", args: ["-r", "l"] };
}

export const readNews: CommandStep = {
	name: "Reading unread news",
	command: "eselect",
	args: ["news", "read", "new"],
};
