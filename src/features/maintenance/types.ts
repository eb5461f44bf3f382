import type { ShellOptions, ShellResult } from "../../utility/Shell.js";

export const UPGRADE_MODES = ["security", "full"] as const;
export type UpgradeMode = (typeof UPGRADE_MODES)[number];

export const CONFIG_UPDATE_MODES = ["merge", "interactive", "dispatch", "ignore"] as const;
export type ConfigUpdateMode = (typeof CONFIG_UPDATE_MODES)[number];

/**
 * Config update selection. An unrecognized value is kept so stage 3 can warn
 * about it without stopping the run.
 */
export type ConfigUpdateSelection =
	| { kind: "mode"; mode: ConfigUpdateMode }
	| { kind: "unrecognized"; value: string };

export interface MaintenanceParameters {
	readonly upgradeMode: UpgradeMode;
	readonly upgradeFlags: readonly string[];
	readonly configUpdate: ConfigUpdateSelection;
	readonly restartServices: boolean;
	readonly clean: boolean;
}

/**
 * Values as they arrive from the command line
 */
export interface RawParameters {
	upgradeMode?: string;
	upgradeFlags?: string; // whitespace-separated, legacy positional form
	extraUpgradeFlags?: readonly string[]; // repeated --upgrade-flag values, taken verbatim
	configUpdateMode?: string;
	restart?: string;
	clean?: string;
}

export interface CommandStep {
	name: string;
	command: string;
	args: readonly string[];
	interactive?: boolean; // prompts the user, so it gets the terminal
}

/**
 * Runs one external tool. Shell.execute is the production implementation.
 */
export type CommandRunner = (
	command: string,
	args: readonly string[],
	options: ShellOptions,
) => Promise<ShellResult>;
