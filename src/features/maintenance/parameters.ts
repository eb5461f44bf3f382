import { z } from "zod";
import { InvalidUpgradeModeError } from "../../utility/errors.js";
import {
	CONFIG_UPDATE_MODES,
	UPGRADE_MODES,
	type ConfigUpdateSelection,
	type MaintenanceParameters,
	type RawParameters,
} from "./types.js";

const UpgradeModeSchema = z.enum(UPGRADE_MODES);
const ConfigUpdateModeSchema = z.enum(CONFIG_UPDATE_MODES);

/** Flag values are compared against this literal; anything else means off */
export const ENABLED_FLAG = "y";

/**
 * Split the legacy flags string on whitespace. No quoting is supported, so a
 * flag value containing spaces has to go through --upgrade-flag instead.
 */
export function splitFlags(flags: string): string[] {
	return flags.split(/\s+/).filter((flag) => flag.length > 0);
}

export function parseConfigUpdateMode(value: string): ConfigUpdateSelection {
	const parsed = ConfigUpdateModeSchema.safeParse(value);
	return parsed.success
		? { kind: "mode", mode: parsed.data }
		: { kind: "unrecognized", value };
}

/**
 * Validate command-line values into run parameters. Only the upgrade mode is
 * fatal; it throws InvalidUpgradeModeError before any stage has started.
 */
export function parseParameters(raw: RawParameters): MaintenanceParameters {
	const upgradeMode = UpgradeModeSchema.safeParse(raw.upgradeMode);
	if (!upgradeMode.success) {
		throw new InvalidUpgradeModeError(raw.upgradeMode ?? "");
	}

	return Object.freeze({
		upgradeMode: upgradeMode.data,
		upgradeFlags: Object.freeze([
			...splitFlags(raw.upgradeFlags ?? ""),
			...(raw.extraUpgradeFlags ?? []),
		]),
		configUpdate: parseConfigUpdateMode(raw.configUpdateMode ?? ""),
		restartServices: raw.restart === ENABLED_FLAG,
		clean: raw.clean === ENABLED_FLAG,
	});
}
