/**
 * Run report - read a run log back and summarize what the run did
 */

import * as fs from "node:fs";
import { LOG_SEPARATOR, listLogFiles } from "../../utility/Logger.js";
import { LogNotFoundError } from "../../utility/errors.js";
import { OUTCOME_LINES, SECTION_TITLES } from "../maintenance/Maintenance.js";
import { parsePackages, type PackageInfo } from "./PackageParser.js";

export const LEADING_SECTION = "beginning";
const SECTION_PATTERN = /\{\{(.+?)\}\}/;

export type PretendOutcome = "passed" | "failed" | "not-run";

export interface RunReport {
	upgradeType: "full" | "security" | "unknown";
	pretend: PretendOutcome;
	upgradeSucceeded: boolean;
	completed: boolean; // reached the news section
	sections: string[];
	packages: PackageInfo[];
}

/**
 * Group log messages under the {{ SECTION }} markers that precede them
 */
export function splitSections(logText: string): Map<string, string[]> {
	let current = LEADING_SECTION;
	const sections = new Map<string, string[]>([[current, []]]);

	for (const line of logText.split("\n")) {
		const separatorAt = line.indexOf(LOG_SEPARATOR);
		if (separatorAt === -1) continue;

		const message = line.slice(separatorAt + LOG_SEPARATOR.length).trim();
		const marker = SECTION_PATTERN.exec(message)?.[1];
		if (marker) {
			current = marker.trim();
			sections.set(current, []);
		} else if (message) {
			sections.get(current)?.push(message);
		}
	}

	return sections;
}

export function buildReport(logText: string): RunReport {
	const sections = splitSections(logText);
	const full = sections.get(SECTION_TITLES.full);
	const security = sections.get(SECTION_TITLES.security);

	let report: Pick<RunReport, "upgradeType" | "pretend" | "upgradeSucceeded" | "packages">;
	if (full) {
		report = {
			upgradeType: "full",
			pretend: full.includes(OUTCOME_LINES.pretendPassed)
				? "passed"
				: full.includes(OUTCOME_LINES.pretendFailed)
					? "failed"
					: "not-run",
			upgradeSucceeded: full.includes(OUTCOME_LINES.worldUpdated),
			packages: parsePackages(full),
		};
	} else if (security) {
		report = {
			upgradeType: "security",
			pretend: "not-run",
			upgradeSucceeded:
				security.includes(OUTCOME_LINES.glsaUpdated) ||
				security.includes(OUTCOME_LINES.noAdvisories),
			packages: parsePackages(security),
		};
	} else {
		report = { upgradeType: "unknown", pretend: "not-run", upgradeSucceeded: false, packages: [] };
	}

	return {
		...report,
		completed: sections.has(SECTION_TITLES.news),
		sections: [...sections.keys()].filter((name) => name !== LEADING_SECTION),
	};
}

/**
 * Load a run log, the most recent one in `logDir` when no path is given
 */
export function readRunLog(logDir: string, logPath?: string): { path: string; text: string } {
	const target = logPath ?? listLogFiles(logDir).at(-1);
	if (!target || !fs.existsSync(target)) {
		throw new LogNotFoundError(target ?? logDir);
	}
	return { path: target, text: fs.readFileSync(target, "utf8") };
}

function describePackage(pkg: PackageInfo): string {
	switch (pkg.kind) {
		case "ebuild": {
			const versions = pkg.oldVersion ? `${pkg.oldVersion} -> ${pkg.newVersion}` : `${pkg.newVersion}`;
			return `  ${pkg.status} ${pkg.name} ${versions}${pkg.repo ? ` (${pkg.repo})` : ""}`;
		}
		case "blocks":
			return `  Blocked ${pkg.name} by ${pkg.attributes.blocked_package}`;
		case "uninstall":
			return `  Uninstall ${pkg.name}`;
	}
}

export function formatReport(report: RunReport): string {
	const lines: string[] = [];

	switch (report.upgradeType) {
		case "full":
			lines.push(
				report.pretend === "passed"
					? "Pretend completed without errors"
					: report.pretend === "failed"
						? "Pretend exited with errors"
						: "Pretend did not run",
			);
			lines.push(report.upgradeSucceeded ? "Full update was successful" : "Full update was NOT successful");
			break;
		case "security":
			lines.push(
				report.upgradeSucceeded ? "Security update was successful" : "Security update was NOT successful",
			);
			break;
		case "unknown":
			lines.push("No upgrade section found in the log");
			break;
	}

	if (report.packages.length > 0) {
		lines.push(`Packages (${report.packages.length}):`);
		lines.push(...report.packages.map(describePackage));
	}

	lines.push(report.completed ? "Run completed all stages" : `Run stopped after: ${report.sections.at(-1) ?? "start"}`);
	return lines.join("\n");
}
