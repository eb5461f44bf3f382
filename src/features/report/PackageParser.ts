/**
 * Parse the package list emerge prints for --pretend, e.g.
 *
 *   [ebuild     U  ] sys-devel/gnuconfig-20230731::gentoo [20230121::gentoo] 72 KiB
 *   [blocks b      ] <perl-core/Compress-Raw-Zlib-2.204.1_rc ("<perl-core/..." is soft blocking virtual/perl-Compress-Raw-Zlib-2.204.1_rc)
 *   [uninstall     ] perl-core/Compress-Raw-Zlib-2.202.0::gentoo
 */

export type PackageKind = "ebuild" | "blocks" | "uninstall";
export type UpdateStatus = "NewPackage" | "ReEmerge" | "Update" | "Undefined";

export interface PackageInfo {
	kind: PackageKind;
	name: string;
	newVersion: string | null;
	oldVersion: string | null;
	status: string;
	repo: string | null;
	attributes: Record<string, string | string[]>;
}

const STATUS_PATTERN = /\[(.+?)\]/;
const ATOM_VERSION_PATTERN = /^(.*?)-(\d[^-]*(?:-r\d+)?)$/;

/**
 * Split on spaces that are outside quotes and brackets
 */
export function splitPackageLine(line: string): string[] {
	const parts: string[] = [];
	let current = "";
	let inQuotes = false;
	let bracketDepth = 0;

	for (const char of line) {
		if (char === '"') inQuotes = !inQuotes;
		else if (char === "[") bracketDepth++;
		else if (char === "]") bracketDepth--;

		if (char === " " && !inQuotes && bracketDepth === 0) {
			if (current.trim()) parts.push(current.trim());
			current = "";
		} else {
			current += char;
		}
	}
	if (current.trim()) parts.push(current.trim());

	return parts;
}

export function determineUpdateStatus(statusField: string): UpdateStatus {
	if (statusField.includes("N")) return "NewPackage";
	if (statusField.includes("R")) return "ReEmerge";
	if (statusField.includes("U")) return "Update";
	return "Undefined";
}

function splitRepo(atom: string): { atom: string; repo: string | null } {
	const [name = atom, repo] = atom.split("::");
	return { atom: name, repo: repo ?? null };
}

function parseEbuild(parts: string[]): PackageInfo | null {
	const [statusField = "", atomField, previous] = parts;
	if (!atomField) return null;

	const { atom, repo } = splitRepo(atomField);
	const versioned = ATOM_VERSION_PATTERN.exec(atom);
	const oldVersion =
		previous?.startsWith("[") && previous.endsWith("]")
			? splitRepo(previous.slice(1, -1)).atom
			: null;

	const attributes: Record<string, string[]> = {};
	for (const part of parts) {
		const [, key, values] = /^([A-Z_0-9]+)="(.*)"$/.exec(part) ?? [];
		if (key !== undefined && values !== undefined) {
			attributes[key] = values.split(" ").filter(Boolean);
		}
	}

	return {
		kind: "ebuild",
		name: versioned?.[1] ?? atom,
		newVersion: versioned?.[2] ?? null,
		oldVersion,
		status: determineUpdateStatus(statusField),
		repo,
		attributes,
	};
}

function parseBlocks(parts: string[]): PackageInfo | null {
	const [statusField = "", blocker] = parts;
	const last = parts[parts.length - 1];
	if (!blocker || !last) return null;

	return {
		kind: "blocks",
		name: blocker.replace(/^[<>=!~]+/, ""),
		newVersion: null,
		oldVersion: null,
		status: statusField,
		repo: null,
		attributes: { blocked_package: last.replace(/\)$/, "") },
	};
}

function parseUninstall(parts: string[]): PackageInfo | null {
	const [statusField = "", atomField] = parts;
	if (!atomField) return null;

	const { atom, repo } = splitRepo(atomField);
	return {
		kind: "uninstall",
		name: atom,
		newVersion: null,
		oldVersion: null,
		status: statusField,
		repo,
		attributes: { uninstalled_package: atom },
	};
}

export function parsePackageLine(line: string): PackageInfo | null {
	const parts = splitPackageLine(line.trim());
	const statusField = parts[0] ?? "";

	if (statusField.includes("ebuild")) return parseEbuild(parts);
	if (statusField.includes("blocks")) return parseBlocks(parts);
	if (statusField.includes("uninstall")) return parseUninstall(parts);
	return null;
}

/**
 * Package entries from a section of emerge output
 */
export function parsePackages(lines: readonly string[]): PackageInfo[] {
	const packages: PackageInfo[] = [];
	for (const line of lines) {
		const trimmed = line.trim();
		if (trimmed === "[ ok ]" || !STATUS_PATTERN.test(trimmed) || !trimmed.startsWith("[")) {
			continue;
		}
		const info = parsePackageLine(trimmed);
		if (info) packages.push(info);
	}
	return packages;
}
