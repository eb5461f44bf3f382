import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Maintenance, OUTCOME_LINES, dryRunRunner } from "../../src/features/maintenance/Maintenance.js";
import { parseParameters } from "../../src/features/maintenance/parameters.js";
import type { RawParameters } from "../../src/features/maintenance/types.js";
import { CommandFailedError } from "../../src/utility/errors.js";
import { createFakeRunner } from "../helpers/fakeRunner.js";

const SYNC = "emerge --sync";
const PRETEND = "emerge --pretend --update --newuse --deep @world";
const LIST_GLSA = "glsa-check --list affected";
const FIX_GLSA = "glsa-check --fix affected";
const NEWS = "eselect news read new";
const missingElogDir = path.join(os.tmpdir(), "gentoo-maintain-no-such-elog-dir");

function maintenanceFor(raw: RawParameters, runner = createFakeRunner()) {
	const maintenance = new Maintenance(parseParameters(raw), {
		elogDir: missingElogDir,
		runner: runner.runner,
	});
	return { maintenance, runner };
}

function spyConsole() {
	return {
		log: vi.spyOn(console, "log").mockImplementation(() => {}),
		error: vi.spyOn(console, "error").mockImplementation(() => {}),
		warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
	};
}

describe("Maintenance", () => {
	let log: ReturnType<typeof spyConsole>["log"];
	let error: ReturnType<typeof spyConsole>["error"];
	let warn: ReturnType<typeof spyConsole>["warn"];

	beforeEach(() => {
		({ log, error, warn } = spyConsole());
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("runs a full upgrade pass in stage order", async () => {
		const { maintenance, runner } = maintenanceFor({
			upgradeMode: "full",
			upgradeFlags: "--keep-going --verbose",
			configUpdateMode: "merge",
			restart: "n",
			clean: "n",
		});

		await maintenance.run();

		expect(runner.calls).toEqual([
			SYNC,
			PRETEND,
			"emerge --verbose --quiet-build y --update --newuse --deep --keep-going --verbose @world",
			"etc-update --automode -5",
			"needrestart -r l",
			NEWS,
		]);
	});

	it("passes each upgrade flag as its own argument", async () => {
		const { maintenance, runner } = maintenanceFor({
			upgradeMode: "full",
			upgradeFlags: "--keep-going --verbose",
			configUpdateMode: "ignore",
		});

		await maintenance.run();

		const upgrade = runner.argv[2];
		expect(upgrade).toEqual([
			"emerge",
			"--verbose",
			"--quiet-build",
			"y",
			"--update",
			"--newuse",
			"--deep",
			"--keep-going",
			"--verbose",
			"@world",
		]);
	});

	it("prints stage banners", async () => {
		const { maintenance } = maintenanceFor({ upgradeMode: "security", configUpdateMode: "ignore" });

		await maintenance.run();

		const banners = log.mock.calls
			.map(([line]) => String(line).trim())
			.filter((line) => line.startsWith("{{"));
		expect(banners).toEqual([
			"{{ SYNC PORTAGE TREE }}",
			"{{ SECURITY UPGRADES }}",
			"{{ UPDATE SYSTEM CONFIGURATION FILES }}",
			"{{ CLEAN UP }}",
			"{{ RESTART SERVICES }}",
			"{{ READ ELOGS }}",
			"{{ READ NEWS }}",
		]);
	});

	it("skips the upgrade with a warning when the pretend run fails", async () => {
		const runner = createFakeRunner({ [PRETEND]: { exitCode: 1, stderr: "blocked" } });
		const { maintenance } = maintenanceFor({ upgradeMode: "full", configUpdateMode: "ignore" }, runner);

		await maintenance.run();

		expect(runner.calls).toEqual([SYNC, PRETEND, "needrestart -r l", NEWS]);
		expect(warn).toHaveBeenCalledWith(OUTCOME_LINES.pretendFailed);
		expect(log).not.toHaveBeenCalledWith(OUTCOME_LINES.worldUpdated);
	});

	it("does not fix anything when no advisory affects the system", async () => {
		const { maintenance, runner } = maintenanceFor({ upgradeMode: "security", configUpdateMode: "ignore" });

		await maintenance.run();

		expect(runner.calls).not.toContain(FIX_GLSA);
		expect(runner.calls.slice(0, 2)).toEqual([SYNC, LIST_GLSA]);
		expect(log).toHaveBeenCalledWith(OUTCOME_LINES.noAdvisories);
	});

	it("fixes affected packages when advisories are listed", async () => {
		const runner = createFakeRunner({
			[LIST_GLSA]: { stdout: "202401-01 [A] OpenSSL: Multiple Vulnerabilities ( dev-libs/openssl )\n" },
		});
		const { maintenance } = maintenanceFor({ upgradeMode: "security", configUpdateMode: "ignore" }, runner);

		await maintenance.run();

		expect(runner.calls.slice(0, 3)).toEqual([SYNC, LIST_GLSA, FIX_GLSA]);
		expect(log).toHaveBeenCalledWith(OUTCOME_LINES.glsaUpdated);
		// the advisory list itself is captured, not forwarded
		expect(log).not.toHaveBeenCalledWith(expect.stringContaining("202401-01"));
	});

	it.each([
		["merge", ["etc-update --automode -5"]],
		["interactive", ["etc-update"]],
		["dispatch", ["dispatch-conf"]],
		["ignore", []],
	])("config update mode %s invokes exactly its own action", async (mode, expected) => {
		const { maintenance, runner } = maintenanceFor({ upgradeMode: "security", configUpdateMode: mode });

		await maintenance.run();

		const configCalls = runner.calls.filter(
			(call) => call.startsWith("etc-update") || call.startsWith("dispatch-conf"),
		);
		expect(configCalls).toEqual(expected);
	});

	it.each([
		["merge", false],
		["interactive", true],
		["dispatch", true],
	])("config update mode %s runs with interactive=%s", async (mode, interactive) => {
		const { maintenance, runner } = maintenanceFor({ upgradeMode: "security", configUpdateMode: mode });

		await maintenance.run();

		const index = runner.calls.findIndex((call) => call.startsWith("etc-update") || call.startsWith("dispatch-conf"));
		expect(runner.options[index]?.interactive).toBe(interactive);
		expect(runner.options[runner.calls.indexOf(SYNC)]?.interactive).toBe(false);
	});

	it("warns about an unrecognized config mode and carries on", async () => {
		const { maintenance, runner } = maintenanceFor({
			upgradeMode: "security",
			configUpdateMode: "automatic",
		});

		await maintenance.run();

		expect(runner.calls).toEqual([SYNC, LIST_GLSA, "needrestart -r l", NEWS]);
		expect(error).toHaveBeenCalledWith("Invalid update mode: automatic");
		expect(log).toHaveBeenCalledWith("Clean up is not enabled.");
	});

	it("runs the clean up actions and restarts services when enabled", async () => {
		const { maintenance, runner } = maintenanceFor({
			upgradeMode: "security",
			configUpdateMode: "ignore",
			restart: "y",
			clean: "y",
		});

		await maintenance.run();

		expect(runner.calls).toEqual([
			SYNC,
			LIST_GLSA,
			"emerge --depclean",
			"revdep-rebuild",
			"eclean --deep distfiles",
			"needrestart -r a",
			NEWS,
		]);
	});

	it.each(["n", "yes", ""])("runs no clean up action when clean is %j", async (clean) => {
		const { maintenance, runner } = maintenanceFor({ upgradeMode: "security", configUpdateMode: "ignore", clean });

		await maintenance.run();

		expect(runner.calls).not.toContain("emerge --depclean");
		expect(runner.calls).not.toContain("revdep-rebuild");
		expect(runner.calls).not.toContain("eclean --deep distfiles");
	});

	it("stops the run when the tree sync fails", async () => {
		const runner = createFakeRunner({ [SYNC]: { exitCode: 2, stderr: "rsync error" } });
		const { maintenance } = maintenanceFor({ upgradeMode: "full", configUpdateMode: "merge" }, runner);

		const failure = maintenance.run();

		await expect(failure).rejects.toBeInstanceOf(CommandFailedError);
		await expect(failure).rejects.toMatchObject({ command: SYNC, commandExitCode: 2, exitCode: 2 });
		expect(runner.calls).toEqual([SYNC]);
	});

	it("stops the run when the world upgrade itself fails", async () => {
		const upgrade = "emerge --verbose --quiet-build y --update --newuse --deep @world";
		const runner = createFakeRunner({ [upgrade]: { exitCode: 1 } });
		const { maintenance } = maintenanceFor({ upgradeMode: "full", configUpdateMode: "merge" }, runner);

		await expect(maintenance.run()).rejects.toThrow(`${upgrade} exited with error code 1`);
		expect(runner.calls).toEqual([SYNC, PRETEND, upgrade]);
	});

	it("forwards tool output line by line", async () => {
		const runner = createFakeRunner({ [SYNC]: { stdout: ">>> Syncing repository 'gentoo'\n=== Sync completed\n" } });
		const { maintenance } = maintenanceFor({ upgradeMode: "security", configUpdateMode: "ignore" }, runner);

		await maintenance.run();

		expect(log).toHaveBeenCalledWith(">>> Syncing repository 'gentoo'");
		expect(log).toHaveBeenCalledWith("=== Sync completed");
	});

	it("reports a missing elog directory without failing", async () => {
		const { maintenance } = maintenanceFor({ upgradeMode: "security", configUpdateMode: "ignore" });

		await maintenance.run();

		expect(log).toHaveBeenCalledWith("Elog directory does not exist.");
	});
});

describe("dryRunRunner", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("prints the command and reports success", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});

		const result = await dryRunRunner("emerge", ["--sync"], {});

		expect(log).toHaveBeenCalledWith("[dry-run] emerge --sync");
		expect(result).toEqual({ exitCode: 0, stdout: "", stderr: "", timedOut: false, command: "emerge --sync" });
	});
});
