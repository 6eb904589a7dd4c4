import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { loadSettings, parseDuration, parseSettingsContent } from "../src/config/settings.js";
import { ConfigError } from "../src/errors.js";

describe("parseSettingsContent", () => {
	it("returns nothing for an empty file", () => {
		expect(parseSettingsContent("")).toEqual({});
	});

	it("reads every setting", () => {
		const content = [
			"includeDir: data",
			"timeout: 5000",
			"requestDelay: 250",
			"logLevel: debug",
			"tokenEnv: CI_GITHUB_TOKEN",
			"failOnError: true",
			"categories: [apps, sysmodules]",
			"paths:",
			"  emulators:",
			"    input: emulators/emulators.ini",
		].join("\n");

		const settings = parseSettingsContent(content, "/project/release-manifest.yml");

		expect(settings).toEqual({
			includeDir: path.resolve("/project", "data"),
			timeout: 5000,
			requestDelay: 250,
			logLevel: "debug",
			tokenEnv: "CI_GITHUB_TOKEN",
			failOnError: true,
			categories: ["sysmodules", "apps"],
			paths: { emulators: { input: "emulators/emulators.ini", output: undefined } },
		});
	});

	it("rejects invalid YAML", () => {
		expect(() => parseSettingsContent("timeout: [1, 2")).toThrow(ConfigError);
	});

	it("rejects a document that is not a mapping", () => {
		expect(() => parseSettingsContent("- apps\n- overlays\n")).toThrow("Settings must be a mapping");
	});

	it("rejects negative durations", () => {
		expect(() => parseSettingsContent("requestDelay: -1")).toThrow(ConfigError);
	});

	it("rejects unknown categories", () => {
		expect(() => parseSettingsContent("categories: [games]")).toThrow('Unknown category: "games"');
	});

	it("rejects unknown log levels", () => {
		expect(() => parseSettingsContent("logLevel: verbose")).toThrow('Unknown log level: "verbose"');
	});

	it("rejects a non-boolean failOnError", () => {
		expect(() => parseSettingsContent("failOnError: sometimes")).toThrow(ConfigError);
	});
});

describe("parseDuration", () => {
	it("accepts numbers and numeric strings", () => {
		expect(parseDuration(1500, "timeout")).toBe(1500);
		expect(parseDuration("0", "--delay")).toBe(0);
	});

	it("rejects fractions and text", () => {
		expect(() => parseDuration(1.5, "timeout")).toThrow(ConfigError);
		expect(() => parseDuration("soon", "--delay")).toThrow(
			'"--delay" must be a non-negative integer number of milliseconds',
		);
	});
});

describe("loadSettings", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "rm-settings-test-"));
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("uses defaults without a settings file", () => {
		const settings = loadSettings({ cwd: tempDir });

		expect(settings).toEqual({
			includeDir: path.join(tempDir, "include"),
			timeout: 10000,
			requestDelay: 500,
			logLevel: "info",
			tokenEnv: "GITHUB_TOKEN",
			failOnError: false,
			categories: ["sysmodules", "overlays", "apps", "emulators"],
			paths: {},
		});
	});

	it("reads release-manifest.yml from the working directory", () => {
		fs.writeFileSync(path.join(tempDir, "release-manifest.yml"), "includeDir: modules\nrequestDelay: 100\n");

		const settings = loadSettings({ cwd: tempDir });

		expect(settings.includeDir).toBe(path.join(tempDir, "modules"));
		expect(settings.requestDelay).toBe(100);
	});

	it("reads an explicit settings file", () => {
		fs.mkdirSync(path.join(tempDir, "config"));
		fs.writeFileSync(path.join(tempDir, "config", "custom.yml"), "includeDir: ../include\ntimeout: 2000\n");

		const settings = loadSettings({ cwd: tempDir, configPath: "config/custom.yml" });

		expect(settings.includeDir).toBe(path.join(tempDir, "include"));
		expect(settings.timeout).toBe(2000);
	});

	it("fails when an explicit settings file is missing", () => {
		expect(() => loadSettings({ cwd: tempDir, configPath: "missing.yml" })).toThrow(ConfigError);
	});

	it("lets overrides win over the settings file", () => {
		fs.writeFileSync(
			path.join(tempDir, "release-manifest.yml"),
			"includeDir: modules\nlogLevel: debug\ncategories: [apps]\n",
		);

		const settings = loadSettings({
			cwd: tempDir,
			overrides: { includeDir: "other", logLevel: "warn", categories: ["emulators", "overlays"], failOnError: true },
		});

		expect(settings.includeDir).toBe(path.join(tempDir, "other"));
		expect(settings.logLevel).toBe("warn");
		expect(settings.categories).toEqual(["overlays", "emulators"]);
		expect(settings.failOnError).toBe(true);
	});
});
