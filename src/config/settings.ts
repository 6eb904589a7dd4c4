/**
 * @title Settings Module
 * @description Run settings from defaults, an optional YAML file and explicit overrides.
 *
 * @module config
 *
 * @example release-manifest.yml
 * ```yaml
 * includeDir: include
 * timeout: 10000
 * requestDelay: 500
 * logLevel: info
 * tokenEnv: GITHUB_TOKEN
 * failOnError: false
 * categories: [sysmodules, overlays]
 * paths:
 *   emulators:
 *     input: emulators/emulators.ini
 *     output: emulators/RELEASE_EM.ini
 * ```
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { ConfigError, getErrorMessage } from "../errors.js";
import { CATEGORIES, parseCategory, type Category, type CategoryPathOverride } from "../types/category.js";
import { DEFAULT_TOKEN_ENV } from "../types/auth.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

/** Settings file looked up in the working directory. */
export const DEFAULT_SETTINGS_FILENAME = "release-manifest.yml";

/**
 * Resolved settings of a run.
 */
export interface Settings {
	/** Absolute directory holding the category folders. */
	includeDir: string;
	/** Request timeout in milliseconds. */
	timeout: number;
	/** Pause between consecutive requests of a category, in milliseconds. */
	requestDelay: number;
	logLevel: LogLevel;
	/** Environment variable holding the GitHub token. */
	tokenEnv: string;
	/** Exit with a failure status when any entry failed. */
	failOnError: boolean;
	/** Categories to process, in run order. */
	categories: Category[];
	/** Per-category path overrides. */
	paths: Partial<Record<Category, CategoryPathOverride>>;
}

/**
 * Settings given explicitly (e.g. on the command line).
 * Relative paths are resolved against the working directory.
 */
export interface SettingsOverrides {
	includeDir?: string;
	timeout?: number;
	requestDelay?: number;
	logLevel?: string;
	failOnError?: boolean;
	categories?: string[];
}

/**
 * Options for loading settings.
 */
export interface LoadSettingsOptions {
	/** Working directory (default: process.cwd()). */
	cwd?: string;
	/** Settings file; must exist when given. */
	configPath?: string;
	overrides?: SettingsOverrides;
}

const DEFAULTS = {
	includeDir: "include",
	timeout: 10000,
	requestDelay: 500,
	logLevel: "info",
	tokenEnv: DEFAULT_TOKEN_ENV,
	failOnError: false,
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(message: string, sourcePath?: string): never {
	throw new ConfigError(message, {
		suggestion: sourcePath ? `Check the settings file at: ${sourcePath}` : undefined,
	});
}

function readString(raw: Record<string, unknown>, key: string, sourcePath?: string): string | undefined {
	const value = raw[key];
	if (value === undefined || value === null) {
		return undefined;
	}
	if (typeof value !== "string" || value.trim() === "") {
		fail(`"${key}" must be a non-empty string`, sourcePath);
	}
	return value;
}

function readDuration(raw: Record<string, unknown>, key: string, sourcePath?: string): number | undefined {
	const value = raw[key];
	if (value === undefined || value === null) {
		return undefined;
	}
	return parseDuration(value, key, sourcePath);
}

/**
 * Validate a millisecond duration.
 *
 * @param value - Raw value (number or numeric string)
 * @param key - Setting name for error messages
 * @param sourcePath - Settings file for error messages
 * @returns Duration in milliseconds
 * @throws ConfigError if the value is not a non-negative integer
 */
export function parseDuration(value: unknown, key: string, sourcePath?: string): number {
	const duration = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
	if (typeof duration !== "number" || !Number.isInteger(duration) || duration < 0) {
		fail(`"${key}" must be a non-negative integer number of milliseconds`, sourcePath);
	}
	return duration;
}

function parseLogLevel(value: string, sourcePath?: string): LogLevel {
	if (!isLogLevel(value)) {
		fail(`Unknown log level: "${value}"`, sourcePath);
	}
	return value;
}

/**
 * Order categories the way a run processes them, dropping duplicates.
 */
function parseCategories(values: string[]): Category[] {
	const selected = new Set(values.map(parseCategory));
	return CATEGORIES.filter((category) => selected.has(category));
}

function parsePaths(value: unknown, sourcePath?: string): Partial<Record<Category, CategoryPathOverride>> {
	if (value === undefined || value === null) {
		return {};
	}
	if (!isRecord(value)) {
		fail(`"paths" must be a mapping of category to input/output paths`, sourcePath);
	}

	const paths: Partial<Record<Category, CategoryPathOverride>> = {};
	for (const [name, override] of Object.entries(value)) {
		const category = parseCategory(name);
		if (!isRecord(override)) {
			fail(`"paths.${name}" must be a mapping with "input" and/or "output"`, sourcePath);
		}
		paths[category] = {
			input: readString(override, "input", sourcePath),
			output: readString(override, "output", sourcePath),
		};
	}
	return paths;
}

/**
 * Parse the content of a settings file.
 *
 * @param content - YAML content
 * @param sourcePath - Settings file path; relative paths inside it are resolved against its directory
 * @returns Settings present in the file
 * @throws ConfigError if the content is not valid YAML or holds invalid values
 */
export function parseSettingsContent(content: string, sourcePath?: string): Partial<Settings> {
	let raw: unknown;
	try {
		raw = yaml.load(content);
	} catch (error) {
		throw new ConfigError(`Failed to parse settings: ${getErrorMessage(error)}`, {
			suggestion: sourcePath ? `Check the settings file at: ${sourcePath}` : undefined,
			cause: error,
		});
	}

	if (raw === undefined || raw === null) {
		return {};
	}
	if (!isRecord(raw)) {
		fail("Settings must be a mapping", sourcePath);
	}

	const settings: Partial<Settings> = {};
	const baseDir = sourcePath ? path.dirname(path.resolve(sourcePath)) : process.cwd();

	const includeDir = readString(raw, "includeDir", sourcePath);
	if (includeDir !== undefined) {
		settings.includeDir = path.resolve(baseDir, includeDir);
	}

	const timeout = readDuration(raw, "timeout", sourcePath);
	if (timeout !== undefined) {
		settings.timeout = timeout;
	}

	const requestDelay = readDuration(raw, "requestDelay", sourcePath);
	if (requestDelay !== undefined) {
		settings.requestDelay = requestDelay;
	}

	const logLevel = readString(raw, "logLevel", sourcePath);
	if (logLevel !== undefined) {
		settings.logLevel = parseLogLevel(logLevel, sourcePath);
	}

	const tokenEnv = readString(raw, "tokenEnv", sourcePath);
	if (tokenEnv !== undefined) {
		settings.tokenEnv = tokenEnv;
	}

	const failOnError = raw["failOnError"];
	if (failOnError !== undefined && failOnError !== null) {
		if (typeof failOnError !== "boolean") {
			fail(`"failOnError" must be true or false`, sourcePath);
		}
		settings.failOnError = failOnError;
	}

	const categories = raw["categories"];
	if (categories !== undefined && categories !== null) {
		if (!Array.isArray(categories) || !categories.every((item): item is string => typeof item === "string")) {
			fail(`"categories" must be a list of category names`, sourcePath);
		}
		settings.categories = parseCategories(categories);
	}

	const paths = parsePaths(raw["paths"], sourcePath);
	if (Object.keys(paths).length > 0) {
		settings.paths = paths;
	}

	return settings;
}

/**
 * Read a settings file.
 *
 * @param settingsPath - Settings file path
 * @returns Settings present in the file
 * @throws ConfigError if the file cannot be read or parsed
 */
export function readSettingsFile(settingsPath: string): Partial<Settings> {
	let content: string;
	try {
		content = fs.readFileSync(settingsPath, "utf-8");
	} catch (error) {
		throw new ConfigError(`Failed to read settings file ${settingsPath}: ${getErrorMessage(error)}`, {
			cause: error,
		});
	}
	return parseSettingsContent(content, settingsPath);
}

/**
 * Resolve the settings of a run.
 *
 * Precedence, lowest first: defaults, the settings file (the given one, or
 * release-manifest.yml in the working directory when present), overrides.
 *
 * @param options - Load options
 * @returns Resolved settings
 * @throws ConfigError if the settings file or an override is invalid
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
	const { cwd = process.cwd(), configPath, overrides = {} } = options;

	let fromFile: Partial<Settings> = {};
	if (configPath) {
		fromFile = readSettingsFile(path.resolve(cwd, configPath));
	} else {
		const defaultPath = path.join(cwd, DEFAULT_SETTINGS_FILENAME);
		if (fs.existsSync(defaultPath)) {
			fromFile = readSettingsFile(defaultPath);
		}
	}

	return {
		includeDir: path.resolve(cwd, overrides.includeDir ?? fromFile.includeDir ?? DEFAULTS.includeDir),
		timeout: overrides.timeout ?? fromFile.timeout ?? DEFAULTS.timeout,
		requestDelay: overrides.requestDelay ?? fromFile.requestDelay ?? DEFAULTS.requestDelay,
		logLevel: overrides.logLevel ? parseLogLevel(overrides.logLevel) : (fromFile.logLevel ?? DEFAULTS.logLevel),
		tokenEnv: fromFile.tokenEnv ?? DEFAULTS.tokenEnv,
		failOnError: overrides.failOnError ?? fromFile.failOnError ?? DEFAULTS.failOnError,
		categories: overrides.categories ? parseCategories(overrides.categories) : (fromFile.categories ?? [...CATEGORIES]),
		paths: fromFile.paths ?? {},
	};
}
