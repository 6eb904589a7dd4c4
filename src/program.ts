/**
 * Command-line program: option parsing and the generate run.
 */

import * as fs from "node:fs";
import { Command, CommanderError } from "@commander-js/extra-typings";
import { isReleaseManifestError, getErrorMessage } from "./errors.js";
import { createAuthConfig, hasGitHubToken } from "./types/auth.js";
import { loadSettings, parseDuration, type SettingsOverrides } from "./config/settings.js";
import { createLogger } from "./logging/index.js";
import { generateReleaseManifests, formatRunSummary } from "./operations/index.js";
import { closeProxyAgents } from "./proxy/index.js";

/**
 * Where the program runs and writes.
 */
export interface ProgramContext {
	/** Working directory for relative paths. */
	cwd: string;
	/** Standard output line sink. */
	write: (line: string) => void;
	/** Standard error line sink. */
	writeError: (line: string) => void;
}

/**
 * Options accepted on the command line.
 */
export interface GenerateCommandOptions {
	includeDir?: string;
	config?: string;
	category?: string[];
	timeout?: string;
	delay?: string;
	logLevel?: string;
	failOnError?: boolean;
}

const RULE = "=".repeat(50);

function readPackageVersion(): string {
	const raw: unknown = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
	if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
		return raw.version;
	}
	return "0.0.0";
}

function toOverrides(options: GenerateCommandOptions): SettingsOverrides {
	return {
		includeDir: options.includeDir,
		timeout: options.timeout === undefined ? undefined : parseDuration(options.timeout, "--timeout"),
		requestDelay: options.delay === undefined ? undefined : parseDuration(options.delay, "--delay"),
		logLevel: options.logLevel,
		failOnError: options.failOnError,
		categories: options.category,
	};
}

/**
 * Fetch the latest tags and write every release manifest.
 *
 * @param options - Command-line options
 * @param context - Program context
 * @returns Process exit status
 */
export async function runGenerate(options: GenerateCommandOptions, context: ProgramContext): Promise<number> {
	const settings = loadSettings({ cwd: context.cwd, configPath: options.config, overrides: toOverrides(options) });
	const logger = createLogger({ level: settings.logLevel, write: context.write });
	const auth = createAuthConfig({ tokenEnv: settings.tokenEnv });

	logger.info("GitHub Release Tag Fetcher");
	if (hasGitHubToken(auth)) {
		logger.info("✓ Using GitHub token (higher rate limit)");
	} else {
		logger.info(`⚠ No GitHub token found. Set ${settings.tokenEnv} env var for higher rate limits.`);
	}
	logger.info(RULE);
	logger.debug(`Include directory: ${settings.includeDir}`);

	try {
		const summary = await generateReleaseManifests({
			includeDir: settings.includeDir,
			categories: settings.categories,
			paths: settings.paths,
			auth,
			timeout: settings.timeout,
			requestDelay: settings.requestDelay,
			logger,
		});

		for (const line of formatRunSummary(summary)) {
			logger.info(line);
		}

		return settings.failOnError && summary.totalFailed > 0 ? 1 : 0;
	} finally {
		await closeProxyAgents();
	}
}

/**
 * Create the command-line program.
 *
 * @param context - Program context
 * @param onExit - Receives the exit status of the run
 * @returns Commander program
 */
export function createProgram(context: ProgramContext, onExit: (code: number) => void) {
	return new Command()
		.name("release-manifest")
		.description("Write per-category version manifests from the latest GitHub release tags")
		.version(readPackageVersion(), "-v, --version")
		.option("-d, --include-dir <dir>", "directory holding the category folders (default: include)")
		.option("-c, --config <file>", "settings file (default: release-manifest.yml when present)")
		.option("--category <names...>", "only process these categories")
		.option("--timeout <ms>", "request timeout in milliseconds (default: 10000)")
		.option("--delay <ms>", "pause between requests in milliseconds (default: 500)")
		.option("--log-level <level>", "error, warn, info or debug (default: info)")
		.option("--fail-on-error", "exit with status 1 when any entry failed")
		.configureOutput({
			writeOut: (text) => context.write(text.replace(/\n$/, "")),
			writeErr: (text) => context.writeError(text.replace(/\n$/, "")),
		})
		.action(async (options) => {
			onExit(await runGenerate(options, context));
		});
}

/**
 * Run the program.
 *
 * @param argv - Process arguments (including the node and script paths)
 * @param context - Program context
 * @returns Process exit status
 */
export async function main(argv: string[], context: ProgramContext): Promise<number> {
	let exitCode = 0;
	const program = createProgram(context, (code) => {
		exitCode = code;
	}).exitOverride();

	try {
		await program.parseAsync(argv);
	} catch (error) {
		if (isReleaseManifestError(error)) {
			context.writeError(error.format());
			return 1;
		}
		if (error instanceof CommanderError) {
			return error.exitCode;
		}
		context.writeError(`Error: ${getErrorMessage(error)}`);
		return 1;
	}

	return exitCode;
}
