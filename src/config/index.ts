/**
 * Configuration exports: input files, repository references and run settings.
 */

export { parseEntries, readEntries } from "./reader.js";
export { extractRepository, type RepositoryRef } from "./repository.js";
export {
	type Settings,
	type SettingsOverrides,
	type LoadSettingsOptions,
	DEFAULT_SETTINGS_FILENAME,
	parseDuration,
	parseSettingsContent,
	readSettingsFile,
	loadSettings,
} from "./settings.js";
