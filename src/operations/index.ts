/**
 * Generation operations.
 */

export {
	generateCategory,
	generateReleaseManifests,
	DEFAULT_REQUEST_DELAY,
	type GenerateOptions,
	type GenerateManifestsOptions,
} from "./generate.js";

export { summarizeResults, formatRunSummary, type RunSummary } from "./summary.js";
