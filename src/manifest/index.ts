/**
 * Release manifest exports.
 */

export {
	serializeReleaseManifest,
	writeReleaseManifest,
	parseReleaseManifest,
	readReleaseManifest,
} from "./writer.js";
