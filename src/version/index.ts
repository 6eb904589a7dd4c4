/**
 * Version normalisation exports.
 */

export { normalizeTag, MAX_VERSION_LENGTH } from "./normalize.js";
