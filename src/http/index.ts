/**
 * HTTP exports.
 */

export { fetchJson, DEFAULT_TIMEOUT, USER_AGENT, type HttpOptions } from "./http.js";
