/**
 * Run summary across categories.
 */

import type { CategoryResult } from "../types/entry.js";

/**
 * Totals of a generation run.
 */
export interface RunSummary {
	/** One result per category that had entries, in run order. */
	results: CategoryResult[];
	totalEntries: number;
	totalSuccess: number;
	totalFailed: number;
}

const RULE = "=".repeat(50);

/**
 * Add up category results.
 *
 * @param results - Category results in run order
 * @returns Run summary
 */
export function summarizeResults(results: CategoryResult[]): RunSummary {
	return {
		results,
		totalEntries: results.reduce((sum, result) => sum + result.total, 0),
		totalSuccess: results.reduce((sum, result) => sum + result.success, 0),
		totalFailed: results.reduce((sum, result) => sum + result.failed, 0),
	};
}

function percentage(count: number, total: number): string {
	return ((count / total) * 100).toFixed(1);
}

/**
 * Format the final report of a run.
 *
 * @param summary - Run summary
 * @returns Report lines
 */
export function formatRunSummary(summary: RunSummary): string[] {
	const { results, totalEntries, totalSuccess, totalFailed } = summary;
	const lines = ["", RULE, "FINAL SUMMARY", RULE, `Total entries processed: ${totalEntries}`];

	if (totalEntries > 0) {
		lines.push(`Successfully fetched: ${totalSuccess} (${percentage(totalSuccess, totalEntries)}%)`);
		lines.push(`Failed: ${totalFailed} (${percentage(totalFailed, totalEntries)}%)`);
	} else {
		lines.push("Successfully fetched: 0", "Failed: 0");
	}

	if (totalFailed > 0) {
		lines.push("", "Failed entries by category:");
		for (const result of results.filter((r) => r.failed > 0)) {
			lines.push(`  ${result.category}:`);
			lines.push(...result.failedEntries.map((label) => `    - ${label}`));
		}
	}

	lines.push("", RULE, "Done!");
	return lines;
}
