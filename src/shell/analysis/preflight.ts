// CHANGE: Explicit preflight checks for the dbt project layout
// WHY: Provide actionable diagnostics before scanning instead of an empty report
// REF: user-request-preflight
// SOURCE: n/a

import { match } from "ts-pattern";

import {
	DEFAULT_MODEL_PATHS,
	PROJECT_FILE,
} from "../config/project.js";
import { fs, path } from "../utils/node-mods.js";

/**
 * Preflight issue codes.
 *
 * Invariants:
 * - The project path must be an existing directory (blocking).
 * - dbt_project.yml should exist at the project root (advisory).
 * - The default model directory should exist when dbt_project.yml is absent (advisory).
 */
export type PreflightIssueCode =
	| "missingProjectDirectory"
	| "noDbtProjectFile"
	| "noModelDirectory";

/**
 * Result of preflight checks.
 *
 * @property ok True if no blocking issues found (advisories may still exist)
 * @property issues List of detected issues (blocking and advisory)
 */
export interface PreflightResult {
	readonly ok: boolean;
	readonly issues: ReadonlyArray<PreflightIssueCode>;
}

function isDirectory(target: string): boolean {
	try {
		return fs.statSync(target).isDirectory();
	} catch {
		return false;
	}
}

/**
 * Check whether the directory contains dbt_project.yml.
 */
export function hasDbtProjectFile(projectRoot: string): boolean {
	try {
		return fs.statSync(path.join(projectRoot, PROJECT_FILE)).isFile();
	} catch {
		return false;
	}
}

/**
 * Run preflight checks and return a structured result.
 *
 * Postconditions:
 * - ok === true iff the project directory exists
 * - advisories are reported only for an existing directory
 *
 * Complexity:
 * - O(1) fs checks; no file traversal
 */
export function runPreflight(projectRoot: string): PreflightResult {
	if (!isDirectory(projectRoot)) {
		return { ok: false, issues: ["missingProjectDirectory"] };
	}
	const issues: PreflightIssueCode[] = [];
	const hasProjectFile = hasDbtProjectFile(projectRoot);
	if (!hasProjectFile) {
		issues.push("noDbtProjectFile");
		const defaultModels = DEFAULT_MODEL_PATHS.some((dir) =>
			isDirectory(path.join(projectRoot, dir)),
		);
		if (!defaultModels) issues.push("noModelDirectory");
	}
	return { ok: true, issues };
}

function printIssue(code: PreflightIssueCode, projectRoot: string): void {
	match(code)
		.with("missingProjectDirectory", () => {
			console.error(`  • ${projectRoot} is not a directory.`);
			console.error(
				"    Action: pass the dbt project directory (where dbt_project.yml is located).\n",
			);
		})
		.with("noDbtProjectFile", () => {
			console.warn(`  • ${PROJECT_FILE} not found; using default model paths.`);
		})
		.with("noModelDirectory", () => {
			console.warn(
				`  • No "${DEFAULT_MODEL_PATHS.join(", ")}" directory; no models will be found.`,
			);
		})
		.exhaustive();
}

/**
 * Print preflight findings (blocking issues to stderr, advisories as warnings).
 */
export function printPreflightReport(
	result: PreflightResult,
	projectRoot: string,
): void {
	if (result.issues.length === 0) return;
	if (result.ok) console.warn("⚠️  Preflight advisories:");
	else console.error("❌ Preflight failed:");
	for (const code of result.issues) printIssue(code, projectRoot);
}

/**
 * Run and report preflight checks.
 *
 * @returns PreflightResult
 */
export function checkAndReportPreflight(projectRoot: string): PreflightResult {
	const result = runPreflight(projectRoot);
	printPreflightReport(result, projectRoot);
	return result;
}
