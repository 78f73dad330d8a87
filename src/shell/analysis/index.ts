// CHANGE: Central export file for analysis module

export {
	checkAndReportPreflight,
	hasDbtProjectFile,
	type PreflightIssueCode,
	type PreflightResult,
	printPreflightReport,
	runPreflight,
} from "./preflight.js";
