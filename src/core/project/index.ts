// CHANGE: Central export file for project-level pure helpers

export {
	documentedModelNames,
	hasMetadata,
	isYamlMapping,
	isYamlSequence,
	modelNameFromPath,
	modelPropertiesOf,
} from "./metadata.js";
export { extractModelRefs } from "./refs.js";
export {
	buildColumnCoverage,
	buildCoverageReport,
	buildTestCoverage,
	toModelRecords,
} from "./report.js";
