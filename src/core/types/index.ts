// CHANGE: Central export file for all type definitions
// WHY: Provides a single import point for all types used across modules

export type { CLIOptions, OutputFormat } from "./config.js";
export type {
	LineageDescription,
	LineageEdge,
	LineageGraph,
	LineageNode,
	ModelRecord,
	NodeId,
} from "./lineage.js";
export type {
	ColumnCoverageReport,
	ColumnProperties,
	CoverageReport,
	InspectionReport,
	MetadataFile,
	ModelProperties,
	ModelSelection,
	ProjectConfig,
	ProjectScan,
	ScannedModel,
	TestCoverageReport,
	UndocumentedColumns,
	YamlValue,
} from "./project.js";
