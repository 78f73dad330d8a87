// CHANGE: Introduce dbt project scan types
// WHY: SHELL collects files, CORE derives records/coverage from these immutable values
// REF: user-request-metadata-coverage
// PURITY: CORE
// INVARIANT: Paths are relative to the project root with "/" separators
// COMPLEXITY: O(1) - type declarations only

import type { LineageDescription } from "./lineage.js";

/**
 * Any value a YAML document can decode to.
 *
 * @invariant Mirrors JSON-compatible YAML output (no custom tags)
 */
export type YamlValue =
	| string
	| number
	| boolean
	| null
	| readonly YamlValue[]
	| { readonly [key: string]: YamlValue };

/**
 * Settings read from `dbt_project.yml`.
 *
 * @property modelPaths Directories (relative to the project root) that contain models
 */
export interface ProjectConfig {
	readonly name?: string;
	readonly modelPaths: readonly string[];
}

/**
 * A column entry of a model properties file.
 *
 * @property documented Has a non-empty `description`
 * @property tested Lists at least one entry under `tests` or `data_tests`
 */
export interface ColumnProperties {
	readonly name: string;
	readonly documented: boolean;
	readonly tested: boolean;
}

/**
 * A `models:` entry of a properties file.
 *
 * @property tested Model-level `tests` / `data_tests` are declared
 */
export interface ModelProperties {
	readonly name: string;
	readonly tested: boolean;
	readonly columns: readonly ColumnProperties[];
}

/**
 * A YAML file with the model names it documents.
 */
export interface MetadataFile {
	readonly relativePath: string;
	readonly documentedModels: readonly string[];
	readonly modelProperties: readonly ModelProperties[];
}

/**
 * A model SQL file after reference extraction and metadata lookup.
 */
export interface ScannedModel {
	readonly name: string;
	readonly relativePath: string;
	readonly hasMetadata: boolean;
	readonly references: readonly string[];
}

/**
 * Result of scanning a dbt project directory.
 *
 * @invariant models are ordered by relativePath
 */
export interface ProjectScan {
	readonly root: string;
	readonly config: ProjectConfig;
	readonly models: readonly ScannedModel[];
	readonly metadataFiles: readonly MetadataFile[];
}

/**
 * Metadata coverage summary.
 *
 * Models are counted by distinct name.
 *
 * @invariant documentedModels + missingMetadata.length === totalModels
 */
export interface CoverageReport {
	readonly totalModels: number;
	readonly documentedModels: number;
	readonly missingMetadata: readonly string[];
	readonly coveragePercent: number;
}

/**
 * Undocumented columns of one model, in declaration order.
 */
export interface UndocumentedColumns {
	readonly model: string;
	readonly columns: readonly string[];
}

/**
 * Column description coverage over the scanned models.
 *
 * @invariant undocumentedByModel is sorted by model
 */
export interface ColumnCoverageReport {
	readonly totalColumns: number;
	readonly documentedColumns: number;
	readonly coveragePercent: number;
	readonly undocumentedByModel: readonly UndocumentedColumns[];
}

/**
 * Data test coverage of models and their declared columns.
 *
 * @invariant testedModels + untestedModels.length === totalModels
 */
export interface TestCoverageReport {
	readonly totalModels: number;
	readonly testedModels: number;
	readonly untestedModels: readonly string[];
	readonly modelCoveragePercent: number;
	readonly totalColumns: number;
	readonly testedColumns: number;
	readonly columnCoveragePercent: number;
}

/**
 * Upstream/downstream closure of one selected model.
 */
export interface ModelSelection {
	readonly model: string;
	readonly upstream: readonly string[];
	readonly downstream: readonly string[];
}

/**
 * Everything the APP layer hands to the printer.
 *
 * @property lineage Absent in metadata-only runs
 * @property selection Present when a model was selected on the command line
 */
export interface InspectionReport {
	readonly project: string;
	readonly models: readonly ScannedModel[];
	readonly coverage: CoverageReport;
	readonly columns: ColumnCoverageReport;
	readonly tests: TestCoverageReport;
	readonly lineage?: LineageDescription;
	readonly danglingReferences: readonly string[];
	readonly selection?: ModelSelection;
}
