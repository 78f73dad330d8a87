// CHANGE: Central export file for configuration module

export { parseCLIArgs } from "./cli.js";
export {
	DEFAULT_MODEL_PATHS,
	loadProjectConfig,
	PROJECT_FILE,
	projectConfigFromDocument,
} from "./project.js";
