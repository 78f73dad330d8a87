// CHANGE: Central export file for project scanning

export { type ScanOptions, scanProject } from "./collector.js";
