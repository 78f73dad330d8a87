// CHANGE: Central export file for output module

export { printFailure, printReport } from "./printer.js";
