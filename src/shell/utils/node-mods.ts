/**
 * CHANGE: Centralized re-exports of Node built-ins used by the shell
 * WHY: One import block for fs/path across collector, config loader and preflight
 *
 * Invariant: re-export through constants, avoiding `export *` for modules declared with `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export const fs = fsNS;
export const path = pathNS;
