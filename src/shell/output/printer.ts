// CHANGE: Console printer for inspection reports and failures
// WHY: SHELL owns console I/O; wording is rendered by CORE
// PURITY: SHELL
// INVARIANT: Reports go to stdout, failures to stderr
// COMPLEXITY: O(n) where n = rendered lines

import { match } from "ts-pattern";

import type { AppError } from "../../core/errors.js";
import { describeError } from "../../core/format/errors.js";
import {
	renderJsonReport,
	renderTextReport,
} from "../../core/format/report.js";
import type { InspectionReport, OutputFormat } from "../../core/types/index.js";

/**
 * Prints the report in the requested format.
 *
 * @pure false (console output)
 */
export function printReport(
	report: InspectionReport,
	format: OutputFormat,
): void {
	match(format)
		.with("json", () => {
			console.log(renderJsonReport(report));
		})
		.with("text", () => {
			for (const line of renderTextReport(report)) console.log(line);
		})
		.exhaustive();
}

/**
 * Prints a fatal error with its remediation hint.
 *
 * @pure false (console output)
 */
export function printFailure(error: AppError): void {
	const { message, hint } = describeError(error);
	console.error(`❌ ${message}`);
	console.error(`   ${hint}`);
}
