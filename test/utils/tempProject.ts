// CHANGE: Test helper to create isolated temporary dbt projects
// WHY: Collector and preflight behaviour must be validated on a real filesystem, not mocks
// SOURCE: n/a

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Files to materialize, keyed by POSIX path relative to the project root.
 */
export type ProjectFiles = Readonly<Record<string, string>>;

/**
 * Result of creating a temporary project.
 *
 * Postconditions:
 * - cwd points to the root directory of the temporary project
 * - cleanup() removes the temporary directory recursively
 */
export interface TempProject {
	readonly cwd: string;
	readonly cleanup: () => void;
}

/**
 * Create a temporary project directory containing `files`.
 *
 * @example
 * const t = createTempProject({ "models/orders.sql": "select 1" });
 * // ... run tests ...
 * t.cleanup();
 */
export function createTempProject(files: ProjectFiles = {}): TempProject {
	const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "model-lineage-test-"));
	for (const [relativePath, content] of Object.entries(files)) {
		const target = path.join(cwd, ...relativePath.split("/"));
		fs.mkdirSync(path.dirname(target), { recursive: true });
		fs.writeFileSync(target, content, { encoding: "utf-8" });
	}
	const cleanup = (): void => {
		fs.rmSync(cwd, { recursive: true, force: true });
	};
	return { cwd, cleanup };
}

/**
 * A small documented project:
 *
 *   raw_customers (seed-like, undeclared) → stg_customers → customers
 *   stg_orders → customers
 *   customers → orders_summary (undocumented)
 *
 * stg_customers declares customer_id (described, tested) and email (bare);
 * customers carries a model-level test.
 */
export const SAMPLE_PROJECT: ProjectFiles = {
	"dbt_project.yml": "name: jaffle\nversion: '1.0'\nmodel-paths: ['models']\n",
	"models/schema.yml": [
		"version: 2",
		"models:",
		"  - name: stg_customers",
		"    description: Cleaned customers",
		"    columns:",
		"      - name: customer_id",
		"        description: Primary key",
		"        data_tests:",
		"          - unique",
		"          - not_null",
		"      - name: email",
		"  - name: stg_orders",
		"  - name: customers",
		"    tests:",
		"      - dbt_utils.unique_combination_of_columns:",
		"          combination_of_columns: [customer_id, order_id]",
		"",
	].join("\n"),
	"models/staging/stg_customers.sql":
		"select * from {{ ref('raw_customers') }}\n",
	"models/staging/stg_orders.sql": "select 1 as order_id\n",
	"models/marts/customers.sql": [
		"select c.*, o.order_id",
		"from {{ ref('stg_customers') }} c",
		"join {{ ref(\"stg_orders\") }} o on true",
		"",
	].join("\n"),
	"models/marts/orders_summary.sql":
		"select count(*) from {{ ref('customers') }}\n",
};
