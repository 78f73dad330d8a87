// CHANGE: Extract dbt ref() targets from model SQL
// WHY: References are the only SQL fact the lineage graph needs; no SQL parsing beyond this
// REF: dbt ref() macro
// SOURCE: https://docs.getdbt.com/reference/dbt-jinja-functions/ref
// FORMAT THEOREM: refs(sql) = [model argument of each ref(...) call, in order of appearance]
// PURITY: CORE
// INVARIANT: Duplicates are preserved; Jinja comments contribute nothing
// COMPLEXITY: O(n) where n = |sql|

const JINJA_COMMENT = /\{#[\s\S]*?#\}/g;

// ref('model'), ref("model"), ref ('model'), ref('package', 'model'),
// ref('model', v=2), ref('model', version='3')
const REF_CALL =
	/\bref\s*\(\s*(?:['"][\w.]+['"]\s*,\s*)?['"]([\w.]+)['"]\s*(?:,\s*(?:v|version)\s*=\s*['"]?[\w.]+['"]?\s*)?\)/g;

/**
 * Lists model names referenced through `ref()`.
 *
 * @param sql - Raw model file content (SQL + Jinja)
 * @returns Referenced model names in order of appearance
 *
 * @pure true
 * @example
 * ```ts
 * extractModelRefs("select * from {{ ref('stg_orders') }} join {{ ref(\"customers\") }}");
 * // ["stg_orders", "customers"]
 * ```
 */
export function extractModelRefs(sql: string): readonly string[] {
	const visible = sql.replace(JINJA_COMMENT, "");
	const refs: string[] = [];
	for (const match of visible.matchAll(REF_CALL)) {
		const name = match[1];
		if (name !== undefined) refs.push(name);
	}
	return refs;
}
