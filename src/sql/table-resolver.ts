// Table resolution: logical names in a query -> the Parquet files that back them
import { basename } from "path";
import { quoteLiteral, type DuckDBSession } from "../bridge/duckdb-session.js";
import type { TableBinding, TableMappings } from "../types/data.js";

// Identifier after FROM or JOIN. Quoted paths and subqueries never match.
const TABLE_REF_PATTERN = /\b(?:FROM|JOIN)\s+([a-zA-Z_][a-zA-Z0-9_]*)/gi;

const CLAUSE_KEYWORDS = new Set(["where", "select", "group", "order", "having", "limit", "offset"]);

const NATIVE_READER = "read_parquet";

function scanTableRefs(sql: string): string[] {
  const refs: string[] = [];
  for (const match of sql.matchAll(TABLE_REF_PATTERN)) {
    if (!CLAUSE_KEYWORDS.has(match[1].toLowerCase())) refs.push(match[1]);
  }
  return refs;
}

// Candidate logical tables, first spelling wins for case-insensitive repeats
export function extractTableNames(sql: string): string[] {
  const seen = new Set<string>();
  const names: string[] = [];
  for (const ref of scanTableRefs(sql)) {
    const key = ref.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    names.push(ref);
  }
  return names;
}

export function extractDatasetName(sql: string): string | null {
  return scanTableRefs(sql)[0] ?? null;
}

// The query already reads this name through read_parquet(...) itself
export function usesNativeReader(sql: string, name: string): boolean {
  const lower = sql.toLowerCase();
  return lower.includes(NATIVE_READER) && lower.includes(name.toLowerCase());
}

type TierPredicate = (fileName: string, table: string) => boolean;

// Most specific first. Only the first tier with any hit contributes.
const MATCH_TIERS: TierPredicate[] = [
  // ethereum__blocks__00001000_to_00001009.parquet
  (f, t) => f.includes(`__${t}__`),
  // ethereum_blocks_1000.parquet
  (f, t) => f.includes(`_${t}_`),
  // blocks_1000.parquet, blocks.parquet
  (f, t) => f.startsWith(`${t}_`) || f.startsWith(`${t}.`),
];

export function matchTableFiles(table: string, files: readonly string[]): string[] {
  const t = table.toLowerCase();
  for (const matches of MATCH_TIERS) {
    const hits = files.filter((f) => matches(basename(f).toLowerCase(), t));
    if (hits.length > 0) return hits;
  }
  return [];
}

/**
 * One binding per referenced table that has files. Names with no files are
 * left alone: the engine reports them when the query runs.
 */
export function planTableBindings(sql: string, files: readonly string[]): TableBinding[] {
  const bindings: TableBinding[] = [];
  for (const table of extractTableNames(sql)) {
    if (usesNativeReader(sql, table)) continue;
    const matched = matchTableFiles(table, files);
    if (matched.length === 0) continue;
    bindings.push({ table, files: matched, combined: matched.length > 1 });
  }
  return bindings;
}

// Row-wise union for several files; they are assumed to share a schema
export function viewSelectSql(files: readonly string[]): string {
  return files.map((f) => `SELECT * FROM ${NATIVE_READER}(${quoteLiteral(f)})`).join(" UNION ALL ");
}

export async function registerTableViews(session: DuckDBSession, bindings: readonly TableBinding[]): Promise<void> {
  for (const binding of bindings) {
    await session.createView(binding.table, viewSelectSql(binding.files));
    console.error(
      binding.combined
        ? `[sql] Registered view '${binding.table}' over ${binding.files.length} files using UNION ALL`
        : `[sql] Registered view '${binding.table}' for file: ${binding.files[0]}`,
    );
  }
}

export function toTableMappings(bindings: readonly TableBinding[]): TableMappings | null {
  if (bindings.length === 0) return null;
  const mappings: TableMappings = {};
  for (const { table, files, combined } of bindings) {
    mappings[table] = { files: [...files], combined };
  }
  return mappings;
}
