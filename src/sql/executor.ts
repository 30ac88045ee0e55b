// Query executor: resolve tables, run the query in a throwaway DuckDB session
import { stat } from "fs/promises";
import { withSession } from "../bridge/duckdb-session.js";
import { listParquetFiles, PARQUET_EXT } from "../data/catalog.js";
import type { ResultSchema, SqlResult } from "../types/data.js";
import { planTableBindings, registerTableViews, toTableMappings } from "./table-resolver.js";

export const NO_FILES_ERROR = "No parquet files available. Download data first with datasets.query_v1.";

export interface ExecuteOptions {
  dataDir: string;
  // Explicit pool; every Parquet file under dataDir when absent or empty
  files?: string[];
  includeSchema?: boolean;
}

async function isParquetFile(path: string): Promise<boolean> {
  if (!path.endsWith(PARQUET_EXT)) return false;
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function resolveFilePool(dataDir: string, files?: string[]): Promise<string[]> {
  if (!files || files.length === 0) return listParquetFiles(dataDir);

  const pool: string[] = [];
  for (const file of files) {
    if (await isParquetFile(file)) pool.push(file);
    else console.error(`[sql] Warning: File not found or not a parquet file: ${file}`);
  }
  return pool;
}

export async function executeSqlQuery(sql: string, options: ExecuteOptions): Promise<SqlResult> {
  const pool = await resolveFilePool(options.dataDir, options.files);
  if (pool.length === 0) {
    return { success: false, error: NO_FILES_ERROR };
  }

  try {
    return await withSession<SqlResult>(async (session) => {
      const bindings = planTableBindings(sql, pool);
      await registerTableViews(session, bindings);

      console.error(`[sql] Executing SQL query: ${sql}`);
      const { columns, columnTypes, rows } = await session.query(sql);

      let schema: ResultSchema | null = null;
      if (options.includeSchema !== false && rows.length > 0) {
        schema = {
          columns,
          dtypes: Object.fromEntries(columns.map((c, i) => [c, columnTypes[i]])),
        };
      }

      return {
        success: true,
        result: rows,
        row_count: rows.length,
        schema,
        files_used: pool,
        used_direct_references: bindings.length > 0,
        table_mappings: toTableMappings(bindings),
      };
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(`[sql] SQL query error: ${message}`);
    return { success: false, error: message, files_available: pool };
  }
}
