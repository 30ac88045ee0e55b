// Schema inspection for a single Parquet file
import { stat } from "fs/promises";
import { quoteLiteral, withSession } from "../bridge/duckdb-session.js";
import { PARQUET_EXT } from "../data/catalog.js";
import type { ColumnInfo, SchemaResult } from "../types/data.js";

const INSPECT_VIEW = "schema_inspect_view";
export const SAMPLE_ROWS = 5;

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function getTableSchema(filePath: string): Promise<SchemaResult> {
  if (!filePath.endsWith(PARQUET_EXT) || !(await isRegularFile(filePath))) {
    return { success: false, error: `File not found or not a parquet file: ${filePath}` };
  }

  try {
    return await withSession<SchemaResult>(async (session) => {
      await session.createView(INSPECT_VIEW, `SELECT * FROM read_parquet(${quoteLiteral(filePath)})`);
      try {
        const described = await session.query(
          `SELECT column_name, data_type FROM information_schema.columns WHERE table_name = ${quoteLiteral(INSPECT_VIEW)} ORDER BY ordinal_position`,
        );
        const columns: ColumnInfo[] = described.rows.map((r) => ({
          column_name: String(r.column_name),
          data_type: String(r.data_type),
        }));

        const sample = await session.query(`SELECT * FROM ${INSPECT_VIEW} LIMIT ${SAMPLE_ROWS}`);
        // Full scan; acceptable for an explicit inspection call
        const counted = await session.query(`SELECT COUNT(*) AS row_count FROM ${INSPECT_VIEW}`);

        return {
          success: true,
          file_path: filePath,
          columns,
          sample_data: sample.rows,
          row_count: Number(counted.rows[0]?.row_count ?? 0),
        };
      } finally {
        await session.dropView(INSPECT_VIEW);
      }
    });
  } catch (e) {
    return { success: false, error: e instanceof Error ? e.message : String(e) };
  }
}
