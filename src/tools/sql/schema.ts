// sql.schema — Columns, sample rows and row count of one Parquet file
import { z } from "zod";
import { getTableSchema } from "../../sql/schema.js";
import { ok, fail, errorMessage, parseArgs, type ToolDef } from "../../types/tools.js";

const argsSchema = z.object({ file_path: z.string().min(1) });

export const sqlSchema: ToolDef = {
  name: "sql.schema_v1",
  description: "Inspect a Parquet file: column names and types, the first 5 rows, and the total row count.",
  inputSchema: {
    type: "object",
    properties: {
      file_path: { type: "string", description: "Path to a .parquet file" },
    },
    required: ["file_path"],
  },
  async handler(args) {
    const parsed = parseArgs(argsSchema, args);
    if (!parsed.ok) return parsed.result;
    try {
      const result = await getTableSchema(parsed.value.file_path);
      return result.success ? ok(result) : fail({ ...result });
    } catch (e) {
      return fail({ success: false, error: errorMessage(e) });
    }
  },
};
