// sql.query — Run SQL over downloaded Parquet files, tables resolved by name
import { z } from "zod";
import { executeSqlQuery } from "../../sql/executor.js";
import { ok, fail, errorMessage, parseArgs, type ToolDef } from "../../types/tools.js";

const argsSchema = z.object({
  query: z.string().min(1),
  files: z.array(z.string()).optional(),
  include_schema: z.boolean().default(true),
});

export const sqlQuery: ToolDef = {
  name: "sql.query_v1",
  description:
    "Run a DuckDB SQL query over downloaded Parquet files. Reference datasets by name (FROM blocks, JOIN transactions); " +
    "each name is bound to the matching files, several files are combined with UNION ALL. " +
    "read_parquet('<path>') also works. Without files, every Parquet file in the data directory is a candidate.",
  inputSchema: {
    type: "object",
    properties: {
      query: { type: "string", description: "SQL query" },
      files: { type: "array", items: { type: "string" }, description: "Parquet files to query (default: all downloaded files)" },
      include_schema: { type: "boolean", description: "Include result column types (default true)" },
    },
    required: ["query"],
  },
  async handler(args, ctx) {
    const parsed = parseArgs(argsSchema, args);
    if (!parsed.ok) return parsed.result;
    const { query, files, include_schema } = parsed.value;

    try {
      const result = await executeSqlQuery(query, {
        dataDir: ctx.config.dataDir,
        files,
        includeSchema: include_schema,
      });
      return result.success ? ok(result) : fail({ ...result });
    } catch (e) {
      return fail({ success: false, error: errorMessage(e) });
    }
  },
};
