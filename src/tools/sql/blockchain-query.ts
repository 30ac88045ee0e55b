// sql.blockchain_query — Fetch a dataset as Parquet, then run SQL over exactly those files
import { z } from "zod";
import { fetchDataset } from "../../data/fetch.js";
import { executeSqlQuery } from "../../sql/executor.js";
import { extractDatasetName } from "../../sql/table-resolver.js";
import { ok, err, fail, errorMessage, parseArgs, type ToolDef } from "../../types/tools.js";
import { rangeArgProperties, rangeArgs, toRangeRequest } from "../datasets/range-args.js";

const argsSchema = z.object({
  sql_query: z.string().min(1),
  dataset: z.string().min(1).optional(),
  ...rangeArgs,
  contract: z.string().min(1).optional(),
  include_schema: z.boolean().default(true),
});

export const sqlBlockchainQuery: ToolDef = {
  name: "sql.blockchain_query_v1",
  description:
    "Download a dataset as Parquet for a block range and run a SQL query over the downloaded files in one call. " +
    "The dataset defaults to the first table named in the query.",
  inputSchema: {
    type: "object",
    properties: {
      sql_query: { type: "string", description: "SQL query; reference the dataset by name (e.g. FROM blocks)" },
      dataset: { type: "string", description: "Dataset to download (default: first table in the query)" },
      ...rangeArgProperties,
      contract: { type: "string", description: "Contract address filter" },
      include_schema: { type: "boolean", description: "Include result column types (default true)" },
    },
    required: ["sql_query"],
  },
  async handler(args, ctx) {
    const parsed = parseArgs(argsSchema, args);
    if (!parsed.ok) return parsed.result;
    const a = parsed.value;

    const dataset = a.dataset ?? extractDatasetName(a.sql_query);
    if (dataset === null) {
      return err("Could not determine dataset from SQL query. Please specify the dataset parameter.");
    }

    try {
      const fetched = await fetchDataset(ctx, {
        ...toRangeRequest(a),
        dataset,
        format: "parquet",
        contract: a.contract,
      });
      if (!fetched.ok) {
        return fail({
          success: false,
          error: `Failed to download data: ${fetched.error}`,
          download_details: { error: fetched.error, stdout: fetched.stdout, command: fetched.command },
        });
      }
      if (fetched.files.length === 0) {
        return fail({ success: false, error: "No files were downloaded" });
      }

      const result = await executeSqlQuery(a.sql_query, {
        dataDir: ctx.config.dataDir,
        files: fetched.files,
        includeSchema: a.include_schema,
      });
      return result.success ? ok(result) : fail({ ...result });
    } catch (e) {
      return fail({ success: false, error: errorMessage(e) });
    }
  },
};
