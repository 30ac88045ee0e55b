// datasets.query — Extract a dataset for a block range into the data directory
import { z } from "zod";
import { OUTPUT_FORMATS } from "../../data/extraction.js";
import { fetchDataset } from "../../data/fetch.js";
import { ok, fail, errorMessage, parseArgs, type ToolDef } from "../../types/tools.js";
import { rangeArgProperties, rangeArgs, toRangeRequest } from "./range-args.js";

const argsSchema = z.object({
  dataset: z.string().min(1),
  ...rangeArgs,
  contract: z.string().min(1).optional(),
  output_format: z.enum(OUTPUT_FORMATS).default("json"),
  include_columns: z.array(z.string()).optional(),
  exclude_columns: z.array(z.string()).optional(),
});

export const datasetsQuery: ToolDef = {
  name: "datasets.query_v1",
  description:
    "Extract a cryo dataset for a block range and return the paths of the files written. " +
    "Range precedence: blocks > use_latest/blocks_from_latest > start_block/end_block > 1000:1010.",
  inputSchema: {
    type: "object",
    properties: {
      dataset: { type: "string", description: "Dataset name (e.g. 'blocks', 'transactions', 'logs')" },
      ...rangeArgProperties,
      contract: { type: "string", description: "Contract address filter (recipient address for transactions)" },
      output_format: { type: "string", enum: [...OUTPUT_FORMATS], description: "Output format (default json)" },
      include_columns: { type: "array", items: { type: "string" }, description: "Columns to add to the defaults" },
      exclude_columns: { type: "array", items: { type: "string" }, description: "Columns to drop from the defaults" },
    },
    required: ["dataset"],
  },
  async handler(args, ctx) {
    const parsed = parseArgs(argsSchema, args);
    if (!parsed.ok) return parsed.result;
    const a = parsed.value;

    try {
      const fetched = await fetchDataset(ctx, {
        ...toRangeRequest(a),
        dataset: a.dataset,
        format: a.output_format,
        contract: a.contract,
        includeColumns: a.include_columns,
        excludeColumns: a.exclude_columns,
      });
      if (!fetched.ok) {
        return fail({ error: fetched.error, stdout: fetched.stdout, command: fetched.command });
      }
      return ok({ files: fetched.files, count: fetched.files.length, format: fetched.format });
    } catch (e) {
      return fail({ error: `Failed to query dataset: ${errorMessage(e)}` });
    }
  },
};
