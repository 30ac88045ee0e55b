// datasets.describe — cryo's help text for a dataset plus example tool calls
import { z } from "zod";
import { ok, err, errorMessage, parseArgs, type ToolContext, type ToolDef } from "../../types/tools.js";

export interface DatasetInfo {
  name: string;
  description: string;
  example_queries: string[];
  notes: string[];
  [extra: string]: unknown;
}

export async function describeDataset(ctx: ToolContext, name: string): Promise<DatasetInfo> {
  const help = await ctx.runner.run(["help", name, "-r", ctx.config.rpcUrl]);
  const head = await ctx.rpc.blockNumber();

  const examples = [
    `datasets.query_v1 { "dataset": "${name}", "blocks": "1000:1010" }`,
    `datasets.query_v1 { "dataset": "${name}", "start_block": 1000, "end_block": 1009 }`,
    `datasets.query_v1 { "dataset": "${name}", "use_latest": true }`,
  ];
  if (head !== null) {
    examples.push(`datasets.query_v1 { "dataset": "${name}", "blocks_from_latest": 10 }`);
  }

  return {
    name,
    description: help.stdout,
    example_queries: examples,
    notes: [
      "Block ranges are inclusive for start_block and end_block when using integer parameters.",
      "Use 'use_latest: true' to query only the latest block.",
      "Use 'blocks_from_latest: N' to query the latest N blocks.",
    ],
  };
}

const argsSchema = z.object({ name: z.string().min(1) });

export const datasetsDescribe: ToolDef = {
  name: "datasets.describe_v1",
  description: "Describe a cryo dataset: help text, example calls and range conventions.",
  inputSchema: {
    type: "object",
    properties: {
      name: { type: "string", description: "Dataset name" },
    },
    required: ["name"],
  },
  async handler(args, ctx) {
    const parsed = parseArgs(argsSchema, args);
    if (!parsed.ok) return parsed.result;
    try {
      return ok(await describeDataset(ctx, parsed.value.name));
    } catch (e) {
      return err(`Failed to describe dataset: ${errorMessage(e)}`);
    }
  },
};
