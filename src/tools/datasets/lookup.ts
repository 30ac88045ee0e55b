// datasets.lookup — describe a dataset, its schema, and a small sample extraction
import { z } from "zod";
import { SAMPLE_PROFILE } from "../../data/block-range.js";
import { fetchDataset } from "../../data/fetch.js";
import { ok, err, errorMessage, parseArgs, type ToolDef } from "../../types/tools.js";
import { describeDataset } from "./describe.js";

// The sample path is bounded; a full fetch is not
export const SAMPLE_TIMEOUT_MS = 30_000;

const blockNumber = z.number().int().nonnegative();

const argsSchema = z.object({
  name: z.string().min(1),
  sample_start_block: blockNumber.optional(),
  sample_end_block: blockNumber.optional(),
  use_latest_sample: z.boolean().default(false),
  sample_blocks_from_latest: blockNumber.optional(),
});

export const datasetsLookup: ToolDef = {
  name: "datasets.lookup_v1",
  description:
    "Look up a cryo dataset: help text, schema from a dry run, and a sample extraction (5 blocks by default, JSON).",
  inputSchema: {
    type: "object",
    properties: {
      name: { type: "string", description: "Dataset name" },
      sample_start_block: { type: "integer", description: "First sample block, inclusive" },
      sample_end_block: { type: "integer", description: "Last sample block, inclusive. Defaults to start + 4" },
      use_latest_sample: { type: "boolean", description: "Sample the latest 5 blocks" },
      sample_blocks_from_latest: { type: "integer", description: "Sample latest-N through latest" },
    },
    required: ["name"],
  },
  async handler(args, ctx) {
    const parsed = parseArgs(argsSchema, args);
    if (!parsed.ok) return parsed.result;
    const a = parsed.value;

    try {
      const info = await describeDataset(ctx, a.name);

      const dryRun = await ctx.runner.run([a.name, "--dry-run", "-r", ctx.config.rpcUrl]);
      if (dryRun.exitCode === 0) info.schema = dryRun.stdout;
      else info.schema_error = dryRun.stderr;

      const sample = await fetchDataset(
        ctx,
        {
          dataset: a.name,
          format: "json",
          startBlock: a.sample_start_block,
          endBlock: a.sample_end_block,
          useLatest: a.use_latest_sample,
          blocksFromLatest: a.sample_blocks_from_latest,
        },
        { profile: SAMPLE_PROFILE, timeoutMs: SAMPLE_TIMEOUT_MS },
      );

      if (sample.ok) {
        if (sample.latest) info.sample_block_range = sample.range;
        info.sample_files = sample.files;
      } else {
        info.sample_error = sample.error;
        if (sample.stdout !== undefined) info.sample_stdout = sample.stdout;
      }
      return ok(info);
    } catch (e) {
      return err(`Failed to look up dataset: ${errorMessage(e)}`);
    }
  },
};
