// Block-range arguments shared by every tool that fetches data
import { z } from "zod";
import type { BlockRangeRequest } from "../../data/block-range.js";

const blockNumber = z.number().int().nonnegative();

export const rangeArgs = {
  blocks: z.string().min(1).optional(),
  start_block: blockNumber.optional(),
  end_block: blockNumber.optional(),
  use_latest: z.boolean().default(false),
  blocks_from_latest: blockNumber.optional(),
};

export const rangeArgProperties: Record<string, unknown> = {
  blocks: { type: "string", description: "Block range in cryo's half-open form, e.g. '1000:1010' (blocks 1000-1009)" },
  start_block: { type: "integer", description: "First block, inclusive (alternative to blocks)" },
  end_block: { type: "integer", description: "Last block, inclusive. Defaults to start_block + 9" },
  use_latest: { type: "boolean", description: "Fetch only the latest block" },
  blocks_from_latest: { type: "integer", description: "Fetch latest-N through latest" },
};

export interface RangeArgs {
  blocks?: string;
  start_block?: number;
  end_block?: number;
  use_latest: boolean;
  blocks_from_latest?: number;
}

export function toRangeRequest(args: RangeArgs): BlockRangeRequest {
  return {
    blocks: args.blocks,
    startBlock: args.start_block,
    endBlock: args.end_block,
    useLatest: args.use_latest,
    blocksFromLatest: args.blocks_from_latest,
  };
}
