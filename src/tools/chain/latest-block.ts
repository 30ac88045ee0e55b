// chain.latest_block — chain head number plus its block row extracted into latest/
import { LATEST_HEAD_ERROR } from "../../data/block-range.js";
import { fetchDataset } from "../../data/fetch.js";
import { ok, fail, errorMessage, type ToolDef } from "../../types/tools.js";

export const chainLatestBlock: ToolDef = {
  name: "chain.latest_block_v1",
  description: "Get the latest block number from the RPC endpoint and extract that block with cryo (JSON, latest/ directory).",
  inputSchema: {
    type: "object",
    properties: {},
    required: [],
  },
  async handler(_args, ctx) {
    try {
      const head = await ctx.rpc.blockNumber();
      if (head === null) return fail({ error: LATEST_HEAD_ERROR });

      // Pin the range to the head we report, so a block mined in between cannot skew it
      const fetched = await fetchDataset(
        { ...ctx, rpc: { blockNumber: async () => head } },
        { dataset: "blocks", format: "json", useLatest: true },
      );
      if (!fetched.ok) {
        // stdout is only captured when cryo itself exited non-zero
        return fetched.stdout !== undefined
          ? fail({ block_number: head, error: "Failed to get detailed block data", stderr: fetched.error })
          : fail({ block_number: head, error: fetched.error });
      }
      return ok({ block_number: head, files: fetched.files, count: fetched.files.length });
    } catch (e) {
      return fail({ error: `Failed to get latest block: ${errorMessage(e)}` });
    }
  },
};
