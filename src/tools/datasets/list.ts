// datasets.list — Names of every dataset cryo can extract
import { ok, err, errorMessage, type ToolDef } from "../../types/tools.js";

const GROUP_ONLY = "- blocks_and_transactions:";
const GROUPS_HEADER = "dataset group names";

// Parses "- name (alias = ...)" lines up to the group section
export function parseDatasetList(helpText: string): string[] {
  const datasets: string[] = [];
  for (const line of helpText.split("\n")) {
    if (line === GROUPS_HEADER) break;
    if (line.startsWith("- ") && !line.startsWith(GROUP_ONLY)) {
      datasets.push(line.slice(2).split(" (alias")[0].trim());
    }
  }
  return datasets;
}

export const datasetsList: ToolDef = {
  name: "datasets.list_v1",
  description: "List every blockchain dataset cryo can extract (blocks, transactions, logs, ...).",
  inputSchema: {
    type: "object",
    properties: {},
    required: [],
  },
  async handler(_args, ctx) {
    try {
      const result = await ctx.runner.run(["help", "datasets", "-r", ctx.config.rpcUrl]);
      if (result.exitCode !== 0) {
        return err(`cryo help datasets failed (exit ${result.exitCode}): ${result.stderr}`);
      }
      return ok(parseDatasetList(result.stdout));
    } catch (e) {
      return err(`Failed to list datasets: ${errorMessage(e)}`);
    }
  },
};
