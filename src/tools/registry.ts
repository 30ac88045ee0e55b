// Tool registry — single source of truth for all MCP tools
import { err, errorMessage, type ToolContext, type ToolDef, type ToolResult } from "../types/tools.js";
import {
  datasetsList,
  datasetsQuery,
  datasetsDescribe,
  datasetsLookup,
} from "./datasets/index.js";
import {
  chainLatestBlock,
  chainTransaction,
} from "./chain/index.js";
import {
  sqlQuery,
  sqlTables,
  sqlSchema,
  sqlExamples,
  sqlBlockchainQuery,
} from "./sql/index.js";

const allTools: ToolDef[] = [
  datasetsList,
  datasetsQuery,
  datasetsDescribe,
  datasetsLookup,
  chainLatestBlock,
  chainTransaction,
  sqlQuery,
  sqlTables,
  sqlSchema,
  sqlExamples,
  sqlBlockchainQuery,
];

// Indexed by tool name for fast lookup
export const tools: Map<string, ToolDef> = new Map(
  allTools.map((t) => [t.name, t])
);

// Never throws: unknown tools and handler exceptions become error results
export async function callTool(
  name: string,
  args: Record<string, unknown>,
  ctx: ToolContext,
): Promise<ToolResult> {
  const tool = tools.get(name);
  if (!tool) return err(`Unknown tool: ${name}`);
  try {
    return await tool.handler(args, ctx);
  } catch (e) {
    console.error(`[server] Tool ${name} threw:`, errorMessage(e));
    return err(`Tool ${name} failed: ${errorMessage(e)}`);
  }
}
