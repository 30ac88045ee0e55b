#!/usr/bin/env node
import { mkdir } from "fs/promises";
import { Command } from "commander";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { CryoRunner } from "./bridge/cryo-runner.js";
import { EthRpcClient } from "./bridge/rpc-client.js";
import { resolveConfig, type ConfigOverrides } from "./config/loader.js";
import { tools, callTool } from "./tools/registry.js";
import type { ToolContext } from "./types/tools.js";

const program = new Command()
  .name("cryo-sql-mcp")
  .description("MCP server for cryo blockchain extraction and SQL over the extracted Parquet files")
  .option("--rpc-url <url>", "Ethereum RPC URL (default: $ETH_RPC_URL or http://localhost:8545)")
  .option("--data-dir <dir>", "Directory for downloaded data (default: $CRYO_DATA_DIR or ~/.cryo-mcp/data)")
  .option("--cryo-bin <path>", "cryo executable (default: $CRYO_BIN or cryo)");

// Flags win over the environment; both are re-read for every call
function contextFor(overrides: ConfigOverrides): ToolContext {
  const config = resolveConfig(overrides);
  return {
    config,
    runner: new CryoRunner(config.cryoBinary),
    rpc: new EthRpcClient(config.rpcUrl),
  };
}

function createServer(overrides: ConfigOverrides): Server {
  const server = new Server(
    { name: "cryo-sql-mcp", version: "0.1.0" },
    { capabilities: { tools: {} } }
  );

  // List all registered tools
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: Array.from(tools.values()).map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const started = Date.now();
    const result = await callTool(name, args ?? {}, contextFor(overrides));
    console.error(`[server] ${name} ${result.isError ? "failed" : "ok"} in ${Date.now() - started}ms`);
    return {
      content: result.content.map((c) => ({ type: "text" as const, text: c.text })),
      isError: result.isError,
    };
  });

  return server;
}

async function main() {
  program.parse();
  const opts = program.opts<{ rpcUrl?: string; dataDir?: string; cryoBin?: string }>();
  const overrides: ConfigOverrides = { rpcUrl: opts.rpcUrl, dataDir: opts.dataDir, cryoBinary: opts.cryoBin };

  const config = resolveConfig(overrides);
  await mkdir(config.dataDir, { recursive: true });
  console.error(`[server] RPC ${config.rpcUrl}, data directory ${config.dataDir}`);

  const transport = new StdioServerTransport();
  await createServer(overrides).connect(transport);
}

main().catch((e) => {
  console.error("[server] Fatal:", e instanceof Error ? e.message : String(e));
  process.exit(1);
});
