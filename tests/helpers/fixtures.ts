import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { DuckDBInstance } from "@duckdb/node-api";
import { quoteLiteral } from "../../src/bridge/duckdb-session.js";
import type { ProcessResult, ProcessRunner, RunOptions } from "../../src/bridge/cryo-runner.js";
import type { ChainRpc, RpcObject } from "../../src/bridge/rpc-client.js";
import type { ToolContext, ToolResult } from "../../src/types/tools.js";

export const TEST_RPC_URL = "http://rpc.test:8545";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "cryo-sql-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

// Rows block_number = first .. first+count-1, gas_used = block_number * 100
export async function writeBlocksParquet(path: string, first: number, count: number): Promise<void> {
  const instance = await DuckDBInstance.create(":memory:");
  const connection = await instance.connect();
  try {
    await connection.run(
      `COPY (SELECT i AS block_number, i * 100 AS gas_used FROM range(${first}, ${first + count}) t(i) ORDER BY i) ` +
        `TO ${quoteLiteral(path)} (FORMAT PARQUET)`,
    );
  } finally {
    connection.closeSync();
  }
}

export function processResult(partial: Partial<ProcessResult> = {}): ProcessResult {
  return { stdout: "", stderr: "", exitCode: 0, ...partial };
}

export class FakeRunner implements ProcessRunner {
  readonly binary = "cryo";
  readonly calls: Array<{ args: string[]; options?: RunOptions }> = [];

  constructor(private readonly respond: (args: string[]) => Promise<ProcessResult> | ProcessResult = () => processResult()) {}

  async run(args: string[], options?: RunOptions): Promise<ProcessResult> {
    this.calls.push({ args, options });
    return this.respond(args);
  }
}

// Value following "-o" in a cryo argument list
export function outputDirOf(args: string[]): string {
  const idx = args.indexOf("-o");
  if (idx < 0 || idx + 1 >= args.length) throw new Error(`no -o in ${args.join(" ")}`);
  return args[idx + 1];
}

export class FakeRpc implements ChainRpc {
  readonly url = TEST_RPC_URL;
  headCalls = 0;

  constructor(
    private readonly head: number | null = null,
    private readonly transactions: Record<string, RpcObject> = {},
    private readonly receipts: Record<string, RpcObject> = {},
  ) {}

  async blockNumber(): Promise<number | null> {
    this.headCalls++;
    return this.head;
  }

  async getTransactionByHash(hash: string): Promise<RpcObject | null> {
    return this.transactions[hash] ?? null;
  }

  async getTransactionReceipt(hash: string): Promise<RpcObject | null> {
    return this.receipts[hash] ?? null;
  }
}

export function makeContext(dataDir: string, runner: ProcessRunner = new FakeRunner(), rpc: ChainRpc = new FakeRpc()): ToolContext {
  return {
    config: { rpcUrl: TEST_RPC_URL, dataDir, cryoBinary: "cryo" },
    runner,
    rpc,
  };
}

export function resultText(result: ToolResult): string {
  return result.content[0]?.text ?? "";
}

export function resultJson(result: ToolResult): Record<string, unknown> {
  const parsed: unknown = JSON.parse(resultText(result));
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`expected a JSON object, got: ${resultText(result)}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}
