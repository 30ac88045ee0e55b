import { mkdir, utimes, writeFile } from "fs/promises";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  REPORTS_SUBDIR,
  addressFlag,
  buildCryoArgs,
  readManifest,
  runExtraction,
  type ExtractionRequest,
} from "../../src/data/extraction.js";
import { FakeRunner, TEST_RPC_URL, makeTempDir, processResult, removeDir } from "../helpers/fixtures.js";

function request(outputDir: string, overrides: Partial<ExtractionRequest> = {}): ExtractionRequest {
  return { dataset: "blocks", range: "1000:1010", rpcUrl: TEST_RPC_URL, outputDir, format: "json", ...overrides };
}

async function writeReport(outputDir: string, name: string, body: unknown, mtimeSec: number): Promise<void> {
  const reportDir = join(outputDir, REPORTS_SUBDIR);
  await mkdir(reportDir, { recursive: true });
  const path = join(reportDir, name);
  await writeFile(path, JSON.stringify(body));
  await utimes(path, mtimeSec, mtimeSec);
}

describe("buildCryoArgs", () => {
  it("filters transactions by recipient and everything else by contract", () => {
    expect(addressFlag("transactions")).toBe("--to-address");
    expect(addressFlag("logs")).toBe("--contract");
    expect(addressFlag("erc20_transfers")).toBe("--contract");
  });

  it("builds the transactions command with the recipient flag", () => {
    expect(buildCryoArgs(request("/out", { dataset: "transactions", range: "1:2", contract: "0xabc" }))).toEqual([
      "transactions",
      "-b",
      "1:2",
      "-r",
      TEST_RPC_URL,
      "--to-address",
      "0xabc",
      "--json",
      "-o",
      "/out",
    ]);
  });

  it("adds no format flag for parquet and passes column lists through", () => {
    const args = buildCryoArgs(
      request("/out", {
        dataset: "logs",
        format: "parquet",
        contract: "0xdef",
        includeColumns: ["topic0", "data"],
        excludeColumns: ["chain_id"],
      }),
    );
    expect(args).toEqual([
      "logs",
      "-b",
      "1000:1010",
      "-r",
      TEST_RPC_URL,
      "--contract",
      "0xdef",
      "--include-columns",
      "topic0",
      "data",
      "--exclude-columns",
      "chain_id",
      "-o",
      "/out",
    ]);
  });

  it("uses --csv for csv output", () => {
    expect(buildCryoArgs(request("/out", { format: "csv" }))).toContain("--csv");
  });
});

describe("runExtraction", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(outputDir);
  });

  it("takes the completed paths from the newest report", async () => {
    const runner = new FakeRunner(async () => {
      await writeReport(outputDir, "old.json", { results: { completed_paths: ["/stale.json"] } }, 1_000);
      await writeReport(outputDir, "new.json", { results: { completed_paths: ["/fresh_a.json", "/fresh_b.json"] } }, 2_000);
      return processResult();
    });

    const out = await runExtraction(runner, request(outputDir));

    expect(out).toEqual({
      ok: true,
      files: ["/fresh_a.json", "/fresh_b.json"],
      source: "manifest",
      command: `cryo blocks -b 1000:1010 -r ${TEST_RPC_URL} --json -o ${outputDir}`,
    });
  });

  it("falls back to a filename search when the report lacks completed_paths", async () => {
    const runner = new FakeRunner(async () => {
      await writeReport(outputDir, "run.json", { results: { errored_paths: [] } }, 2_000);
      await writeFile(join(outputDir, "ethereum__blocks__00001000_to_00001009.json"), "[]");
      await writeFile(join(outputDir, "ethereum__blocks__00001000_to_00001009.csv"), "");
      await writeFile(join(outputDir, "ethereum__logs__00001000_to_00001009.json"), "[]");
      return processResult();
    });

    const out = await runExtraction(runner, request(outputDir));

    expect(out).toMatchObject({
      ok: true,
      files: [join(outputDir, "ethereum__blocks__00001000_to_00001009.json")],
      source: "glob",
    });
  });

  it("reports the captured stderr, stdout and command on a non-zero exit", async () => {
    const runner = new FakeRunner(() => processResult({ exitCode: 1, stderr: "rpc unreachable", stdout: "partial" }));

    const out = await runExtraction(runner, request(outputDir, { range: "1:2" }));

    expect(out).toEqual({
      ok: false,
      error: "rpc unreachable",
      stdout: "partial",
      command: `cryo blocks -b 1:2 -r ${TEST_RPC_URL} --json -o ${outputDir}`,
    });
  });

  it("reports missing output when neither the report nor the search finds files", async () => {
    const out = await runExtraction(new FakeRunner(), request(outputDir));
    expect(out).toEqual({
      ok: false,
      error: "No output files generated",
      command: `cryo blocks -b 1000:1010 -r ${TEST_RPC_URL} --json -o ${outputDir}`,
    });
  });

  it("passes the timeout to the runner and surfaces a timeout as an error", async () => {
    const runner = new FakeRunner(async () => {
      throw new Error("cryo timed out after 30000ms");
    });

    const out = await runExtraction(runner, request(outputDir, { timeoutMs: 30_000 }));

    expect(runner.calls[0].options).toEqual({ timeoutMs: 30_000 });
    expect(out).toMatchObject({ ok: false, error: "cryo timed out after 30000ms" });
  });
});

describe("readManifest", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(outputDir);
  });

  it("returns null without a reports directory", async () => {
    expect(await readManifest(outputDir)).toBeNull();
  });

  it("returns null for an unparseable report", async () => {
    const reportDir = join(outputDir, REPORTS_SUBDIR);
    await mkdir(reportDir, { recursive: true });
    await writeFile(join(reportDir, "broken.json"), "{not json");
    expect(await readManifest(outputDir)).toBeNull();
  });
});
