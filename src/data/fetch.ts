// Fetch a dataset for a range: normalize, prepare the output directory, extract
import type { ChainRpc } from "../bridge/rpc-client.js";
import type { ProcessRunner } from "../bridge/cryo-runner.js";
import type { CryoConfig } from "../config/loader.js";
import { FETCH_PROFILE, normalizeBlockRange, prepareOutputDir, type BlockRangeRequest, type RangeProfile } from "./block-range.js";
import { runExtraction, type OutputFormat } from "./extraction.js";

export interface FetchRequest extends BlockRangeRequest {
  dataset: string;
  format: OutputFormat;
  contract?: string;
  includeColumns?: string[];
  excludeColumns?: string[];
}

export interface FetchDeps {
  config: CryoConfig;
  runner: ProcessRunner;
  rpc: Pick<ChainRpc, "blockNumber">;
}

export interface FetchOptions {
  profile?: RangeProfile;
  timeoutMs?: number;
}

export type FetchResult =
  | { ok: true; files: string[]; format: OutputFormat; range: string; latest: boolean }
  | { ok: false; error: string; command?: string; stdout?: string; range?: string };

export async function fetchDataset(deps: FetchDeps, req: FetchRequest, options: FetchOptions = {}): Promise<FetchResult> {
  const normalized = await normalizeBlockRange(req, () => deps.rpc.blockNumber(), options.profile ?? FETCH_PROFILE);
  if (!normalized.ok) return { ok: false, error: normalized.error };

  const { range, latest } = normalized;
  let outputDir: string;
  try {
    const prepared = await prepareOutputDir(deps.config.dataDir, latest, req.dataset);
    outputDir = prepared.dir;
    for (const path of prepared.removed) console.error(`[cryo] Removed existing file: ${path}`);
  } catch (e) {
    return { ok: false, error: `Cannot prepare output directory: ${e instanceof Error ? e.message : String(e)}`, range };
  }

  const extracted = await runExtraction(deps.runner, {
    dataset: req.dataset,
    range,
    rpcUrl: deps.config.rpcUrl,
    outputDir,
    format: req.format,
    contract: req.contract,
    includeColumns: req.includeColumns,
    excludeColumns: req.excludeColumns,
    timeoutMs: options.timeoutMs,
  });

  if (!extracted.ok) {
    return { ok: false, error: extracted.error, command: extracted.command, stdout: extracted.stdout, range };
  }
  return { ok: true, files: extracted.files, format: req.format, range, latest };
}
