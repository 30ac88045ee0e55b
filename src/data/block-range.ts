// Block-range normalization: caller range expressions -> cryo's half-open "start:end"
import { mkdir, readdir, unlink } from "fs/promises";
import { join } from "path";

export interface BlockRangeRequest {
  // Passed through unchanged, already in cryo's native form
  blocks?: string;
  // Inclusive on both ends
  startBlock?: number;
  endBlock?: number;
  useLatest?: boolean;
  // latest-N through latest
  blocksFromLatest?: number;
}

export interface RangeProfile {
  // Window width when only a start block is given
  span: number;
  // Window width for a bare "latest" request
  latestSpan: number;
  // Last resort when nothing is supplied
  fallback: string;
}

export const FETCH_PROFILE: RangeProfile = { span: 10, latestSpan: 1, fallback: "1000:1010" };
export const SAMPLE_PROFILE: RangeProfile = { span: 5, latestSpan: 5, fallback: "1000:1005" };

export const LATEST_HEAD_ERROR = "Failed to get the latest block number from the RPC endpoint";

export type NormalizedRange =
  | { ok: true; range: string; latest: boolean }
  | { ok: false; error: string };

export type HeadLookup = () => Promise<number | null>;

/**
 * Precedence: explicit string > latest flag / offset > start(/end) > profile fallback.
 * The chain head is only looked up for latest requests.
 */
export async function normalizeBlockRange(
  req: BlockRangeRequest,
  getHead: HeadLookup,
  profile: RangeProfile = FETCH_PROFILE,
): Promise<NormalizedRange> {
  if (req.blocks !== undefined && req.blocks !== "") {
    return { ok: true, range: req.blocks, latest: false };
  }

  if (req.useLatest === true || req.blocksFromLatest !== undefined) {
    const head = await getHead();
    if (head === null) return { ok: false, error: LATEST_HEAD_ERROR };
    const back = req.blocksFromLatest ?? profile.latestSpan - 1;
    return { ok: true, range: `${Math.max(0, head - back)}:${head + 1}`, latest: true };
  }

  if (req.startBlock !== undefined) {
    const end = req.endBlock !== undefined ? req.endBlock + 1 : req.startBlock + profile.span;
    return { ok: true, range: `${req.startBlock}:${end}`, latest: false };
  }

  return { ok: true, range: profile.fallback, latest: false };
}

export interface OutputDir {
  dir: string;
  removed: string[];
}

/**
 * Historical ranges write to the data root; latest ranges write to
 * `<dataDir>/latest`, which is first purged of this dataset's files.
 * The purge is last-writer-wins and unlocked: concurrent latest requests for
 * the same dataset are unsupported.
 */
export async function prepareOutputDir(dataDir: string, latest: boolean, dataset: string): Promise<OutputDir> {
  if (!latest) {
    await mkdir(dataDir, { recursive: true });
    return { dir: dataDir, removed: [] };
  }

  const dir = join(dataDir, "latest");
  await mkdir(dir, { recursive: true });

  const removed: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (!entry.isFile() || !isDatasetFile(entry.name, dataset)) continue;
    const path = join(dir, entry.name);
    try {
      await unlink(path);
      removed.push(path);
    } catch (e) {
      console.error(`[cryo] Could not remove stale file ${path}:`, e instanceof Error ? e.message : String(e));
    }
  }
  return { dir, removed };
}

// "*<dataset>*.*"
function isDatasetFile(fileName: string, dataset: string): boolean {
  const idx = fileName.indexOf(dataset);
  return idx >= 0 && fileName.indexOf(".", idx + dataset.length) >= 0;
}
