// File catalog: the Parquet files currently materialized under the data root
import { readdir, stat } from "fs/promises";
import { basename, extname, join, relative, sep } from "path";
import type { PhysicalFile } from "../types/data.js";

export const PARQUET_EXT = ".parquet";

// Recursive, so head-relative files under latest/ are included
export async function listParquetFiles(dataDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dataDir, { recursive: true });
  } catch {
    return []; // data root not created yet
  }
  return entries
    .filter((rel) => rel.endsWith(PARQUET_EXT))
    .map((rel) => join(dataDir, rel))
    .sort();
}

/**
 * Dataset name from a cryo file stem:
 *   ethereum__blocks__00001000_to_00001009 -> blocks
 *   blocks__00001000_to_00001009           -> blocks
 *   token_transfers_1000                   -> token_transfers
 */
export function inferDatasetName(fileName: string): string {
  const stem = basename(fileName, extname(fileName));
  const segments = stem.split("__");
  if (segments.length >= 3) return segments[1];
  if (segments.length === 2) return segments[0];
  const leading = /^([a-z_]+)_/.exec(stem);
  return leading ? leading[1] : stem;
}

// "1000:1009" from "__00001000_to_00001009", "" when the name carries no range
export function inferBlockRange(fileName: string): string {
  const m = /__(\d+)_to_(\d+)/.exec(basename(fileName));
  return m ? `${Number(m[1])}:${Number(m[2])}` : "";
}

// Only latest/ directly under the data root counts, not a "latest" above it
export function isLatestPath(dataDir: string, path: string): boolean {
  return relative(dataDir, path).split(sep)[0] === "latest";
}

export async function describeFile(dataDir: string, path: string): Promise<PhysicalFile> {
  const stats = await stat(path);
  return {
    name: inferDatasetName(path),
    path,
    size_bytes: stats.size,
    modified: stats.mtimeMs / 1000,
    block_range: inferBlockRange(path),
    is_latest: isLatestPath(dataDir, path),
  };
}

export async function listAvailableTables(dataDir: string): Promise<PhysicalFile[]> {
  const files = await listParquetFiles(dataDir);
  return Promise.all(files.map((path) => describeFile(dataDir, path)));
}
