// Extraction invoker: one cryo run per dataset request, then locate what it wrote
import { readdir, readFile, stat } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { formatCommand, type ProcessRunner } from "../bridge/cryo-runner.js";

export const OUTPUT_FORMATS = ["json", "csv", "parquet"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const REPORTS_SUBDIR = join(".cryo", "reports");

export interface ExtractionRequest {
  dataset: string;
  range: string;
  rpcUrl: string;
  outputDir: string;
  format: OutputFormat;
  contract?: string;
  includeColumns?: string[];
  excludeColumns?: string[];
  timeoutMs?: number;
}

export type ExtractionResult =
  | { ok: true; files: string[]; source: "manifest" | "glob"; command: string }
  | { ok: false; error: string; command: string; stdout?: string };

// cryo filters transactions by recipient; every other dataset takes --contract
const ADDRESS_FLAGS: Record<string, string> = {
  transactions: "--to-address",
};

export function addressFlag(dataset: string): string {
  return ADDRESS_FLAGS[dataset] ?? "--contract";
}

export function buildCryoArgs(req: ExtractionRequest): string[] {
  const args = [req.dataset, "-b", req.range, "-r", req.rpcUrl];

  if (req.contract) {
    args.push(addressFlag(req.dataset), req.contract);
  }

  // parquet is cryo's default output and has no flag
  if (req.format === "json") args.push("--json");
  else if (req.format === "csv") args.push("--csv");

  if (req.includeColumns && req.includeColumns.length > 0) {
    args.push("--include-columns", ...req.includeColumns);
  }
  if (req.excludeColumns && req.excludeColumns.length > 0) {
    args.push("--exclude-columns", ...req.excludeColumns);
  }

  args.push("-o", req.outputDir);
  return args;
}

const manifestSchema = z.object({
  results: z.object({
    completed_paths: z.array(z.string()),
  }),
});

/**
 * Completed paths from the newest run report under `<outputDir>/.cryo/reports`.
 * null when there is no report or the newest one lacks `results.completed_paths`.
 */
export async function readManifest(outputDir: string): Promise<string[] | null> {
  const reportDir = join(outputDir, REPORTS_SUBDIR);
  let names: string[];
  try {
    names = (await readdir(reportDir)).filter((n) => n.endsWith(".json"));
  } catch {
    return null; // no reports written yet
  }
  if (names.length === 0) return null;

  const reports = await Promise.all(
    names.map(async (name) => {
      const path = join(reportDir, name);
      return { path, mtimeMs: (await stat(path)).mtimeMs };
    }),
  );
  reports.sort((a, b) => b.mtimeMs - a.mtimeMs || b.path.localeCompare(a.path));
  const newest = reports[0].path;

  let body: unknown;
  try {
    body = JSON.parse(await readFile(newest, "utf-8"));
  } catch (e) {
    console.error(`[cryo] Unreadable report ${newest}:`, e instanceof Error ? e.message : String(e));
    return null;
  }
  const parsed = manifestSchema.safeParse(body);
  return parsed.success ? parsed.data.results.completed_paths : null;
}

// "*<dataset>*.<ext>" in the output directory itself
export async function globOutputFiles(outputDir: string, dataset: string, ext: string): Promise<string[]> {
  const entries = await readdir(outputDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(`.${ext}`) && e.name.includes(dataset))
    .map((e) => join(outputDir, e.name))
    .sort();
}

export async function runExtraction(runner: ProcessRunner, req: ExtractionRequest): Promise<ExtractionResult> {
  const args = buildCryoArgs(req);
  const command = formatCommand(runner.binary, args);
  console.error(`[cryo] Running: ${command}`);

  let files: string[];
  try {
    const result = await runner.run(args, { timeoutMs: req.timeoutMs });
    if (result.exitCode !== 0) {
      return { ok: false, error: result.stderr, stdout: result.stdout, command };
    }

    const fromManifest = await readManifest(req.outputDir);
    if (fromManifest !== null) {
      console.error(`[cryo] Report lists ${fromManifest.length} file(s)`);
      return { ok: true, files: fromManifest, source: "manifest", command };
    }
    files = await globOutputFiles(req.outputDir, req.dataset, req.format);
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e), command };
  }

  if (files.length === 0) {
    return { ok: false, error: "No output files generated", command };
  }
  return { ok: true, files, source: "glob", command };
}
