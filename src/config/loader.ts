// Config resolution: explicit override > process environment > default
import { homedir } from "os";
import { join } from "path";

export interface CryoConfig {
  rpcUrl: string;
  dataDir: string;
  cryoBinary: string;
}

export type ConfigOverrides = Partial<CryoConfig>;

export const DEFAULT_RPC_URL = "http://localhost:8545";
export const DEFAULT_CRYO_BINARY = "cryo";

export function defaultDataDir(): string {
  return join(homedir(), ".cryo-mcp", "data");
}

function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

function pick(explicit: string | undefined, fromEnv: string | undefined, fallback: string): string {
  if (explicit !== undefined && explicit.trim() !== "") return explicit;
  if (fromEnv !== undefined && fromEnv.trim() !== "") return fromEnv;
  return fallback;
}

/**
 * Resolve the configuration for one call. Nothing is cached and nothing is
 * written back to the environment, so two calls with different overrides
 * never see each other's values.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): CryoConfig {
  return {
    rpcUrl: pick(overrides.rpcUrl, env.ETH_RPC_URL, DEFAULT_RPC_URL),
    dataDir: expandHome(pick(overrides.dataDir, env.CRYO_DATA_DIR, defaultDataDir())),
    cryoBinary: pick(overrides.cryoBinary, env.CRYO_BIN, DEFAULT_CRYO_BINARY),
  };
}
