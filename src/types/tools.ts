// Tool input/output types
import type { z } from "zod";
import type { CryoConfig } from "../config/loader.js";
import type { ProcessRunner } from "../bridge/cryo-runner.js";
import type { ChainRpc } from "../bridge/rpc-client.js";

export interface ToolResult {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function ok(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: typeof data === "string" ? data : JSON.stringify(data, null, 2) }],
  };
}

export function err(message: string): ToolResult {
  return {
    content: [{ type: "text", text: message }],
    isError: true,
  };
}

// Structured failure: the payload keeps its diagnostic fields (command, stderr, files_available)
export function fail(payload: Record<string, unknown>): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    isError: true,
  };
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// Collaborators handed to every handler, resolved per call by the server
export interface ToolContext {
  config: CryoConfig;
  runner: ProcessRunner;
  rpc: ChainRpc;
}

// Tool handler type
export type ToolHandler = (args: Record<string, unknown>, ctx: ToolContext) => Promise<ToolResult>;

// Tool definition for registry
export interface ToolDef {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  handler: ToolHandler;
}

export type ParsedArgs<T> = { ok: true; value: T } | { ok: false; result: ToolResult };

export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: Record<string, unknown>): ParsedArgs<z.infer<S>> {
  const parsed = schema.safeParse(args);
  if (parsed.success) return { ok: true, value: parsed.data };
  const issues = parsed.error.issues
    .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
    .join("; ");
  return { ok: false, result: err(`Invalid arguments: ${issues}`) };
}
