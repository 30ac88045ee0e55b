// Ethereum JSON-RPC client: chain head and transaction lookups
import { z } from "zod";

const HEX_QUANTITY = /^0x[0-9a-fA-F]+$/;

const rpcEnvelope = z.object({
  result: z.unknown().optional(),
  error: z.object({ code: z.number().optional(), message: z.string() }).passthrough().optional(),
});

export type RpcObject = Record<string, unknown>;

export interface ChainRpc {
  readonly url: string;
  // null means "unavailable": transport failure, RPC error or malformed result
  blockNumber(): Promise<number | null>;
  getTransactionByHash(hash: string): Promise<RpcObject | null>;
  getTransactionReceipt(hash: string): Promise<RpcObject | null>;
}

export function decodeQuantity(value: unknown): number | null {
  if (typeof value !== "string" || !HEX_QUANTITY.test(value)) return null;
  return Number.parseInt(value, 16);
}

export class EthRpcClient implements ChainRpc {
  constructor(readonly url: string = "http://localhost:8545") {}

  async blockNumber(): Promise<number | null> {
    try {
      const result = await this.call("eth_blockNumber", []);
      const head = decodeQuantity(result);
      if (head === null) {
        console.error(`[rpc] Malformed eth_blockNumber result: ${JSON.stringify(result)}`);
        return null;
      }
      return head;
    } catch (e) {
      console.error(`[rpc] Failed to fetch latest block from ${this.url}:`, e instanceof Error ? e.message : String(e));
      return null;
    }
  }

  async getTransactionByHash(hash: string): Promise<RpcObject | null> {
    return asObject(await this.call("eth_getTransactionByHash", [hash]));
  }

  async getTransactionReceipt(hash: string): Promise<RpcObject | null> {
    return asObject(await this.call("eth_getTransactionReceipt", [hash]));
  }

  // Throws on transport errors, non-2xx responses and JSON-RPC error objects
  async call(method: string, params: unknown[]): Promise<unknown> {
    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ jsonrpc: "2.0", method, params, id: 1 }),
    });

    if (!res.ok) {
      throw new Error(`RPC ${method} failed: ${res.status} ${res.statusText}`);
    }

    const body: unknown = await res.json();
    const envelope = rpcEnvelope.safeParse(body);
    if (!envelope.success) {
      throw new Error(`RPC ${method} returned a malformed response`);
    }
    if (envelope.data.error) {
      throw new Error(`RPC ${method} error: ${envelope.data.error.message}`);
    }
    return envelope.data.result;
  }
}

function asObject(value: unknown): RpcObject | null {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}
