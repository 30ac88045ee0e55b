// chain.transaction — a transaction and its receipt, decoded from hex quantities
import { z } from "zod";
import { decodeQuantity, type RpcObject } from "../../bridge/rpc-client.js";
import { ok, err, fail, errorMessage, parseArgs, type ToolDef } from "../../types/tools.js";

const argsSchema = z.object({
  tx_hash: z.string().regex(/^0x[0-9a-fA-F]{64}$/, "expected a 0x-prefixed 32-byte hash"),
});

// Missing quantities decode as 0
function quantity(obj: RpcObject, key: string): number {
  return decodeQuantity(obj[key]) ?? 0;
}

// Wei values overflow Number; keep them exact as decimal strings
function decimalString(value: unknown): string {
  return typeof value === "string" && /^0x[0-9a-fA-F]+$/.test(value) ? BigInt(value).toString() : "0";
}

export function decodeTransaction(hash: string, tx: RpcObject): Record<string, unknown> {
  return {
    transaction_hash: hash,
    block_number: quantity(tx, "blockNumber"),
    block_hash: tx.blockHash ?? null,
    from_address: tx.from ?? null,
    to_address: tx.to ?? null,
    value: tx.value ?? null,
    value_decimal: decimalString(tx.value),
    gas_limit: quantity(tx, "gas"),
    gas_price: quantity(tx, "gasPrice"),
    nonce: quantity(tx, "nonce"),
    input: tx.input ?? null,
    transaction_index: quantity(tx, "transactionIndex"),
  };
}

export function decodeReceipt(receipt: RpcObject): Record<string, unknown> {
  return {
    gas_used: quantity(receipt, "gasUsed"),
    status: quantity(receipt, "status"),
    logs_count: Array.isArray(receipt.logs) ? receipt.logs.length : 0,
    contract_address: receipt.contractAddress ?? null,
  };
}

export const chainTransaction: ToolDef = {
  name: "chain.transaction_v1",
  description: "Get a transaction by hash, joined with its receipt (gas used, status, log count).",
  inputSchema: {
    type: "object",
    properties: {
      tx_hash: { type: "string", description: "Transaction hash (0x-prefixed)" },
    },
    required: ["tx_hash"],
  },
  async handler(args, ctx) {
    const parsed = parseArgs(argsSchema, args);
    if (!parsed.ok) return parsed.result;
    const hash = parsed.value.tx_hash;

    try {
      const tx = await ctx.rpc.getTransactionByHash(hash);
      if (tx === null) return err(`Transaction not found: ${hash}`);

      const decoded = decodeTransaction(hash, tx);
      const receipt = await ctx.rpc.getTransactionReceipt(hash);
      if (receipt === null) {
        return ok({ ...decoded, error: "Failed to retrieve transaction receipt" });
      }

      const result: Record<string, unknown> = { ...decoded, ...decodeReceipt(receipt) };
      // EIP-1559
      if ("maxFeePerGas" in tx) {
        result.max_fee_per_gas = quantity(tx, "maxFeePerGas");
        result.max_priority_fee_per_gas = quantity(tx, "maxPriorityFeePerGas");
        result.transaction_type = quantity(tx, "type");
      }
      return ok(result);
    } catch (e) {
      return fail({ error: `Exception when fetching transaction: ${errorMessage(e)}` });
    }
  },
};
