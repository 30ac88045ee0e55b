import { describe, expect, it, vi } from "vitest";
import { EthRpcClient, decodeQuantity } from "../../src/bridge/rpc-client.js";
import { TEST_RPC_URL } from "../helpers/fixtures.js";

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), { ...init, headers: { "Content-Type": "application/json" } });
}

describe("decodeQuantity", () => {
  it("decodes hex quantities and rejects anything else", () => {
    expect(decodeQuantity("0x1b4")).toBe(436);
    expect(decodeQuantity("0x0")).toBe(0);
    expect(decodeQuantity("1b4")).toBeNull();
    expect(decodeQuantity(436)).toBeNull();
    expect(decodeQuantity(undefined)).toBeNull();
  });
});

describe("EthRpcClient.blockNumber", () => {
  it("posts eth_blockNumber and decodes the head", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ jsonrpc: "2.0", id: 1, result: "0x1b4" }));
    vi.stubGlobal("fetch", fetchMock);

    expect(await new EthRpcClient(TEST_RPC_URL).blockNumber()).toBe(436);

    expect(fetchMock).toHaveBeenCalledWith(TEST_RPC_URL, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ jsonrpc: "2.0", method: "eth_blockNumber", params: [], id: 1 }),
    });
  });

  it.each([
    ["a missing result", async () => jsonResponse({ jsonrpc: "2.0", id: 1 })],
    ["a non-hex result", async () => jsonResponse({ jsonrpc: "2.0", id: 1, result: "latest" })],
    ["an RPC error", async () => jsonResponse({ jsonrpc: "2.0", id: 1, error: { code: -32000, message: "busy" } })],
    ["an HTTP failure", async () => jsonResponse({}, { status: 500, statusText: "Internal Server Error" })],
    [
      "a transport failure",
      async (): Promise<Response> => {
        throw new Error("connect ECONNREFUSED");
      },
    ],
  ])("returns null on %s", async (_label, respond) => {
    vi.stubGlobal("fetch", vi.fn(respond));
    expect(await new EthRpcClient(TEST_RPC_URL).blockNumber()).toBeNull();
  });
});

describe("EthRpcClient transaction lookups", () => {
  const hash = `0x${"ab".repeat(32)}`;

  it("returns the transaction object", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ jsonrpc: "2.0", id: 1, result: { hash, blockNumber: "0x10" } })),
    );
    expect(await new EthRpcClient(TEST_RPC_URL).getTransactionByHash(hash)).toEqual({ hash, blockNumber: "0x10" });
  });

  it("returns null for an unknown receipt", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ jsonrpc: "2.0", id: 1, result: null })));
    expect(await new EthRpcClient(TEST_RPC_URL).getTransactionReceipt(hash)).toBeNull();
  });

  it("throws on an RPC error", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ jsonrpc: "2.0", id: 1, error: { message: "bad hash" } })));
    await expect(new EthRpcClient(TEST_RPC_URL).getTransactionByHash(hash)).rejects.toThrow(
      "RPC eth_getTransactionByHash error: bad hash",
    );
  });
});
