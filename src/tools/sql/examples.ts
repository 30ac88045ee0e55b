// sql.examples — Example queries for the common cryo datasets
import { ok, type ToolDef } from "../../types/tools.js";

export const SQL_EXAMPLES: Record<string, string[]> = {
  basic: [
    "SELECT * FROM blocks LIMIT 10",
    "SELECT COUNT(*) AS block_count FROM blocks",
    "SELECT MIN(block_number) AS first_block, MAX(block_number) AS last_block FROM blocks",
  ],
  blocks: [
    "SELECT block_number, gas_used, timestamp FROM blocks ORDER BY gas_used DESC LIMIT 10",
    "SELECT AVG(gas_used) AS avg_gas, MAX(gas_used) AS max_gas FROM blocks",
  ],
  transactions: [
    "SELECT block_number, COUNT(*) AS tx_count FROM transactions GROUP BY block_number ORDER BY tx_count DESC",
    "SELECT from_address, COUNT(*) AS sent FROM transactions GROUP BY from_address ORDER BY sent DESC LIMIT 10",
  ],
  joins: [
    "SELECT b.block_number, b.gas_used, COUNT(t.transaction_hash) AS tx_count FROM blocks b JOIN transactions t ON b.block_number = t.block_number GROUP BY b.block_number, b.gas_used",
  ],
  direct_file: [
    "SELECT * FROM read_parquet('/path/to/ethereum__blocks__00001000_to_00001009.parquet') LIMIT 5",
  ],
};

export const sqlExamples: ToolDef = {
  name: "sql.examples_v1",
  description: "Example SQL queries for blocks and transactions, including joins and direct read_parquet() access.",
  inputSchema: {
    type: "object",
    properties: {},
    required: [],
  },
  async handler() {
    return ok(SQL_EXAMPLES);
  },
};
