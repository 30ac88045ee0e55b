// sql.tables — Parquet files currently materialized under the data directory
import { listAvailableTables } from "../../data/catalog.js";
import { ok, err, errorMessage, type ToolDef } from "../../types/tools.js";

export const sqlTables: ToolDef = {
  name: "sql.tables_v1",
  description:
    "List downloaded Parquet files with their inferred dataset name, block range, size and whether they hold latest-block data.",
  inputSchema: {
    type: "object",
    properties: {},
    required: [],
  },
  async handler(_args, ctx) {
    try {
      return ok(await listAvailableTables(ctx.config.dataDir));
    } catch (e) {
      return err(`Failed to list tables: ${errorMessage(e)}`);
    }
  },
};
