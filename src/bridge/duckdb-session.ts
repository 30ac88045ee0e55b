// DuckDB session: one in-memory database per query, views tracked for teardown
import { DuckDBInstance, type DuckDBConnection } from "@duckdb/node-api";

export const SESSION_LIMITS = {
  memoryLimit: "4GB",
  maxExpressionDepth: 10_000,
  queryTimeoutMs: 30_000,
} as const;

export type JsonRow = Record<string, unknown>;

export interface QueryRows {
  columns: string[];
  columnTypes: string[];
  rows: JsonRow[];
}

// BIGINT/HUGEINT, BLOB and timestamp values do not survive JSON.stringify as-is
export function toJsonValue(value: unknown): unknown {
  if (typeof value === "bigint") {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (value instanceof Uint8Array) return `0x${Buffer.from(value).toString("hex")}`;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toJsonValue(v)]));
  }
  return value;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

// Repeated names (a.block_number, b.block_number) become block_number, block_number:1, ...
export function uniqueColumnNames(names: string[]): string[] {
  const seen = new Set<string>();
  return names.map((name) => {
    let candidate = name;
    for (let n = 1; seen.has(candidate); n++) candidate = `${name}:${n}`;
    seen.add(candidate);
    return candidate;
  });
}

export class DuckDBSession {
  private readonly views = new Set<string>();
  private closed = false;

  private constructor(private readonly connection: DuckDBConnection) {}

  static async open(): Promise<DuckDBSession> {
    const instance = await DuckDBInstance.create(":memory:");
    const session = new DuckDBSession(await instance.connect());
    try {
      await session.run(`SET memory_limit = '${SESSION_LIMITS.memoryLimit}'`);
      await session.run(`SET max_expression_depth = ${SESSION_LIMITS.maxExpressionDepth}`);
    } catch (e) {
      await session.close();
      throw e;
    }
    if (!(await session.trySet(`SET query_timeout_ms = ${SESSION_LIMITS.queryTimeoutMs}`))) {
      console.error("[sql] query_timeout_ms not supported, running without it");
    }
    return session;
  }

  async run(sql: string): Promise<void> {
    await this.connection.run(sql);
  }

  async query(sql: string): Promise<QueryRows> {
    const reader = await this.connection.runAndReadAll(sql);
    const columns = uniqueColumnNames(reader.columnNames());
    return {
      columns,
      columnTypes: reader.columnTypes().map((t) => t.toString()),
      rows: reader.getRowsJS().map((values) => {
        const out: JsonRow = {};
        columns.forEach((name, i) => {
          out[name] = toJsonValue(values[i]);
        });
        return out;
      }),
    };
  }

  // Drop-then-create, so a stale view of the same name never survives
  async createView(name: string, selectSql: string): Promise<void> {
    const ident = quoteIdentifier(name);
    await this.run(`DROP VIEW IF EXISTS ${ident}`);
    this.views.add(name);
    await this.run(`CREATE VIEW ${ident} AS ${selectSql}`);
  }

  async dropView(name: string): Promise<void> {
    await this.run(`DROP VIEW IF EXISTS ${quoteIdentifier(name)}`);
    this.views.delete(name);
  }

  get viewNames(): string[] {
    return Array.from(this.views);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // Drops every view this session created, then closes the connection. Safe to call twice.
  async close(): Promise<void> {
    if (this.closed) return;
    for (const name of this.viewNames) {
      try {
        await this.dropView(name);
      } catch (e) {
        console.error(`[sql] Failed to drop view ${name}:`, e instanceof Error ? e.message : String(e));
      }
    }
    this.connection.closeSync();
    this.closed = true;
  }

  private async trySet(sql: string): Promise<boolean> {
    try {
      await this.run(sql);
      return true;
    } catch {
      return false;
    }
  }
}

// Scoped acquisition: the session is closed on every exit path of fn
export async function withSession<T>(fn: (session: DuckDBSession) => Promise<T>): Promise<T> {
  const session = await DuckDBSession.open();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
