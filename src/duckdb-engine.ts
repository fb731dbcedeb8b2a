import { DuckDBConnection, DuckDBInstance } from "@duckdb/node-api";
import fs from "fs-extra";
import path from "path";
import { Credentials, MEMORY_PATH, isMotherDuck } from "./config";
import { Dataframe, Row, cellValue } from "./dataframe";
import { Cursor, DatabaseHandle, Engine } from "./engine";
import { createLogger } from "./logger";

const log = createLogger("duckdb");

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function stripTerminator(sql: string): string {
  return sql.trim().replace(/;+$/, "");
}

export class DuckDBCursor implements Cursor {
  private pending: Row[] = [];

  constructor(private connection: DuckDBConnection) {}

  async execute(sql: string, params?: unknown[]): Promise<Cursor> {
    this.pending = await this.all(sql, params);
    return this;
  }

  async fetchOne(): Promise<Row | undefined> {
    return this.pending.shift();
  }

  async fetchAll(): Promise<Row[]> {
    const rows = this.pending;
    this.pending = [];
    return rows;
  }

  async query(sql: string): Promise<Dataframe> {
    const statement = stripTerminator(sql);
    const described = await this.all(`DESCRIBE ${statement}`);
    const columns = described.map((c) => ({
      name: String(c["column_name"]),
      type: String(c["column_type"]),
    }));
    const rows = await this.all(statement);
    return { columns, rows };
  }

  sql(code: string): Promise<Dataframe> {
    return this.query(code);
  }

  /**
   * Registered dataframes live in a temporary table, so they are only
   * visible on this connection.
   */
  async register(name: string, df: Dataframe): Promise<void> {
    const table = quoteIdentifier(name);
    const columns = df.columns
      .map((c) => `${quoteIdentifier(c.name)} ${c.type}`)
      .join(", ");
    await this.connection.run(`CREATE OR REPLACE TEMP TABLE ${table} (${columns})`);

    const placeholders = df.columns.map((c) => `CAST(? AS ${c.type})`).join(", ");
    for (const row of df.rows) {
      await this.connection.run(
        `INSERT INTO ${table} VALUES (${placeholders})`,
        df.columns.map((c) => cellValue(row[c.name], c.type))
      );
    }
  }

  async close(): Promise<void> {
    this.connection.closeSync();
  }

  private async all(sql: string, params?: unknown[]): Promise<Row[]> {
    const reader =
      params === undefined
        ? await this.connection.runAndReadAll(sql)
        : await this.connection.runAndReadAll(
            sql,
            params.map((p) => cellValue(p))
          );
    return reader.getRowObjectsJS();
  }
}

export class DuckDBHandle implements DatabaseHandle {
  constructor(private instance: DuckDBInstance) {}

  async cursor(): Promise<Cursor> {
    return new DuckDBCursor(await this.instance.connect());
  }

  async close(): Promise<void> {
    this.instance.closeSync();
  }
}

async function prepareDatabasePath(dbPath: string): Promise<string> {
  if (dbPath === MEMORY_PATH || isMotherDuck(dbPath)) {
    return dbPath;
  }
  const resolved = path.resolve(dbPath);
  await fs.ensureDir(path.dirname(resolved));
  return resolved;
}

export class DuckDBEngine implements Engine {
  async connect(credentials: Credentials): Promise<DatabaseHandle> {
    const dbPath = await prepareDatabasePath(credentials.path);
    const instance = await DuckDBInstance.create(dbPath);
    log("opened database at %s", dbPath);
    return new DuckDBHandle(instance);
  }
}
