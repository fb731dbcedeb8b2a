import { Credentials } from "./config";
import { Dataframe, Row } from "./dataframe";

/**
 * The capability set every engine cursor provides. Each cursor carries its
 * own session settings and registered dataframes.
 */
export interface Cursor {
  /** Runs a statement; its rows become available to `fetchOne`/`fetchAll`. */
  execute(sql: string, params?: unknown[]): Promise<Cursor>;
  fetchOne(): Promise<Row | undefined>;
  fetchAll(): Promise<Row[]>;
  query(sql: string): Promise<Dataframe>;
  /** Binds a dataframe under `name` for the lifetime of this cursor. */
  register(name: string, df: Dataframe): Promise<void>;
  sql(code: string): Promise<Dataframe>;
  close(): Promise<void>;
}

export interface DatabaseHandle {
  cursor(): Promise<Cursor>;
  close(): Promise<void>;
}

export interface Engine {
  connect(credentials: Credentials): Promise<DatabaseHandle>;
}
