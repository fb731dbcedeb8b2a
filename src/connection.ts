import { ConnectorError } from "@hasura/ndc-sdk-typescript";
import { Dataframe, Row } from "./dataframe";
import { Cursor } from "./engine";
import { RuntimeExecutionError } from "./errors";

/**
 * Forwards every cursor operation unchanged, except that `execute` turns
 * engine failures into `RuntimeExecutionError`.
 */
export class CursorHandle implements Cursor {
  private closed = false;

  constructor(private cursor: Cursor) {}

  async execute(sql: string, params?: unknown[]): Promise<Cursor> {
    try {
      if (params === undefined) {
        await this.cursor.execute(sql);
      } else {
        await this.cursor.execute(sql, params);
      }
      return this;
    } catch (e) {
      if (e instanceof Error && !(e instanceof ConnectorError)) {
        throw new RuntimeExecutionError(e.message, sql, e);
      }
      throw e;
    }
  }

  fetchOne(): Promise<Row | undefined> {
    return this.cursor.fetchOne();
  }

  fetchAll(): Promise<Row[]> {
    return this.cursor.fetchAll();
  }

  query(sql: string): Promise<Dataframe> {
    return this.cursor.query(sql);
  }

  register(name: string, df: Dataframe): Promise<void> {
    return this.cursor.register(name, df);
  }

  sql(code: string): Promise<Dataframe> {
    return this.cursor.sql(code);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.cursor.close();
  }
}

export interface HandleOwner {
  notifyClosed(): Promise<void>;
}

export class ConnectionHandle {
  private readonly wrapped: CursorHandle;
  private closed = false;

  constructor(cursor: Cursor, private owner: HandleOwner) {
    this.wrapped = new CursorHandle(cursor);
  }

  cursor(): CursorHandle {
    return this.wrapped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Closes the cursor and releases this handle's reference on the shared
   * database. Only the first call has any effect.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.wrapped.close();
    } finally {
      await this.owner.notifyClosed();
    }
  }
}
