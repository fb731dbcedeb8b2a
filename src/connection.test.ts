import { ConnectionHandle, CursorHandle, HandleOwner } from "./connection";
import { Dataframe, Row } from "./dataframe";
import { Cursor } from "./engine";
import { PluginLoadError, RuntimeExecutionError } from "./errors";

function stubCursor(): jest.Mocked<Cursor> {
  const cursor: jest.Mocked<Cursor> = {
    execute: jest.fn(async (_sql: string, _params?: unknown[]): Promise<Cursor> => cursor),
    fetchOne: jest.fn(async (): Promise<Row | undefined> => ({ n: 1 })),
    fetchAll: jest.fn(async (): Promise<Row[]> => [{ n: 1 }]),
    query: jest.fn(async (_sql: string): Promise<Dataframe> => ({ columns: [], rows: [] })),
    register: jest.fn(async (_name: string, _df: Dataframe): Promise<void> => undefined),
    sql: jest.fn(async (_code: string): Promise<Dataframe> => ({ columns: [], rows: [] })),
    close: jest.fn(async (): Promise<void> => undefined),
  };
  return cursor;
}

function stubOwner(): jest.Mocked<HandleOwner> {
  return { notifyClosed: jest.fn(async (): Promise<void> => undefined) };
}

it("executes without parameters when none are given", async () => {
  const raw = stubCursor();
  const cursor = new CursorHandle(raw);

  await cursor.execute("select 1");
  await cursor.execute("select ?", [1]);

  expect(raw.execute).toHaveBeenNthCalledWith(1, "select 1");
  expect(raw.execute).toHaveBeenNthCalledWith(2, "select ?", [1]);
});

it("returns itself from execute so results can be fetched", async () => {
  const raw = stubCursor();
  const cursor = new CursorHandle(raw);

  const executed = await cursor.execute("select 1 as n");

  expect(executed).toBe(cursor);
  expect(await executed.fetchOne()).toEqual({ n: 1 });
});

it("normalizes engine failures and keeps the message verbatim", async () => {
  const raw = stubCursor();
  const failure = new Error("Catalog Error: Table with name missing does not exist!");
  raw.execute.mockRejectedValueOnce(failure);
  const cursor = new CursorHandle(raw);

  const result = cursor.execute("select * from missing");

  await expect(result).rejects.toBeInstanceOf(RuntimeExecutionError);
  await expect(result).rejects.toMatchObject({
    message: "Catalog Error: Table with name missing does not exist!",
    cause: failure,
    details: { sql: "select * from missing" },
  });
});

it("does not wrap errors that are already normalized", async () => {
  const raw = stubCursor();
  const failure = new PluginLoadError("mem", "people");
  raw.execute.mockRejectedValueOnce(failure);

  await expect(new CursorHandle(raw).execute("select 1")).rejects.toBe(failure);
});

it("rethrows non-error failures unchanged", async () => {
  const raw = stubCursor();
  raw.execute.mockRejectedValueOnce("interrupted");

  await expect(new CursorHandle(raw).execute("select 1")).rejects.toBe("interrupted");
});

it("forwards every other operation", async () => {
  const raw = stubCursor();
  const cursor = new CursorHandle(raw);
  const df = { columns: [{ name: "n", type: "INTEGER" }], rows: [{ n: 1 }] };

  await cursor.query("select * from t");
  await cursor.register("t_df", df);
  await cursor.sql("select 1");
  await cursor.fetchAll();

  expect(raw.query).toHaveBeenCalledWith("select * from t");
  expect(raw.register).toHaveBeenCalledWith("t_df", df);
  expect(raw.sql).toHaveBeenCalledWith("select 1");
  expect(raw.fetchAll).toHaveBeenCalledTimes(1);
});

it("closes the cursor and notifies the owner once", async () => {
  const raw = stubCursor();
  const owner = stubOwner();
  const handle = new ConnectionHandle(raw, owner);

  await handle.cursor().close();
  await handle.close();
  await handle.close();

  expect(raw.close).toHaveBeenCalledTimes(1);
  expect(owner.notifyClosed).toHaveBeenCalledTimes(1);
  expect(handle.isClosed).toBe(true);
});

it("notifies the owner even when closing the cursor fails", async () => {
  const raw = stubCursor();
  raw.close.mockRejectedValueOnce(new Error("IO Error: close failed"));
  const owner = stubOwner();
  const handle = new ConnectionHandle(raw, owner);

  await expect(handle.close()).rejects.toThrow("IO Error: close failed");
  expect(owner.notifyClosed).toHaveBeenCalledTimes(1);
});
