import { Credentials } from "../config";
import { Dataframe, Row } from "../dataframe";
import { Cursor, DatabaseHandle, Engine } from "../engine";

type Relation =
  | { kind: "table"; catalog: string; df: Dataframe }
  | { kind: "view"; catalog: string; binding: string };

const CREATE_AS = /^CREATE OR REPLACE (TABLE|VIEW) (\S+) AS SELECT \* FROM (\S+)$/i;
const CREATE_SCHEMA = /^CREATE SCHEMA IF NOT EXISTS (\S+)$/i;
const SELECT_ALL = /^select \* from (\S+)$/i;
const SESSION = /^(INSTALL|LOAD|SET|ATTACH)\b/i;

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** What outlives a database handle: the contents of one database file. */
export class FakeStorage {
  readonly schemas = new Set<string>(["main"]);
  readonly relations = new Map<string, Relation>();
  writes = 0;

  constructor(readonly catalog: string) {}
}

/**
 * In-process stand-in for DuckDB that understands the handful of statements
 * the environment issues. Registered dataframes are cursor-scoped, relations
 * and schemas live in the storage behind the database.
 */
export class FakeDatabase implements DatabaseHandle {
  readonly statements: string[] = [];
  closed = false;
  cursorsOpened = 0;
  cursorsClosed = 0;
  failCursor = false;

  constructor(readonly storage: FakeStorage) {}

  async cursor(): Promise<Cursor> {
    await tick();
    this.assertOpen();
    if (this.failCursor) {
      throw new Error("IO Error: could not open cursor");
    }
    this.cursorsOpened += 1;
    return new FakeCursor(this);
  }

  async close(): Promise<void> {
    await tick();
    this.assertOpen();
    this.closed = true;
  }

  assertOpen(): void {
    if (this.closed) {
      throw new Error("Connection Error: database is closed");
    }
  }
}

export class FakeCursor implements Cursor {
  readonly bindings = new Map<string, Dataframe>();
  private pending: Row[] = [];
  closed = false;

  constructor(private db: FakeDatabase) {}

  async execute(sql: string, params: unknown[] = []): Promise<Cursor> {
    await tick();
    this.db.assertOpen();
    const statement = sql.trim().replace(/\s+/g, " ");
    this.db.statements.push(statement);
    this.pending = [];

    if (SESSION.test(statement)) {
      return this;
    }

    const schema = CREATE_SCHEMA.exec(statement);
    if (schema) {
      this.db.storage.schemas.add(schema[1]);
      return this;
    }

    if (/information_schema\.tables/i.test(statement)) {
      const [tableSchema, table, catalog] = params;
      const relation = this.db.storage.relations.get(`${String(tableSchema)}.${String(table)}`);
      const found =
        relation !== undefined &&
        (catalog === undefined || relation.catalog === catalog);
      this.pending = [{ n: found ? 1n : 0n }];
      return this;
    }

    const create = CREATE_AS.exec(statement);
    if (create) {
      const [, kind, target, binding] = create;
      const [relationSchema, name] = this.split(target);
      if (!this.db.storage.schemas.has(relationSchema)) {
        throw new Error(`Catalog Error: Schema with name ${relationSchema} does not exist!`);
      }
      const df = this.resolve(binding);
      const key = `${relationSchema}.${name}`;
      this.db.storage.relations.set(
        key,
        kind.toLowerCase() === "view"
          ? { kind: "view", catalog: this.db.storage.catalog, binding }
          : { kind: "table", catalog: this.db.storage.catalog, df }
      );
      this.db.storage.writes += 1;
      return this;
    }

    const select = SELECT_ALL.exec(statement);
    if (select) {
      this.pending = [...this.resolve(select[1]).rows];
      return this;
    }

    throw new Error(`Parser Error: syntax error at or near "${statement.split(" ")[0]}"`);
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
    await tick();
    this.db.assertOpen();
    const select = SELECT_ALL.exec(sql.trim());
    if (!select) {
      throw new Error(`Parser Error: unsupported query ${sql}`);
    }
    return this.resolve(select[1]);
  }

  sql(code: string): Promise<Dataframe> {
    return this.query(code);
  }

  async register(name: string, df: Dataframe): Promise<void> {
    this.db.assertOpen();
    this.bindings.set(name, df);
  }

  async close(): Promise<void> {
    if (this.closed) {
      throw new Error("Connection Error: cursor already closed");
    }
    this.closed = true;
    this.db.cursorsClosed += 1;
  }

  private split(name: string): [string, string] {
    const parts = name.split(".");
    const relation = parts[parts.length - 1];
    const schema = parts.length > 1 ? parts[parts.length - 2] : "main";
    return [schema, relation];
  }

  private resolve(name: string): Dataframe {
    const bound = this.bindings.get(name);
    if (bound) {
      return bound;
    }
    const [schema, relationName] = this.split(name);
    const relation = this.db.storage.relations.get(`${schema}.${relationName}`);
    if (relation?.kind === "table") {
      return relation.df;
    }
    if (relation?.kind === "view") {
      const viewed = this.bindings.get(relation.binding);
      if (!viewed) {
        throw new Error(
          `Catalog Error: Table with name ${relation.binding} does not exist!`
        );
      }
      return viewed;
    }
    throw new Error(`Catalog Error: Table with name ${name} does not exist!`);
  }
}

export class FakeEngine implements Engine {
  readonly databases: FakeDatabase[] = [];
  readonly storage = new Map<string, FakeStorage>();
  failConnect = false;

  async connect(credentials: Credentials): Promise<DatabaseHandle> {
    await tick();
    if (this.failConnect) {
      throw new Error(`IO Error: Cannot open file "${credentials.path}"`);
    }
    let storage = this.storage.get(credentials.path);
    if (!storage) {
      storage = new FakeStorage(credentials.path === ":memory:" ? "memory" : "db");
      this.storage.set(credentials.path, storage);
    }
    const db = new FakeDatabase(storage);
    this.databases.push(db);
    return db;
  }

  get latest(): FakeDatabase {
    const db = this.databases[this.databases.length - 1];
    if (!db) {
      throw new Error("no database opened yet");
    }
    return db;
  }
}
