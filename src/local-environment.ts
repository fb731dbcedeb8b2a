import { ConnectionHandle, HandleOwner } from "./connection";
import { Credentials, MEMORY_PATH, isMotherDuck } from "./config";
import { Dataframe } from "./dataframe";
import { DuckDBEngine } from "./duckdb-engine";
import { Cursor, DatabaseHandle, Engine } from "./engine";
import { Environment, JobResponse, ParsedModel } from "./environment";
import { PluginLoadError, RelationAlreadyExists } from "./errors";
import { createLogger } from "./logger";
import { PluginFactory } from "./plugins/plugin";
import { PluginRegistry } from "./plugins/registry";
import {
  SourceConfig,
  TargetConfig,
  bindingName,
  saveMode,
  tableName,
} from "./relation";
import { Latch } from "./util/latch";

const log = createLogger("environment:local");
const warn = log.extend("warn");

export type EnvironmentOptions = {
  engine?: Engine;
  /** Used instead of building a registry from `credentials.plugins`. */
  plugins?: PluginRegistry;
  pluginFactories?: Record<string, PluginFactory>;
};

/**
 * Shares one database handle between every open ConnectionHandle. The
 * handle is opened by the first `handle()` call and closed when the last
 * ConnectionHandle closes, unless the environment is kept open (explicit
 * `keepOpen`, an in-memory database or MotherDuck).
 */
export class LocalEnvironment extends Environment implements HandleOwner {
  readonly plugins: PluginRegistry;
  readonly keepOpen: boolean;

  private conn: DatabaseHandle | null = null;
  private handleCount = 0;
  private readonly latch = new Latch();
  private readonly registeredDataframes = new Map<string, Dataframe>();

  constructor(creds: Credentials, options: EnvironmentOptions = {}) {
    super(creds, options.engine ?? new DuckDBEngine());
    this.plugins =
      options.plugins ??
      PluginRegistry.fromEntries(creds.plugins, options.pluginFactories);
    this.keepOpen =
      creds.keepOpen || creds.path === MEMORY_PATH || isMotherDuck(creds.path);
  }

  get openHandles(): number {
    return this.handleCount;
  }

  get isOpen(): boolean {
    return this.conn !== null;
  }

  get registeredDataframeNames(): string[] {
    return [...this.registeredDataframes.keys()];
  }

  async handle(): Promise<ConnectionHandle> {
    const db = await this.latch.withLock(async () => {
      if (this.conn === null) {
        this.conn = await this.initializeDb(this.plugins);
        log("opened shared database %s", this.creds.path);
      }
      this.handleCount += 1;
      return this.conn;
    });

    let cursor: Cursor;
    try {
      cursor = await this.initializeCursor(
        db,
        this.plugins,
        new Map(this.registeredDataframes)
      );
    } catch (e) {
      await this.notifyClosed();
      throw e;
    }
    return new ConnectionHandle(cursor, this);
  }

  async notifyClosed(): Promise<void> {
    await this.latch.withLock(async () => {
      if (this.handleCount === 0) {
        warn("handle closed with no open handles; count left at zero");
        return;
      }
      this.handleCount -= 1;
      if (this.handleCount === 0 && !this.keepOpen) {
        await this.closeShared();
      }
    });
  }

  async submitJob(
    handle: ConnectionHandle,
    parsedModel: ParsedModel,
    compiledCode: string
  ): Promise<JobResponse> {
    const cursor = handle.cursor();
    const load = (table: string) => cursor.query(`select * from ${table}`);

    await this.runModelJob(cursor, load, parsedModel.alias, compiledCode);
    return { status: "OK" };
  }

  async loadSource(pluginName: string, source: SourceConfig): Promise<void> {
    const plugin = this.plugins.get(pluginName);
    const mode = saveMode(source);
    const qualified = tableName(source);

    const handle = await this.handle();
    const cursor = handle.cursor();
    try {
      if (source.schema) {
        await cursor.execute(`CREATE SCHEMA IF NOT EXISTS ${source.schema}`);
      }

      if (mode === "ignore" || mode === "error_if_exists") {
        if (await this.relationExists(cursor, source)) {
          if (mode === "error_if_exists") {
            throw new RelationAlreadyExists(qualified);
          }
          log("source %s already exists; leaving it in place", qualified);
          return;
        }
      }

      const df = await plugin.load(source);
      if (!df) {
        throw new PluginLoadError(pluginName, qualified);
      }

      const configured = source.meta["materialization"];
      const materialization =
        typeof configured === "string"
          ? configured
          : plugin.defaultMaterialization();
      const binding = bindingName(qualified);

      await cursor.register(binding, df);
      if (materialization === "view") {
        this.registeredDataframes.set(binding, df);
      }

      await cursor.execute(
        `CREATE OR REPLACE ${materialization} ${qualified} AS SELECT * FROM ${binding}`
      );
      log("loaded %s through %s as %s", qualified, pluginName, materialization);
    } finally {
      await handle.close();
    }
  }

  async storeRelation(pluginName: string, target: TargetConfig): Promise<void> {
    const plugin = this.plugins.get(pluginName);
    const adapted = plugin.adaptTargetConfig(target);

    const handle = await this.handle();
    try {
      const cursor = handle.cursor();
      const df = await cursor.sql(adapted.config.compiledCode);
      await plugin.store(df, adapted, cursor);
      log("stored %s through %s", adapted.relation.identifier, pluginName);
    } finally {
      await handle.close();
    }

    if (plugin.canBeUpstreamReferenced()) {
      await this.loadSource(pluginName, plugin.createSourceConfig(adapted));
    }
  }

  /**
   * Closes the shared database whatever the open-handle count. Meant for
   * process shutdown; calling it with nothing open does nothing.
   */
  async close(): Promise<void> {
    await this.latch.withLock(() => this.closeShared());
  }

  private async closeShared(): Promise<void> {
    if (this.conn === null) {
      return;
    }
    const conn = this.conn;
    this.conn = null;
    await conn.close();
    log("closed shared database %s", this.creds.path);
  }

  private async relationExists(
    cursor: Cursor,
    source: SourceConfig
  ): Promise<boolean> {
    const params: unknown[] = [source.schema ?? "main", source.identifier];
    let sql = `SELECT COUNT(1) AS n
      FROM system.information_schema.tables
      WHERE table_schema = ?
      AND table_name = ?`;
    if (source.database) {
      sql += "\n      AND table_catalog = ?";
      params.push(source.database);
    }

    const row = await (await cursor.execute(sql, params)).fetchOne();
    return Number(row?.["n"] ?? 0) > 0;
  }
}

export function createEnvironment(
  creds: Credentials,
  options: EnvironmentOptions = {}
): LocalEnvironment {
  return new LocalEnvironment(creds, options);
}
