import vm from "vm";
import { ConnectionHandle } from "./connection";
import { Credentials, SettingValue } from "./config";
import { Dataframe, Row, toDataframe } from "./dataframe";
import { Cursor, DatabaseHandle, Engine } from "./engine";
import { ModelJobError } from "./errors";
import { createLogger } from "./logger";
import { PluginRegistry } from "./plugins/registry";
import { SourceConfig, TargetConfig, bindingName } from "./relation";

const log = createLogger("environment");

export type ParsedModel = {
  alias: string;
  [key: string]: unknown;
};

export type JobResponse = {
  status: string;
};

export type LoadDataframe = (table: string) => Promise<Dataframe>;

/** The object compiled model code receives as its first argument. */
export type ModelContext = {
  ref(table: string): Promise<Dataframe>;
  source(...parts: string[]): Promise<Dataframe>;
  load: LoadDataframe;
  alias: string;
};

function settingLiteral(value: SettingValue): string {
  if (typeof value === "string") {
    return `'${value.replace(/'/g, "''")}'`;
  }
  return String(value);
}

function isDataframe(value: unknown): value is Dataframe {
  return (
    typeof value === "object" &&
    value !== null &&
    "columns" in value &&
    "rows" in value &&
    Array.isArray(value.columns) &&
    Array.isArray(value.rows)
  );
}

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export abstract class Environment {
  constructor(
    protected readonly creds: Credentials,
    protected readonly engine: Engine
  ) {}

  abstract handle(): Promise<ConnectionHandle>;
  abstract loadSource(pluginName: string, source: SourceConfig): Promise<void>;
  abstract storeRelation(pluginName: string, target: TargetConfig): Promise<void>;
  abstract submitJob(
    handle: ConnectionHandle,
    parsedModel: ParsedModel,
    compiledCode: string
  ): Promise<JobResponse>;
  abstract close(): Promise<void>;

  /**
   * Opens the shared database: installs extensions, attaches databases and
   * lets every plugin configure the new connection.
   */
  protected async initializeDb(plugins: PluginRegistry): Promise<DatabaseHandle> {
    const db = await this.engine.connect(this.creds);
    try {
      const cursor = await db.cursor();
      try {
        for (const extension of this.creds.extensions) {
          await cursor.execute(`INSTALL ${extension}`);
        }
        for (const attachment of this.creds.attach) {
          const alias = attachment.alias ? ` AS ${attachment.alias}` : "";
          const readOnly = attachment.readOnly ? " (READ_ONLY)" : "";
          await cursor.execute(
            `ATTACH '${attachment.path.replace(/'/g, "''")}'${alias}${readOnly}`
          );
        }
        for (const plugin of plugins.values()) {
          await plugin.configureConnection?.(cursor);
        }
      } finally {
        await cursor.close();
      }
    } catch (e) {
      await db.close();
      throw e;
    }
    return db;
  }

  /**
   * Extensions, settings and registered dataframes are scoped to a cursor,
   * so each new cursor gets all of them again.
   */
  protected async initializeCursor(
    db: DatabaseHandle,
    plugins: PluginRegistry,
    registered: ReadonlyMap<string, Dataframe>
  ): Promise<Cursor> {
    const cursor = await db.cursor();
    try {
      for (const extension of this.creds.extensions) {
        await cursor.execute(`LOAD ${extension}`);
      }
      for (const [name, value] of Object.entries(this.creds.settings)) {
        await cursor.execute(`SET ${name} = ${settingLiteral(value)}`);
      }
      for (const plugin of plugins.values()) {
        await plugin.configureCursor?.(cursor);
      }
      for (const [name, df] of registered) {
        await cursor.register(name, df);
      }
    } catch (e) {
      await cursor.close();
      throw e;
    }
    return cursor;
  }

  /**
   * Evaluates compiled model code, which must define
   * `function model(dbt, session)` returning a dataframe (or rows), and
   * materializes the result as a table named after the model's alias.
   */
  protected async runModelJob(
    cursor: Cursor,
    load: LoadDataframe,
    alias: string,
    compiledCode: string
  ): Promise<void> {
    const model: unknown = vm.runInNewContext(
      `${compiledCode}\n;typeof model === "function" ? model : undefined`,
      {},
      { filename: `${alias}.js` }
    );
    if (typeof model !== "function") {
      throw new ModelJobError(alias, "compiled code does not define a model function");
    }

    const context: ModelContext = {
      ref: load,
      source: (...parts) => load(parts.join(".")),
      load,
      alias,
    };
    const result: unknown = await model(context, cursor);

    let df: Dataframe;
    if (isDataframe(result)) {
      df = result;
    } else if (Array.isArray(result)) {
      df = toDataframe(result.filter(isRow));
    } else {
      throw new ModelJobError(alias, "model did not return a dataframe");
    }

    const binding = bindingName(alias);
    log("materializing model %s from %d rows", alias, df.rows.length);
    await cursor.register(binding, df);
    await cursor.execute(`CREATE OR REPLACE TABLE ${alias} AS SELECT * FROM ${binding}`);
  }
}
