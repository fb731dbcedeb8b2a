export {
  LocalEnvironment,
  EnvironmentOptions,
  createEnvironment,
} from "./local-environment";
export { Environment, JobResponse, ModelContext, ParsedModel } from "./environment";
export { ConnectionHandle, CursorHandle } from "./connection";
export { Cursor, DatabaseHandle, Engine } from "./engine";
export { DuckDBEngine } from "./duckdb-engine";
export {
  Attachment,
  Credentials,
  PluginEntry,
  isMotherDuck,
  loadCredentials,
} from "./config";
export { Column, Dataframe, Row, toDataframe } from "./dataframe";
export {
  Materialization,
  SaveMode,
  SourceConfig,
  TargetConfig,
  bindingName,
  tableName,
} from "./relation";
export * from "./errors";
export * from "./plugins";
