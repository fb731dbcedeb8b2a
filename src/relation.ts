import { InvalidSaveMode } from "./errors";

export type SaveMode = "overwrite" | "ignore" | "error_if_exists";

const SAVE_MODES: readonly SaveMode[] = ["overwrite", "ignore", "error_if_exists"];

export type Materialization = "table" | "view" | (string & {});

export type SourceConfig = {
  name: string;
  identifier: string;
  schema?: string;
  database?: string;
  /**
   * `save_mode` and `materialization` are read here; every other key is
   * left for the plugin.
   */
  meta: Record<string, unknown>;
  tags?: string[];
};

export type TargetRelation = {
  database?: string;
  schema?: string;
  identifier: string;
};

export type TargetLocation = {
  path: string;
  format: string;
};

export type TargetConfig = {
  relation: TargetRelation;
  columns?: Record<string, { name: string; type?: string }>;
  config: {
    alias?: string;
    compiledCode: string;
    meta: Record<string, unknown>;
    options: Record<string, unknown>;
  };
  location?: TargetLocation;
};

export function tableName(source: SourceConfig): string {
  const parts: string[] = [];
  if (source.database && source.database !== "memory") {
    parts.push(source.database);
  }
  if (source.schema) {
    parts.push(source.schema);
  }
  parts.push(source.identifier);
  return parts.join(".");
}

/** Name a loaded dataframe is registered under on a cursor. */
export function bindingName(qualifiedName: string): string {
  return qualifiedName.replace(/\./g, "_") + "_df";
}

export function saveMode(source: SourceConfig): SaveMode {
  const mode = source.meta["save_mode"] ?? "overwrite";
  const known = SAVE_MODES.find((m) => m === mode);
  if (!known) {
    throw new InvalidSaveMode(mode);
  }
  return known;
}

export function targetAlias(target: TargetConfig): string {
  return target.config.alias ?? target.relation.identifier;
}
