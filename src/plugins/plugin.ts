import { Dataframe } from "../dataframe";
import { Cursor } from "../engine";
import { UnsupportedPluginOperation } from "../errors";
import { Materialization, SourceConfig, TargetConfig } from "../relation";

/**
 * Contract every source/sink integration satisfies. Instances are created
 * once when the registry is built and never replaced.
 */
export interface Plugin {
  readonly name: string;

  load(source: SourceConfig): Promise<Dataframe | undefined>;
  store(df: Dataframe, target: TargetConfig, cursor: Cursor): Promise<void>;
  adaptTargetConfig(target: TargetConfig): TargetConfig;
  defaultMaterialization(): Materialization;
  canBeUpstreamReferenced(): boolean;
  createSourceConfig(target: TargetConfig): SourceConfig;

  /** Runs once, when the shared database is opened. */
  configureConnection?(cursor: Cursor): Promise<void>;
  /** Runs for every new cursor. */
  configureCursor?(cursor: Cursor): Promise<void>;
}

export type PluginFactory = (
  name: string,
  config: Record<string, unknown>
) => Plugin;

/**
 * Default behaviour for plugins: sources materialize as tables, exports
 * are not re-registered and storing is unsupported until overridden.
 */
export abstract class BasePlugin implements Plugin {
  constructor(
    readonly name: string,
    protected config: Record<string, unknown> = {}
  ) {}

  abstract load(source: SourceConfig): Promise<Dataframe | undefined>;

  async store(_df: Dataframe, _target: TargetConfig, _cursor: Cursor): Promise<void> {
    throw new UnsupportedPluginOperation(this.name, "store");
  }

  adaptTargetConfig(target: TargetConfig): TargetConfig {
    return target;
  }

  defaultMaterialization(): Materialization {
    const configured = this.config["materialization"];
    return typeof configured === "string" ? configured : "table";
  }

  canBeUpstreamReferenced(): boolean {
    return false;
  }

  createSourceConfig(_target: TargetConfig): SourceConfig {
    throw new UnsupportedPluginOperation(this.name, "createSourceConfig");
  }
}
