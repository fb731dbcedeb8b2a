import { Dataframe } from "../dataframe";
import { Cursor } from "../engine";
import { createLogger } from "../logger";
import { SourceConfig, TargetConfig, targetAlias } from "../relation";
import { BasePlugin } from "./plugin";

const log = createLogger("plugin:memory");

/**
 * Keeps dataframes in process, keyed by name. Sources read `meta.key`
 * (falling back to the identifier); exports are stored under the target's
 * alias and can be read back straight away.
 */
export class MemoryPlugin extends BasePlugin {
  constructor(
    name: string,
    config: Record<string, unknown> = {},
    readonly frames: Map<string, Dataframe> = new Map()
  ) {
    super(name, config);
  }

  async load(source: SourceConfig): Promise<Dataframe | undefined> {
    const key = source.meta["key"];
    return this.frames.get(typeof key === "string" ? key : source.identifier);
  }

  async store(df: Dataframe, target: TargetConfig, _cursor: Cursor): Promise<void> {
    const key = targetAlias(target);
    log("storing %d rows under %s", df.rows.length, key);
    this.frames.set(key, df);
  }

  adaptTargetConfig(target: TargetConfig): TargetConfig {
    const alias = targetAlias(target);
    return {
      ...target,
      location: { path: `memory://${alias}`, format: "dataframe" },
    };
  }

  canBeUpstreamReferenced(): boolean {
    return true;
  }

  createSourceConfig(target: TargetConfig): SourceConfig {
    const alias = targetAlias(target);
    return {
      name: alias,
      identifier: alias,
      schema: target.relation.schema,
      database: target.relation.database,
      meta: { ...target.config.meta, key: alias },
    };
  }
}
