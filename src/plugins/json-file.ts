import fs from "fs-extra";
import path from "path";
import { Dataframe, Row, toDataframe } from "../dataframe";
import { Cursor } from "../engine";
import { InvalidConfiguration } from "../errors";
import { createLogger } from "../logger";
import { SourceConfig, TargetConfig, targetAlias } from "../relation";
import { BasePlugin } from "./plugin";

const log = createLogger("plugin:json_file");

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonValue(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  return value;
}

/**
 * Reads and writes JSON files holding an array of row objects.
 *
 * Config: `root` is the directory relative paths and default export
 * locations resolve against (defaults to the working directory).
 * Sources read `meta.path`, or `<root>/<identifier>.json`.
 * Exports go to `options.location`, or `<root>/<alias>.json`.
 */
export class JsonFilePlugin extends BasePlugin {
  private get root(): string {
    const root = this.config["root"];
    return typeof root === "string" ? root : process.cwd();
  }

  async load(source: SourceConfig): Promise<Dataframe | undefined> {
    const configured = source.meta["path"];
    const file = path.resolve(
      this.root,
      typeof configured === "string" ? configured : `${source.identifier}.json`
    );

    log("loading %s", file);
    const contents: unknown = await fs.readJson(file);
    if (!Array.isArray(contents)) {
      throw new InvalidConfiguration("path", file, "expected a JSON array of rows");
    }
    return toDataframe(contents.filter(isRow));
  }

  async store(df: Dataframe, target: TargetConfig, _cursor: Cursor): Promise<void> {
    const location = target.location ?? this.adaptTargetConfig(target).location;
    if (!location) {
      throw new InvalidConfiguration("location", "", "no export location");
    }
    log("writing %d rows to %s", df.rows.length, location.path);
    await fs.outputFile(
      location.path,
      JSON.stringify(df.rows, jsonValue, 2) + "\n"
    );
  }

  adaptTargetConfig(target: TargetConfig): TargetConfig {
    const configured = target.config.options["location"];
    const file =
      typeof configured === "string"
        ? path.resolve(this.root, configured)
        : path.join(this.root, `${targetAlias(target)}.json`);
    return { ...target, location: { path: file, format: "json" } };
  }

  canBeUpstreamReferenced(): boolean {
    return true;
  }

  createSourceConfig(target: TargetConfig): SourceConfig {
    const alias = targetAlias(target);
    const location = target.location ?? this.adaptTargetConfig(target).location;
    return {
      name: alias,
      identifier: alias,
      schema: target.relation.schema,
      database: target.relation.database,
      meta: { ...target.config.meta, path: location?.path },
    };
  }
}
