import { InvalidConfiguration } from "./errors";

export type SettingValue = string | number | boolean;

export type PluginEntry = {
  /** Built-in plugin name (`memory`, `json_file`) or a key of the caller's factories. */
  module: string;
  /** Name the plugin is registered under; defaults to `module`. */
  alias?: string;
  config?: Record<string, unknown>;
};

export type Attachment = {
  path: string;
  alias?: string;
  readOnly?: boolean;
};

export type Credentials = {
  path: string;
  keepOpen: boolean;
  extensions: string[];
  settings: Record<string, SettingValue>;
  attach: Attachment[];
  plugins: PluginEntry[];
};

export const MEMORY_PATH = ":memory:";

export function isMotherDuck(path: string): boolean {
  return path.startsWith("md:") || path.startsWith("motherduck:");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(key: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new InvalidConfiguration(
      key,
      raw,
      e instanceof Error ? e.message : String(e)
    );
  }
}

function parseBoolean(key: string, raw: string | undefined): boolean {
  if (raw === undefined || raw === "") {
    return false;
  }
  switch (raw.toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      throw new InvalidConfiguration(key, raw, "expected true, false, 1 or 0");
  }
}

function parseSettings(
  raw: string | undefined
): Record<string, SettingValue> {
  if (!raw) {
    return {};
  }
  const parsed = parseJson("DUCKENV_SETTINGS", raw);
  if (!isRecord(parsed)) {
    throw new InvalidConfiguration("DUCKENV_SETTINGS", raw, "expected a JSON object");
  }
  const settings: Record<string, SettingValue> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (
      typeof value !== "string" &&
      typeof value !== "number" &&
      typeof value !== "boolean"
    ) {
      throw new InvalidConfiguration(
        "DUCKENV_SETTINGS",
        raw,
        `setting ${name} must be a string, number or boolean`
      );
    }
    settings[name] = value;
  }
  return settings;
}

function parsePlugins(raw: string | undefined): PluginEntry[] {
  if (!raw) {
    return [];
  }
  const parsed = parseJson("DUCKENV_PLUGINS", raw);
  if (!Array.isArray(parsed)) {
    throw new InvalidConfiguration("DUCKENV_PLUGINS", raw, "expected a JSON array");
  }
  return parsed.map((entry: unknown): PluginEntry => {
    if (!isRecord(entry) || typeof entry.module !== "string") {
      throw new InvalidConfiguration(
        "DUCKENV_PLUGINS",
        raw,
        "every plugin needs a module name"
      );
    }
    const plugin: PluginEntry = { module: entry.module };
    if (typeof entry.alias === "string") {
      plugin.alias = entry.alias;
    }
    if (isRecord(entry.config)) {
      plugin.config = entry.config;
    }
    return plugin;
  });
}

/**
 * Reads credentials from environment variables:
 * DUCKENV_PATH, DUCKENV_KEEP_OPEN, DUCKENV_EXTENSIONS (comma separated),
 * DUCKENV_SETTINGS (JSON object) and DUCKENV_PLUGINS (JSON array).
 */
export function loadCredentials(
  env: NodeJS.ProcessEnv = process.env
): Credentials {
  const extensions = (env["DUCKENV_EXTENSIONS"] ?? "")
    .split(",")
    .map((e) => e.trim())
    .filter((e) => e.length > 0);

  return {
    path: env["DUCKENV_PATH"] || MEMORY_PATH,
    keepOpen: parseBoolean("DUCKENV_KEEP_OPEN", env["DUCKENV_KEEP_OPEN"]),
    extensions,
    settings: parseSettings(env["DUCKENV_SETTINGS"]),
    attach: [],
    plugins: parsePlugins(env["DUCKENV_PLUGINS"]),
  };
}
