import { PluginEntry } from "../config";
import { InvalidConfiguration, PluginNotFound } from "../errors";
import { JsonFilePlugin } from "./json-file";
import { MemoryPlugin } from "./memory";
import { Plugin, PluginFactory } from "./plugin";

export const BUILTIN_PLUGINS: Readonly<Record<string, PluginFactory>> = {
  memory: (name, config) => new MemoryPlugin(name, config),
  json_file: (name, config) => new JsonFilePlugin(name, config),
};

export class PluginRegistry {
  private constructor(private plugins: ReadonlyMap<string, Plugin>) {}

  static of(plugins: Plugin[]): PluginRegistry {
    const byName = new Map<string, Plugin>();
    for (const plugin of plugins) {
      if (byName.has(plugin.name)) {
        throw new InvalidConfiguration("plugins", plugin.name, "duplicate plugin name");
      }
      byName.set(plugin.name, plugin);
    }
    return new PluginRegistry(byName);
  }

  /**
   * Instantiates every configured plugin. Caller-supplied factories take
   * precedence over the built-in ones of the same module name.
   */
  static fromEntries(
    entries: PluginEntry[],
    factories: Record<string, PluginFactory> = {}
  ): PluginRegistry {
    const available: Record<string, PluginFactory> = { ...BUILTIN_PLUGINS, ...factories };
    return PluginRegistry.of(
      entries.map((entry) => {
        const factory = available[entry.module];
        if (!factory) {
          throw new PluginNotFound(entry.module, Object.keys(available));
        }
        return factory(entry.alias ?? entry.module, entry.config ?? {});
      })
    );
  }

  get(name: string): Plugin {
    const plugin = this.plugins.get(name);
    if (!plugin) {
      throw new PluginNotFound(name, this.names());
    }
    return plugin;
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  names(): string[] {
    return [...this.plugins.keys()];
  }

  values(): Plugin[] {
    return [...this.plugins.values()];
  }
}
