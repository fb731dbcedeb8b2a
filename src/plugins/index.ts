export { BasePlugin, Plugin, PluginFactory } from "./plugin";
export { JsonFilePlugin } from "./json-file";
export { MemoryPlugin } from "./memory";
export { BUILTIN_PLUGINS, PluginRegistry } from "./registry";
