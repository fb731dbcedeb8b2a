import { InvalidConfiguration, PluginNotFound } from "../errors";
import { JsonFilePlugin } from "./json-file";
import { MemoryPlugin } from "./memory";
import { PluginRegistry } from "./registry";

it("builds built-in plugins under their alias", () => {
  const registry = PluginRegistry.fromEntries([
    { module: "memory", alias: "mem" },
    { module: "json_file", config: { root: "exports" } },
  ]);

  expect(registry.names()).toEqual(["mem", "json_file"]);
  expect(registry.get("mem")).toBeInstanceOf(MemoryPlugin);
  expect(registry.get("json_file")).toBeInstanceOf(JsonFilePlugin);
  expect(registry.has("memory")).toBe(false);
});

it("prefers caller factories over built-ins", () => {
  const custom = new MemoryPlugin("memory", { materialization: "view" });
  const registry = PluginRegistry.fromEntries([{ module: "memory" }], {
    memory: () => custom,
  });

  expect(registry.get("memory")).toBe(custom);
  expect(registry.get("memory").defaultMaterialization()).toBe("view");
});

it("fails on an unknown module", () => {
  expect(() => PluginRegistry.fromEntries([{ module: "parquet" }])).toThrow(
    "Plugin parquet not found; known plugins are: memory,json_file"
  );
});

it("fails on duplicate plugin names", () => {
  expect(() =>
    PluginRegistry.fromEntries([{ module: "memory" }, { module: "memory" }])
  ).toThrow(InvalidConfiguration);
});

it("lists known names for an unknown lookup", () => {
  const registry = PluginRegistry.of([new MemoryPlugin("mem")]);

  expect(() => registry.get("gsheet")).toThrow(PluginNotFound);
  expect(() => registry.get("gsheet")).toThrow(
    "Plugin gsheet not found; known plugins are: mem"
  );
});
