import { toDataframe } from "../dataframe";
import { FakeEngine } from "../duckdbtest/fake-engine";
import { Cursor } from "../engine";
import { UnsupportedPluginOperation } from "../errors";
import { TargetConfig } from "../relation";
import { MemoryPlugin } from "./memory";
import { BasePlugin } from "./plugin";

const target: TargetConfig = {
  relation: { schema: "main", identifier: "orders" },
  config: { alias: "o", compiledCode: "select * from orders", meta: { owner: "ops" }, options: {} },
};

async function openCursor(): Promise<Cursor> {
  const db = await new FakeEngine().connect({
    path: ":memory:",
    keepOpen: true,
    extensions: [],
    settings: {},
    attach: [],
    plugins: [],
  });
  return db.cursor();
}

it("stores under the alias and reads it back", async () => {
  const plugin = new MemoryPlugin("mem");
  const df = toDataframe([{ id: 1 }]);
  const cursor = await openCursor();

  const adapted = plugin.adaptTargetConfig(target);
  await plugin.store(df, adapted, cursor);
  const source = plugin.createSourceConfig(adapted);

  expect(adapted.location).toEqual({ path: "memory://o", format: "dataframe" });
  expect(source).toEqual({
    name: "o",
    identifier: "o",
    schema: "main",
    database: undefined,
    meta: { owner: "ops", key: "o" },
  });
  expect(await plugin.load(source)).toBe(df);
  expect(plugin.canBeUpstreamReferenced()).toBe(true);
});

it("falls back to the identifier when no key is given", async () => {
  const df = toDataframe([{ id: 1 }]);
  const plugin = new MemoryPlugin("mem", {}, new Map([["orders", df]]));

  expect(await plugin.load({ name: "orders", identifier: "orders", meta: {} })).toBe(df);
  expect(await plugin.load({ name: "x", identifier: "x", meta: {} })).toBeUndefined();
});

class ReadOnly extends BasePlugin {
  async load() {
    return toDataframe([]);
  }
}

it("gives plugins table materialization and no export by default", async () => {
  const plugin = new ReadOnly("ro");

  expect(plugin.defaultMaterialization()).toBe("table");
  expect(plugin.canBeUpstreamReferenced()).toBe(false);
  expect(plugin.adaptTargetConfig(target)).toBe(target);
  expect(() => plugin.createSourceConfig(target)).toThrow(UnsupportedPluginOperation);
  await expect(
    plugin.store(toDataframe([]), target, await openCursor())
  ).rejects.toThrow("Plugin ro does not support store");
});
