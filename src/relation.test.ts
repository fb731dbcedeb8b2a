import { InvalidSaveMode } from "./errors";
import { bindingName, saveMode, tableName, targetAlias } from "./relation";

it("qualifies table names with the schema and database", () => {
  expect(tableName({ name: "s", identifier: "people", meta: {} })).toBe("people");
  expect(tableName({ name: "s", identifier: "people", schema: "raw", meta: {} })).toBe(
    "raw.people"
  );
  expect(
    tableName({ name: "s", identifier: "people", schema: "raw", database: "lake", meta: {} })
  ).toBe("lake.raw.people");
  expect(
    tableName({ name: "s", identifier: "people", schema: "raw", database: "memory", meta: {} })
  ).toBe("raw.people");
});

it("derives binding names from qualified names", () => {
  expect(bindingName("lake.raw.people")).toBe("lake_raw_people_df");
  expect(bindingName("people")).toBe("people_df");
});

it("defaults the save mode to overwrite", () => {
  expect(saveMode({ name: "s", identifier: "t", meta: {} })).toBe("overwrite");
  expect(saveMode({ name: "s", identifier: "t", meta: { save_mode: "ignore" } })).toBe("ignore");
  expect(() =>
    saveMode({ name: "s", identifier: "t", meta: { save_mode: "append" } })
  ).toThrow(InvalidSaveMode);
});

it("prefers the configured alias over the identifier", () => {
  const relation = { identifier: "orders" };
  expect(
    targetAlias({ relation, config: { compiledCode: "", meta: {}, options: {} } })
  ).toBe("orders");
  expect(
    targetAlias({ relation, config: { alias: "o", compiledCode: "", meta: {}, options: {} } })
  ).toBe("o");
});
