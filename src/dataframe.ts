import { types } from "util";

export type Row = Record<string, unknown>;

/** A cell as it is bound to a statement parameter. */
export type BoundValue = string | number | boolean | null;

export interface Column {
  name: string;
  /** DuckDB SQL type name, e.g. `VARCHAR` or `DOUBLE`. */
  type: string;
}

export interface Dataframe {
  columns: Column[];
  rows: Row[];
}

function isBytes(value: unknown): value is Uint8Array {
  return types.isUint8Array(value);
}

function inferType(value: unknown): string {
  switch (typeof value) {
    case "boolean":
      return "BOOLEAN";
    case "number":
      return "DOUBLE";
    case "bigint":
      return "BIGINT";
    case "object":
      if (types.isDate(value)) {
        return "TIMESTAMP";
      }
      return isBytes(value) ? "BLOB" : "VARCHAR";
    default:
      return "VARCHAR";
  }
}

function blobLiteral(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => `\\x${b.toString(16).padStart(2, "0")}`).join("");
}

function dateLiteral(value: Date, type: string): string {
  const iso = value.toISOString();
  switch (type.toUpperCase()) {
    case "DATE":
      return iso.slice(0, 10);
    case "TIMESTAMP WITH TIME ZONE":
    case "TIMESTAMPTZ":
      return `${iso.slice(0, 10)} ${iso.slice(11, 23)}+00`;
    default:
      return `${iso.slice(0, 10)} ${iso.slice(11, 23)}`;
  }
}

/**
 * Value bound for a dataframe cell of the given column type. Integers wider
 * than a double, dates and bytes are bound as text the engine casts back to
 * the column type; nested values become JSON text and missing values null.
 */
export function cellValue(value: unknown, type = "VARCHAR"): BoundValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (types.isDate(value)) {
    return dateLiteral(value, type);
  }
  if (isBytes(value)) {
    return blobLiteral(value);
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return String(value);
}

/**
 * Builds a dataframe from plain rows. Column order follows the first row
 * that mentions each column; a column's type comes from its first
 * non-null value.
 */
export function toDataframe(rows: Row[], columns?: Column[]): Dataframe {
  if (columns) {
    return { columns, rows };
  }

  const names: string[] = [];
  const types = new Map<string, string>();
  const typed = new Set<string>();

  for (const row of rows) {
    for (const [name, value] of Object.entries(row)) {
      if (!types.has(name)) {
        names.push(name);
        types.set(name, "VARCHAR");
      }
      if (value !== null && value !== undefined && !typed.has(name)) {
        types.set(name, inferType(value));
        typed.add(name);
      }
    }
  }

  return {
    columns: names.map((name) => ({ name, type: types.get(name) ?? "VARCHAR" })),
    rows,
  };
}
