import { ConnectorError } from "@hasura/ndc-sdk-typescript";

type ErrorDetails = Record<string, unknown>;

/**
 * Base for every error raised by the environment. Each carries a status
 * code and a details object for the layer that reports it.
 */
export class DuckEnvError extends ConnectorError {
  constructor(statusCode: number, message: string, details: ErrorDetails) {
    super(statusCode, message, details);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PluginNotFound extends DuckEnvError {
  constructor(plugin: string, known: string[]) {
    super(
      404,
      `Plugin ${plugin} not found; known plugins are: ${known.join(",")}`,
      { plugin, known }
    );
  }
}

export class RelationAlreadyExists extends DuckEnvError {
  constructor(relation: string) {
    super(409, `Source ${relation} already exists!`, { relation });
  }
}

export class PluginLoadError extends DuckEnvError {
  constructor(plugin: string, source: string) {
    super(500, `Plugin ${plugin} returned no data for source ${source}`, {
      plugin,
      source,
    });
  }
}

/**
 * Normalized form of any failure raised by the engine while executing a
 * statement. The engine's message is kept verbatim.
 */
export class RuntimeExecutionError extends DuckEnvError {
  constructor(message: string, sql: string, cause?: unknown) {
    super(500, message, { sql });
    this.cause = cause;
  }
}

export class InvalidSaveMode extends DuckEnvError {
  constructor(saveMode: unknown) {
    super(
      400,
      `Unsupported save_mode ${String(saveMode)}; expected one of overwrite, ignore, error_if_exists`,
      { saveMode: String(saveMode) }
    );
  }
}

export class InvalidConfiguration extends DuckEnvError {
  constructor(key: string, value: string, reason: string) {
    super(400, `Invalid value for ${key}: ${reason}`, { key, value });
  }
}

export class ModelJobError extends DuckEnvError {
  constructor(alias: string, reason: string) {
    super(500, `Model ${alias} failed: ${reason}`, { alias });
  }
}

export class UnsupportedPluginOperation extends DuckEnvError {
  constructor(plugin: string, operation: string) {
    super(501, `Plugin ${plugin} does not support ${operation}`, {
      plugin,
      operation,
    });
  }
}
