import debug from "debug";

const BASE_NAMESPACE = "duckenv";

/**
 * Creates a namespaced debug logger, e.g. `createLogger("environment")`
 * logs under `duckenv:environment`. Enable with `DEBUG=duckenv:*`.
 */
export function createLogger(subNamespace: string): debug.Debugger {
  return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}
