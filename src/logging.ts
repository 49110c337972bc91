import createDebug from "debug";

/**
 * Debug loggers, one per subsystem.
 *
 * Output is enabled through the DEBUG environment variable:
 * ```sh
 * DEBUG=shapecodec:*        # everything
 * DEBUG=shapecodec:writer   # buffer growth only
 * ```
 */
export const NAMESPACE = "shapecodec";

export const log = {
  encoder: createDebug(`${NAMESPACE}:encoder`),
  registry: createDebug(`${NAMESPACE}:registry`),
  writer: createDebug(`${NAMESPACE}:writer`),
  fields: createDebug(`${NAMESPACE}:fields`),
};
