/**
 * @ranktok/core -- shared types, errors, configuration and the registry.
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./interfaces.js";
export { Registry } from "./registry.js";
export { fnv1a, bucketOf } from "./hash.js";
export {
  defaultConfig,
  configFromEnv,
  validateConfig,
  resolveConfig,
  loadConfig,
  type RanktokConfig,
  type BatchExecutorKind,
} from "./config.js";
