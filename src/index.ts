/**
 * Scientific data containers.
 *
 * ```typescript
 * import { Container, createSyncEngine } from "scidata-container";
 *
 * const dc = Container.create({
 *   "content.json": { containerType: { name: "dice-roll" } },
 *   "meta.json": { title: "Three dice" },
 *   "sim/dice.json": [2, 5, 1],
 * });
 * const result = await createSyncEngine().upload(dc);
 * ```
 */

export * from "./container/index.js";
export * from "./codecs/index.js";
export * from "./sync/index.js";

export {
  config,
  validateConfig,
  ConfigError,
  loadIdentityDefaults,
  getIdentityDefaults,
  type AppConfig,
  type IdentityDefaults,
} from "./config/index.js";

export { createLogger, silentLogger, type Logger, type LogLevel } from "./logging/index.js";
