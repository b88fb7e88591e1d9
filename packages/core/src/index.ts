/**
 * @smartnumber/core
 *
 * Shared infrastructure for the smartnumber packages:
 * - Configuration loading (env vars, config files, programmatic overrides)
 * - Scoped console logging filtered by the configured level
 */

export {
  config,
  defineConfig,
  DEFAULT_CONFIG,
  type SmartNumberConfig,
  type ApproximationConfig,
  type ReductionConfig,
  type ScientificConfig,
  type LogLevel,
} from "./config.js";

export { createLogger, currentLogLevel, type Logger } from "./logger.js";
