/**
 * scaffoldr: render project skeletons from template directories.
 *
 * ```typescript
 * import { ProjectTemplate } from "scaffoldr";
 *
 * const template = ProjectTemplate.load("./templates/service");
 * const summary = await template.execute("./my-service", { useDefaults: true });
 * ```
 */

export * from "./context/index.js";
export * from "./bindings/index.js";
export * from "./template/index.js";
export * from "./project/index.js";
export {
  loadConfig,
  validateConfig,
  effectiveLogLevel,
  ConfigError,
  type AppConfig,
} from "./config/index.js";
export {
  createLogger,
  silentLogger,
  initRunId,
  getRunId,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";
