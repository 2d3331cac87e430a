export { createLogger, flattenForLog } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  BotConfigSchema,
  BackendConfigSchema,
  RoleDetailsSchema,
  ExampleMessageSchema,
  ModelEntrySchema,
} from "./utils/config-schema.js";

export { withFileLock } from "./utils/lock.js";
