/**
 * @subfilter/core
 * Settings snapshot, logging and errors shared by the subfilter packages
 */

// Config
export {
  loadSettings,
  getSettings,
  setSettings,
  resetSettings,
  type Settings,
  type SettingsEnv,
} from "./config.js";

// Logger
export {
  logger,
  formatEntry,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  SubfilterError,
  ConfigError,
  ValidationError,
  EngineInitError,
  ScriptExceptionError,
  ScriptEvalError,
  MissingFilterFunctionError,
  MissingSortFunctionError,
  ScriptCallError,
  isSubfilterError,
  wrapError,
  type ScriptStageError,
} from "./errors.js";
