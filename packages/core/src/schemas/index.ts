export {
  SweepConfigSchema,
  LogLevel,
  DEFAULTS,
  DEFAULT_EXCLUDED_PATHS,
  type SweepConfig,
  type LoggingConfig,
  type ScanConfig,
} from "./sweep-config.js";
