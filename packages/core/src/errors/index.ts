export {
  SweepError,
  StorageError,
  StorageCorruptionError,
  InvalidSessionTransitionError,
  SessionFailedError,
  TaskTimeoutError,
  ConfigError,
  errorMessage,
  errorCode,
} from "./catalog.js";
