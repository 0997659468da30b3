export {
  createLogger,
  DualLogger,
  PanicError,
  sprint,
  sprintln,
  type ExitFn,
  type ExtendedLogger,
  type LoggerOptions,
  type StandardLogger,
} from "./logger"

export { formatPayload, pairs, serializePayload, InvalidFieldKeyError, type Field, type Payload } from "./payload"

export { SEVERITY_ORDER, toCloudSeverity, type CloudSeverity, type Severity } from "./severity"

export type { HttpRequest, Labels, RemoteEntry, RemoteSink } from "./sink"

export {
  buildCloudSink,
  CloudLoggingSink,
  FlushError,
  type BuildCloudSinkOptions,
  type CloudSinkConfig,
  type LogWriter,
} from "./cloud-sink"

export {
  ENV_CREDENTIALS,
  resolveCredentials,
  resolveProjectId,
  type CredentialError,
  type Credentials,
} from "./credentials"

export {
  loggingMiddleware,
  toHttpRequest,
  REQUEST_LOGGER_KEY,
  type LoggingMiddlewareConfig,
  type MiddlewareRequest,
  type MiddlewareResponse,
} from "./middleware"

export { None, Some, type Option, type Result } from "ts-results"
