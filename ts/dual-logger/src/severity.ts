/**
 * Severities understood by the logger, lowest first.
 */
export type Severity = "debug" | "info" | "warning" | "error" | "critical"

/**
 * Google Cloud Logging severity names.
 * @see https://cloud.google.com/logging/docs/reference/v2/rest/v2/LogEntry#LogSeverity
 */
export type CloudSeverity = "DEBUG" | "INFO" | "WARNING" | "ERROR" | "CRITICAL"

/** npm level names used by the local winston writer. */
export type LocalLevel = "debug" | "info" | "warn" | "error"

export const SEVERITY_ORDER: Record<Severity, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
  critical: 4,
}

const CLOUD_SEVERITY: Record<Severity, CloudSeverity> = {
  debug: "DEBUG",
  info: "INFO",
  warning: "WARNING",
  error: "ERROR",
  critical: "CRITICAL",
}

const LOCAL_LEVEL: Record<Severity, LocalLevel> = {
  debug: "debug",
  info: "info",
  warning: "warn",
  error: "error",
  critical: "error",
}

export function toCloudSeverity(severity: Severity): CloudSeverity {
  return CLOUD_SEVERITY[severity]
}

export function toLocalLevel(severity: Severity): LocalLevel {
  return LOCAL_LEVEL[severity]
}
