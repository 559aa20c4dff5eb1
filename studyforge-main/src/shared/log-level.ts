export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let configuredLevel: LogLevel | null = null;

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error" || value === "silent";
}

/** Overrides the level taken from STUDYFORGE_LOG_LEVEL. Pass null to fall back to the env again. */
export function setLogLevel(level: LogLevel | null): void {
  configuredLevel = level;
}

export function getLogLevel(): LogLevel {
  if (configuredLevel) return configuredLevel;
  const raw = process.env["STUDYFORGE_LOG_LEVEL"]?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

export function isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];
}
