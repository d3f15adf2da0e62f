/**
 * Logger powered by consola
 *
 * Control verbosity via LOG_LEVEL env var or setLogLevel():
 *   - debug: all logs
 *   - info: info, warn, error (default)
 *   - warn: warn, error only
 *   - error: errors only
 *   - silent: no logs
 */

import { createConsola, LogLevels } from "consola";

export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVEL_MAP: Record<LogLevelName, number> = {
  debug: LogLevels.debug,
  info: LogLevels.info,
  warn: LogLevels.warn,
  error: LogLevels.error,
  silent: LogLevels.silent
};

function isLogLevelName(value: string): value is LogLevelName {
  return value in LOG_LEVEL_MAP;
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? "info";

const base = createConsola({
  level: isLogLevelName(envLevel) ? LOG_LEVEL_MAP[envLevel] : LogLevels.info
});

export function setLogLevel(name: LogLevelName): void {
  base.level = LOG_LEVEL_MAP[name];
}

export interface TaggedLogger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const MODULE_TAGS: Record<string, string> = {
  server: "HTTP",
  router: "ROUTER",
  vetter: "VETTER",
  auditor: "AUDIT",
  orchestrator: "ORCH",
  search: "SEARCH",
  config: "CONFIG"
};

export function createLogger(module: string): TaggedLogger {
  const tag = MODULE_TAGS[module] ?? module.toUpperCase();
  return {
    debug: (...args: unknown[]) => base.debug(`[${tag}]`, ...args),
    info: (...args: unknown[]) => base.info(`[${tag}]`, ...args),
    warn: (...args: unknown[]) => base.warn(`[${tag}]`, ...args),
    error: (...args: unknown[]) => base.error(`[${tag}]`, ...args)
  };
}

export const logger = {
  server: createLogger("server"),
  router: createLogger("router"),
  vetter: createLogger("vetter"),
  auditor: createLogger("auditor"),
  orchestrator: createLogger("orchestrator"),
  search: createLogger("search"),
  config: createLogger("config")
};
