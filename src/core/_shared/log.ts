export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
});

export interface Log {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveMinimumLevel(env: NodeJS.ProcessEnv): number {
  if (env.CHECKRUN_DEBUG === "1" || env.CHECKRUN_DEBUG === "true") {
    return LEVEL_ORDER.debug;
  }
  const raw = (env.CHECKRUN_LOG_LEVEL ?? "info").trim().toLowerCase();
  return isLogLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

function emit(level: LogLevel, tag: string, message: string): void {
  if (LEVEL_ORDER[level] < resolveMinimumLevel(process.env)) {
    return;
  }
  const line = `[${tag}] ${message}`;
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

export function createLog(tag: string): Log {
  return {
    debug: (message) => emit("debug", tag, message),
    info: (message) => emit("info", tag, message),
    warn: (message) => emit("warn", tag, message),
    error: (message) => emit("error", tag, message),
  };
}
