export interface LogContext {
  sessionId?: string;
  turnId?: string;
  callId?: string;
  tool?: string;
}

type Level = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<Level | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevelName(value: string): value is keyof typeof LEVEL_RANK {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLevelName(raw) ? LEVEL_RANK[raw] : LEVEL_RANK.info;
}

function contextPrefix(context?: LogContext): string {
  if (!context) {
    return "";
  }

  const parts: string[] = [];
  if (context.sessionId) parts.push(`session=${context.sessionId}`);
  if (context.turnId) parts.push(`turn=${context.turnId}`);
  if (context.callId) parts.push(`call=${context.callId}`);
  if (context.tool) parts.push(`tool=${context.tool}`);

  return parts.length ? `[${parts.join(" ")}] ` : "";
}

function format(level: Level, message: string, context?: LogContext, extra?: Record<string, unknown>): string {
  const suffix = extra && Object.keys(extra).length ? ` ${JSON.stringify(extra)}` : "";
  return `${new Date().toISOString()} ${level.toUpperCase()} ${contextPrefix(context)}${message}${suffix}`;
}

function write(level: Level, message: string, context?: LogContext, extra?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < threshold()) {
    return;
  }

  const line = format(level, message, context, extra);
  switch (level) {
    case "debug":
      console.debug(line);
      return;
    case "info":
      console.log(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
  }
}

export const logger = {
  debug(message: string, context?: LogContext, extra?: Record<string, unknown>): void {
    write("debug", message, context, extra);
  },

  info(message: string, context?: LogContext, extra?: Record<string, unknown>): void {
    write("info", message, context, extra);
  },

  warn(message: string, context?: LogContext, extra?: Record<string, unknown>): void {
    write("warn", message, context, extra);
  },

  error(message: string, context?: LogContext, extra?: Record<string, unknown>): void {
    write("error", message, context, extra);
  },
};

export function errorMessage(error: unknown, fallback = "unknown error"): string {
  return error instanceof Error ? error.message : fallback;
}
