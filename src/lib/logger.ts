// Logger winston: colorido no dev, JSON estruturado em produção,
// silencioso nos testes. Uso: const log = createLogger({ route: "/api/query" })

import winston from "winston";
import { nanoid } from "nanoid";

export interface LogContext {
  requestId?: string;
  route?: string;
  action?: string;
  documentId?: string;
  [key: string]: unknown;
}

export type Log = {
  debug(message: string, meta?: object): void;
  info(message: string, meta?: object): void;
  warn(message: string, meta?: object): void;
  error(message: string, meta?: object): void;
};

const isProd = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

const SENSITIVE_KEYS = ["password", "token", "secret", "apikey", "api_key"];

function redactInternal(data: unknown, depth: number, seen: WeakSet<object>): unknown {
  if (data === null || typeof data !== "object") return data;
  if (depth <= 0) return "[Max Depth Reached]";
  if (seen.has(data)) return "[Circular]";
  seen.add(data);

  if (Array.isArray(data)) {
    // vetores de embedding poluem o log; só o tamanho interessa
    if (data.length > 32 && data.every((v) => typeof v === "number")) {
      return `[${data.length} numbers]`;
    }
    return data.map((item) => redactInternal(item, depth - 1, seen));
  }

  if (data instanceof Error) {
    return { name: data.name, message: data.message, stack: data.stack };
  }

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    const lower = key.toLowerCase();
    out[key] = SENSITIVE_KEYS.some((s) => lower.includes(s))
      ? "[REDACTED]"
      : redactInternal(value, depth - 1, seen);
  }
  return out;
}

export function redact(data: unknown): unknown {
  return redactInternal(data, 8, new WeakSet<object>());
}

const devFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const metaString = Object.keys(meta).length
    ? ` ${JSON.stringify(redact(meta))}`
    : "";
  return `${String(timestamp)} ${level}: ${String(message)}${metaString}`;
});

const prodFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.printf((info) =>
    JSON.stringify(
      redact({
        ...info,
        environment: process.env.NODE_ENV || "development",
      })
    )
  )
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isProd ? "info" : "debug"),
  format: isProd
    ? prodFormat
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        devFormat
      ),
  transports: [new winston.transports.Console({ silent: isTest })],
  exitOnError: !isProd,
});

export function generateRequestId(): string {
  return nanoid(10);
}

/** Logger filho que anexa `context` a todas as linhas. */
export function createLogger(context: LogContext): Log {
  const child = logger.child(context);
  return {
    debug: (message, meta) => child.debug(message, meta),
    info: (message, meta) => child.info(message, meta),
    warn: (message, meta) => child.warn(message, meta),
    error: (message, meta) => child.error(message, meta),
  };
}

/** Cronômetro: chame o retorno ao fim da operação para logar a duração. */
export function startTimer(log: Log, operation: string) {
  const startedAt = Date.now();
  return (meta?: object) => {
    const durationMs = Date.now() - startedAt;
    log.info(`Performance: ${operation}`, { operation, durationMs, ...meta });
    return durationMs;
  };
}
