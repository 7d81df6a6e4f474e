import pino from "pino";
import type { DestinationStream, Logger, LoggerOptions } from "pino";
import { trace } from "@opentelemetry/api";

// Credentials and tokens pass through check inputs and SDK results.
const SENSITIVE_KEYS = [
  "password",
  "token",
  "tokens",
  "secret",
  "authorization",
  "webIdentityToken",
  "secretAccessKey",
  "sessionToken",
];

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL || "info",
  redact: SENSITIVE_KEYS.flatMap((key) => [key, `*.${key}`]),
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
  mixin() {
    const span = trace.getActiveSpan();
    if (!span) return {};
    const { traceId, spanId } = span.spanContext();
    return { traceId, spanId };
  },
};

function prettyOutput(): DestinationStream | undefined {
  if (process.env.LOG_PRETTY !== "true" && process.env.NODE_ENV !== "development") return undefined;
  return pino.transport({
    target: "pino-pretty",
    options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
  });
}

/** JSON lines to `destination`, or stdout (pretty-printed in development). */
export function createBaseLogger(destination?: DestinationStream): Logger {
  return pino(options, destination ?? prettyOutput());
}

export const logger = createBaseLogger();

export type { Logger };

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export function createPipelineLogger(pipeline?: string) {
  return createChildLogger({ component: "pipeline", pipeline });
}

export function createPolicyLogger() {
  return createChildLogger({ component: "policy" });
}

export function createIdentityLogger(provider?: string) {
  return createChildLogger({ component: "identity", provider });
}

export function createClusterLogger() {
  return createChildLogger({ component: "cluster" });
}

export function createExecutorLogger() {
  return createChildLogger({ component: "executor" });
}

export function createChecksLogger(check?: string) {
  return createChildLogger({ component: "checks", check });
}
