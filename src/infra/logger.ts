import pino, { type Logger } from "pino";

export type { Logger };

// stdout carries the MCP stdio transport, so logs always go to stderr.
export function createLogger(opts?: { name?: string; level?: string }): Logger {
  return pino(
    {
      name: opts?.name ?? "doc-query-retrieval",
      level: opts?.level ?? process.env.LOG_LEVEL ?? "info",
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    pino.destination(2),
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
