import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger };

export type LoggerOptions = {
  level: string;
  // Defaults to stderr; stdout is reserved for the report.
  destination?: DestinationStream;
};

export function createLogger(opts: LoggerOptions): Logger {
  return pino(
    {
      name: "pg-upgrade-precheck",
      level: opts.level,
      base: undefined,
      redact: { paths: ["password", "*.password", "connection.password"], censor: "[redacted]" },
    },
    opts.destination ?? pino.destination(2),
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
