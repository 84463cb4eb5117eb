import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export type LogFormat = "pretty" | "json";

export type Logger = pino.Logger;

export interface LogConfigInput {
  level?: LogLevel;
  format?: LogFormat;
}

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function parseLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

function parseFormat(value: string | undefined): LogFormat | undefined {
  return value === "pretty" || value === "json" ? value : undefined;
}

export function resolveLogConfig(
  input: LogConfigInput | undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedLogConfig {
  const envLevel = parseLevel(env.WAVELINK_LOG);
  const envFormat = parseFormat(env.WAVELINK_LOG_FORMAT);

  const level: LogLevel = input?.level ?? envLevel ?? "info";
  const format: LogFormat = input?.format ?? envFormat ?? "pretty";

  return { level, format };
}

export function createRootLogger(config: ResolvedLogConfig): Logger {
  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
          },
        }
      : undefined;

  return pino({
    name: "wavelink",
    level: config.level,
    transport,
  });
}

export function createChildLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}
