import pino from "pino";
import type { Logger } from "../logger.js";

export function createTestLogger(): Logger {
  return pino({ level: "silent" });
}

export type CapturedLogLine = {
  level: number;
  msg: string;
  module?: string;
  [key: string]: unknown;
};

/** A logger whose JSON lines are kept in memory for assertions. */
export function createCapturingLogger(level: pino.LevelWithSilent = "debug"): {
  logger: Logger;
  lines: CapturedLogLine[];
  messages: () => string[];
} {
  const lines: CapturedLogLine[] = [];
  const logger = pino(
    { level },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    }
  );
  return { logger, lines, messages: () => lines.map((line) => line.msg) };
}
