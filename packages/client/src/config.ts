import { z } from "zod";
import { OpcodeOverridesSchema, resolveOpcodes, type OpcodeTable } from "./shared/opcodes.js";
import { resolveLogConfig, type ResolvedLogConfig } from "./logger.js";

export const DEFAULT_URL = "wss://ws-api.oneme.ru/websocket";
export const DEFAULT_ORIGIN = "https://web.max.ru";
export const DEFAULT_SESSION_PATH = "session.wavelink.json";

const PositiveInt = z.coerce.number().int().positive();
const NonNegativeInt = z.coerce.number().int().nonnegative();

const ReconnectConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    baseDelayMs: PositiveInt.default(2000),
    maxDelayMs: PositiveInt.default(30000),
    jitterRatio: z.number().min(0).max(1).default(0.2),
  })
  .strict()
  .refine((value) => value.maxDelayMs >= value.baseDelayMs, {
    message: "maxDelayMs must be >= baseDelayMs",
    path: ["maxDelayMs"],
  });

export const ClientConfigSchema = z
  .object({
    url: z.string().url().default(DEFAULT_URL),
    origin: z.string().min(1).default(DEFAULT_ORIGIN),
    sessionPath: z.string().min(1).default(DEFAULT_SESSION_PATH),
    requestTimeoutMs: PositiveInt.default(15000),
    reconnect: ReconnectConfigSchema.default({}),
    rateLimitCooldownMs: PositiveInt.default(60000),
    maxConsecutiveDecodeErrors: PositiveInt.default(5),
    dispatchQueueLimit: PositiveInt.default(1000),
    chatsCount: NonNegativeInt.default(40),
    contactsSyncLimit: NonNegativeInt.default(50),
    maxCodeAttempts: PositiveInt.default(3),
    language: z.string().min(1).default("ru"),
    tokenRejectionCodes: z.array(z.string().min(1)).default(["login.token", "FAIL_LOGIN_TOKEN"]),
    rateLimitCodes: z.array(z.string().min(1)).default(["error.limit.violate"]),
    opcodes: OpcodeOverridesSchema.optional(),
    log: z
      .object({
        level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
        format: z.enum(["pretty", "json"]).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

export type ClientConfig = Omit<z.output<typeof ClientConfigSchema>, "opcodes" | "log"> & {
  opcodes: OpcodeTable;
  log: ResolvedLogConfig;
};

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  if (env.WAVELINK_URL) {
    values.url = env.WAVELINK_URL;
  }
  if (env.WAVELINK_ORIGIN) {
    values.origin = env.WAVELINK_ORIGIN;
  }
  if (env.WAVELINK_SESSION) {
    values.sessionPath = env.WAVELINK_SESSION;
  }
  if (env.WAVELINK_REQUEST_TIMEOUT_MS) {
    values.requestTimeoutMs = env.WAVELINK_REQUEST_TIMEOUT_MS;
  }
  return values;
}

/**
 * Merge defaults, `WAVELINK_*` environment variables and explicit options
 * (highest precedence) into a validated client config.
 */
export function resolveClientConfig(
  options: ClientConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const result = ClientConfigSchema.safeParse({ ...fromEnv(env), ...options });
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`[Config] Invalid client config:\n${issues}`);
  }

  const { opcodes, log, ...rest } = result.data;
  return {
    ...rest,
    opcodes: resolveOpcodes(opcodes),
    log: resolveLogConfig(log, env),
  };
}
