import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { Logger } from "../logger.js";
import { SessionCorruptError, toError } from "../shared/errors.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/142.0.0.0 Safari/537.36";

export const DEFAULT_PROTOCOL_VERSION = 11;

export const SessionSchema = z.object({
  deviceId: z.string().min(1),
  userAgent: z.string(),
  appVersion: z.string(),
  deviceType: z.string(),
  locale: z.string(),
  deviceLocale: z.string(),
  osVersion: z.string(),
  deviceName: z.string(),
  screen: z.string(),
  timezone: z.string(),
  protocolVersion: z.number().int().positive(),
  token: z.string().min(1).nullable().default(null),
  phone: z.string().min(1).nullable().default(null),
});

export type Session = z.infer<typeof SessionSchema>;

/** Device metadata a caller may pin; identity and credentials are not overridable here. */
export type SessionOverrides = Partial<Omit<Session, "token" | "phone">>;

export function createSession(overrides: SessionOverrides = {}): Session {
  return {
    deviceId: randomUUID(),
    userAgent: DEFAULT_USER_AGENT,
    appVersion: "25.12.3",
    deviceType: "ANDROID",
    locale: "ru",
    deviceLocale: "ru",
    osVersion: "Windows",
    deviceName: "Chrome",
    screen: "1080x1920 1.0x",
    timezone: "Europe/Moscow",
    protocolVersion: DEFAULT_PROTOCOL_VERSION,
    ...overrides,
    token: null,
    phone: null,
  };
}

/**
 * JSON file persistence for the durable part of a client session.
 *
 * A missing or unusable file reads as "no session"; writes go through a temp
 * file and a rename so the previous file survives a crash mid-write.
 */
export class SessionStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(filePath: string, logger: Logger) {
    this.filePath = path.resolve(filePath);
    this.logger = logger.child({ module: "session-store" });
  }

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<Session | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      this.reportCorrupt(new SessionCorruptError(this.filePath, "unreadable", { cause: error }));
      return null;
    }

    try {
      return parseSession(this.filePath, raw);
    } catch (error) {
      this.reportCorrupt(toError(error));
      return null;
    }
  }

  async save(session: Session): Promise<void> {
    const payload = JSON.stringify(SessionSchema.parse(session), null, 2) + "\n";
    const next = this.pendingWrite.then(() => writeFileAtomically(this.filePath, payload));
    // A failed write must not poison the ones queued after it.
    this.pendingWrite = next.catch(() => undefined);
    await next;
    this.logger.debug({ path: this.filePath }, "session_saved");
  }

  /**
   * Load the stored session, or create and persist a fresh one. Overrides
   * update device metadata but never the stored device id.
   */
  async loadOrCreate(overrides: SessionOverrides = {}): Promise<Session> {
    const stored = await this.load();
    if (!stored) {
      const fresh = createSession(overrides);
      await this.save(fresh);
      this.logger.info({ deviceId: fresh.deviceId.slice(0, 8) }, "session_created");
      return fresh;
    }
    const { deviceId: _ignored, ...metadata } = overrides;
    const merged: Session = { ...stored, ...metadata };
    if (Object.keys(metadata).length > 0) {
      await this.save(merged);
    }
    return merged;
  }

  private reportCorrupt(error: Error): void {
    this.logger.warn({ path: this.filePath, err: error }, "session_corrupt");
  }
}

export function parseSession(filePath: string, raw: string): Session {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SessionCorruptError(filePath, "invalid JSON", { cause: error });
  }
  const result = SessionSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new SessionCorruptError(filePath, issues);
  }
  return result.data;
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

async function writeFileAtomically(targetPath: string, payload: string): Promise<void> {
  const directory = path.dirname(targetPath);
  await fs.mkdir(directory, { recursive: true });
  const tempPath = path.join(
    directory,
    `.${path.basename(targetPath)}.tmp-${process.pid}-${Date.now()}-${randomUUID()}`
  );
  try {
    await fs.writeFile(tempPath, payload, "utf8");
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
