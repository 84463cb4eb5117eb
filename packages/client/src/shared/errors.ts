export class WavelinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// Transport
// ============================================================================

export class TransportError extends WavelinkError {}

export class ConnectError extends TransportError {
  readonly url: string;

  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to connect to ${url}: ${reason}`, options);
    this.url = url;
  }
}

export class SendError extends TransportError {}

// ============================================================================
// Protocol
// ============================================================================

export class ProtocolError extends WavelinkError {}

export class FrameDecodeError extends ProtocolError {
  readonly raw: string;

  constructor(message: string, raw: string, options?: { cause?: unknown }) {
    super(message, options);
    this.raw = raw;
  }
}

// ============================================================================
// Request correlation
// ============================================================================

export class CorrelationTimeoutError extends WavelinkError {
  readonly seq: number;
  readonly opcode: number;
  readonly timeoutMs: number;

  constructor(params: { seq: number; opcode: number; timeoutMs: number }) {
    super(
      `Timeout waiting for response to opcode ${params.opcode} (seq ${params.seq}, ${params.timeoutMs}ms)`
    );
    this.seq = params.seq;
    this.opcode = params.opcode;
    this.timeoutMs = params.timeoutMs;
  }
}

export class ConnectionClosedError extends WavelinkError {
  constructor(reason = "Connection closed") {
    super(reason);
  }
}

export type ServerErrorPayload = {
  error?: string;
  message?: string;
  localizedMessage?: string;
  title?: string;
};

export class ServerError extends WavelinkError {
  readonly seq: number;
  readonly opcode: number;
  readonly code: string | null;
  readonly serverMessage: string | null;
  readonly localizedMessage: string | null;

  constructor(params: { seq: number; opcode: number; payload: ServerErrorPayload }) {
    const { payload } = params;
    super(
      payload.localizedMessage ??
        payload.message ??
        payload.error ??
        `Server rejected opcode ${params.opcode}`
    );
    this.seq = params.seq;
    this.opcode = params.opcode;
    this.code = payload.error ?? null;
    this.serverMessage = payload.message ?? null;
    this.localizedMessage = payload.localizedMessage ?? null;
  }
}

// ============================================================================
// Authentication
// ============================================================================

export class AuthError extends WavelinkError {
  readonly code: string | null;
  readonly localizedMessage: string | null;

  constructor(
    message: string,
    params: { code?: string | null; localizedMessage?: string | null; cause?: unknown } = {}
  ) {
    super(message, { cause: params.cause });
    this.code = params.code ?? null;
    this.localizedMessage = params.localizedMessage ?? null;
  }
}

export class RateLimitError extends WavelinkError {
  readonly until: number;

  constructor(until: number) {
    super(`Rate limited until ${new Date(until).toISOString()}`);
    this.until = until;
  }
}

// ============================================================================
// Session
// ============================================================================

export class SessionCorruptError extends WavelinkError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Session file ${path} is unusable: ${reason}`, options);
    this.path = path;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
