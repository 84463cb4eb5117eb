import type { Logger } from "../logger.js";
import {
  ConnectionClosedError,
  CorrelationTimeoutError,
  SendError,
  ServerError,
  TransportError,
  WavelinkError,
  type ServerErrorPayload,
} from "../shared/errors.js";
import { encodeRequest, type FramePayload, type ResponseFrame } from "../shared/frames.js";
import type { Transport } from "./transport.js";

export type CallOptions = {
  timeoutMs?: number;
};

type PendingRequest = {
  seq: number;
  opcode: number;
  issuedAt: number;
  resolve: (payload: FramePayload) => void;
  reject: (error: Error) => void;
  timeoutHandle: ReturnType<typeof setTimeout> | null;
};

export type CorrelatorOptions = {
  logger: Logger;
  defaultTimeoutMs: number;
  /** Read on every send so a session update changes the envelope `ver`. */
  protocolVersion: () => number;
  maxSeq?: number;
};

export const DEFAULT_MAX_SEQ = 2 ** 31 - 1;

/**
 * Matches responses to the calls that caused them.
 *
 * Each call gets its own `seq` and a parked completion slot. A slot settles
 * exactly once: by its response, its timeout, or the connection going away.
 */
export class Correlator {
  private pending = new Map<number, PendingRequest>();
  private transport: Transport | null = null;
  private nextSeq = 1;
  private readonly maxSeq: number;
  private readonly logger: Logger;
  private serverErrorListeners = new Set<(error: ServerError) => void>();

  constructor(private readonly options: CorrelatorOptions) {
    this.logger = options.logger.child({ module: "correlator" });
    this.maxSeq = options.maxSeq ?? DEFAULT_MAX_SEQ;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get isAttached(): boolean {
    return this.transport !== null;
  }

  attach(transport: Transport): void {
    this.transport = transport;
  }

  /** Unbind from the current transport and fail everything still waiting on it. */
  detach(error: Error = new ConnectionClosedError()): void {
    this.transport = null;
    this.rejectAll(error);
  }

  onServerError(listener: (error: ServerError) => void): () => void {
    this.serverErrorListeners.add(listener);
    return () => {
      this.serverErrorListeners.delete(listener);
    };
  }

  call(opcode: number, payload: FramePayload, options: CallOptions = {}): Promise<FramePayload> {
    const transport = this.transport;
    if (!transport) {
      return Promise.reject(new ConnectionClosedError("Not connected"));
    }

    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    const seq = this.allocateSeq();
    if (seq === null) {
      return Promise.reject(new WavelinkError("No free sequence numbers"));
    }

    return new Promise<FramePayload>((resolve, reject) => {
      const entry: PendingRequest = {
        seq,
        opcode,
        issuedAt: Date.now(),
        resolve,
        reject,
        timeoutHandle: null,
      };

      if (timeoutMs > 0) {
        // Built here so the stack points at the caller, not the timer.
        const timeoutError = new CorrelationTimeoutError({ seq, opcode, timeoutMs });
        entry.timeoutHandle = setTimeout(() => {
          if (this.pending.get(seq) !== entry) {
            return;
          }
          this.pending.delete(seq);
          this.logger.warn({ seq, opcode, timeoutMs }, "request_timeout");
          reject(timeoutError);
        }, timeoutMs);
      }

      this.pending.set(seq, entry);

      try {
        transport.send(
          encodeRequest({ kind: "request", seq, opcode, payload }, this.options.protocolVersion())
        );
        this.logger.debug({ seq, opcode }, "request_sent");
      } catch (error) {
        this.settle(entry);
        reject(
          error instanceof TransportError
            ? error
            : new SendError(error instanceof Error ? error.message : String(error), { cause: error })
        );
      }
    });
  }

  /**
   * Deliver a response to its waiting call. Returns false when nothing was
   * waiting for that `seq` (late, duplicate or unknown); such frames are dropped.
   */
  handleResponse(frame: ResponseFrame): boolean {
    const entry = this.pending.get(frame.seq);
    if (!entry) {
      this.logger.warn({ seq: frame.seq, opcode: frame.opcode }, "unmatched_response_dropped");
      return false;
    }
    this.settle(entry);

    const latencyMs = Date.now() - entry.issuedAt;
    if (frame.status === "ok") {
      this.logger.debug({ seq: frame.seq, opcode: frame.opcode, latencyMs }, "response_received");
      entry.resolve(frame.payload);
      return true;
    }

    const error = new ServerError({
      seq: frame.seq,
      opcode: entry.opcode,
      payload: toServerErrorPayload(frame.payload),
    });
    this.logger.debug(
      { seq: frame.seq, opcode: frame.opcode, code: error.code, latencyMs },
      "error_response_received"
    );
    for (const listener of this.serverErrorListeners) {
      try {
        listener(error);
      } catch (listenerError) {
        this.logger.error({ err: listenerError }, "server_error_listener_failed");
      }
    }
    entry.reject(error);
    return true;
  }

  rejectAll(error: Error): void {
    const entries = Array.from(this.pending.values());
    this.pending.clear();
    for (const entry of entries) {
      if (entry.timeoutHandle) {
        clearTimeout(entry.timeoutHandle);
      }
      entry.reject(error);
    }
    if (entries.length > 0) {
      this.logger.debug({ count: entries.length, reason: error.message }, "pending_requests_rejected");
    }
  }

  private settle(entry: PendingRequest): void {
    if (entry.timeoutHandle) {
      clearTimeout(entry.timeoutHandle);
    }
    if (this.pending.get(entry.seq) === entry) {
      this.pending.delete(entry.seq);
    }
  }

  private allocateSeq(): number | null {
    for (let attempts = 0; attempts <= this.pending.size; attempts++) {
      const seq = this.nextSeq;
      this.nextSeq = seq >= this.maxSeq ? 1 : seq + 1;
      if (!this.pending.has(seq)) {
        return seq;
      }
    }
    return null;
  }
}

function toServerErrorPayload(payload: FramePayload): ServerErrorPayload {
  const pick = (key: string): string | undefined => {
    const value = payload[key];
    return typeof value === "string" ? value : undefined;
  };
  return {
    error: pick("error"),
    message: pick("message"),
    localizedMessage: pick("localizedMessage"),
    title: pick("title"),
  };
}
