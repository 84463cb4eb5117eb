import WebSocket from "ws";
import type { Logger } from "../logger.js";
import { ConnectError, SendError, TransportError } from "../shared/errors.js";

export type TransportCloseInfo = {
  code: number | null;
  reason: string;
  /** True when this side asked for the close. */
  initiatedLocally: boolean;
};

/**
 * One socket lifetime. Inbound frames are pulled with `receive()` (or
 * `for await`); the sequence ends once the socket closes and cannot be
 * restarted, so every connection attempt gets a fresh transport.
 */
export interface Transport extends AsyncIterable<string> {
  connect(url: string, headers?: Record<string, string>): Promise<void>;
  send(data: string): void;
  /** Next inbound frame, or `null` once the socket has closed. */
  receive(): Promise<string | null>;
  close(code?: number, reason?: string): void;
  readonly closeInfo: TransportCloseInfo | null;
}

export type TransportFactory = () => Transport;

export type WebSocketLike = {
  readonly readyState: number;
  send: (data: string) => void;
  close: (code?: number, reason?: string) => void;
  on: (event: string, listener: (...args: unknown[]) => void) => unknown;
  off: (event: string, listener: (...args: unknown[]) => void) => unknown;
};

export type WebSocketFactory = (
  url: string,
  options: { headers?: Record<string, string> }
) => WebSocketLike;

const WS_OPEN = 1;

export const defaultWebSocketFactory: WebSocketFactory = (url, options) =>
  new WebSocket(url, { headers: options.headers });

type InboxWaiter = {
  resolve: (value: string | null) => void;
  reject: (error: Error) => void;
};

export class WebSocketTransport implements Transport {
  private ws: WebSocketLike | null = null;
  private cleanup: Array<() => void> = [];
  private inbox: string[] = [];
  private waiters: InboxWaiter[] = [];
  private failure: TransportError | null = null;
  private closed = false;
  private closeInfoValue: TransportCloseInfo | null = null;
  private closingLocally = false;
  private readonly logger: Logger;

  constructor(
    private readonly factory: WebSocketFactory,
    logger: Logger
  ) {
    this.logger = logger.child({ module: "transport" });
  }

  get closeInfo(): TransportCloseInfo | null {
    return this.closeInfoValue;
  }

  connect(url: string, headers?: Record<string, string>): Promise<void> {
    if (this.ws) {
      return Promise.reject(new ConnectError(url, "transport already used"));
    }

    return new Promise<void>((resolve, reject) => {
      let opened = false;
      let ws: WebSocketLike;
      try {
        ws = this.factory(url, { headers });
      } catch (error) {
        this.markClosed({ code: null, reason: describeTransportError(error), initiatedLocally: false });
        reject(new ConnectError(url, describeTransportError(error), { cause: error }));
        return;
      }
      this.ws = ws;

      this.cleanup = [
        bindWsHandler(ws, "open", () => {
          opened = true;
          this.logger.debug({ url }, "socket_open");
          resolve();
        }),
        bindWsHandler(ws, "message", (data: unknown) => {
          const text = decodeMessageData(data);
          if (text !== null) {
            this.push(text);
          }
        }),
        bindWsHandler(ws, "error", (error: unknown) => {
          const reason = describeTransportError(error);
          if (!opened) {
            this.markClosed({ code: null, reason, initiatedLocally: false });
            reject(new ConnectError(url, reason, { cause: error }));
            return;
          }
          this.logger.warn({ reason }, "socket_error");
          this.fail(new TransportError(reason, { cause: error }));
        }),
        bindWsHandler(ws, "close", (code: unknown, reason: unknown) => {
          const info: TransportCloseInfo = {
            code: typeof code === "number" ? code : null,
            reason: describeTransportClose({ code, reason }),
            initiatedLocally: this.closingLocally,
          };
          if (!opened) {
            reject(new ConnectError(url, info.reason));
          }
          this.markClosed(info);
        }),
      ];
    });
  }

  send(data: string): void {
    if (this.closed || !this.ws || this.ws.readyState !== WS_OPEN) {
      throw new SendError(
        `WebSocket not open (readyState=${this.ws?.readyState ?? "none"})`
      );
    }
    try {
      this.ws.send(data);
    } catch (error) {
      throw new SendError(describeTransportError(error), { cause: error });
    }
  }

  receive(): Promise<string | null> {
    const next = this.inbox.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<string> {
    while (true) {
      const frame = await this.receive();
      if (frame === null) {
        return;
      }
      yield frame;
    }
  }

  close(code = 1000, reason = "Client closed"): void {
    if (this.closed) {
      return;
    }
    this.closingLocally = true;
    const ws = this.ws;
    if (ws) {
      try {
        ws.close(code, reason);
      } catch (error) {
        this.logger.debug({ err: error }, "socket_close_failed");
      }
    }
    this.markClosed({ code, reason, initiatedLocally: true });
  }

  private push(frame: string): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
      return;
    }
    this.inbox.push(frame);
  }

  private fail(error: TransportError): void {
    if (this.closed) {
      return;
    }
    this.failure = error;
    this.closeInfoValue = { code: null, reason: error.message, initiatedLocally: false };
    this.closed = true;
    this.disposeListeners();
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
    try {
      this.ws?.close(1011, "Transport error");
    } catch (closeError) {
      this.logger.debug({ err: closeError }, "socket_close_failed");
    }
  }

  private markClosed(info: TransportCloseInfo): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.closeInfoValue = info;
    this.disposeListeners();
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(null);
    }
  }

  private disposeListeners(): void {
    for (const dispose of this.cleanup) {
      dispose();
    }
    this.cleanup = [];
    if (this.ws) {
      this.guardLateErrors(this.ws);
    }
  }

  /** ws can still emit `error` during the closing handshake; unhandled it would throw. */
  private guardLateErrors(ws: WebSocketLike): void {
    const disposeError = bindWsHandler(ws, "error", (error: unknown) => {
      this.logger.debug({ reason: describeTransportError(error) }, "socket_error_after_close");
    });
    const disposeClose = bindWsHandler(ws, "close", () => {
      disposeError();
      disposeClose();
    });
  }
}

export function createWebSocketTransportFactory(
  logger: Logger,
  factory: WebSocketFactory = defaultWebSocketFactory
): TransportFactory {
  return () => new WebSocketTransport(factory, logger);
}

export function bindWsHandler(
  ws: WebSocketLike,
  event: "open" | "close" | "error" | "message",
  handler: (...args: unknown[]) => void
): () => void {
  ws.on(event, handler);
  return () => {
    ws.off(event, handler);
  };
}

export function describeTransportClose(event?: unknown): string {
  if (!event) {
    return "Transport closed";
  }
  if (typeof event === "object") {
    const reason = "reason" in event ? decodeMessageData(event.reason) : null;
    if (reason && reason.trim().length > 0) {
      return reason.trim();
    }
    if ("code" in event && typeof event.code === "number") {
      return `Transport closed (code ${event.code})`;
    }
  }
  return "Transport closed";
}

export function describeTransportError(event?: unknown): string {
  if (!event) {
    return "Transport error";
  }
  if (event instanceof Error) {
    return event.message;
  }
  if (typeof event === "string") {
    return event;
  }
  if (typeof event === "object" && "message" in event) {
    const { message } = event;
    if (typeof message === "string" && message.trim().length > 0) {
      return message.trim();
    }
  }
  return "Transport error";
}

export function decodeMessageData(data: unknown): string | null {
  if (data === null || data === undefined) {
    return null;
  }
  if (typeof data === "string") {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  if (Array.isArray(data) && data.every((chunk) => Buffer.isBuffer(chunk))) {
    return Buffer.concat(data).toString("utf8");
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("utf8");
  }
  return null;
}
