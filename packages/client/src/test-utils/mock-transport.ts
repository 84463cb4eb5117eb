import { ConnectError, SendError, TransportError } from "../shared/errors.js";
import {
  FrameCommand,
  decodeFrame,
  type FramePayload,
  type RequestFrame,
} from "../shared/frames.js";
import type { Transport, TransportCloseInfo } from "../client/transport.js";

type Waiter = {
  resolve: (value: string | null) => void;
  reject: (error: Error) => void;
};

export type ScriptedReply =
  | { status: "ok"; payload?: FramePayload }
  | { status: "error"; payload: FramePayload }
  | { status: "none" };

/**
 * In-process stand-in for a socket. Records every frame the client sends and
 * lets a test feed inbound frames, script replies per opcode, and drop the
 * connection.
 */
export class MockTransport implements Transport {
  readonly sent: string[] = [];
  connectedUrl: string | null = null;
  connectedHeaders: Record<string, string> | undefined;
  failConnectWith: string | null = null;

  private inbox: string[] = [];
  private waiters: Waiter[] = [];
  private closed = false;
  private failure: TransportError | null = null;
  private closeInfoValue: TransportCloseInfo | null = null;
  private replies = new Map<number, ScriptedReply[]>();
  private sendListeners = new Set<(frame: RequestFrame) => void>();

  get closeInfo(): TransportCloseInfo | null {
    return this.closeInfoValue;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async connect(url: string, headers?: Record<string, string>): Promise<void> {
    if (this.failConnectWith) {
      this.closed = true;
      throw new ConnectError(url, this.failConnectWith);
    }
    this.connectedUrl = url;
    this.connectedHeaders = headers;
  }

  send(data: string): void {
    if (this.closed) {
      throw new SendError("WebSocket not open (readyState=3)");
    }
    this.sent.push(data);
    const frame = toRequest(data);
    for (const listener of this.sendListeners) {
      listener(frame);
    }
    const queue = this.replies.get(frame.opcode);
    const reply = queue?.shift();
    if (reply && reply.status !== "none") {
      const payload = reply.payload ?? {};
      queueMicrotask(() => {
        this.respond(frame.seq, frame.opcode, reply.status, payload);
      });
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
    this.finish({ code, reason, initiatedLocally: true });
  }

  /** Queue replies for the next requests carrying `opcode`, in order. */
  reply(opcode: number, ...replies: ScriptedReply[]): void {
    const queue = this.replies.get(opcode) ?? [];
    queue.push(...replies);
    this.replies.set(opcode, queue);
  }

  onSend(listener: (frame: RequestFrame) => void): () => void {
    this.sendListeners.add(listener);
    return () => {
      this.sendListeners.delete(listener);
    };
  }

  sentFrames(): RequestFrame[] {
    return this.sent.map(toRequest);
  }

  sentWithOpcode(opcode: number): RequestFrame[] {
    return this.sentFrames().filter((frame) => frame.opcode === opcode);
  }

  lastSent(): RequestFrame {
    const last = this.sent[this.sent.length - 1];
    if (last === undefined) {
      throw new Error("Nothing was sent");
    }
    return toRequest(last);
  }

  pushRaw(data: string): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(data);
      return;
    }
    this.inbox.push(data);
  }

  respond(seq: number, opcode: number, status: "ok" | "error", payload: FramePayload = {}): void {
    this.pushRaw(
      JSON.stringify({
        ver: 11,
        cmd: status === "ok" ? FrameCommand.Ok : FrameCommand.Error,
        seq,
        opcode,
        payload,
      })
    );
  }

  pushEvent(opcode: number, payload: FramePayload = {}): void {
    this.pushRaw(JSON.stringify({ ver: 11, cmd: FrameCommand.Request, seq: 0, opcode, payload }));
  }

  /** Simulate the server dropping the connection. */
  drop(reason = "Connection reset"): void {
    this.finish({ code: 1006, reason, initiatedLocally: false });
  }

  failWith(error: TransportError): void {
    if (this.closed) {
      return;
    }
    this.failure = error;
    this.closed = true;
    this.closeInfoValue = { code: null, reason: error.message, initiatedLocally: false };
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  private finish(info: TransportCloseInfo): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.closeInfoValue = info;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(null);
    }
  }
}

function toRequest(data: string): RequestFrame {
  const frame = decodeFrame(data, "client");
  if (frame.kind !== "request") {
    throw new Error(`Client sent a ${frame.kind} frame`);
  }
  return frame;
}
