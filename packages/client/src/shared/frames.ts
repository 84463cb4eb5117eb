import { z } from "zod";
import { FrameDecodeError } from "./errors.js";

/**
 * Envelope `cmd` values. `cmd` is the field that tells a response apart from
 * a request or a push: the server answers with 1 (ok) or 3 (error) and the
 * `seq` of the request; every other frame is sent with 0.
 */
export const FrameCommand = {
  Request: 0,
  Ok: 1,
  Error: 3,
} as const;

export type FramePayload = Record<string, unknown>;

export type RequestFrame = {
  kind: "request";
  seq: number;
  opcode: number;
  payload: FramePayload;
};

export type ResponseFrame = {
  kind: "response";
  seq: number;
  opcode: number;
  status: "ok" | "error";
  payload: FramePayload;
};

export type PushFrame = {
  kind: "push";
  opcode: number;
  payload: FramePayload;
};

export type Frame = RequestFrame | ResponseFrame | PushFrame;
export type InboundFrame = ResponseFrame | PushFrame;

export type FrameOrigin = "client" | "server";

const WireEnvelopeSchema = z
  .object({
    ver: z.number().int().optional(),
    cmd: z.number().int().default(FrameCommand.Request),
    seq: z.number().int().nonnegative().optional(),
    opcode: z.number().int().nonnegative(),
    payload: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

export type WireEnvelope = {
  ver: number;
  cmd: number;
  seq: number;
  opcode: number;
  payload: FramePayload;
};

export function encodeRequest(frame: RequestFrame, version: number): string {
  const envelope: WireEnvelope = {
    ver: version,
    cmd: FrameCommand.Request,
    seq: frame.seq,
    opcode: frame.opcode,
    payload: frame.payload,
  };
  return JSON.stringify(envelope);
}

/**
 * Decode one wire frame.
 *
 * Frames written by the client with `cmd = 0` are requests; frames written by
 * the server with `cmd = 0` are pushes. Opcodes are not checked here: an
 * opcode this client does not know still decodes to a push.
 */
export function decodeFrame(data: string, origin: FrameOrigin): Frame {
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(data);
  } catch (error) {
    throw new FrameDecodeError("Frame is not valid JSON", data, { cause: error });
  }

  const parsed = WireEnvelopeSchema.safeParse(parsedJson);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "frame"}: ${issue.message}`)
      .join("; ");
    throw new FrameDecodeError(`Invalid frame envelope (${issues})`, data);
  }

  const envelope = parsed.data;
  const payload: FramePayload = envelope.payload ?? {};

  switch (envelope.cmd) {
    case FrameCommand.Ok:
    case FrameCommand.Error: {
      if (envelope.seq === undefined) {
        throw new FrameDecodeError("Response frame is missing seq", data);
      }
      return {
        kind: "response",
        seq: envelope.seq,
        opcode: envelope.opcode,
        status: envelope.cmd === FrameCommand.Ok ? "ok" : "error",
        payload,
      };
    }
    case FrameCommand.Request: {
      if (origin === "server") {
        return { kind: "push", opcode: envelope.opcode, payload };
      }
      if (envelope.seq === undefined) {
        throw new FrameDecodeError("Request frame is missing seq", data);
      }
      return { kind: "request", seq: envelope.seq, opcode: envelope.opcode, payload };
    }
    default:
      throw new FrameDecodeError(`Unknown frame cmd ${envelope.cmd}`, data);
  }
}

export function decodeInbound(data: string): InboundFrame {
  const frame = decodeFrame(data, "server");
  if (frame.kind === "request") {
    throw new FrameDecodeError("Server sent a request frame", data);
  }
  return frame;
}
