import type { Chat, Message, User } from "../shared/entities.js";
import type { PushFrame } from "../shared/frames.js";

export type ConnectionState =
  | { status: "idle" }
  | { status: "connecting"; attempt: number }
  | { status: "connected" }
  | { status: "reconnecting"; attempt: number; delayMs: number; reason: string }
  | { status: "stopped" };

export type AuthCodeErrorPayload = {
  error: string | null;
  message: string | null;
  localizedMessage: string | null;
};

export type AuthLimitExceededPayload = AuthCodeErrorPayload & {
  until: number;
};

export type ReadyPayload = {
  user: User | null;
  chats: readonly Chat[];
};

export type WavelinkEvents = {
  ready: ReadyPayload;
  new_message: Message;
  message_sent: Message;
  contacts_update: readonly User[];
  chats_update: readonly Chat[];
  auth_required: { reason: string };
  auth_limit_exceeded: AuthLimitExceededPayload;
  auth_code_error: AuthCodeErrorPayload;
  connection_state: ConnectionState;
  /** Every push the client has no dedicated handling for, unknown opcodes included. */
  push: PushFrame;
};

export type WavelinkEventName = keyof WavelinkEvents;
