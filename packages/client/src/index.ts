export { WavelinkClient, DEFAULT_REACTION } from "./client/wavelink-client.js";
export type { WavelinkClientOptions, SendOptions } from "./client/wavelink-client.js";

export { ConnectionSupervisor } from "./client/connection-supervisor.js";
export type { ConnectionSupervisorOptions } from "./client/connection-supervisor.js";

export { AuthStateMachine } from "./client/auth-state-machine.js";
export type {
  AuthCaller,
  AuthEventSink,
  AuthSettings,
  AuthState,
  AuthStateListener,
  AuthStatus,
  AuthenticateParams,
  CodeProvider,
  CodeRequestContext,
} from "./client/auth-state-machine.js";

export { Correlator, DEFAULT_MAX_SEQ } from "./client/correlator.js";
export type { CallOptions, CorrelatorOptions } from "./client/correlator.js";

export { EventDispatcher } from "./client/event-dispatcher.js";
export type {
  EventHandler,
  EventHandlerFunction,
  EventHandlerObject,
} from "./client/event-dispatcher.js";

export { EntityCache } from "./client/entity-cache.js";

export type {
  AuthCodeErrorPayload,
  AuthLimitExceededPayload,
  ConnectionState,
  ReadyPayload,
  WavelinkEventName,
  WavelinkEvents,
} from "./client/events.js";

export {
  WebSocketTransport,
  createWebSocketTransportFactory,
  defaultWebSocketFactory,
} from "./client/transport.js";
export type {
  Transport,
  TransportCloseInfo,
  TransportFactory,
  WebSocketFactory,
  WebSocketLike,
} from "./client/transport.js";

export {
  SessionStore,
  createSession,
  parseSession,
  DEFAULT_USER_AGENT,
} from "./session/session-store.js";
export type { Session, SessionOverrides } from "./session/session-store.js";
export { SessionHandle } from "./session/session-handle.js";

export { FrameCommand, decodeFrame, decodeInbound, encodeRequest } from "./shared/frames.js";
export type {
  Frame,
  FramePayload,
  InboundFrame,
  PushFrame,
  RequestFrame,
  ResponseFrame,
} from "./shared/frames.js";

export { DEFAULT_OPCODES, resolveOpcodeName, resolveOpcodes } from "./shared/opcodes.js";
export type { OpcodeName, OpcodeOverrides, OpcodeTable } from "./shared/opcodes.js";

export {
  defaultEntityParsers,
  displayName,
  parseChat,
  parseChatPatch,
  parseMessage,
  parseUser,
  parseUserPatch,
} from "./shared/entities.js";
export type {
  Chat,
  ChatType,
  Entity,
  EntityKind,
  EntityOfKind,
  EntityParsers,
  EntityPatch,
  EntityUpdate,
  Message,
  User,
} from "./shared/entities.js";

export * from "./shared/errors.js";

export { resolveClientConfig, ClientConfigSchema } from "./config.js";
export type { ClientConfig, ClientConfigInput } from "./config.js";
export { createRootLogger, createChildLogger, resolveLogConfig } from "./logger.js";
export type { LogFormat, LogLevel, Logger } from "./logger.js";
