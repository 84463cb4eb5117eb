import { z } from "zod";
import type { ClientConfig } from "../config.js";
import { createChildLogger, type Logger } from "../logger.js";
import { SessionHandle } from "../session/session-handle.js";
import {
  DEFAULT_PROTOCOL_VERSION,
  type Session,
  type SessionOverrides,
  type SessionStore,
} from "../session/session-store.js";
import type { Chat, EntityParsers, Message, User } from "../shared/entities.js";
import {
  AuthError,
  ConnectionClosedError,
  ProtocolError,
  RateLimitError,
  WavelinkError,
  toError,
} from "../shared/errors.js";
import { decodeInbound, type FramePayload, type InboundFrame, type PushFrame } from "../shared/frames.js";
import { resolveOpcodeName } from "../shared/opcodes.js";
import {
  AuthStateMachine,
  type AuthState,
  type AuthenticateParams,
} from "./auth-state-machine.js";
import { Correlator, type CallOptions } from "./correlator.js";
import type { EntityCache } from "./entity-cache.js";
import type { EventDispatcher } from "./event-dispatcher.js";
import type { ConnectionState, WavelinkEvents } from "./events.js";
import type { Transport, TransportCloseInfo, TransportFactory } from "./transport.js";

export type ConnectionSupervisorOptions = {
  config: ClientConfig;
  logger: Logger;
  transportFactory: TransportFactory;
  sessionStore: SessionStore;
  sessionOverrides?: SessionOverrides;
  parsers: EntityParsers;
  cache: EntityCache;
  dispatcher: EventDispatcher<WavelinkEvents>;
  /** Source of jitter in [0, 1). */
  random?: () => number;
  now?: () => number;
};

const MessageEnvelopeSchema = z.object({
  chatId: z.number().int(),
  message: z.record(z.unknown()),
});

const LoginPayloadSchema = z.object({
  profile: z.object({ contact: z.unknown().optional() }).nullish(),
  chats: z.array(z.unknown()).nullish(),
});

const ListPayloadSchema = z.object({
  chats: z.array(z.unknown()).nullish(),
  contacts: z.array(z.unknown()).nullish(),
});

/** Chat 0 is the account's own saved-messages chat; its login snapshot is partial. */
const SELF_CHAT_ID = 0;

type StopSignal = {
  promise: Promise<void>;
  resolve: () => void;
};

/**
 * Owns the connection lifecycle: connect and handshake, authenticate, keep a
 * single read loop running, and reconnect with backoff after the transport
 * is lost.
 */
export class ConnectionSupervisor {
  readonly correlator: Correlator;
  private auth: AuthStateMachine | null = null;
  private sessionHandle: SessionHandle | null = null;
  private transport: Transport | null = null;
  private readLoop: Promise<void> | null = null;
  private reconnectTimeout: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempt = 0;
  private stopping = false;
  private starting = false;
  private stopSignal: StopSignal = createStopSignal();
  private state: ConnectionState = { status: "idle" };
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(private readonly options: ConnectionSupervisorOptions) {
    this.logger = createChildLogger(options.logger, "supervisor");
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.correlator = new Correlator({
      logger: options.logger,
      defaultTimeoutMs: options.config.requestTimeoutMs,
      protocolVersion: () =>
        this.sessionHandle?.current.protocolVersion ?? DEFAULT_PROTOCOL_VERSION,
    });
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get authState(): AuthState {
    return this.auth?.state ?? { status: "unauthenticated" };
  }

  get session(): Session | null {
    return this.sessionHandle?.current ?? null;
  }

  /**
   * Connect, hand the device over to the server, log in, and sync. Without a
   * stored token and without phone + code provider the connection stays up,
   * `auth_required` is raised and the caller drives {@link beginAuth} and
   * {@link submitCode} itself.
   *
   * Called again while connected but logged out (after `auth_required`), it
   * re-runs only the login on the open connection.
   */
  async start(params: AuthenticateParams = {}): Promise<void> {
    if (this.starting) {
      throw new WavelinkError("Client is already starting");
    }
    this.starting = true;
    try {
      await this.runStart(params);
    } finally {
      this.starting = false;
    }
  }

  private async runStart(params: AuthenticateParams): Promise<void> {
    if (this.state.status === "connected") {
      if (this.authState.status === "authenticated") {
        throw new WavelinkError("Client is already running");
      }
      await this.login(params);
      return;
    }
    if (this.state.status === "connecting" || this.state.status === "reconnecting") {
      throw new WavelinkError(`Client is already ${this.state.status}`);
    }

    this.stopping = false;
    this.reconnectAttempt = 0;
    if (this.state.status === "stopped") {
      this.stopSignal = createStopSignal();
    }
    this.options.dispatcher.resume();

    const session = await this.options.sessionStore.loadOrCreate(this.options.sessionOverrides);
    this.bindSession(session);

    try {
      await this.establish(0);
    } catch (error) {
      this.setState({ status: "idle" });
      throw error;
    }
    await this.login(params);
  }

  async stop(): Promise<void> {
    if (this.state.status === "stopped") {
      return;
    }
    this.stopping = true;
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }

    const transport = this.transport;
    this.transport = null;
    this.correlator.detach(new ConnectionClosedError("Client stopped"));
    transport?.close(1000, "Client stopped");
    if (this.readLoop) {
      await this.readLoop;
    }

    await this.auth?.reset();
    this.setState({ status: "stopped" });
    this.logger.info("client_stopped");
    this.options.dispatcher.stop();
    this.stopSignal.resolve();
  }

  /** Resolves once {@link stop} has run. Reconnects happen in between. */
  runUntilStopped(): Promise<void> {
    return this.stopSignal.promise;
  }

  call(opcode: number, payload: FramePayload, options?: CallOptions): Promise<FramePayload> {
    return this.correlator.call(opcode, payload, options);
  }

  async beginAuth(phone: string): Promise<void> {
    await this.requireAuth().beginAuth(phone);
  }

  async submitCode(code: string): Promise<void> {
    const payload = await this.requireAuth().submitCode(code);
    await this.completeLogin(payload);
  }

  async fetchChats(chatIds: readonly number[]): Promise<Chat[]> {
    const payload = await this.call(this.options.config.opcodes.getChats, {
      chatIds: [...chatIds],
    });
    const chats = this.parseList(payload, "chats", (raw) => this.options.parsers.chat(raw)).map(
      (chat) => this.upsertChat(chat)
    );
    this.options.dispatcher.emit("chats_update", chats);
    return chats;
  }

  async fetchContacts(contactIds: readonly number[]): Promise<User[]> {
    const payload = await this.call(this.options.config.opcodes.getContacts, {
      contactIds: [...contactIds],
    });
    const users = this.parseList(payload, "contacts", (raw) => this.options.parsers.user(raw));
    for (const user of users) {
      this.options.cache.upsert(user);
    }
    this.options.dispatcher.emit("contacts_update", users);
    return users;
  }

  private bindSession(session: Session): void {
    this.auth?.dispose();
    const { config } = this.options;
    this.sessionHandle = new SessionHandle(this.options.sessionStore, session);
    this.auth = new AuthStateMachine({
      caller: this.correlator,
      session: this.sessionHandle,
      events: this.options.dispatcher,
      opcodes: config.opcodes,
      settings: {
        language: config.language,
        chatsCount: config.chatsCount,
        maxCodeAttempts: config.maxCodeAttempts,
        rateLimitCooldownMs: config.rateLimitCooldownMs,
        tokenRejectionCodes: config.tokenRejectionCodes,
        rateLimitCodes: config.rateLimitCodes,
      },
      logger: this.options.logger,
      now: this.now,
    });
  }

  /** Open a fresh transport, start reading from it and send the device handshake. */
  private async establish(attempt: number): Promise<void> {
    const session = this.requireSession();
    const { config } = this.options;
    this.setState({ status: "connecting", attempt });

    const transport = this.options.transportFactory();
    try {
      await transport.connect(config.url, {
        Origin: config.origin,
        "User-Agent": session.userAgent,
      });
    } catch (error) {
      transport.close();
      throw error;
    }
    if (this.stopping) {
      transport.close(1000, "Client stopped");
      throw new ConnectionClosedError("Stopped while connecting");
    }

    this.transport = transport;
    this.correlator.attach(transport);
    this.readLoop = this.runReadLoop(transport);

    try {
      await this.correlator.call(config.opcodes.sessionInit, buildHandshake(session));
    } catch (error) {
      this.abandon(transport, "handshake_failed");
      throw error;
    }
    this.setState({ status: "connected" });
    this.logger.info({ deviceId: session.deviceId.slice(0, 8), attempt }, "connected");
  }

  private async login(params: AuthenticateParams): Promise<void> {
    const auth = this.requireAuth();
    const hasToken = Boolean(this.requireSession().token);
    if (!hasToken && !(params.phone && params.codeProvider)) {
      this.logger.info("no_credentials_awaiting_auth");
      this.options.dispatcher.emit("auth_required", { reason: "no_credentials" });
      return;
    }
    const payload = await auth.authenticate(params);
    await this.completeLogin(payload);
  }

  /** Seed the cache from the login payload, pull contacts, then announce `ready`. */
  private async completeLogin(payload: FramePayload): Promise<void> {
    const { cache, parsers, dispatcher, config } = this.options;
    const parsed = LoginPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProtocolError("Login response has an unexpected shape");
    }

    const contact = parsed.data.profile?.contact;
    if (contact !== undefined) {
      const user = parsers.user({ contact });
      cache.setCurrentUser(user);
      this.logger.info({ userId: user.id }, "logged_in");
    }

    const chats = this.parseEach(parsed.data.chats ?? [], "chat", (raw) => parsers.chat(raw)).map(
      (chat) => this.upsertChat(chat)
    );
    this.logger.info({ count: chats.length }, "chats_loaded");
    dispatcher.emit("chats_update", chats);

    await this.syncAfterLogin(chats, config.contactsSyncLimit);
    dispatcher.emit("ready", { user: cache.currentUser, chats: cache.all("chat") });
  }

  private async syncAfterLogin(chats: readonly Chat[], contactsLimit: number): Promise<void> {
    try {
      if (chats.some((chat) => chat.id === SELF_CHAT_ID)) {
        await this.fetchChats([SELF_CHAT_ID]);
      }

      const contactIds = new Set<number>();
      const me = this.options.cache.currentUser;
      if (me) {
        contactIds.add(me.id);
      }
      for (const chat of chats) {
        for (const participantId of chat.participantIds) {
          contactIds.add(participantId);
        }
      }
      const ids = Array.from(contactIds).slice(0, contactsLimit);
      if (ids.length > 0) {
        await this.fetchContacts(ids);
      }
    } catch (error) {
      this.logger.warn({ err: error }, "initial_sync_failed");
    }
  }

  private async runReadLoop(transport: Transport): Promise<void> {
    let consecutiveDecodeErrors = 0;
    let failure: Error | null = null;
    const maxDecodeErrors = this.options.config.maxConsecutiveDecodeErrors;

    try {
      for await (const data of transport) {
        let frame: InboundFrame;
        try {
          frame = decodeInbound(data);
        } catch (error) {
          consecutiveDecodeErrors += 1;
          this.logger.warn({ err: error, consecutiveDecodeErrors }, "frame_decode_failed");
          if (consecutiveDecodeErrors >= maxDecodeErrors) {
            this.logger.error({ consecutiveDecodeErrors }, "too_many_malformed_frames");
            transport.close(1002, "Too many malformed frames");
          }
          continue;
        }
        consecutiveDecodeErrors = 0;
        this.route(frame);
      }
    } catch (error) {
      failure = toError(error);
    }

    this.handleTransportEnd(transport, failure);
  }

  private route(frame: InboundFrame): void {
    if (frame.kind === "response") {
      this.correlator.handleResponse(frame);
      return;
    }
    try {
      this.handlePush(frame);
    } catch (error) {
      this.logger.warn({ err: error, opcode: frame.opcode }, "push_handling_failed");
    }
  }

  private handlePush(frame: PushFrame): void {
    const { opcodes } = this.options.config;
    const { cache, parsers, dispatcher } = this.options;

    if (frame.opcode === opcodes.pushMessage) {
      const message = this.parseMessageEnvelope(frame.payload);
      cache.recordMessage(message);
      dispatcher.emit("new_message", message);
      return;
    }
    if (opcodes.pushChatPatch !== null && frame.opcode === opcodes.pushChatPatch) {
      const update = parsers.chatPatch(frame.payload);
      const chat = cache.patch("chat", update.id, update.fields);
      if (chat) {
        dispatcher.emit("chats_update", [chat]);
      }
      return;
    }
    if (opcodes.pushContactPatch !== null && frame.opcode === opcodes.pushContactPatch) {
      const update = parsers.userPatch(frame.payload);
      const user = cache.patch("user", update.id, update.fields);
      if (user) {
        dispatcher.emit("contacts_update", [user]);
      }
      return;
    }

    this.logger.debug(
      { opcode: frame.opcode, name: resolveOpcodeName(opcodes, frame.opcode) },
      "push_unhandled"
    );
    dispatcher.emit("push", frame);
  }

  /** `{ chatId, message }` as carried by message pushes and send/edit responses. */
  parseMessageEnvelope(payload: FramePayload): Message {
    const parsed = MessageEnvelopeSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProtocolError("Message payload is missing chatId or message");
    }
    return this.options.parsers.message(parsed.data.message, parsed.data.chatId);
  }

  private handleTransportEnd(transport: Transport, failure: Error | null): void {
    if (this.transport !== transport) {
      return;
    }
    this.transport = null;
    const reason = failure ? failure.message : describeClose(transport.closeInfo);
    this.correlator.detach(new ConnectionClosedError(`Connection lost: ${reason}`));

    // A transport lost mid-handshake is reported by establish() instead.
    if (this.stopping || this.state.status === "connecting") {
      return;
    }
    this.logger.warn({ reason }, "connection_lost");

    if (!this.options.config.reconnect.enabled) {
      void this.stop().catch((error) => {
        this.logger.error({ err: error }, "stop_failed");
      });
      return;
    }
    this.scheduleReconnect(reason);
  }

  private scheduleReconnect(reason: string): void {
    if (this.reconnectTimeout || this.stopping) {
      return;
    }
    const attempt = this.reconnectAttempt + 1;
    const delayMs = this.backoffDelay(this.reconnectAttempt);
    this.reconnectAttempt = attempt;
    this.setState({ status: "reconnecting", attempt, delayMs, reason });
    this.logger.info({ attempt, delayMs, reason }, "reconnect_scheduled");

    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      void this.reconnect(attempt).catch((error) => {
        this.logger.error({ err: error, attempt }, "reconnect_crashed");
      });
    }, delayMs);
  }

  /** min(base * 2^attempt, max) plus up to `jitterRatio` of that on top. */
  backoffDelay(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitterRatio } = this.options.config.reconnect;
    const capped = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
    return Math.round(capped + capped * jitterRatio * this.random());
  }

  private async reconnect(attempt: number): Promise<void> {
    if (this.stopping) {
      return;
    }
    try {
      await this.establish(attempt);
    } catch (error) {
      if (this.stopping) {
        return;
      }
      const reason = toError(error).message;
      this.logger.warn({ attempt, err: error }, "reconnect_failed");
      this.scheduleReconnect(reason);
      return;
    }
    this.reconnectAttempt = 0;

    if (!this.requireSession().token) {
      this.options.dispatcher.emit("auth_required", { reason: "no_token" });
      return;
    }
    try {
      const payload = await this.requireAuth().loginWithToken();
      await this.completeLogin(payload);
      this.logger.info({ attempt }, "reconnected");
    } catch (error) {
      if (error instanceof AuthError || error instanceof RateLimitError) {
        this.logger.warn({ err: error }, "reconnect_login_rejected");
        return;
      }
      const transport = this.transport;
      if (transport && !this.stopping) {
        this.logger.warn({ err: error }, "reconnect_login_failed");
        transport.close(1011, "Login after reconnect failed");
      }
    }
  }

  /** Detach from a transport that never became usable and close it. */
  private abandon(transport: Transport, reason: string): void {
    if (this.transport === transport) {
      this.transport = null;
    }
    this.correlator.detach(new ConnectionClosedError(reason));
    transport.close(1011, reason);
  }

  private setState(next: ConnectionState): void {
    this.state = next;
    this.logger.debug({ state: next }, "connection_state_changed");
    this.options.dispatcher.emit("connection_state", next);
  }

  private requireSession(): Session {
    if (!this.sessionHandle) {
      throw new WavelinkError("Client has not been started");
    }
    return this.sessionHandle.current;
  }

  private requireAuth(): AuthStateMachine {
    if (!this.auth) {
      throw new WavelinkError("Client has not been started");
    }
    return this.auth;
  }

  private upsertChat(chat: Chat): Chat {
    this.options.cache.upsert(chat);
    return this.options.cache.get("chat", chat.id) ?? chat;
  }

  private parseList<T>(payload: FramePayload, key: "chats" | "contacts", parse: (raw: unknown) => T): T[] {
    const parsed = ListPayloadSchema.safeParse(payload);
    const items = parsed.success ? parsed.data[key] ?? [] : [];
    return this.parseEach(items, key, parse);
  }

  private parseEach<T>(items: readonly unknown[], label: string, parse: (raw: unknown) => T): T[] {
    const result: T[] = [];
    for (const raw of items) {
      try {
        result.push(parse(raw));
      } catch (error) {
        this.logger.warn({ err: error, label }, "entity_parse_failed");
      }
    }
    return result;
  }
}

function buildHandshake(session: Session): FramePayload {
  return {
    userAgent: {
      deviceType: session.deviceType,
      locale: session.locale,
      deviceLocale: session.deviceLocale,
      osVersion: session.osVersion,
      deviceName: session.deviceName,
      headerUserAgent: session.userAgent,
      appVersion: session.appVersion,
      screen: session.screen,
      timezone: session.timezone,
    },
    deviceId: session.deviceId,
  };
}

function describeClose(info: TransportCloseInfo | null): string {
  if (!info) {
    return "closed";
  }
  const code = info.code === null ? "" : `code ${info.code}`;
  return [code, info.reason].filter(Boolean).join(": ") || "closed";
}

function createStopSignal(): StopSignal {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
