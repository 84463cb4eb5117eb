import { resolveClientConfig, type ClientConfig, type ClientConfigInput } from "../config.js";
import { createRootLogger, type Logger } from "../logger.js";
import { SessionStore, type Session, type SessionOverrides } from "../session/session-store.js";
import {
  defaultEntityParsers,
  type Chat,
  type EntityKind,
  type EntityOfKind,
  type EntityParsers,
  type Message,
  type User,
} from "../shared/entities.js";
import type { FramePayload } from "../shared/frames.js";
import type { AuthState, AuthenticateParams } from "./auth-state-machine.js";
import { ConnectionSupervisor } from "./connection-supervisor.js";
import type { CallOptions } from "./correlator.js";
import { EntityCache } from "./entity-cache.js";
import {
  EventDispatcher,
  type EventHandler,
  type EventHandlerFunction,
} from "./event-dispatcher.js";
import type { ConnectionState, WavelinkEvents } from "./events.js";
import { createWebSocketTransportFactory, type TransportFactory } from "./transport.js";

export type WavelinkClientOptions = {
  config?: ClientConfigInput;
  /** Used as-is; otherwise a logger is built from `config.log`. */
  logger?: Logger;
  transportFactory?: TransportFactory;
  parsers?: Partial<EntityParsers>;
  session?: SessionOverrides;
  env?: NodeJS.ProcessEnv;
  random?: () => number;
  now?: () => number;
};

export type SendOptions = {
  replyTo?: string;
};

export const DEFAULT_REACTION = "👍";

/**
 * One connection to the messenger and everything hanging off it. Instances
 * share nothing; two clients may run side by side in one process.
 */
export class WavelinkClient {
  readonly config: ClientConfig;
  readonly logger: Logger;
  private readonly dispatcher: EventDispatcher<WavelinkEvents>;
  private readonly cache = new EntityCache();
  private readonly supervisor: ConnectionSupervisor;
  private readonly parsers: EntityParsers;
  private readonly now: () => number;

  constructor(options: WavelinkClientOptions = {}) {
    this.config = resolveClientConfig(options.config, options.env);
    this.logger = options.logger ?? createRootLogger(this.config.log);
    this.now = options.now ?? Date.now;
    this.parsers = { ...defaultEntityParsers, ...options.parsers };
    this.dispatcher = new EventDispatcher<WavelinkEvents>({
      logger: this.logger,
      queueLimit: this.config.dispatchQueueLimit,
    });
    this.supervisor = new ConnectionSupervisor({
      config: this.config,
      logger: this.logger,
      transportFactory:
        options.transportFactory ?? createWebSocketTransportFactory(this.logger),
      sessionStore: new SessionStore(this.config.sessionPath, this.logger),
      sessionOverrides: options.session,
      parsers: this.parsers,
      cache: this.cache,
      dispatcher: this.dispatcher,
      random: options.random,
      now: this.now,
    });
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  start(params: AuthenticateParams = {}): Promise<void> {
    return this.supervisor.start(params);
  }

  stop(): Promise<void> {
    return this.supervisor.stop();
  }

  runUntilStopped(): Promise<void> {
    return this.supervisor.runUntilStopped();
  }

  get connectionState(): ConnectionState {
    return this.supervisor.connectionState;
  }

  get authState(): AuthState {
    return this.supervisor.authState;
  }

  get currentSession(): Session | null {
    return this.supervisor.session;
  }

  beginAuth(phone: string): Promise<void> {
    return this.supervisor.beginAuth(phone);
  }

  submitCode(code: string): Promise<void> {
    return this.supervisor.submitCode(code);
  }

  // ============================================================================
  // Events
  // ============================================================================

  on<K extends keyof WavelinkEvents>(
    name: K,
    handler: EventHandler<WavelinkEvents[K]>
  ): () => void {
    return this.dispatcher.on(name, handler);
  }

  once<K extends keyof WavelinkEvents>(
    name: K,
    handler: EventHandlerFunction<WavelinkEvents[K]>
  ): () => void {
    return this.dispatcher.once(name, handler);
  }

  off<K extends keyof WavelinkEvents>(name: K, handler: EventHandler<WavelinkEvents[K]>): void {
    this.dispatcher.off(name, handler);
  }

  /** Resolves after every event raised so far has reached its handlers. */
  drainEvents(): Promise<void> {
    return this.dispatcher.drain();
  }

  // ============================================================================
  // Entities
  // ============================================================================

  getEntity<K extends EntityKind>(kind: K, id: number): EntityOfKind<K> | null {
    return this.cache.get(kind, id);
  }

  getChat(id: number): Chat | null {
    return this.cache.get("chat", id);
  }

  getUser(id: number): User | null {
    return this.cache.get("user", id);
  }

  getChats(): Chat[] {
    return this.cache.all("chat");
  }

  getUsers(): User[] {
    return this.cache.all("user");
  }

  get currentUser(): User | null {
    return this.cache.currentUser;
  }

  fetchChats(chatIds: readonly number[]): Promise<Chat[]> {
    return this.supervisor.fetchChats(chatIds);
  }

  fetchContacts(contactIds: readonly number[]): Promise<User[]> {
    return this.supervisor.fetchContacts(contactIds);
  }

  // ============================================================================
  // Requests
  // ============================================================================

  call(opcode: number, payload: FramePayload, options?: CallOptions): Promise<FramePayload> {
    return this.supervisor.call(opcode, payload, options);
  }

  async sendMessage(chatId: number, text: string, options: SendOptions = {}): Promise<Message | null> {
    const response = await this.call(this.config.opcodes.sendMessage, {
      chatId,
      message: {
        text,
        cid: this.now(),
        elements: [],
        attaches: [],
        ...(options.replyTo ? { replyTo: options.replyTo } : {}),
      },
      notify: true,
    });
    return this.acceptSentMessage(response, chatId);
  }

  async sendSticker(
    chatId: number,
    stickerId: number,
    options: SendOptions = {}
  ): Promise<Message | null> {
    const response = await this.call(this.config.opcodes.sendMessage, {
      chatId,
      message: {
        cid: this.now(),
        attaches: [{ _type: "STICKER", stickerId }],
        ...(options.replyTo ? { replyTo: options.replyTo } : {}),
      },
      notify: true,
    });
    return this.acceptSentMessage(response, chatId);
  }

  async editMessage(chatId: number, messageId: string, text: string): Promise<Message | null> {
    const response = await this.call(this.config.opcodes.editMessage, {
      chatId,
      messageId,
      text,
    });
    return this.acceptSentMessage(response, chatId);
  }

  async deleteMessage(chatId: number, messageId: string): Promise<void> {
    await this.call(this.config.opcodes.deleteMessage, { chatId, messageId });
  }

  async sendReaction(
    chatId: number,
    messageId: string,
    reaction: string = DEFAULT_REACTION
  ): Promise<void> {
    await this.call(this.config.opcodes.sendReaction, {
      chatId,
      messageId,
      reaction: { reactionType: "EMOJI", id: reaction },
    });
  }

  private acceptSentMessage(response: FramePayload, chatId: number): Message | null {
    if (!("message" in response)) {
      return null;
    }
    let message: Message;
    try {
      message = this.supervisor.parseMessageEnvelope({ chatId, ...response });
    } catch (error) {
      // The server already accepted the request; only the echo is unusable.
      this.logger.warn({ err: error, chatId }, "sent_message_unparsed");
      return null;
    }
    this.cache.recordMessage(message);
    this.dispatcher.emit("message_sent", message);
    return message;
  }
}
