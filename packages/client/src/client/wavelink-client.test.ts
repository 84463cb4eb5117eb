import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";
import { DEFAULT_URL, type ClientConfigInput } from "../config.js";
import { DEFAULT_USER_AGENT, SessionStore, createSession } from "../session/session-store.js";
import type { Chat, Message } from "../shared/entities.js";
import { ConnectionClosedError, ServerError } from "../shared/errors.js";
import { DEFAULT_OPCODES } from "../shared/opcodes.js";
import { MockTransport } from "../test-utils/mock-transport.js";
import { createTestLogger } from "../test-utils/test-logger.js";
import type { ConnectionState, WavelinkEvents } from "./events.js";
import { WavelinkClient } from "./wavelink-client.js";

const OP = DEFAULT_OPCODES;
const PHONE = "+10000000000";

const ME = { id: 1, names: [{ name: "Me" }] };
const EVE = { id: 5, names: [{ name: "Eve" }] };
const SELF_CHAT = { id: 0, type: "DIALOG", participants: { "1": 0 } };
const EVE_CHAT = { id: 5, type: "DIALOG", participants: { "1": 0, "5": 0 } };

function standardReplies(transport: MockTransport): void {
  transport.reply(OP.sessionInit, { status: "ok", payload: { location: "RU" } });
  transport.reply(OP.login, {
    status: "ok",
    payload: { profile: { contact: ME }, chats: [SELF_CHAT, EVE_CHAT] },
  });
  transport.reply(OP.getChats, { status: "ok", payload: { chats: [SELF_CHAT] } });
  transport.reply(OP.getContacts, { status: "ok", payload: { contacts: [ME, EVE] } });
}

type HarnessOptions = {
  token?: string;
  config?: ClientConfigInput;
  prepare?: (transport: MockTransport, index: number) => void;
};

const dirs: string[] = [];
const clients: WavelinkClient[] = [];

async function createHarness(options: HarnessOptions = {}) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "wavelink-client-"));
  dirs.push(dir);
  const sessionPath = path.join(dir, "session.json");
  const logger = createTestLogger();
  if (options.token) {
    await new SessionStore(sessionPath, logger).save({
      ...createSession({ deviceId: "device-1" }),
      token: options.token,
    });
  }

  const transports: MockTransport[] = [];
  const prepare = options.prepare ?? standardReplies;
  const client = new WavelinkClient({
    config: { sessionPath, requestTimeoutMs: 2000, ...options.config },
    logger,
    env: {},
    random: () => 0,
    now: () => 1234,
    transportFactory: () => {
      const transport = new MockTransport();
      prepare(transport, transports.length);
      transports.push(transport);
      return transport;
    },
  });
  clients.push(client);

  const events: string[] = [];
  const states: ConnectionState[] = [];
  const payloads: { [K in keyof WavelinkEvents]?: Array<WavelinkEvents[K]> } = {};
  const record = <K extends keyof WavelinkEvents>(name: K) => {
    client.on(name, (payload) => {
      events.push(name);
      const list = payloads[name] ?? [];
      list.push(payload);
      payloads[name] = list;
    });
  };
  record("ready");
  record("chats_update");
  record("contacts_update");
  record("auth_required");
  record("new_message");
  record("message_sent");
  record("push");
  client.on("connection_state", (state) => {
    events.push(`connection_state:${state.status}`);
    states.push(state);
  });

  const transportAt = (index: number): MockTransport => {
    const transport = transports[index];
    if (!transport) {
      throw new Error(`No transport #${index}`);
    }
    return transport;
  };

  return { client, transports, transportAt, events, states, payloads, sessionPath, logger };
}

describe("WavelinkClient", () => {
  afterEach(async () => {
    for (const client of clients.splice(0)) {
      await client.stop();
    }
    for (const dir of dirs.splice(0)) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  test("start with a stored token connects, logs in and syncs", async () => {
    const { client, transportAt, events, payloads } = await createHarness({ token: "test-token" });

    await client.start();
    await client.drainEvents();

    const transport = transportAt(0);
    expect(transport.connectedUrl).toBe(DEFAULT_URL);
    expect(transport.connectedHeaders).toEqual({
      Origin: "https://web.max.ru",
      "User-Agent": DEFAULT_USER_AGENT,
    });
    expect(transport.sentFrames().map((frame) => frame.opcode)).toEqual([
      OP.sessionInit,
      OP.login,
      OP.getChats,
      OP.getContacts,
    ]);
    expect(transport.sentWithOpcode(OP.sessionInit)[0]?.payload).toEqual({
      userAgent: {
        deviceType: "ANDROID",
        locale: "ru",
        deviceLocale: "ru",
        osVersion: "Windows",
        deviceName: "Chrome",
        headerUserAgent: DEFAULT_USER_AGENT,
        appVersion: "25.12.3",
        screen: "1080x1920 1.0x",
        timezone: "Europe/Moscow",
      },
      deviceId: "device-1",
    });
    expect(transport.sentWithOpcode(OP.login)[0]?.payload).toMatchObject({
      interactive: false,
      token: "test-token",
      chatsCount: 40,
    });
    expect(transport.sentWithOpcode(OP.getChats)[0]?.payload).toEqual({ chatIds: [0] });
    expect(transport.sentWithOpcode(OP.getContacts)[0]?.payload).toEqual({ contactIds: [1, 5] });

    expect(client.connectionState).toEqual({ status: "connected" });
    expect(client.authState).toEqual({ status: "authenticated", token: "test-token" });
    expect(client.currentUser?.name).toBe("Me");
    expect(client.getChat(5)?.title).toBe("Eve");
    expect(client.getUser(5)?.name).toBe("Eve");
    expect(client.currentUser).toBe(client.getUser(1));

    expect(events).toEqual([
      "connection_state:connecting",
      "connection_state:connected",
      "chats_update",
      "chats_update",
      "contacts_update",
      "ready",
    ]);
    const ready = payloads.ready?.[0];
    expect(ready?.user?.id).toBe(1);
    expect(ready?.chats.map((chat) => [chat.id, chat.title])).toEqual([
      [0, null],
      [5, "Eve"],
    ]);
  });

  test("without credentials the connection stays up for a manual login", async () => {
    const { client, events, payloads, sessionPath, logger } = await createHarness({
      prepare: (transport) => {
        transport.reply(OP.sessionInit, { status: "ok" });
        transport.reply(OP.authRequest, { status: "ok", payload: { token: "req-1" } });
        transport.reply(OP.navEvents, { status: "ok" });
        transport.reply(OP.authCheckCode, {
          status: "ok",
          payload: { tokenAttrs: { LOGIN: { token: "test-token" } } },
        });
        transport.reply(OP.login, { status: "ok", payload: { profile: { contact: ME }, chats: [] } });
        transport.reply(OP.getContacts, { status: "ok", payload: { contacts: [ME] } });
      },
    });

    await client.start();
    await client.drainEvents();
    expect(client.connectionState.status).toBe("connected");
    expect(payloads.auth_required).toEqual([{ reason: "no_credentials" }]);

    await client.beginAuth(PHONE);
    expect(client.authState).toEqual({ status: "code_requested", requestId: "req-1" });
    await client.submitCode("123456");
    await client.drainEvents();

    expect(client.authState.status).toBe("authenticated");
    expect(client.currentSession).toMatchObject({ token: "test-token", phone: PHONE });
    await expect(new SessionStore(sessionPath, logger).load()).resolves.toMatchObject({
      token: "test-token",
      phone: PHONE,
    });
    expect(events).toEqual([
      "connection_state:connecting",
      "connection_state:connected",
      "auth_required",
      "chats_update",
      "contacts_update",
      "ready",
    ]);
  });

  test("a rejected stored token fails start and clears the token", async () => {
    const { client, payloads, sessionPath, logger } = await createHarness({
      token: "stale-token",
      prepare: (transport) => {
        transport.reply(OP.sessionInit, { status: "ok" });
        transport.reply(OP.login, {
          status: "error",
          payload: { error: "login.token", message: "FAIL_LOGIN_TOKEN" },
        });
      },
    });

    await expect(client.start()).rejects.toThrow("Login token was rejected");
    await client.drainEvents();

    expect(client.authState.status).toBe("reauth_required");
    expect(payloads.auth_required).toEqual([{ reason: "token_rejected" }]);
    await expect(new SessionStore(sessionPath, logger).load()).resolves.toMatchObject({ token: null });
  });

  test("a failed handshake closes the transport and leaves the client idle", async () => {
    const { client, transportAt } = await createHarness({
      token: "test-token",
      prepare: (transport) => {
        transport.reply(OP.sessionInit, { status: "error", payload: { error: "session.invalid" } });
      },
    });

    await expect(client.start()).rejects.toBeInstanceOf(ServerError);
    expect(client.connectionState).toEqual({ status: "idle" });
    expect(transportAt(0).closeInfo).toEqual({
      code: 1011,
      reason: "handshake_failed",
      initiatedLocally: true,
    });
  });

  test("a second start while running is refused", async () => {
    const { client } = await createHarness({ token: "test-token" });
    await client.start();
    await expect(client.start()).rejects.toThrow("Client is already running");
  });

  test("overlapping start calls open a single connection", async () => {
    const { client, transports } = await createHarness({ token: "test-token" });

    const first = client.start();
    const second = client.start();
    await expect(second).rejects.toThrow("Client is already starting");
    await expect(first).resolves.toBeUndefined();
    expect(transports).toHaveLength(1);

    await client.stop();
    expect(transports[0]?.isClosed).toBe(true);
  });

  test("message pushes update the chat and raise new_message", async () => {
    const { client, transportAt } = await createHarness({ token: "test-token" });
    await client.start();

    const received = new Promise<Message>((resolve) => {
      client.once("new_message", resolve);
    });
    transportAt(0).pushEvent(OP.pushMessage, {
      chatId: 5,
      message: { id: "m-1", text: "hello", sender: 5, time: 1700 },
    });

    await expect(received).resolves.toEqual({
      id: "m-1",
      text: "hello",
      senderId: 5,
      timestamp: 1700,
      chatId: 5,
      type: "USER",
      attachments: [],
      replyTo: null,
    });
    expect(client.getChat(5)?.lastMessageId).toBe("m-1");
  });

  test("pushes without dedicated handling are raised as push events", async () => {
    const { client, transportAt, payloads } = await createHarness({ token: "test-token" });
    await client.start();

    transportAt(0).pushEvent(999, { typing: true });
    await vi.waitFor(() => {
      expect(payloads.push).toEqual([{ kind: "push", opcode: 999, payload: { typing: true } }]);
    });
  });

  test("chat patch pushes update cached chats when their opcode is configured", async () => {
    const { client, transportAt } = await createHarness({
      token: "test-token",
      config: { opcodes: { pushChatPatch: 135 } },
    });
    await client.start();
    await client.drainEvents();

    const updates: Chat[][] = [];
    client.on("chats_update", (chats) => {
      updates.push([...chats]);
    });
    transportAt(0).pushEvent(135, { chat: { id: 5, title: "Renamed" } });

    await vi.waitFor(() => {
      expect(updates).toHaveLength(1);
    });
    expect(updates[0]?.map((chat) => [chat.id, chat.title])).toEqual([[5, "Renamed"]]);
    expect(client.getChat(5)?.participantIds).toEqual([1, 5]);
  });

  test("sendMessage sends the message envelope and raises message_sent", async () => {
    const { client, transportAt, payloads } = await createHarness({ token: "test-token" });
    await client.start();
    const transport = transportAt(0);
    transport.reply(OP.sendMessage, {
      status: "ok",
      payload: { message: { id: "m-2", text: "hi", sender: 1, time: 1800 } },
    });

    const message = await client.sendMessage(5, "hi", { replyTo: "m-1" });

    expect(transport.lastSent()).toMatchObject({
      opcode: OP.sendMessage,
      payload: {
        chatId: 5,
        message: { text: "hi", cid: 1234, elements: [], attaches: [], replyTo: "m-1" },
        notify: true,
      },
    });
    expect(message).toEqual({
      id: "m-2",
      text: "hi",
      senderId: 1,
      timestamp: 1800,
      chatId: 5,
      type: "USER",
      attachments: [],
      replyTo: null,
    });
    expect(client.getChat(5)?.lastMessageId).toBe("m-2");
    await client.drainEvents();
    expect(payloads.message_sent).toEqual([message]);
  });

  test("sticker, edit, delete and reaction requests carry their payloads", async () => {
    const { client, transportAt } = await createHarness({ token: "test-token" });
    await client.start();
    const transport = transportAt(0);
    transport.reply(OP.sendMessage, { status: "ok" });
    transport.reply(OP.editMessage, { status: "ok" });
    transport.reply(OP.deleteMessage, { status: "ok" });
    transport.reply(OP.sendReaction, { status: "ok" });

    await expect(client.sendSticker(5, 77)).resolves.toBeNull();
    expect(transport.lastSent().payload).toEqual({
      chatId: 5,
      message: { cid: 1234, attaches: [{ _type: "STICKER", stickerId: 77 }] },
      notify: true,
    });

    await expect(client.editMessage(5, "m-2", "edited")).resolves.toBeNull();
    expect(transport.lastSent().payload).toEqual({ chatId: 5, messageId: "m-2", text: "edited" });

    await client.deleteMessage(5, "m-2");
    expect(transport.lastSent().payload).toEqual({ chatId: 5, messageId: "m-2" });

    await client.sendReaction(5, "m-2");
    expect(transport.lastSent().payload).toEqual({
      chatId: 5,
      messageId: "m-2",
      reaction: { reactionType: "EMOJI", id: "👍" },
    });
  });

  test("an accepted send with an unreadable echo resolves to null", async () => {
    const { client, transportAt, payloads } = await createHarness({ token: "test-token" });
    await client.start();
    transportAt(0).reply(OP.sendMessage, { status: "ok", payload: { message: "queued" } });

    await expect(client.sendMessage(5, "hi")).resolves.toBeNull();
    await client.drainEvents();
    expect(payloads.message_sent).toBeUndefined();
    expect(client.getChat(5)?.lastMessageId).toBeNull();
  });

  test("a lost connection fails pending calls and reconnects with backoff", async () => {
    const { client, transports, transportAt, states, payloads } = await createHarness({
      token: "test-token",
      config: { reconnect: { baseDelayMs: 10, maxDelayMs: 1000, jitterRatio: 0.5 } },
      prepare: (transport, index) => {
        if (index === 1) {
          transport.failConnectWith = "refused";
          return;
        }
        standardReplies(transport);
      },
    });
    await client.start();

    const pending = client.call(999, {});
    transportAt(0).drop("gone");
    await expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
    await expect(pending).rejects.toThrow("Connection lost: code 1006: gone");

    await vi.waitFor(() => {
      expect(payloads.ready).toHaveLength(2);
    });
    expect(transports).toHaveLength(3);
    expect(states).toEqual([
      { status: "connecting", attempt: 0 },
      { status: "connected" },
      { status: "reconnecting", attempt: 1, delayMs: 10, reason: "code 1006: gone" },
      { status: "connecting", attempt: 1 },
      {
        status: "reconnecting",
        attempt: 2,
        delayMs: 20,
        reason: `Failed to connect to ${DEFAULT_URL}: refused`,
      },
      { status: "connecting", attempt: 2 },
      { status: "connected" },
    ]);
    expect(transportAt(2).sentWithOpcode(OP.login)[0]?.payload).toMatchObject({ token: "test-token" });
  });

  test("a token rejected after reconnecting leaves the connection up for a new login", async () => {
    const { client, transports, transportAt, payloads, sessionPath, logger } = await createHarness({
      token: "test-token",
      config: { reconnect: { baseDelayMs: 10, maxDelayMs: 1000, jitterRatio: 0 } },
      prepare: (transport, index) => {
        if (index === 0) {
          standardReplies(transport);
          return;
        }
        transport.reply(OP.sessionInit, { status: "ok" });
        transport.reply(OP.login, { status: "error", payload: { error: "login.token" } });
      },
    });
    await client.start();
    await client.drainEvents();

    transportAt(0).drop("gone");
    await vi.waitFor(() => {
      expect(payloads.auth_required).toEqual([{ reason: "token_rejected" }]);
    });
    await vi.waitFor(async () => {
      await expect(new SessionStore(sessionPath, logger).load()).resolves.toMatchObject({
        token: null,
      });
    });

    expect(client.authState).toEqual({ status: "reauth_required" });
    expect(client.connectionState).toEqual({ status: "connected" });
    expect(client.currentSession?.token).toBeNull();
    expect(transports).toHaveLength(2);
    expect(transportAt(1).isClosed).toBe(false);
    expect(payloads.ready).toHaveLength(1);
  });

  test("stop closes the socket, fails pending calls and releases runUntilStopped", async () => {
    const { client, transports, transportAt } = await createHarness({ token: "test-token" });
    await client.start();
    const running = client.runUntilStopped();
    const pending = client.call(999, {});

    await client.stop();

    await expect(pending).rejects.toThrow("Client stopped");
    await expect(running).resolves.toBeUndefined();
    expect(client.connectionState).toEqual({ status: "stopped" });
    expect(transportAt(0).closeInfo).toEqual({
      code: 1000,
      reason: "Client stopped",
      initiatedLocally: true,
    });
    expect(client.authState).toEqual({ status: "unauthenticated" });
    await expect(client.call(999, {})).rejects.toThrow("Not connected");
    await client.stop();
    expect(transports).toHaveLength(1);
  });

  test("too many malformed frames in a row close the connection", async () => {
    const { client, transportAt, payloads } = await createHarness({
      token: "test-token",
      config: { maxConsecutiveDecodeErrors: 2, reconnect: { enabled: false } },
    });
    await client.start();
    const transport = transportAt(0);

    transport.pushRaw("not json");
    transport.pushEvent(999, { n: 1 });
    transport.pushRaw("not json");
    transport.pushEvent(999, { n: 2 });
    await vi.waitFor(() => {
      expect(payloads.push).toHaveLength(2);
    });
    expect(client.connectionState.status).toBe("connected");

    transport.pushRaw("not json");
    transport.pushRaw("still not json");
    await client.runUntilStopped();

    expect(transport.closeInfo).toEqual({
      code: 1002,
      reason: "Too many malformed frames",
      initiatedLocally: true,
    });
    expect(client.connectionState).toEqual({ status: "stopped" });
  });

  test("two clients in one process do not share state", async () => {
    const first = await createHarness({ token: "test-token" });
    const second = await createHarness({ token: "test-token" });
    await first.client.start();

    expect(first.client.getChat(5)).not.toBeNull();
    expect(second.client.getChat(5)).toBeNull();
    expect(second.client.connectionState).toEqual({ status: "idle" });
  });
});
