import { describe, expect, test } from "vitest";
import { parseChat, parseMessage, parseUser } from "../shared/entities.js";
import { EntityCache } from "./entity-cache.js";

const me = parseUser({ id: 1, names: [{ name: "Me" }] });
const alice = parseUser({ id: 2, names: [{ name: "Alice" }] });

function dialog(id: number, participants: number[], title?: string) {
  return parseChat({
    id,
    type: "DIALOG",
    title,
    participants: Object.fromEntries(
      participants.map((participant): [string, number] => [String(participant), 0])
    ),
  });
}

describe("EntityCache", () => {
  test("upsert stores entities by kind and replaces them wholesale", () => {
    const cache = new EntityCache();
    cache.upsert(alice);
    cache.upsert(parseChat({ id: 10, type: "CHAT", title: "Team" }));

    expect(cache.get("user", 2)).toBe(alice);
    expect(cache.get("chat", 10)?.title).toBe("Team");
    expect(cache.get("chat", 2)).toBeNull();

    cache.upsert(parseChat({ id: 10, type: "CHAT", title: "Renamed" }));
    expect(cache.all("chat").map((chat) => chat.title)).toEqual(["Renamed"]);
  });

  test("a second upsert of a user replaces every field", () => {
    const cache = new EntityCache();
    cache.upsert(parseUser({ id: 7, phone: "+10000000007", names: [{ name: "Old" }], photoId: 3 }));
    cache.upsert(parseUser({ id: 7, names: [{ firstName: "New" }] }));

    expect(cache.get("user", 7)).toEqual({
      kind: "user",
      id: 7,
      phone: null,
      name: null,
      firstName: "New",
      lastName: null,
      photoId: null,
      baseUrl: null,
    });
  });

  test("untitled dialogs take the name of the other participant", () => {
    const cache = new EntityCache();
    cache.setCurrentUser(me);
    cache.upsert(alice);

    const stored = cache.upsert(dialog(2, [1, 2]));
    expect(stored).toMatchObject({ kind: "chat", title: "Alice" });
    expect(cache.get("chat", 2)?.title).toBe("Alice");
  });

  test("a dialog is retitled when its participant arrives later", () => {
    const cache = new EntityCache();
    cache.setCurrentUser(me);
    cache.upsert(dialog(5, [1, 5]));
    expect(cache.get("chat", 5)?.title).toBeNull();

    cache.upsert(parseUser({ id: 5, names: [{ firstName: "Bob", lastName: "Stone" }] }));
    expect(cache.get("chat", 5)?.title).toBe("Bob Stone");
  });

  test("the current user never names a dialog", () => {
    const cache = new EntityCache();
    cache.upsert(dialog(0, [1]));
    cache.setCurrentUser(me);

    expect(cache.get("chat", 0)?.title).toBeNull();
    expect(cache.currentUser).toBe(me);
  });

  test("titled dialogs and group chats keep their titles", () => {
    const cache = new EntityCache();
    cache.upsert(dialog(2, [1, 2], "Pinned name"));
    cache.upsert(parseChat({ id: 20, type: "CHAT", participants: { "2": 0 } }));
    cache.upsert(alice);

    expect(cache.get("chat", 2)?.title).toBe("Pinned name");
    expect(cache.get("chat", 20)?.title).toBeNull();
  });

  test("patch overwrites only the given fields of a cached entity", () => {
    const cache = new EntityCache();
    cache.upsert(parseChat({ id: 10, type: "CHAT", title: "Team", status: "ACTIVE" }));

    const patched = cache.patch("chat", 10, { title: "Team 2" });
    expect(patched).toMatchObject({ id: 10, type: "CHAT", title: "Team 2", status: "ACTIVE" });
    expect(Object.isFrozen(patched)).toBe(true);
    expect(cache.patch("chat", 11, { title: "Nobody" })).toBeNull();
    expect(cache.get("chat", 11)).toBeNull();
  });

  test("patching the current user updates currentUser", () => {
    const cache = new EntityCache();
    cache.setCurrentUser(me);
    cache.patch("user", 1, { name: "Still me", photoId: 42 });

    expect(cache.currentUser).toMatchObject({ id: 1, name: "Still me", photoId: 42 });
  });

  test("upserting the current user's record replaces currentUser", () => {
    const cache = new EntityCache();
    cache.setCurrentUser(parseUser({ id: 1, names: [{ name: "Old" }] }));
    const fresh = parseUser({ id: 1, names: [{ name: "New" }] });
    cache.upsert(fresh);

    expect(cache.currentUser).toBe(fresh);
    expect(cache.get("user", 1)).toBe(fresh);
  });

  test("recordMessage points the chat at its newest message", () => {
    const cache = new EntityCache();
    cache.upsert(parseChat({ id: 10, type: "CHAT" }));

    const chat = cache.recordMessage(parseMessage({ id: "m-7", text: "hi" }, 10));
    expect(chat?.lastMessageId).toBe("m-7");
    expect(cache.recordMessage(parseMessage({ id: "m-8" }, 99))).toBeNull();
  });

  test("clear forgets everything including the current user", () => {
    const cache = new EntityCache();
    cache.setCurrentUser(me);
    cache.upsertMany([alice, dialog(2, [1, 2])]);
    cache.clear();

    expect(cache.currentUser).toBeNull();
    expect(cache.all("user")).toEqual([]);
    expect(cache.all("chat")).toEqual([]);
  });
});
