import type {
  Chat,
  Entity,
  EntityKind,
  EntityOfKind,
  EntityPatch,
  Message,
  User,
} from "../shared/entities.js";

type EntityMaps = { [K in EntityKind]: Map<number, EntityOfKind<K>> };

/**
 * In-memory chats and users for one client.
 *
 * Records are frozen and replaced wholesale. The only derived field is a
 * dialog's title: a dialog the server sends without one is named after its
 * first participant (other than the current user) whose name is known.
 */
export class EntityCache {
  private maps: EntityMaps = { chat: new Map(), user: new Map() };
  private current: User | null = null;

  get currentUser(): User | null {
    return this.current;
  }

  setCurrentUser(user: User): void {
    this.current = user;
    this.upsert(user);
  }

  upsert(entity: Entity): Entity {
    switch (entity.kind) {
      case "chat": {
        const chat = this.withDerivedTitle(entity);
        this.maps.chat.set(chat.id, chat);
        return chat;
      }
      case "user": {
        this.maps.user.set(entity.id, entity);
        if (this.current?.id === entity.id) {
          this.current = entity;
        }
        this.nameDialogsAfter(entity);
        return entity;
      }
    }
  }

  upsertMany<E extends Entity>(entities: readonly E[]): Entity[] {
    return entities.map((entity) => this.upsert(entity));
  }

  /**
   * Overwrite the given fields of a cached entity. Returns null when the
   * entity is not cached; a patch never creates one.
   */
  patch<K extends EntityKind>(
    kind: K,
    id: number,
    fields: EntityPatch<K>
  ): EntityOfKind<K> | null {
    const map = this.maps[kind];
    const existing = map.get(id);
    if (!existing) {
      return null;
    }
    const next = { ...existing, ...fields, kind: existing.kind, id: existing.id };
    Object.freeze(next);
    map.set(id, next);
    if (kind === "user" && this.current?.id === id) {
      this.current = this.maps.user.get(id) ?? this.current;
    }
    return next;
  }

  get<K extends EntityKind>(kind: K, id: number): EntityOfKind<K> | null {
    return this.maps[kind].get(id) ?? null;
  }

  all<K extends EntityKind>(kind: K): EntityOfKind<K>[] {
    return Array.from(this.maps[kind].values());
  }

  /** Point the message's chat at it as the newest message. */
  recordMessage(message: Message): Chat | null {
    return this.patch("chat", message.chatId, { lastMessageId: message.id });
  }

  clear(): void {
    this.maps.chat.clear();
    this.maps.user.clear();
    this.current = null;
  }

  private withDerivedTitle(chat: Chat): Chat {
    if (chat.type !== "DIALOG" || chat.title) {
      return chat;
    }
    for (const participantId of chat.participantIds) {
      if (participantId === this.current?.id) {
        continue;
      }
      const name = nameOf(this.maps.user.get(participantId));
      if (name) {
        return retitle(chat, name);
      }
    }
    return chat;
  }

  private nameDialogsAfter(user: User): void {
    const name = nameOf(user);
    if (!name || user.id === this.current?.id) {
      return;
    }
    for (const chat of this.maps.chat.values()) {
      if (chat.type !== "DIALOG" || chat.title) {
        continue;
      }
      if (chat.id === user.id || chat.participantIds.includes(user.id)) {
        this.maps.chat.set(chat.id, retitle(chat, name));
      }
    }
  }
}

function nameOf(user: User | undefined): string | null {
  if (!user) {
    return null;
  }
  if (user.name) {
    return user.name;
  }
  const joined = [user.firstName, user.lastName].filter(Boolean).join(" ");
  return joined.length > 0 ? joined : null;
}

function retitle(chat: Chat, title: string): Chat {
  const next: Chat = { ...chat, title };
  return Object.freeze(next);
}
