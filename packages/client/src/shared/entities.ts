import { z } from "zod";
import { ProtocolError } from "./errors.js";

export type EntityKind = "chat" | "user";

export type User = {
  readonly kind: "user";
  readonly id: number;
  readonly phone: string | null;
  readonly name: string | null;
  readonly firstName: string | null;
  readonly lastName: string | null;
  readonly photoId: number | null;
  readonly baseUrl: string | null;
};

export type ChatType = "DIALOG" | "CHAT" | "CHANNEL" | (string & {});

export type Chat = {
  readonly kind: "chat";
  readonly id: number;
  readonly type: ChatType;
  readonly title: string | null;
  readonly participantIds: readonly number[];
  /** Lookup key of the newest message; the message itself is not owned here. */
  readonly lastMessageId: string | null;
  readonly owner: number | null;
  readonly created: number | null;
  readonly modified: number | null;
  readonly status: string;
};

export type Entity = Chat | User;

export type EntityOfKind<K extends EntityKind> = Extract<Entity, { kind: K }>;

export type EntityPatch<K extends EntityKind> = Partial<Omit<EntityOfKind<K>, "kind" | "id">>;

export type EntityUpdate<K extends EntityKind> = {
  id: number;
  fields: EntityPatch<K>;
};

export type Message = {
  readonly id: string;
  readonly text: string;
  readonly senderId: number;
  readonly timestamp: number;
  readonly chatId: number;
  readonly type: string;
  readonly attachments: readonly unknown[];
  readonly replyTo: string | null;
};

/**
 * Raw payload → entity mappers. The client uses {@link defaultEntityParsers}
 * unless a caller supplies its own.
 */
export interface EntityParsers {
  user(raw: unknown): User;
  chat(raw: unknown): Chat;
  message(raw: unknown, chatId: number): Message;
  chatPatch(raw: unknown): EntityUpdate<"chat">;
  userPatch(raw: unknown): EntityUpdate<"user">;
}

const IdSchema = z.union([z.number(), z.string().regex(/^\d+$/)]).transform(Number);
const OptionalString = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));
const OptionalNumber = z.number().nullish().transform((value) => value ?? null);

const RawNameSchema = z.object({
  name: z.string().nullish(),
  firstName: z.string().nullish(),
  lastName: z.string().nullish(),
});

const RawContactSchema = z.object({
  id: IdSchema,
  phone: OptionalString,
  names: z.array(RawNameSchema).nullish(),
  photoId: OptionalNumber,
  baseUrl: OptionalString,
});

const RawUserSchema = z.union([
  z.object({ contact: RawContactSchema }),
  RawContactSchema,
]);

const RawMessageSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  text: z.string().nullish(),
  sender: z.number().nullish(),
  time: z.number().nullish(),
  type: z.string().nullish(),
  attaches: z.array(z.unknown()).nullish(),
  link: z
    .object({ messageId: z.union([z.string(), z.number()]).transform(String) })
    .nullish(),
});

const RawChatSchema = z.object({
  id: IdSchema,
  type: z.string().nullish(),
  title: z.string().nullish(),
  participants: z.record(z.unknown()).nullish(),
  lastMessage: z
    .object({ id: z.union([z.string(), z.number()]).transform(String) })
    .nullish(),
  owner: OptionalNumber,
  created: OptionalNumber,
  modified: OptionalNumber,
  status: z.string().nullish(),
});

// Patches keep `undefined` (field absent) apart from `null` (field cleared).
const RawChatPatchSchema = z.object({
  id: IdSchema,
  type: z.string().optional(),
  title: z.string().nullable().optional(),
  participants: z.record(z.unknown()).optional(),
  lastMessage: z
    .object({ id: z.union([z.string(), z.number()]).transform(String) })
    .nullable()
    .optional(),
  owner: z.number().nullable().optional(),
  modified: z.number().nullable().optional(),
  status: z.string().optional(),
});

const RawContactPatchSchema = z.object({
  id: IdSchema,
  phone: z.union([z.string(), z.number()]).transform(String).nullable().optional(),
  names: z.array(RawNameSchema).optional(),
  photoId: z.number().nullable().optional(),
  baseUrl: z.string().nullable().optional(),
});

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  label: string
): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || label}: ${issue.message}`)
      .join("; ");
    throw new ProtocolError(`Invalid ${label} payload (${issues})`);
  }
  return result.data;
}

export function parseUser(raw: unknown): User {
  const parsed = parseOrThrow(RawUserSchema, raw, "user");
  const contact = "contact" in parsed ? parsed.contact : parsed;
  const primaryName = contact.names?.[0];
  const user: User = {
    kind: "user",
    id: contact.id,
    phone: contact.phone,
    name: primaryName?.name ?? null,
    firstName: primaryName?.firstName ?? null,
    lastName: primaryName?.lastName ?? null,
    photoId: contact.photoId,
    baseUrl: contact.baseUrl,
  };
  return Object.freeze(user);
}

export function parseMessage(raw: unknown, chatId: number): Message {
  const parsed = parseOrThrow(RawMessageSchema, raw, "message");
  const message: Message = {
    id: parsed.id,
    text: parsed.text ?? "",
    senderId: parsed.sender ?? 0,
    timestamp: parsed.time ?? 0,
    chatId,
    type: parsed.type ?? "USER",
    attachments: Object.freeze([...(parsed.attaches ?? [])]),
    replyTo: parsed.link?.messageId ?? null,
  };
  return Object.freeze(message);
}

export function parseChat(raw: unknown): Chat {
  const parsed = parseOrThrow(RawChatSchema, raw, "chat");
  const participantIds = participantIdsOf(parsed.participants ?? {});
  const chat: Chat = {
    kind: "chat",
    id: parsed.id,
    type: parsed.type ?? "DIALOG",
    title: parsed.title ?? null,
    participantIds: Object.freeze(participantIds),
    lastMessageId: parsed.lastMessage?.id ?? null,
    owner: parsed.owner,
    created: parsed.created,
    modified: parsed.modified,
    status: parsed.status ?? "ACTIVE",
  };
  return Object.freeze(chat);
}

/** Fields of a chat carried by a partial-update push; raw may be wrapped in `chat`. */
export function parseChatPatch(raw: unknown): EntityUpdate<"chat"> {
  const parsed = parseOrThrow(RawChatPatchSchema, unwrap(raw, "chat"), "chat patch");
  const fields: EntityPatch<"chat"> = {
    ...(parsed.type !== undefined ? { type: parsed.type } : {}),
    ...(parsed.title !== undefined ? { title: parsed.title } : {}),
    ...(parsed.participants !== undefined
      ? { participantIds: Object.freeze(participantIdsOf(parsed.participants)) }
      : {}),
    ...(parsed.lastMessage !== undefined
      ? { lastMessageId: parsed.lastMessage?.id ?? null }
      : {}),
    ...(parsed.owner !== undefined ? { owner: parsed.owner } : {}),
    ...(parsed.modified !== undefined ? { modified: parsed.modified } : {}),
    ...(parsed.status !== undefined ? { status: parsed.status } : {}),
  };
  return { id: parsed.id, fields };
}

export function parseUserPatch(raw: unknown): EntityUpdate<"user"> {
  const parsed = parseOrThrow(RawContactPatchSchema, unwrap(raw, "contact"), "contact patch");
  const primaryName = parsed.names?.[0];
  const fields: EntityPatch<"user"> = {
    ...(parsed.phone !== undefined ? { phone: parsed.phone } : {}),
    ...(primaryName !== undefined
      ? {
          name: primaryName.name ?? null,
          firstName: primaryName.firstName ?? null,
          lastName: primaryName.lastName ?? null,
        }
      : {}),
    ...(parsed.photoId !== undefined ? { photoId: parsed.photoId } : {}),
    ...(parsed.baseUrl !== undefined ? { baseUrl: parsed.baseUrl } : {}),
  };
  return { id: parsed.id, fields };
}

function participantIdsOf(participants: Record<string, unknown>): number[] {
  return Object.keys(participants)
    .map(Number)
    .filter((id) => Number.isInteger(id));
}

function unwrap(raw: unknown, key: string): unknown {
  if (typeof raw === "object" && raw !== null && key in raw) {
    return Reflect.get(raw, key);
  }
  return raw;
}

export const defaultEntityParsers: EntityParsers = {
  user: parseUser,
  chat: parseChat,
  message: parseMessage,
  chatPatch: parseChatPatch,
  userPatch: parseUserPatch,
};

export function displayName(user: User): string {
  if (user.name) {
    return user.name;
  }
  const parts = [user.firstName, user.lastName].filter(
    (part): part is string => typeof part === "string" && part.length > 0
  );
  return parts.length > 0 ? parts.join(" ") : `User ${user.id}`;
}
