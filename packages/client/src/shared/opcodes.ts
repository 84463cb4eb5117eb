import { z } from "zod";

/**
 * Numeric opcodes understood by the driver, keyed by the role they play.
 *
 * The server assigns the numbers; they are configuration rather than
 * constants so a deployment can remap them without a code change. Push
 * opcodes set to `null` are disabled.
 */
export type OpcodeTable = {
  sessionInit: number;
  navEvents: number;
  authRequest: number;
  authCheckCode: number;
  login: number;
  editMessage: number;
  deleteMessage: number;
  getContacts: number;
  getChats: number;
  sendMessage: number;
  pushMessage: number;
  sendReaction: number;
  pushChatPatch: number | null;
  pushContactPatch: number | null;
};

export type OpcodeName = keyof OpcodeTable;

const OPCODE_NAMES: readonly OpcodeName[] = [
  "sessionInit",
  "navEvents",
  "authRequest",
  "authCheckCode",
  "login",
  "editMessage",
  "deleteMessage",
  "getContacts",
  "getChats",
  "sendMessage",
  "pushMessage",
  "sendReaction",
  "pushChatPatch",
  "pushContactPatch",
];

export const DEFAULT_OPCODES: Readonly<OpcodeTable> = Object.freeze({
  sessionInit: 6,
  navEvents: 5,
  authRequest: 17,
  authCheckCode: 18,
  login: 19,
  editMessage: 21,
  deleteMessage: 22,
  getContacts: 32,
  getChats: 48,
  sendMessage: 64,
  pushMessage: 128,
  sendReaction: 178,
  pushChatPatch: null,
  pushContactPatch: null,
});

const OpcodeSchema = z.number().int().nonnegative();

export const OpcodeOverridesSchema = z
  .object({
    sessionInit: OpcodeSchema,
    navEvents: OpcodeSchema,
    authRequest: OpcodeSchema,
    authCheckCode: OpcodeSchema,
    login: OpcodeSchema,
    editMessage: OpcodeSchema,
    deleteMessage: OpcodeSchema,
    getContacts: OpcodeSchema,
    getChats: OpcodeSchema,
    sendMessage: OpcodeSchema,
    pushMessage: OpcodeSchema,
    sendReaction: OpcodeSchema,
    pushChatPatch: OpcodeSchema.nullable(),
    pushContactPatch: OpcodeSchema.nullable(),
  })
  .partial()
  .strict();

export type OpcodeOverrides = z.infer<typeof OpcodeOverridesSchema>;

export function resolveOpcodes(overrides: OpcodeOverrides | undefined): OpcodeTable {
  const table: OpcodeTable = { ...DEFAULT_OPCODES, ...(overrides ?? {}) };
  const seen = new Map<number, OpcodeName>();
  for (const name of OPCODE_NAMES) {
    const value = table[name];
    if (value === null) {
      continue;
    }
    const previous = seen.get(value);
    if (previous) {
      throw new Error(`Opcode ${value} is assigned to both ${previous} and ${name}`);
    }
    seen.set(value, name);
  }
  return table;
}

export function resolveOpcodeName(table: OpcodeTable, opcode: number): OpcodeName | null {
  for (const name of OPCODE_NAMES) {
    if (table[name] === opcode) {
      return name;
    }
  }
  return null;
}
