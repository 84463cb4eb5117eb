import type { Session, SessionStore } from "./session-store.js";

export type SessionChanges = Partial<Pick<Session, "token" | "phone">>;

/**
 * The client's live session plus the store it persists to. Every change is
 * written through before `update` resolves.
 */
export class SessionHandle {
  private session: Session;

  constructor(
    private readonly store: SessionStore,
    initial: Session
  ) {
    this.session = initial;
  }

  get current(): Session {
    return this.session;
  }

  async update(changes: SessionChanges): Promise<Session> {
    const next: Session = { ...this.session, ...changes };
    this.session = next;
    await this.store.save(next);
    return next;
  }
}
