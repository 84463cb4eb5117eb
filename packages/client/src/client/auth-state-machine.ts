import { z } from "zod";
import type { Logger } from "../logger.js";
import type { SessionHandle } from "../session/session-handle.js";
import { AuthError, RateLimitError, ServerError } from "../shared/errors.js";
import type { FramePayload } from "../shared/frames.js";
import type { OpcodeTable } from "../shared/opcodes.js";
import type { CallOptions } from "./correlator.js";
import type { AuthCodeErrorPayload, WavelinkEvents } from "./events.js";

export type AuthState =
  | { status: "unauthenticated" }
  | { status: "code_requested"; requestId: string }
  | { status: "verifying"; requestId: string }
  | { status: "authenticated"; token: string }
  | { status: "reauth_required" }
  | { status: "rate_limited"; until: number };

export type AuthStatus = AuthState["status"];

export type AuthStateListener = (state: AuthState, previous: AuthState) => void;

export type CodeRequestContext = {
  phone: string;
  attempt: number;
  lastError: AuthError | null;
};

export interface CodeProvider {
  provideCode(context: CodeRequestContext): string | Promise<string>;
}

/** The slice of the correlator the auth flow drives. */
export interface AuthCaller {
  call(opcode: number, payload: FramePayload, options?: CallOptions): Promise<FramePayload>;
  onServerError(listener: (error: ServerError) => void): () => void;
}

export interface AuthEventSink {
  emit<K extends keyof WavelinkEvents>(name: K, payload: WavelinkEvents[K]): void;
}

export type AuthSettings = {
  language: string;
  chatsCount: number;
  maxCodeAttempts: number;
  rateLimitCooldownMs: number;
  tokenRejectionCodes: readonly string[];
  rateLimitCodes: readonly string[];
};

export type AuthStateMachineOptions = {
  caller: AuthCaller;
  session: SessionHandle;
  events: AuthEventSink;
  opcodes: OpcodeTable;
  settings: AuthSettings;
  logger: Logger;
  now?: () => number;
};

export type AuthenticateParams = {
  phone?: string;
  codeProvider?: CodeProvider;
};

const AuthRequestResponseSchema = z.object({ token: z.string().min(1) });

const CheckCodeResponseSchema = z.object({
  tokenAttrs: z.object({
    LOGIN: z.object({ token: z.string().min(1) }),
  }),
});

const LoginResponseSchema = z.object({ token: z.string().min(1).optional() });

/**
 * Drives phone/code login and token login, and watches every error response
 * for a rejected token.
 *
 * Transitions are serialized: each public operation runs after the previous
 * one settles, so a late response can never move the machine out of a state
 * a newer operation has already left.
 */
export class AuthStateMachine {
  private current: AuthState = { status: "unauthenticated" };
  private resumeAfterRateLimit: AuthState = { status: "unauthenticated" };
  private queue: Promise<unknown> = Promise.resolve();
  private listeners = new Set<AuthStateListener>();
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly detachServerErrors: () => void;

  constructor(private readonly options: AuthStateMachineOptions) {
    this.logger = options.logger.child({ module: "auth" });
    this.now = options.now ?? Date.now;
    this.detachServerErrors = options.caller.onServerError((error) => {
      this.observeServerError(error);
    });
  }

  get state(): AuthState {
    return this.current;
  }

  subscribe(listener: AuthStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.detachServerErrors();
    this.listeners.clear();
  }

  /** Submit a phone number and wait for the server to send a code. */
  beginAuth(phone: string): Promise<void> {
    return this.serialize(async () => {
      this.assertNotRateLimited();
      if (this.current.status === "verifying" || this.current.status === "authenticated") {
        throw new AuthError(`Cannot begin auth while ${this.current.status}`);
      }
      const before = this.current;

      let payload: FramePayload;
      try {
        payload = await this.options.caller.call(this.options.opcodes.authRequest, {
          phone,
          type: "START_AUTH",
          language: this.options.settings.language,
        });
      } catch (error) {
        throw this.failAuthStep(error, before);
      }

      const parsed = AuthRequestResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new AuthError("Auth request response carried no code request token");
      }

      await this.options.session.update({ phone });
      await this.sendNavigationEvents();
      this.transition({ status: "code_requested", requestId: parsed.data.token });
    });
  }

  /**
   * Verify the code the user received. On success the login token is
   * persisted before the token login runs; the login payload is returned.
   */
  submitCode(code: string): Promise<FramePayload> {
    return this.serialize(async () => {
      this.assertNotRateLimited();
      if (this.current.status !== "code_requested") {
        throw new AuthError(`No verification code was requested (state ${this.current.status})`);
      }
      const requested: AuthState = this.current;
      const { requestId } = this.current;
      this.transition({ status: "verifying", requestId });

      let payload: FramePayload;
      try {
        payload = await this.options.caller.call(this.options.opcodes.authCheckCode, {
          token: requestId,
          verifyCode: code,
          authTokenType: "CHECK_CODE",
        });
      } catch (error) {
        throw this.failAuthStep(error, requested);
      }

      const parsed = CheckCodeResponseSchema.safeParse(payload);
      if (!parsed.success) {
        this.transition(requested);
        throw new AuthError("Code was accepted but no login token was returned");
      }

      const token = parsed.data.tokenAttrs.LOGIN.token;
      await this.options.session.update({ token });
      this.logger.info("login_token_saved");
      return this.login(token);
    });
  }

  /** Log in with `token`, or with the session's stored token. */
  loginWithToken(token?: string): Promise<FramePayload> {
    return this.serialize(async () => {
      const effective = token ?? this.options.session.current.token;
      if (!effective) {
        throw new AuthError("No login token available");
      }
      return this.login(effective);
    });
  }

  /**
   * Full login: the stored token if there is one, otherwise the phone/code
   * flow with codes taken from `codeProvider`.
   */
  async authenticate(params: AuthenticateParams = {}): Promise<FramePayload> {
    const { codeProvider } = params;
    if (this.options.session.current.token) {
      try {
        return await this.loginWithToken();
      } catch (error) {
        const canRetryWithPhone =
          this.current.status === "reauth_required" && params.phone !== undefined && codeProvider;
        if (!canRetryWithPhone) {
          throw error;
        }
        this.logger.info("token_rejected_retrying_with_phone");
      }
    }

    const phone = params.phone;
    if (!phone || !codeProvider) {
      this.options.events.emit("auth_required", { reason: "no_credentials" });
      throw new AuthError("No stored token, and no phone number and code provider were given");
    }

    await this.beginAuth(phone);
    const maxAttempts = this.options.settings.maxCodeAttempts;
    let lastError: AuthError | null = null;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const code = await codeProvider.provideCode({ phone, attempt, lastError });
      try {
        return await this.submitCode(code);
      } catch (error) {
        const retryable =
          error instanceof AuthError && this.current.status === "code_requested";
        if (!retryable || attempt === maxAttempts) {
          throw error;
        }
        lastError = error;
        this.logger.warn({ attempt, maxAttempts }, "auth_code_retry");
      }
    }
    throw lastError ?? new AuthError("Code verification failed");
  }

  /** Forget any in-progress or completed login, e.g. after a stop. */
  reset(): Promise<void> {
    return this.serialize(async () => {
      this.transition({ status: "unauthenticated" });
    });
  }

  private async login(token: string): Promise<FramePayload> {
    this.assertNotRateLimited();
    const settings = this.options.settings;

    let payload: FramePayload;
    try {
      payload = await this.options.caller.call(this.options.opcodes.login, {
        interactive: false,
        token,
        chatsCount: settings.chatsCount,
        chatsSync: 0,
        contactsSync: 0,
        presenceSync: 0,
        draftsSync: 0,
      });
    } catch (error) {
      if (error instanceof ServerError && this.isTokenRejection(error)) {
        await this.expireToken("token_rejected");
        throw new AuthError("Login token was rejected", {
          code: error.code,
          localizedMessage: error.localizedMessage,
          cause: error,
        });
      }
      const restore: AuthState =
        this.current.status === "verifying" ? { status: "unauthenticated" } : this.current;
      throw this.failAuthStep(error, restore);
    }

    // The server may rotate the token on login.
    const refreshed = LoginResponseSchema.safeParse(payload);
    const activeToken =
      refreshed.success && refreshed.data.token ? refreshed.data.token : token;
    if (activeToken !== this.options.session.current.token) {
      await this.options.session.update({ token: activeToken });
    }
    this.transition({ status: "authenticated", token: activeToken });
    return payload;
  }

  private observeServerError(error: ServerError): void {
    if (this.current.status !== "authenticated" || !this.isTokenRejection(error)) {
      return;
    }
    void this.serialize(() => this.expireToken("token_rejected")).catch((expireError) => {
      this.logger.error({ err: expireError }, "token_expiry_failed");
    });
  }

  private async expireToken(reason: string): Promise<void> {
    if (this.current.status === "reauth_required") {
      return;
    }
    this.logger.warn({ reason }, "login_token_invalid");
    this.transition({ status: "reauth_required" });
    this.options.events.emit("auth_required", { reason });
    await this.options.session.update({ token: null });
  }

  private failAuthStep(error: unknown, restore: AuthState): Error {
    if (!(error instanceof ServerError)) {
      this.transition(restore);
      return error instanceof Error ? error : new AuthError(String(error));
    }

    const details: AuthCodeErrorPayload = {
      error: error.code,
      message: error.serverMessage,
      localizedMessage: error.localizedMessage,
    };

    if (error.code !== null && this.options.settings.rateLimitCodes.includes(error.code)) {
      const until = this.now() + this.options.settings.rateLimitCooldownMs;
      this.resumeAfterRateLimit = restore;
      this.transition({ status: "rate_limited", until });
      this.options.events.emit("auth_limit_exceeded", { ...details, until });
      return new RateLimitError(until);
    }

    this.transition(restore);
    this.logger.warn({ code: error.code, opcode: error.opcode }, "auth_step_rejected");
    this.options.events.emit("auth_code_error", details);
    return new AuthError(error.message, {
      code: error.code,
      localizedMessage: error.localizedMessage,
      cause: error,
    });
  }

  private assertNotRateLimited(): void {
    if (this.current.status !== "rate_limited") {
      return;
    }
    if (this.now() < this.current.until) {
      throw new RateLimitError(this.current.until);
    }
    this.transition(this.resumeAfterRateLimit);
  }

  private isTokenRejection(error: ServerError): boolean {
    const codes = this.options.settings.tokenRejectionCodes;
    return (
      (error.code !== null && codes.includes(error.code)) ||
      (error.serverMessage !== null && codes.includes(error.serverMessage))
    );
  }

  private async sendNavigationEvents(): Promise<void> {
    const time = this.now();
    try {
      await this.options.caller.call(this.options.opcodes.navEvents, {
        events: [
          { type: "COLD_START", time },
          { type: "GO", page: 1, time },
        ],
      });
    } catch (error) {
      this.logger.warn({ err: error }, "nav_events_failed");
    }
  }

  private transition(next: AuthState): void {
    const previous = this.current;
    if (previous === next) {
      return;
    }
    this.current = next;
    this.logger.debug({ from: previous.status, to: next.status }, "auth_state_changed");
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        this.logger.error({ err: error }, "auth_listener_failed");
      }
    }
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}
