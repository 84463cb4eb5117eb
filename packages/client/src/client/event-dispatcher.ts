import type { Logger } from "../logger.js";

export type EventHandlerFunction<T> = (payload: T) => void | Promise<void>;

export interface EventHandlerObject<T> {
  handle(payload: T): void | Promise<void>;
}

export type EventHandler<T> = EventHandlerFunction<T> | EventHandlerObject<T>;

type Registration<T> = {
  handler: EventHandler<T>;
  once: boolean;
};

type HandlerRegistry<E> = { [K in keyof E]?: Array<Registration<E[K]>> };

type DeliveryJob = {
  name: string;
  run: () => Promise<void>;
};

export type EventDispatcherOptions = {
  logger: Logger;
  queueLimit: number;
};

/**
 * Per-client event fan-out.
 *
 * `emit` only enqueues: handler code never runs on the emitter's stack, so
 * the read loop is not held up by slow handlers. A single worker drains the
 * queue, awaiting each handler in registration order, which keeps delivery
 * in emit order. Handlers that throw or reject are logged and skipped.
 */
export class EventDispatcher<E extends Record<string, unknown>> {
  private handlers: HandlerRegistry<E> = {};
  private queue: DeliveryJob[] = [];
  private worker: Promise<void> | null = null;
  private stopped = false;
  private readonly logger: Logger;
  private readonly queueLimit: number;

  constructor(options: EventDispatcherOptions) {
    this.logger = options.logger.child({ module: "dispatcher" });
    this.queueLimit = options.queueLimit;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  on<K extends keyof E>(name: K, handler: EventHandler<E[K]>): () => void {
    return this.register(name, { handler, once: false });
  }

  /** Like {@link on}, but the handler is removed before its first delivery. */
  once<K extends keyof E>(name: K, handler: EventHandler<E[K]>): () => void {
    return this.register(name, { handler, once: true });
  }

  /** Removes the first registration of `handler`, whether added by `on` or `once`. */
  off<K extends keyof E>(name: K, handler: EventHandler<E[K]>): void {
    const registration = this.handlers[name]?.find((entry) => entry.handler === handler);
    if (registration) {
      this.unregister(name, registration);
    }
  }

  listenerCount<K extends keyof E>(name: K): number {
    return this.handlers[name]?.length ?? 0;
  }

  emit<K extends keyof E>(name: K, payload: E[K]): void {
    if (this.stopped) {
      return;
    }
    if (this.queue.length >= this.queueLimit) {
      this.logger.warn(
        { event: String(name), queueLimit: this.queueLimit },
        "dispatch_queue_overflow"
      );
      return;
    }
    this.queue.push({ name: String(name), run: () => this.deliver(name, payload) });
    this.ensureWorker();
  }

  /** Resolves once every event queued so far has been delivered. */
  async drain(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  /**
   * Ignore further emits until {@link resume}. Events already queued are
   * still delivered; {@link clear} drops them.
   */
  stop(): void {
    this.stopped = true;
  }

  clear(): void {
    this.queue = [];
  }

  resume(): void {
    this.stopped = false;
  }

  private register<K extends keyof E>(name: K, registration: Registration<E[K]>): () => void {
    const list = this.handlers[name] ?? [];
    list.push(registration);
    this.handlers[name] = list;
    return () => this.unregister(name, registration);
  }

  private unregister<K extends keyof E>(name: K, registration: Registration<E[K]>): void {
    const list = this.handlers[name];
    if (!list) {
      return;
    }
    const index = list.indexOf(registration);
    if (index !== -1) {
      list.splice(index, 1);
    }
    if (list.length === 0) {
      delete this.handlers[name];
    }
  }

  private ensureWorker(): void {
    if (this.worker) {
      return;
    }
    this.worker = this.runWorker().finally(() => {
      this.worker = null;
      if (this.queue.length > 0) {
        this.ensureWorker();
      }
    });
  }

  private async runWorker(): Promise<void> {
    // Yield first so nothing runs inside emit().
    await Promise.resolve();
    let job = this.queue.shift();
    while (job) {
      await job.run();
      job = this.queue.shift();
    }
  }

  private async deliver<K extends keyof E>(name: K, payload: E[K]): Promise<void> {
    const list = this.handlers[name];
    if (!list || list.length === 0) {
      return;
    }
    for (const registration of [...list]) {
      if (!list.includes(registration)) {
        continue;
      }
      if (registration.once) {
        this.unregister(name, registration);
      }
      const { handler } = registration;
      try {
        if (typeof handler === "function") {
          await handler(payload);
        } else {
          await handler.handle(payload);
        }
      } catch (error) {
        this.logger.error({ event: String(name), err: error }, "event_handler_failed");
      }
    }
  }
}
