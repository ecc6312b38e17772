/**
 * Strictly-typed, ordered, non-reentrant event notifier.
 *
 * Handlers run synchronously in registration order. An event emitted while
 * another one is being delivered (for example a handler that pauses the
 * session from inside a `phaseChange` callback) is queued and delivered
 * after the current event has reached every handler, so handlers never run
 * concurrently with themselves and observe events in the order they were
 * raised.
 *
 * A handler that throws does not stop delivery to the remaining handlers.
 * The error is forwarded to `error` handlers when the EventMap declares
 * one and somebody listens, otherwise it is logged.
 *
 * @typeParam EventMap - A type alias (not an interface) mapping event names to handler signatures.
 *
 * @example
 * ```typescript
 * type TimerEvents = {
 *   tick: (remaining: number) => void;
 *   error: (err: Error) => void;
 * };
 *
 * class Timer extends EventNotifier<TimerEvents> {
 *   step(remaining: number) {
 *     this.emit("tick", remaining);
 *   }
 * }
 * ```
 */

// Handlers are stored untyped; the public generics carry the safety.
type AnyHandler = (...args: unknown[]) => void;

interface PendingEvent {
  readonly event: string;
  readonly args: unknown[];
}

export class EventNotifier<
  EventMap extends Record<string, (...args: never[]) => void>,
> {
  private readonly listeners = new Map<string, Set<AnyHandler>>();
  private readonly pending: PendingEvent[] = [];
  private dispatching = false;

  /** Register a handler. Returns an unsubscribe function. */
  on<E extends keyof EventMap & string>(event: E, handler: EventMap[E]): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(handler as unknown as AnyHandler);
    return () => this.off(event, handler);
  }

  /** Remove a handler. No-op if it was never registered. */
  off<E extends keyof EventMap & string>(event: E, handler: EventMap[E]): void {
    this.listeners.get(event)?.delete(handler as unknown as AnyHandler);
  }

  /** Register a handler that is removed after its first call. */
  once<E extends keyof EventMap & string>(event: E, handler: EventMap[E]): () => void {
    const wrapper: AnyHandler = (...args: unknown[]) => {
      this.off(event, wrapper as unknown as EventMap[E]);
      (handler as unknown as AnyHandler)(...args);
    };
    return this.on(event, wrapper as unknown as EventMap[E]);
  }

  listenerCount<E extends keyof EventMap & string>(event: E): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  /** Remove all handlers, optionally for a single event only. */
  removeAllListeners<E extends keyof EventMap & string>(event?: E): void {
    if (event !== undefined) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }

  /**
   * Queue an event and, unless a delivery is already in progress further up
   * the stack, deliver everything queued before returning.
   */
  protected emit<E extends keyof EventMap & string>(
    event: E,
    ...args: Parameters<EventMap[E]>
  ): void {
    this.pending.push({ event, args: args as unknown[] });
    if (this.dispatching) return;

    this.dispatching = true;
    try {
      let next = this.pending.shift();
      while (next !== undefined) {
        this.deliver(next);
        next = this.pending.shift();
      }
    } finally {
      this.dispatching = false;
    }
  }

  private deliver({ event, args }: PendingEvent): void {
    const set = this.listeners.get(event);
    if (!set || set.size === 0) return;

    // Copy so handlers may subscribe or unsubscribe while we iterate.
    for (const handler of [...set]) {
      try {
        handler(...args);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        if (event !== "error" && (this.listeners.get("error")?.size ?? 0) > 0) {
          this.pending.push({ event: "error", args: [error] });
        } else {
          console.error(`${this.constructor.name}: listener threw during "${event}"`, error);
        }
      }
    }
  }
}
