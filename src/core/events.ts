type Handler<T> = (data: T) => void;

type Typed = { type: string };

/** Typed pub/sub keyed by `event.type`; '*' receives everything. */
export class EventBus<E extends Typed> {
  private handlers = new Map<string, Set<Handler<E>>>();
  private readonly onError: (err: unknown, event: E) => void;

  constructor(onError?: (err: unknown, event: E) => void) {
    this.onError = onError ?? ((err) => { throw err; });
  }

  on<K extends E['type']>(type: K, handler: Handler<Extract<E, { type: K }>>): () => void;
  on(type: '*', handler: Handler<E>): () => void;
  on(type: string, handler: Handler<E>): () => void {
    return this.subscribe(type, handler);
  }

  /** Untyped form of on(), for callers that forward their own overloads. */
  subscribe(type: string, handler: Handler<E>): () => void {
    const set = this.handlers.get(type) ?? new Set<Handler<E>>();
    this.handlers.set(type, set);
    set.add(handler);
    return () => this.off(type, handler);
  }

  off(type: string, handler: Handler<E>): void {
    this.handlers.get(type)?.delete(handler);
  }

  emit(event: E): void {
    for (const key of [event.type, '*']) {
      const handlers = this.handlers.get(key);
      if (!handlers) continue;
      for (const h of handlers) {
        try {
          h(event);
        } catch (err) {
          this.onError(err, event);
        }
      }
    }
  }

  clear(): void {
    this.handlers.clear();
  }
}
