export type Unsubscribe = () => void;
export type Listener<TEvent> = (event: TEvent) => void;
export type EventFilter<TEvent> = (event: TEvent) => boolean;
export type ListenerErrorHandler<TEvent> = (error: unknown, event: TEvent) => void;

/**
 * Synchronous fan-out of log entries to the logger, the replay UI and tests.
 *
 * Listeners run in subscription order and may narrow what they receive with a
 * filter (one game's entries, say). A listener that throws is reported to
 * `onListenerError` and skipped for that event; emitters never see the error.
 */
export class EventBus<TEvent> {
  private listeners = new Map<Listener<TEvent>, EventFilter<TEvent> | undefined>();

  constructor(private readonly onListenerError: ListenerErrorHandler<TEvent> = () => {}) {}

  get listenerCount(): number {
    return this.listeners.size;
  }

  subscribe(listener: Listener<TEvent>, filter?: EventFilter<TEvent>): Unsubscribe {
    this.listeners.set(listener, filter);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: TEvent): void {
    for (const [listener, filter] of this.listeners) {
      if (filter && !filter(event)) continue;
      try {
        listener(event);
      } catch (error) {
        this.onListenerError(error, event);
      }
    }
  }
}
