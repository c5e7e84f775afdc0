/**
 * Instead of using `EventEmitter`, you could extend `EventEmitterProtected`
 * if you want the emit method to be protected, and allow only your class to emit events.
 *
 * A small synchronous event emitter. Listeners run in subscription order on the
 * caller's stack; a throwing listener is handed to `handleListenerError()`,
 * which rethrows unless a subclass overrides it.
 */

export type EventCallback<T = unknown> = (data: T) => void;

export class EventEmitterProtected {
  private events: Map<string, Set<EventCallback<unknown>>>;

  constructor() {
    this.events = new Map();
  }

  /**
   * Subscribe to an event
   * @param event The event name to subscribe to
   * @param callback The callback function to be called when the event is emitted
   * @returns A function to unsubscribe from the event
   */
  public on<T = unknown>(event: string, callback: EventCallback<T>): () => void {
    let callbacks = this.events.get(event);

    if (!callbacks) {
      callbacks = new Set();
      this.events.set(event, callbacks);
    }

    // Listeners are stored type-erased; emit() is the only caller
    const stored = callback as EventCallback<unknown>;
    callbacks.add(stored);

    // Return unsubscribe function for cleanup
    return () => {
      const current = this.events.get(event);

      if (current) {
        current.delete(stored);

        if (current.size === 0) {
          this.events.delete(event);
        }
      }
    };
  }

  /**
   * Subscribe to an event once - automatically unsubscribes after first emission
   * @returns A function to unsubscribe from the event before it's called
   */
  public once<T = unknown>(
    event: string,
    callback: EventCallback<T>,
  ): () => void {
    const unsubscribe = this.on<T>(event, (data) => {
      unsubscribe();
      callback(data);
    });

    return unsubscribe;
  }

  /**
   * Check if an event has any subscribers
   */
  public hasListeners(event: string): boolean {
    const callbacks = this.events.get(event);
    return callbacks !== undefined && callbacks.size > 0;
  }

  /**
   * Get the number of subscribers for an event
   */
  public listenerCount(event: string): number {
    return this.events.get(event)?.size ?? 0;
  }

  /**
   * Remove all event listeners
   * @param event Optional event name. If not provided, removes all listeners for all events
   */
  public clear(event?: string): void {
    if (event) {
      this.events.delete(event);
    } else {
      this.events.clear();
    }
  }

  /**
   * Emit an event with optional data
   * This method is protected to allow only derived classes to trigger events.
   */
  protected emit<T = unknown>(event: string, data?: T): void {
    const callbacks = this.events.get(event);

    if (!callbacks) {
      return;
    }

    // Snapshot so listeners may unsubscribe while being called
    for (const callback of Array.from(callbacks)) {
      try {
        callback(data);
      } catch (error) {
        this.handleListenerError(event, error);
      }
    }
  }

  /**
   * Called when a listener throws. Rethrows by default, which stops the
   * remaining listeners of that emission.
   */
  protected handleListenerError(_event: string, error: unknown): void {
    throw error;
  }
}

/**
 * A class that implements the event emitter pattern with public emit method.
 *
 * Use this when you want any code with access to the emitter to be able to trigger events.
 * If you want to control who can emit events, extend EventEmitterProtected instead.
 */
export class EventEmitter extends EventEmitterProtected {
  public emit<T = unknown>(event: string, data?: T): void {
    super.emit(event, data);
  }
}
