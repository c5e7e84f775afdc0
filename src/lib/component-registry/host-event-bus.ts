import { EventEmitterProtected } from '../event-emitter';
import type { EventSubscriber, HostEventSystem } from './types';

/**
 * In-process host event system.
 *
 * `subscribe()` attaches every handler from the subscriber's
 * `getEventHandlers()`; `unsubscribeAll()` detaches exactly those.
 * Subscribing the same subscriber twice is a no-op.
 */
export class HostEventBus
  extends EventEmitterProtected
  implements HostEventSystem
{
  private subscriptions: Map<EventSubscriber, Array<() => void>> = new Map();

  public subscribe(subscriber: EventSubscriber): void {
    if (this.subscriptions.has(subscriber)) {
      return;
    }

    const unsubscribers = Object.entries(subscriber.getEventHandlers()).map(
      ([event, handler]) => this.on(event, handler.bind(subscriber)),
    );

    this.subscriptions.set(subscriber, unsubscribers);
  }

  public unsubscribeAll(subscriber: EventSubscriber): void {
    const unsubscribers = this.subscriptions.get(subscriber);

    if (!unsubscribers) {
      return;
    }

    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }

    this.subscriptions.delete(subscriber);
  }

  public isSubscribed(subscriber: EventSubscriber): boolean {
    return this.subscriptions.has(subscriber);
  }

  /**
   * Dispatch an event to every subscribed handler
   */
  public publish<T = unknown>(event: string, payload?: T): void {
    this.emit(event, payload);
  }
}
