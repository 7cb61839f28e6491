import type { Event } from './schema';

export type EventType = Event['type'];
export type EventOf<TType extends EventType> = Extract<Event, { type: TType }>;
export type EventHandler<TEvent extends Event = Event> = (event: TEvent) => void | Promise<void>;

function isEventOf<TType extends EventType>(event: Event, type: TType): event is EventOf<TType> {
  return event.type === type;
}

/** Fans run events out to renderers and listeners in the same process. */
export class EventBus {
  private readonly listeners = new Set<EventHandler>();

  subscribe(handler: EventHandler): () => void {
    this.listeners.add(handler);
    return () => {
      this.listeners.delete(handler);
    };
  }

  on<TType extends EventType>(type: TType, handler: EventHandler<EventOf<TType>>): () => void {
    return this.subscribe((event) => (isEventOf(event, type) ? handler(event) : undefined));
  }

  /** Delivers to every listener; failures are collected and rethrown together. */
  async emit(event: Event): Promise<void> {
    const settled = await Promise.allSettled(
      [...this.listeners].map(async (listener) => listener(event)),
    );
    const failures = settled.flatMap((result) =>
      result.status === 'rejected' ? [result.reason] : [],
    );
    if (failures.length > 0) {
      throw new AggregateError(failures, `Listeners failed for ${event.type}`);
    }
  }
}
