import type {
  AnalyticsEvent,
  AnalyticsEventType,
  EventHandler,
  EventOfType,
} from '../models/events.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('event-bus');

type AnyEventHandler = (event: AnalyticsEvent) => void | Promise<void>;

function isEventOfType<T extends AnalyticsEventType>(
  event: AnalyticsEvent,
  type: T,
): event is EventOfType<T> {
  return event.type === type;
}

/**
 * In-process typed event bus. Services receive an instance through their
 * constructor; the app decides who listens (logging, a broker bridge, tests).
 */
export class EventBus {
  private readonly handlers = new Map<AnalyticsEventType, Set<AnyEventHandler>>();
  private readonly anyHandlers = new Set<AnyEventHandler>();

  /**
   * Deliver an event to every matching handler and wait for them. Handlers run
   * in parallel; a failing handler is logged and does not reject the emit.
   */
  async emit(event: AnalyticsEvent): Promise<void> {
    log.debug({ eventType: event.type }, 'Event emitted');

    const targets = [...(this.handlers.get(event.type) ?? []), ...this.anyHandlers];
    await Promise.all(
      targets.map((handler) =>
        Promise.resolve()
          .then(() => handler(event))
          .catch((err: unknown) => {
            log.error({ err, eventType: event.type }, 'Event handler error');
          }),
      ),
    );
  }

  /**
   * Subscribe to a specific event type.
   * Returns an unsubscribe function.
   */
  on<T extends AnalyticsEventType>(type: T, handler: EventHandler<T>): () => void {
    const wrapped: AnyEventHandler = (event) => {
      if (isEventOfType(event, type)) {
        return handler(event);
      }
    };
    let set = this.handlers.get(type);
    if (!set) {
      set = new Set();
      this.handlers.set(type, set);
    }
    set.add(wrapped);
    return () => {
      this.handlers.get(type)?.delete(wrapped);
    };
  }

  /** Subscribe to every event type. Returns an unsubscribe function. */
  onAny(handler: AnyEventHandler): () => void {
    this.anyHandlers.add(handler);
    return () => {
      this.anyHandlers.delete(handler);
    };
  }

  listenerCount(type?: AnalyticsEventType): number {
    const typed = type ? (this.handlers.get(type)?.size ?? 0) : 0;
    return typed + this.anyHandlers.size;
  }
}
