import type { CommandCorrelator } from './correlator.js';
import { describeError, noopLogger, type HeosLogger } from './logger.js';
import { DEFAULT_TIMINGS } from './options.js';
import { decodeEvent, type EventOf, type HeosEvent, type HeosEventType } from './protocol/events.js';
import { decodeMessage } from './protocol/messages.js';

export type EventCallback<T extends HeosEvent = HeosEvent> = (event: T) => void | Promise<void>;

/** Synchronous handler run inside the read loop, before subscribers, in wire order. */
export type EventApplier = (event: HeosEvent) => void;

export type Unsubscribe = () => void;

export interface DemultiplexerOptions {
  correlator: CommandCorrelator;
  queueSize?: number;
  logger?: HeosLogger;
}

/**
 * Per-subscriber FIFO, drained on microtasks so the read loop never waits on a callback.
 * When full, the oldest undelivered event is dropped.
 */
class SubscriberQueue {
  private readonly events: HeosEvent[] = [];
  private draining = false;
  active = true;

  constructor(
    private readonly callback: EventCallback,
    private readonly capacity: number,
    private readonly label: string,
    private readonly log: HeosLogger,
  ) {}

  enqueue(event: HeosEvent): void {
    if (!this.active) return;
    if (this.events.length >= this.capacity) {
      const dropped = this.events.shift();
      this.log.warn('subscriber queue full, dropping oldest event', {
        subscription: this.label,
        dropped: dropped?.type,
      });
    }
    this.events.push(event);
    if (!this.draining) {
      this.draining = true;
      queueMicrotask(() => {
        this.drain().catch((err: unknown) => {
          this.log.error('subscriber drain failed', { subscription: this.label, error: describeError(err) });
        });
      });
    }
  }

  private async drain(): Promise<void> {
    try {
      let event = this.events.shift();
      while (event && this.active) {
        try {
          await this.callback(event);
        } catch (err) {
          this.log.error('event subscriber threw', {
            subscription: this.label,
            event: event.type,
            error: describeError(err),
          });
        }
        event = this.events.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}

/**
 * Classifies inbound lines: responses go to the correlator, events are decoded into the closed
 * `HeosEvent` set, handed to appliers, then fanned out to subscribers.
 */
export class EventDemultiplexer {
  private readonly correlator: CommandCorrelator;
  private readonly queueSize: number;
  private readonly log: HeosLogger;
  private readonly appliers: EventApplier[] = [];
  private readonly subscriptions = new Map<HeosEventType | '*', Set<SubscriberQueue>>();

  constructor(options: DemultiplexerOptions) {
    this.correlator = options.correlator;
    this.queueSize = options.queueSize ?? DEFAULT_TIMINGS.subscriberQueueSize;
    this.log = options.logger ?? noopLogger;
  }

  /**
   * Process one inbound line. Throws `ProtocolError` when the line is not a HEOS message;
   * unknown events are logged and dropped.
   */
  handle(line: string): void {
    const message = decodeMessage(line);

    if (message.kind !== 'event') {
      this.correlator.offer(message);
      return;
    }

    const event = decodeEvent(message);
    if (!event) {
      this.log.debug('dropping unrecognised event', { name: message.name, message: message.message });
      return;
    }
    this.log.debug('event', { type: event.type });

    for (const applier of this.appliers) {
      try {
        applier(event);
      } catch (err) {
        this.log.error('event applier threw', { event: event.type, error: describeError(err) });
      }
    }
    this.publish(event);
  }

  addApplier(applier: EventApplier): void {
    this.appliers.push(applier);
  }

  subscribe<T extends HeosEventType>(type: T, callback: EventCallback<EventOf<T>>): Unsubscribe;
  subscribe(type: '*', callback: EventCallback): Unsubscribe;
  subscribe(type: HeosEventType | '*', callback: EventCallback): Unsubscribe {
    // publish() only routes events of the subscribed type to this queue.
    const queue = new SubscriberQueue(callback, this.queueSize, type, this.log);
    const set = this.subscriptions.get(type) ?? new Set<SubscriberQueue>();
    set.add(queue);
    this.subscriptions.set(type, set);

    return () => {
      queue.active = false;
      set.delete(queue);
    };
  }

  /** Deliver an event to subscribers only (used for events synthesised locally). */
  publish(event: HeosEvent): void {
    for (const queue of this.subscriptions.get(event.type) ?? []) queue.enqueue(event);
    for (const queue of this.subscriptions.get('*') ?? []) queue.enqueue(event);
  }
}
