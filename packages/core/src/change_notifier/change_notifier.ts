import { EventEmitter } from 'events';
import type { PlanId } from '../plan_tree/index.js';
import type {
  IChangeNotifier,
  PlanChangeEvent,
  PlanSubscription,
  SubscriptionCloseReason,
  SubscriptionOptions,
} from './change_notifier.types.js';

export const DEFAULT_SUBSCRIPTION_CAPACITY = 100;

let subscriptionCounter = 0;

function generateSubscriptionId(): string {
  subscriptionCounter += 1;
  return `subscription:${Date.now()}-${subscriptionCounter}`;
}

function topicOf(planId: PlanId): string {
  return `plan:${planId}`;
}

/**
 * One subscriber's bounded delivery queue. Delivery never blocks the
 * publisher: when the queue is full the subscription closes itself.
 */
class QueuedSubscription implements PlanSubscription {
  readonly id = generateSubscriptionId();
  private readonly queue: PlanChangeEvent[] = [];
  private waiter: ((event: PlanChangeEvent | null) => void) | null = null;
  private reason: SubscriptionCloseReason | null = null;

  constructor(
    readonly planId: PlanId,
    private readonly capacity: number,
    private readonly detach: (subscription: QueuedSubscription) => void,
  ) {}

  get closed(): boolean {
    return this.reason !== null;
  }

  get closeReason(): SubscriptionCloseReason | null {
    return this.reason;
  }

  deliver = (event: PlanChangeEvent): void => {
    if (this.reason !== null) return;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(event);
      return;
    }
    if (this.queue.length >= this.capacity) {
      this.shutdown('lagged');
      return;
    }
    this.queue.push(event);
  };

  next(): Promise<PlanChangeEvent | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.reason !== null) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  drain(): PlanChangeEvent[] {
    return this.queue.splice(0, this.queue.length);
  }

  close(): void {
    this.shutdown('unsubscribed');
  }

  shutdown(reason: SubscriptionCloseReason): void {
    if (this.reason !== null) return;
    this.reason = reason;
    this.detach(this);
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<PlanChangeEvent> {
    for (;;) {
      const event = await this.next();
      if (event === null) return;
      yield event;
    }
  }
}

/**
 * ChangeNotifier - per-plan publish/subscribe of change signals.
 *
 * Fan-out runs on an EventEmitter with one topic per plan.
 */
export class ChangeNotifier implements IChangeNotifier {
  private readonly emitter = new EventEmitter();
  private readonly subscriptions = new Map<string, QueuedSubscription>();
  private readonly sequences = new Map<PlanId, number>();

  constructor(private readonly defaultCapacity: number = DEFAULT_SUBSCRIPTION_CAPACITY) {
    this.emitter.setMaxListeners(0);
  }

  publish(planId: PlanId): PlanChangeEvent {
    const sequence = (this.sequences.get(planId) ?? 0) + 1;
    this.sequences.set(planId, sequence);
    const event: PlanChangeEvent = { planId, sequence, timestamp: Date.now() };

    this.emitter.emit(topicOf(planId), event);
    return event;
  }

  subscribe(planId: PlanId, options: SubscriptionOptions = {}): PlanSubscription {
    return this.attach(planId, options);
  }

  /** Closes every subscription that follows this plan, e.g. after deletion. */
  closeTopic(planId: PlanId): void {
    for (const subscription of [...this.subscriptions.values()]) {
      if (subscription.planId === planId) {
        subscription.shutdown('topic_closed');
      }
    }
    this.sequences.delete(planId);
  }

  getSubscriberCount(planId?: PlanId): number {
    if (planId === undefined) return this.subscriptions.size;
    return [...this.subscriptions.values()].filter((s) => s.planId === planId).length;
  }

  private attach(planId: PlanId, options: SubscriptionOptions): QueuedSubscription {
    const capacity = Math.max(1, options.capacity ?? this.defaultCapacity);
    const topic = topicOf(planId);
    const subscription = new QueuedSubscription(planId, capacity, (closed) => {
      this.emitter.off(topic, closed.deliver);
      this.subscriptions.delete(closed.id);
    });
    this.emitter.on(topic, subscription.deliver);
    this.subscriptions.set(subscription.id, subscription);
    return subscription;
  }
}
