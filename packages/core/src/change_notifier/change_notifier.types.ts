import type { PlanId } from '../plan_tree/index.js';

/**
 * Coarse invalidation signal: carries no diff, recipients re-fetch state.
 */
export interface PlanChangeEvent {
  planId: PlanId;
  /** Strictly increasing per plan, in commit order. */
  sequence: number;
  /** Milliseconds since epoch. */
  timestamp: number;
}

export type SubscriptionCloseReason = 'unsubscribed' | 'lagged' | 'topic_closed';

export interface SubscriptionOptions {
  /** Queue capacity; a subscriber that falls this far behind is dropped. */
  capacity?: number;
}

/**
 * Contract shared by the notifier and anything that wants to fake it.
 */
export interface IChangeNotifier {
  publish(planId: PlanId): PlanChangeEvent;
  subscribe(planId: PlanId, options?: SubscriptionOptions): PlanSubscription;
  closeTopic(planId: PlanId): void;
  getSubscriberCount(planId?: PlanId): number;
}

export interface PlanSubscription extends AsyncIterable<PlanChangeEvent> {
  readonly id: string;
  readonly planId: PlanId;
  readonly closed: boolean;
  readonly closeReason: SubscriptionCloseReason | null;
  /** Resolves with the next event, or null once closed and drained. */
  next(): Promise<PlanChangeEvent | null>;
  /** Takes every queued event without waiting. */
  drain(): PlanChangeEvent[];
  close(): void;
}
