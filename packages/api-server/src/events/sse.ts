import { PlanNotFoundError, type PlanId, type PlanStore, type PlanSubscription } from '@arbor/core';

export const DEFAULT_KEEPALIVE_MS = 15_000;

export const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
};

/** Where an event stream is written; a ServerResponse in production. */
export interface SseSink {
  write(chunk: string): void;
  end(): void;
  onClose(listener: () => void): void;
}

export function formatSseEvent(event: string, data: unknown, id?: number): string {
  const lines = id === undefined ? [] : [`id: ${id}`];
  lines.push(`event: ${event}`, `data: ${JSON.stringify(data)}`);
  return `${lines.join('\n')}\n\n`;
}

/**
 * Subscribes to a plan, then checks that the plan exists. Subscribing first
 * means no change made after the check is missed; a failed check closes the
 * subscription again before the error propagates.
 */
export async function openPlanEvents(store: PlanStore, planId: PlanId): Promise<PlanSubscription> {
  const subscription = store.notifier.subscribe(planId);
  try {
    await store.getPlan(planId);
  } catch (error) {
    subscription.close();
    throw error;
  }
  if (subscription.closed) {
    throw new PlanNotFoundError(planId);
  }
  return subscription;
}

/**
 * Forwards a plan subscription to an SSE sink until either side closes.
 * Resolves once the stream has ended.
 */
export async function pipePlanEvents(
  subscription: PlanSubscription,
  sink: SseSink,
  options: { keepAliveMs?: number } = {},
): Promise<void> {
  sink.onClose(() => subscription.close());
  sink.write(formatSseEvent('connected', { planId: subscription.planId }));

  const keepAlive = setInterval(() => sink.write(': keepalive\n\n'), options.keepAliveMs ?? DEFAULT_KEEPALIVE_MS);
  keepAlive.unref();

  try {
    for await (const event of subscription) {
      sink.write(formatSseEvent('plan_changed', event, event.sequence));
    }
  } finally {
    clearInterval(keepAlive);
    sink.end();
  }
}
