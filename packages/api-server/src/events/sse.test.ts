import { describe, it, expect } from 'vitest';
import { ChangeNotifier, PlanNotFoundError, PlanStore, createLogger } from '@arbor/core';
import { formatSseEvent, openPlanEvents, pipePlanEvents, type SseSink } from './sse.js';

class FakeSink implements SseSink {
  chunks: string[] = [];
  ended = false;
  private closeListener: (() => void) | null = null;

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  end(): void {
    this.ended = true;
  }

  onClose(listener: () => void): void {
    this.closeListener = listener;
  }

  disconnect(): void {
    this.closeListener?.();
  }
}

describe('formatSseEvent', () => {
  it('should format named events with an optional id', () => {
    expect(formatSseEvent('connected', { planId: 1 })).toBe('event: connected\ndata: {"planId":1}\n\n');
    expect(formatSseEvent('plan_changed', { ok: true }, 4)).toBe('id: 4\nevent: plan_changed\ndata: {"ok":true}\n\n');
  });
});

describe('pipePlanEvents', () => {
  it('should forward events until the client disconnects', async () => {
    const notifier = new ChangeNotifier();
    const subscription = notifier.subscribe(1);
    const sink = new FakeSink();

    const done = pipePlanEvents(subscription, sink, { keepAliveMs: 60_000 });
    notifier.publish(1);
    notifier.publish(1);
    sink.disconnect();
    await done;

    expect(sink.chunks[0]).toBe('event: connected\ndata: {"planId":1}\n\n');
    expect(sink.chunks.slice(1).map((chunk) => chunk.split('\n')[0])).toEqual(['id: 1', 'id: 2']);
    expect(sink.ended).toBe(true);
    expect(notifier.getSubscriberCount(1)).toBe(0);
  });

  it('should end the stream when the plan topic closes', async () => {
    const notifier = new ChangeNotifier();
    const sink = new FakeSink();

    const done = pipePlanEvents(notifier.subscribe(2), sink, { keepAliveMs: 60_000 });
    notifier.closeTopic(2);
    await done;

    expect(sink.chunks).toHaveLength(1);
    expect(sink.ended).toBe(true);
  });
});

describe('openPlanEvents', () => {
  const createStore = (): PlanStore => new PlanStore({ logger: createLogger('[test] ', 'silent') });

  it('should return a live subscription for an existing plan', async () => {
    const store = createStore();
    const planId = await store.createPlan('Goal');

    const subscription = await openPlanEvents(store, planId);
    await store.addTask(planId, [], { description: 'A', level: 'planning' });

    expect(subscription.closed).toBe(false);
    expect(subscription.drain().map((event) => event.sequence)).toEqual([2]);
  });

  it('should reject an unknown plan without leaving a subscriber behind', async () => {
    const store = createStore();

    await expect(openPlanEvents(store, 9)).rejects.toBeInstanceOf(PlanNotFoundError);
    expect(store.notifier.getSubscriberCount(9)).toBe(0);
  });

  it('should reject a plan deleted while the stream was opening', async () => {
    const store = createStore();
    const planId = await store.createPlan('Goal');

    const [deletion, opening] = await Promise.allSettled([store.deletePlan(planId), openPlanEvents(store, planId)]);

    expect(deletion.status).toBe('fulfilled');
    expect(opening.status === 'rejected' ? opening.reason : null).toBeInstanceOf(PlanNotFoundError);
    expect(store.notifier.getSubscriberCount()).toBe(0);
  });
});
