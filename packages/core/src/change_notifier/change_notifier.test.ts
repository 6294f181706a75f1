import { describe, it, expect, beforeEach } from 'vitest';
import { ChangeNotifier } from './change_notifier.js';

describe('ChangeNotifier', () => {
  let notifier: ChangeNotifier;

  beforeEach(() => {
    notifier = new ChangeNotifier();
  });

  it('should deliver events only to subscribers of the plan', () => {
    const planOne = notifier.subscribe(1);
    const planTwo = notifier.subscribe(2);

    notifier.publish(1);
    notifier.publish(1);

    expect(planOne.drain().map((event) => event.sequence)).toEqual([1, 2]);
    expect(planTwo.drain()).toEqual([]);
  });

  it('should number events per plan', () => {
    notifier.publish(1);
    expect(notifier.publish(2).sequence).toBe(1);
    expect(notifier.publish(1).sequence).toBe(2);
  });

  it('should resolve a pending next() when an event arrives', async () => {
    const subscription = notifier.subscribe(5);
    const pending = subscription.next();
    notifier.publish(5);
    await expect(pending).resolves.toMatchObject({ planId: 5, sequence: 1 });
  });

  it('should drop a subscriber whose queue overflows without affecting others', () => {
    const slow = notifier.subscribe(1, { capacity: 2 });
    const fast = notifier.subscribe(1);

    notifier.publish(1);
    notifier.publish(1);
    notifier.publish(1);

    expect(slow.closed).toBe(true);
    expect(slow.closeReason).toBe('lagged');
    expect(fast.drain()).toHaveLength(3);
    expect(notifier.getSubscriberCount(1)).toBe(1);
  });

  it('should stop delivering after close and end iteration', async () => {
    const subscription = notifier.subscribe(1);
    notifier.publish(1);
    subscription.close();
    notifier.publish(1);

    const received: number[] = [];
    for await (const event of subscription) {
      received.push(event.sequence);
    }
    expect(received).toEqual([1]);
    expect(notifier.getSubscriberCount()).toBe(0);
  });

  it('should close a plan topic', async () => {
    const subscription = notifier.subscribe(3);
    const other = notifier.subscribe(4);
    const pending = subscription.next();

    notifier.closeTopic(3);

    await expect(pending).resolves.toBeNull();
    expect(subscription.closeReason).toBe('topic_closed');
    expect(other.closed).toBe(false);
  });

  it('should forget the sequence counter of a closed topic', () => {
    notifier.publish(3);
    notifier.publish(3);
    notifier.closeTopic(3);

    expect(notifier.publish(3).sequence).toBe(1);
  });
});
