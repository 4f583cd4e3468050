import type { Topic } from '../types/index.js';

export type SubscriptionState = 'active' | 'inactive';

/**
 * Desired subscription state, independent of whether a connection exists.
 *
 * Entries are never removed while the registry lives; unsubscribing marks a
 * topic inactive. Every method is synchronous and performs no I/O, so on the
 * event loop no call can observe another half-applied, and the supervisor's
 * replay never holds registry state across an `await`.
 */
export class SubscriptionRegistry {
  private readonly topics = new Map<Topic, SubscriptionState>();

  /**
   * Marks `topic` active.
   * @returns `true` if the desired state changed, `false` if it was already active.
   */
  setActive(topic: Topic): boolean {
    if (this.topics.get(topic) === 'active') return false;
    this.topics.set(topic, 'active');
    return true;
  }

  /**
   * Marks `topic` inactive. Unknown topics are left unknown.
   * @returns `true` if the desired state changed.
   */
  setInactive(topic: Topic): boolean {
    if (this.topics.get(topic) !== 'active') return false;
    this.topics.set(topic, 'inactive');
    return true;
  }

  isActive(topic: Topic): boolean {
    return this.topics.get(topic) === 'active';
  }

  /** Snapshot of the active topics; later mutations do not affect it. */
  activeTopics(): ReadonlySet<Topic> {
    const active = new Set<Topic>();
    for (const [topic, state] of this.topics) {
      if (state === 'active') active.add(topic);
    }
    return active;
  }

  /** Snapshot of every known topic with its desired state. */
  entries(): ReadonlyArray<readonly [Topic, SubscriptionState]> {
    return [...this.topics];
  }

  get size(): number {
    return this.topics.size;
  }
}
