/**
 * Message Bus
 *
 * Multi-producer, multi-consumer channel with one bounded queue per
 * subscriber. Guarantees:
 * - every subscriber whose filter matches gets every matching event once
 * - events from one producer arrive in that producer's publish order
 * - a full subscriber queue blocks only the publishers writing into it
 * - peer-lane events never wait for space; they are queued past capacity
 *
 * Consumers pull explicitly (`next()` or `for await`). Closing the bus lets
 * queued events drain and then ends every subscription.
 */

import { BusClosedError, isBusClosed } from "../errors";
import { systemTimeSource, type TimeSource } from "./timeSource";

export type Envelope<E> = {
  readonly producer: string;
  readonly seq: number;
  readonly publishedAt: number;
  readonly event: E;
};

export type SubscriptionFilter<E> = (event: E) => boolean;

export type SubscriptionStats = {
  name: string;
  depth: number;
  capacity: number;
  delivered: number;
  /** Peer-lane events accepted while the queue was already full. */
  overCapacity: number;
  closed: boolean;
};

/**
 * `bounded` waits for space in every matching queue. `peer` is for units that
 * also consume from the bus (agents): their publishes are queued even when a
 * queue is full.
 */
export type PublishLane = "bounded" | "peer";

export type PublishOptions = { lane?: PublishLane };

type SpaceWaiter = { resolve: () => void; reject: (err: Error) => void };

export class Subscription<E> implements AsyncIterable<Envelope<E>> {
  private readonly queue: Envelope<E>[] = [];
  private readonly pullers: Array<(result: IteratorResult<Envelope<E>>) => void> = [];
  private spaceWaiters: SpaceWaiter[] = [];
  private closed = false;
  private delivered = 0;
  private overCapacity = 0;

  constructor(
    readonly name: string,
    private readonly filter: SubscriptionFilter<E>,
    readonly capacity: number,
    private readonly onPulled: () => void
  ) {}

  matches(event: E): boolean {
    return this.filter(event);
  }

  get depth(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Pull the next event; resolves `{ done: true }` once closed and drained. */
  next(): Promise<IteratorResult<Envelope<E>>> {
    const head = this.queue.shift();
    if (head) {
      this.delivered++;
      this.releaseSpace();
      this.onPulled();
      return Promise.resolve({ done: false, value: head });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.pullers.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<Envelope<E>> {
    return { next: () => this.next() };
  }

  stats(): SubscriptionStats {
    return {
      name: this.name,
      depth: this.queue.length,
      capacity: this.capacity,
      delivered: this.delivered,
      overCapacity: this.overCapacity,
      closed: this.closed,
    };
  }

  /** @internal used by MessageBus */
  async offer(envelope: Envelope<E>, lane: PublishLane = "bounded"): Promise<void> {
    while (lane === "bounded" && this.queue.length >= this.capacity) {
      if (this.closed) throw new BusClosedError();
      await new Promise<void>((resolve, reject) => {
        this.spaceWaiters.push({ resolve, reject });
      });
    }
    if (this.closed) throw new BusClosedError();

    const puller = this.pullers.shift();
    if (puller) {
      this.delivered++;
      this.onPulled();
      puller({ done: false, value: envelope });
      return;
    }
    if (this.queue.length >= this.capacity) this.overCapacity++;
    this.queue.push(envelope);
  }

  /** @internal used by MessageBus */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.spaceWaiters;
    this.spaceWaiters = [];
    for (const waiter of waiters) waiter.reject(new BusClosedError());
    // Pullers only wait on an empty queue, so nothing is left for them.
    for (const puller of this.pullers.splice(0)) {
      puller({ done: true, value: undefined });
    }
  }

  private releaseSpace(): void {
    const waiters = this.spaceWaiters;
    this.spaceWaiters = [];
    for (const waiter of waiters) waiter.resolve();
  }
}

export class MessageBus<E> {
  private readonly subscriptions = new Set<Subscription<E>>();
  private readonly producerChains = new Map<string, Promise<void>>();
  private readonly producerSeq = new Map<string, number>();
  private progressWaiters: Array<() => void> = [];
  private readonly capacity: number;
  private readonly time: TimeSource;
  private closed = false;
  private published = 0;

  constructor(opts?: { capacity?: number; time?: TimeSource }) {
    this.capacity = opts?.capacity ?? 256;
    this.time = opts?.time ?? systemTimeSource;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new Error(`bus capacity must be a positive integer, got ${this.capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get publishedCount(): number {
    return this.published;
  }

  subscribe(name: string, filter: SubscriptionFilter<E> = () => true, capacity = this.capacity): Subscription<E> {
    if (this.closed) throw new BusClosedError();
    const subscription = new Subscription<E>(name, filter, capacity, () => this.notifyProgress());
    this.subscriptions.add(subscription);
    return subscription;
  }

  unsubscribe(subscription: Subscription<E>): void {
    if (this.subscriptions.delete(subscription)) {
      subscription.close();
      this.notifyProgress();
    }
  }

  /**
   * Publish on behalf of `producer`. The sequence number is taken at call
   * time and deliveries for one producer are chained, so a caller that does
   * not await still gets FIFO order. Rejects with BusClosedError once closed.
   */
  publish(event: E, producer: string, opts: PublishOptions = {}): Promise<Envelope<E>> {
    if (this.closed) return Promise.reject(new BusClosedError());

    const seq = (this.producerSeq.get(producer) ?? 0) + 1;
    this.producerSeq.set(producer, seq);
    const envelope: Envelope<E> = Object.freeze({ producer, seq, publishedAt: this.time.now(), event });

    const previous = this.producerChains.get(producer) ?? Promise.resolve();
    const delivery = previous.then(() => this.deliver(envelope, opts.lane ?? "bounded"));
    // The chain only orders deliveries; a failure reaches the caller through `delivery`.
    this.producerChains.set(
      producer,
      delivery.then(
        () => undefined,
        () => undefined
      )
    );
    return delivery.then(() => envelope);
  }

  /** Events queued in any subscription but not yet pulled. */
  backlog(): number {
    let total = 0;
    for (const subscription of this.subscriptions) total += subscription.depth;
    return total;
  }

  /**
   * Soft barrier: resolves true once the backlog is at or below `threshold`,
   * false if `timeoutMs` passes first.
   */
  async waitForBacklogBelow(threshold: number, timeoutMs: number, time: TimeSource = this.time): Promise<boolean> {
    const deadline = time.now() + timeoutMs;
    while (this.backlog() > threshold) {
      const remaining = deadline - time.now();
      if (remaining <= 0) return false;
      const controller = new AbortController();
      await Promise.race([
        this.nextProgress().then(() => controller.abort()),
        time.sleep(remaining, controller.signal),
      ]);
      controller.abort();
    }
    return true;
  }

  stats(): SubscriptionStats[] {
    return [...this.subscriptions].map((s) => s.stats());
  }

  /** Idempotent. Queued events stay pullable; blocked publishers are rejected. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const subscription of this.subscriptions) subscription.close();
    this.notifyProgress();
  }

  private async deliver(envelope: Envelope<E>, lane: PublishLane): Promise<void> {
    if (this.closed) throw new BusClosedError();
    for (const subscription of [...this.subscriptions]) {
      if (!subscription.isClosed && subscription.matches(envelope.event)) {
        try {
          await subscription.offer(envelope, lane);
        } catch (err) {
          // A subscriber that left while we waited on it is skipped; a closed bus is not.
          if (this.closed || !isBusClosed(err)) throw err;
        }
      }
    }
    this.published++;
  }

  private nextProgress(): Promise<void> {
    return new Promise((resolve) => {
      this.progressWaiters.push(resolve);
    });
  }

  private notifyProgress(): void {
    const waiters = this.progressWaiters;
    this.progressWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
