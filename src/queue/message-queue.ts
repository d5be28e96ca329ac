/**
 * In-process message queue for inter-agent traffic.
 *
 * Delivery model:
 * - A destination is a role (point-to-point) or a topic. A topic fans out
 *   one delivery to every role subscribed to it; a topic with no
 *   subscribers drops the message.
 * - Each role has its own FIFO. Order is preserved per destination only.
 * - dequeue() leases a delivery. Unacknowledged deliveries go back into
 *   their original FIFO position when the lease expires (at-least-once),
 *   so consumers must be idempotent on (taskId, attempt).
 * - enqueue() never blocks; a destination holding `capacity`
 *   unacknowledged deliveries rejects with QueueFullError.
 *
 * Shared by every run. Isolation between runs comes from the run id each
 * message carries and from run-specific control destinations.
 */

import { QueueFullError, QueueTimeoutError, isOrchestratorError } from "../errors/index.js";
import type { BackoffSettings } from "../config/orchestrator/schema.js";
import { createNullLogger, type Logger } from "../logging/index.js";
import { systemClock, type Clock } from "../types/clock.js";
import { formatDestination, type Destination, type QueueMessage } from "../types/messages.js";
import { retryWithBackoff } from "../utils/retry.js";

export interface Delivery<M extends QueueMessage = QueueMessage> {
  readonly deliveryId: string;
  readonly message: M;
  /** Role the delivery was routed to */
  readonly destination: string;
  /** 1 on first delivery, incremented on every redelivery */
  readonly deliveryCount: number;
  readonly leaseExpiresAt: number;
}

export interface QueueStats {
  /** Deliveries waiting to be dequeued */
  ready: number;
  /** Dequeued, not yet acknowledged */
  inflight: number;
  /** Consumers blocked in dequeue() */
  waiting: number;
  enqueued: number;
  dequeued: number;
  acked: number;
  redelivered: number;
}

export interface MessageQueueOptions {
  /** Maximum unacknowledged deliveries per destination */
  capacity: number;
  leaseMs: number;
  clock?: Clock;
  logger?: Logger;
}

interface Slot {
  readonly deliveryId: string;
  readonly seq: number;
  readonly message: QueueMessage;
  readonly destination: string;
  deliveryCount: number;
  leaseExpiresAt?: number;
  leaseTimer?: NodeJS.Timeout;
}

interface Waiter {
  resolve(delivery: Delivery): void;
  reject(error: unknown): void;
  cleanup(): void;
}

interface DestinationState {
  ready: Slot[];
  inflight: Map<string, Slot>;
  waiters: Waiter[];
  counters: Omit<QueueStats, "ready" | "inflight" | "waiting">;
}

export class MessageQueue {
  private readonly destinations = new Map<string, DestinationState>();
  private readonly subscriptions = new Map<string, Set<string>>();
  /** deliveryId -> role, for ack lookups */
  private readonly deliveryIndex = new Map<string, string>();
  /** Destinations that silently drop anything sent to them */
  private readonly retired = new Set<string>();
  private readonly capacity: number;
  private readonly leaseMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private sequence = 0;
  private closed = false;

  constructor(options: MessageQueueOptions) {
    this.capacity = options.capacity;
    this.leaseMs = options.leaseMs;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createNullLogger()).child({ component: "queue" });
  }

  /**
   * Route `role` to receive every message published on `topic`.
   * Returns an unsubscribe function.
   */
  subscribe(role: string, topic: string): () => void {
    let roles = this.subscriptions.get(topic);
    if (!roles) {
      roles = new Set();
      this.subscriptions.set(topic, roles);
    }
    roles.add(role);
    return () => {
      this.subscriptions.get(topic)?.delete(role);
    };
  }

  /**
   * Enqueue a message. All-or-nothing across a topic's subscribers.
   *
   * @returns delivery ids created (empty for a topic without subscribers)
   * @throws QueueFullError when any target destination is at capacity
   */
  enqueue(message: QueueMessage, destination: Destination): string[] {
    if (this.closed) {
      throw new Error("Message queue is closed");
    }
    const targets = this.resolveTargets(destination).filter((role) => !this.retired.has(role));
    if (targets.length === 0 && destination.kind === "role") {
      this.logger.debug("Dropped message for retired destination", {
        destination: destination.role,
        runId: message.runId,
      });
      return [];
    }

    for (const role of targets) {
      const state = this.state(role);
      if (state.ready.length + state.inflight.size >= this.capacity) {
        this.logger.warn("Destination at capacity", {
          destination: role,
          capacity: this.capacity,
        });
        throw new QueueFullError(role, this.capacity);
      }
    }

    const frozen = Object.freeze(message);
    const ids: string[] = [];
    for (const role of targets) {
      const seq = ++this.sequence;
      const slot: Slot = {
        deliveryId: `d${seq}`,
        seq,
        message: frozen,
        destination: role,
        deliveryCount: 0,
      };
      const state = this.state(role);
      state.ready.push(slot);
      state.counters.enqueued++;
      this.deliveryIndex.set(slot.deliveryId, role);
      ids.push(slot.deliveryId);
      this.drain(state);
    }

    this.logger.debug("Enqueued", {
      kind: message.kind,
      runId: message.runId,
      destination: formatDestination(destination),
      deliveries: ids.length,
    });
    return ids;
  }

  /**
   * Enqueue, retrying QueueFull with exponential backoff.
   *
   * @throws QueueFullError once the backoff budget is spent
   */
  async enqueueWithBackoff(
    message: QueueMessage,
    destination: Destination,
    backoff: BackoffSettings,
    signal?: AbortSignal
  ): Promise<string[]> {
    return retryWithBackoff(async () => this.enqueue(message, destination), {
      ...backoff,
      context: `enqueue ${formatDestination(destination)}`,
      shouldRetry: (error) => isOrchestratorError(error, "QUEUE_FULL"),
      logger: this.logger,
      signal,
    });
  }

  /**
   * Lease the next delivery for `role`.
   *
   * @throws QueueTimeoutError when nothing arrives within timeoutMs
   * @throws the signal's reason when aborted while waiting
   */
  dequeue(role: string, timeoutMs: number, signal?: AbortSignal): Promise<Delivery> {
    if (this.closed) {
      return Promise.reject(new Error("Message queue is closed"));
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const state = this.state(role);
    const next = state.ready.shift();
    if (next) {
      return Promise.resolve(this.lease(state, next));
    }
    if (timeoutMs <= 0) {
      return Promise.reject(new QueueTimeoutError(role, timeoutMs));
    }

    return new Promise<Delivery>((resolve, reject) => {
      const waiter: Waiter = {
        resolve: (delivery) => {
          waiter.cleanup();
          resolve(delivery);
        },
        reject: (error) => {
          waiter.cleanup();
          reject(error);
        },
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
          const index = state.waiters.indexOf(waiter);
          if (index >= 0) {
            state.waiters.splice(index, 1);
          }
        },
      };
      const timer = setTimeout(() => waiter.reject(new QueueTimeoutError(role, timeoutMs)), timeoutMs);
      const onAbort = (): void => waiter.reject(signal?.reason);
      signal?.addEventListener("abort", onAbort, { once: true });
      state.waiters.push(waiter);
    });
  }

  /**
   * Mark a delivery consumed. A delivery whose lease already expired can
   * still be acknowledged as long as it has not been consumed elsewhere.
   *
   * @returns false for unknown or already-acknowledged deliveries
   */
  ack(deliveryId: string): boolean {
    const role = this.deliveryIndex.get(deliveryId);
    if (role === undefined) {
      return false;
    }
    const state = this.state(role);
    const slot = state.inflight.get(deliveryId);
    if (slot) {
      clearTimeout(slot.leaseTimer);
      state.inflight.delete(deliveryId);
    } else {
      const index = state.ready.findIndex((s) => s.deliveryId === deliveryId);
      if (index < 0) {
        return false;
      }
      state.ready.splice(index, 1);
    }
    this.deliveryIndex.delete(deliveryId);
    state.counters.acked++;
    return true;
  }

  /**
   * Depth counters for one destination, or summed across all of them.
   */
  stats(role?: string): QueueStats {
    const states = role === undefined ? [...this.destinations.values()] : [this.state(role)];
    const total: QueueStats = {
      ready: 0,
      inflight: 0,
      waiting: 0,
      enqueued: 0,
      dequeued: 0,
      acked: 0,
      redelivered: 0,
    };
    for (const state of states) {
      total.ready += state.ready.length;
      total.inflight += state.inflight.size;
      total.waiting += state.waiters.length;
      total.enqueued += state.counters.enqueued;
      total.dequeued += state.counters.dequeued;
      total.acked += state.counters.acked;
      total.redelivered += state.counters.redelivered;
    }
    return total;
  }

  /**
   * Drop every ready delivery that belongs to `runId`. In-flight deliveries
   * stay with their consumers; whatever they answer is stale to the run.
   *
   * @returns number of deliveries dropped
   */
  purgeRun(runId: string): number {
    let dropped = 0;
    for (const state of this.destinations.values()) {
      const kept: Slot[] = [];
      for (const slot of state.ready) {
        if (slot.message.runId === runId) {
          this.deliveryIndex.delete(slot.deliveryId);
          dropped++;
        } else {
          kept.push(slot);
        }
      }
      state.ready = kept;
    }
    if (dropped > 0) {
      this.logger.info("Purged run deliveries", { runId, dropped });
    }
    return dropped;
  }

  /**
   * Remove a destination, including in-flight deliveries, and drop anything
   * sent to it later. Used for run-scoped control destinations once the run
   * is terminal, so late completions do not pile up.
   */
  retireDestination(role: string): void {
    this.retired.add(role);
    const state = this.destinations.get(role);
    if (!state) {
      return;
    }
    for (const slot of [...state.ready, ...state.inflight.values()]) {
      clearTimeout(slot.leaseTimer);
      this.deliveryIndex.delete(slot.deliveryId);
    }
    for (const waiter of [...state.waiters]) {
      waiter.reject(new QueueTimeoutError(role, 0));
    }
    this.destinations.delete(role);
    for (const roles of this.subscriptions.values()) {
      roles.delete(role);
    }
  }

  /**
   * Stop accepting messages, reject blocked consumers and clear lease timers.
   */
  close(): void {
    this.closed = true;
    for (const state of this.destinations.values()) {
      for (const slot of state.inflight.values()) {
        clearTimeout(slot.leaseTimer);
      }
      for (const waiter of [...state.waiters]) {
        waiter.reject(new Error("Message queue is closed"));
      }
    }
  }

  // ── internals ──────────────────────────────────────────────────────────

  private resolveTargets(destination: Destination): string[] {
    if (destination.kind === "role") {
      return [destination.role];
    }
    return [...(this.subscriptions.get(destination.topic) ?? [])].sort();
  }

  private state(role: string): DestinationState {
    let state = this.destinations.get(role);
    if (!state) {
      state = {
        ready: [],
        inflight: new Map(),
        waiters: [],
        counters: { enqueued: 0, dequeued: 0, acked: 0, redelivered: 0 },
      };
      this.destinations.set(role, state);
    }
    return state;
  }

  private drain(state: DestinationState): void {
    while (state.waiters.length > 0 && state.ready.length > 0) {
      const waiter = state.waiters[0];
      const slot = state.ready.shift();
      if (!waiter || !slot) {
        return;
      }
      waiter.resolve(this.lease(state, slot));
    }
  }

  private lease(state: DestinationState, slot: Slot): Delivery {
    slot.deliveryCount++;
    slot.leaseExpiresAt = this.clock.now() + this.leaseMs;
    slot.leaseTimer = setTimeout(() => this.expireLease(slot), this.leaseMs);
    // An abandoned lease must not keep the process alive
    slot.leaseTimer.unref();
    state.inflight.set(slot.deliveryId, slot);
    state.counters.dequeued++;

    return {
      deliveryId: slot.deliveryId,
      message: slot.message,
      destination: slot.destination,
      deliveryCount: slot.deliveryCount,
      leaseExpiresAt: slot.leaseExpiresAt,
    };
  }

  private expireLease(slot: Slot): void {
    const state = this.destinations.get(slot.destination);
    if (!state || !state.inflight.delete(slot.deliveryId)) {
      return;
    }
    slot.leaseTimer = undefined;
    slot.leaseExpiresAt = undefined;

    // Back into its original position so per-destination order holds
    const index = state.ready.findIndex((s) => s.seq > slot.seq);
    if (index < 0) {
      state.ready.push(slot);
    } else {
      state.ready.splice(index, 0, slot);
    }
    state.counters.redelivered++;

    this.logger.debug("Lease expired, redelivering", {
      destination: slot.destination,
      deliveryId: slot.deliveryId,
      runId: slot.message.runId,
    });
    this.drain(state);
  }
}
