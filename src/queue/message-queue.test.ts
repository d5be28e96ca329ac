/**
 * Tests for the in-process message queue.
 *
 * Run: node --import tsx src/queue/message-queue.test.ts
 */

import { strict as assert } from "node:assert";
import { setTimeout as delay } from "node:timers/promises";

import { QueueFullError, QueueTimeoutError } from "../errors/index.js";
import { PipelineStage } from "../types/pipeline.js";
import { toRole, toTopic, type ResolutionMessage, type TaskMessage } from "../types/messages.js";
import { MessageQueue } from "./message-queue.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function task(n: number, runId = "run-1", role = "writer"): TaskMessage {
  const taskId = `${runId}/writing/draft-${n}/${role}`;
  return {
    kind: "task",
    id: `${taskId}#1`,
    taskId,
    runId,
    stage: PipelineStage.Writing,
    role,
    subject: `draft-${n}`,
    payloadRef: "payload/writing",
    replyTo: `orchestrator/${runId}`,
    createdAt: n,
    attempt: 1,
  };
}

function resolution(subject: string): ResolutionMessage {
  return {
    kind: "resolution",
    runId: "run-1",
    stage: PipelineStage.Editing,
    subject,
    outcome: "single",
    authoritativeRef: `resolved/editing/${subject}`,
    timestamp: 1,
  };
}

function newQueue(capacity = 100, leaseMs = 60_000): MessageQueue {
  return new MessageQueue({ capacity, leaseMs });
}

const fastBackoff = { maxAttempts: 5, initialDelayMs: 2, maxDelayMs: 5 };

// ═══════════════════════════════════════════════════════════════════════════
// ORDERING AND ROUTING
// ═══════════════════════════════════════════════════════════════════════════

section("Ordering");

await test("messages to one destination are dequeued in enqueue order", async () => {
  const queue = newQueue();
  for (let n = 1; n <= 5; n++) {
    queue.enqueue(task(n), toRole("writer"));
  }
  const subjects: string[] = [];
  for (let n = 1; n <= 5; n++) {
    const delivery = await queue.dequeue("writer", 10);
    subjects.push(delivery.message.kind === "task" ? delivery.message.subject : "?");
    queue.ack(delivery.deliveryId);
  }
  assert.deepEqual(subjects, ["draft-1", "draft-2", "draft-3", "draft-4", "draft-5"]);
});

await test("destinations do not share order", async () => {
  const queue = newQueue();
  queue.enqueue(task(1), toRole("writer"));
  queue.enqueue(task(2, "run-1", "editor"), toRole("editor"));
  const editor = await queue.dequeue("editor", 10);
  assert.equal(editor.message.kind === "task" && editor.message.subject, "draft-2");
  assert.equal(queue.stats("writer").ready, 1);
});

await test("enqueued messages are frozen", async () => {
  const queue = newQueue();
  queue.enqueue(task(1), toRole("writer"));
  const delivery = await queue.dequeue("writer", 10);
  assert.ok(Object.isFrozen(delivery.message));
});

section("Topics");

await test("topic messages fan out to every subscriber", async () => {
  const queue = newQueue();
  queue.subscribe("observer", "resolutions");
  queue.subscribe("auditor", "resolutions");
  const ids = queue.enqueue(resolution("tone"), toTopic("resolutions"));
  assert.equal(ids.length, 2);
  assert.equal((await queue.dequeue("observer", 10)).message.kind, "resolution");
  assert.equal((await queue.dequeue("auditor", 10)).message.kind, "resolution");
});

await test("topic without subscribers drops the message", () => {
  const queue = newQueue();
  assert.deepEqual(queue.enqueue(resolution("tone"), toTopic("resolutions")), []);
  assert.equal(queue.stats().enqueued, 0);
});

await test("unsubscribe stops delivery", () => {
  const queue = newQueue();
  const unsubscribe = queue.subscribe("observer", "resolutions");
  unsubscribe();
  assert.deepEqual(queue.enqueue(resolution("tone"), toTopic("resolutions")), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// CAPACITY
// ═══════════════════════════════════════════════════════════════════════════

section("Capacity");

await test("full destination rejects with QueueFull until a delivery is acked", async () => {
  const queue = newQueue(2);
  queue.enqueue(task(1), toRole("writer"));
  queue.enqueue(task(2), toRole("writer"));
  assert.throws(() => queue.enqueue(task(3), toRole("writer")), QueueFullError);

  // In-flight deliveries still count against capacity
  const delivery = await queue.dequeue("writer", 10);
  assert.throws(() => queue.enqueue(task(3), toRole("writer")), QueueFullError);
  queue.ack(delivery.deliveryId);
  assert.equal(queue.enqueue(task(3), toRole("writer")).length, 1);
});

await test("topic fan-out is all or nothing", () => {
  const queue = newQueue(1);
  queue.subscribe("auditor", "resolutions");
  queue.subscribe("observer", "resolutions");
  queue.enqueue(task(1, "run-1", "observer"), toRole("observer"));
  assert.throws(() => queue.enqueue(resolution("tone"), toTopic("resolutions")), QueueFullError);
  assert.equal(queue.stats("auditor").ready, 0);
});

await test("enqueueWithBackoff succeeds once space frees up", async () => {
  const queue = newQueue(1);
  queue.enqueue(task(1), toRole("writer"));
  const first = await queue.dequeue("writer", 10);
  setTimeout(() => queue.ack(first.deliveryId), 3);
  const ids = await queue.enqueueWithBackoff(task(2), toRole("writer"), {
    maxAttempts: 20,
    initialDelayMs: 2,
    maxDelayMs: 5,
  });
  assert.equal(ids.length, 1);
});

await test("enqueueWithBackoff gives up after its attempt budget", async () => {
  const queue = newQueue(1);
  queue.enqueue(task(1), toRole("writer"));
  await assert.rejects(queue.enqueueWithBackoff(task(2), toRole("writer"), fastBackoff), QueueFullError);
});

// ═══════════════════════════════════════════════════════════════════════════
// DEQUEUE
// ═══════════════════════════════════════════════════════════════════════════

section("Dequeue");

await test("a waiting consumer receives a later enqueue", async () => {
  const queue = newQueue();
  const pending = queue.dequeue("writer", 1_000);
  assert.equal(queue.stats("writer").waiting, 1);
  queue.enqueue(task(7), toRole("writer"));
  const delivery = await pending;
  assert.equal(delivery.message.kind === "task" && delivery.message.subject, "draft-7");
  assert.equal(delivery.deliveryCount, 1);
  assert.equal(queue.stats("writer").waiting, 0);
});

await test("dequeue times out with QueueTimeout", async () => {
  const queue = newQueue();
  await assert.rejects(queue.dequeue("writer", 5), QueueTimeoutError);
  await assert.rejects(queue.dequeue("writer", 0), QueueTimeoutError);
  assert.equal(queue.stats("writer").waiting, 0);
});

await test("abort rejects a waiting consumer with the signal's reason", async () => {
  const queue = newQueue();
  const controller = new AbortController();
  const pending = queue.dequeue("writer", 10_000, controller.signal);
  const reason = new Error("stop");
  controller.abort(reason);
  await assert.rejects(pending, (err: unknown) => err === reason);
  assert.equal(queue.stats("writer").waiting, 0);
});

// ═══════════════════════════════════════════════════════════════════════════
// LEASES
// ═══════════════════════════════════════════════════════════════════════════

section("Leases and acknowledgement");

await test("unacknowledged delivery is redelivered after its lease", async () => {
  const queue = newQueue(100, 15);
  queue.enqueue(task(1), toRole("writer"));
  queue.enqueue(task(2), toRole("writer"));
  const first = await queue.dequeue("writer", 10);
  await delay(40);
  const again = await queue.dequeue("writer", 10);
  assert.equal(again.deliveryId, first.deliveryId);
  assert.equal(again.deliveryCount, 2);
  assert.equal(queue.stats("writer").redelivered, 1);
  queue.ack(again.deliveryId);
  const second = await queue.dequeue("writer", 10);
  assert.equal(second.message.kind === "task" && second.message.subject, "draft-2");
  queue.ack(second.deliveryId);
});

await test("acknowledged delivery is never redelivered", async () => {
  const queue = newQueue(100, 10);
  queue.enqueue(task(1), toRole("writer"));
  const delivery = await queue.dequeue("writer", 10);
  assert.equal(queue.ack(delivery.deliveryId), true);
  await delay(25);
  await assert.rejects(queue.dequeue("writer", 0), QueueTimeoutError);
  assert.equal(queue.ack(delivery.deliveryId), false);
  assert.equal(queue.ack("d-unknown"), false);
});

await test("stats track the delivery lifecycle", async () => {
  const queue = newQueue();
  queue.enqueue(task(1), toRole("writer"));
  queue.enqueue(task(2), toRole("writer"));
  const delivery = await queue.dequeue("writer", 10);
  queue.ack(delivery.deliveryId);
  assert.deepEqual(queue.stats("writer"), {
    ready: 1,
    inflight: 0,
    waiting: 0,
    enqueued: 2,
    dequeued: 1,
    acked: 1,
    redelivered: 0,
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RUN CLEANUP
// ═══════════════════════════════════════════════════════════════════════════

section("Run cleanup");

await test("purgeRun drops only that run's ready deliveries", async () => {
  const queue = newQueue();
  queue.enqueue(task(1, "run-a"), toRole("writer"));
  queue.enqueue(task(2, "run-b"), toRole("writer"));
  queue.enqueue(task(3, "run-a"), toRole("editor"));
  assert.equal(queue.purgeRun("run-a"), 2);
  const delivery = await queue.dequeue("writer", 10);
  assert.equal(delivery.message.runId, "run-b");
  assert.equal(queue.stats("editor").ready, 0);
});

await test("retired destination rejects waiters and drops later sends", async () => {
  const queue = newQueue();
  const pending = queue.dequeue("orchestrator/run-1", 10_000);
  queue.retireDestination("orchestrator/run-1");
  await assert.rejects(pending, QueueTimeoutError);
  assert.deepEqual(queue.enqueue(task(1), toRole("orchestrator/run-1")), []);
  assert.equal(queue.stats("orchestrator/run-1").ready, 0);
});

await test("close rejects waiting consumers and further sends", async () => {
  const queue = newQueue();
  const pending = queue.dequeue("writer", 10_000);
  queue.close();
  await assert.rejects(pending, /closed/);
  assert.throws(() => queue.enqueue(task(1), toRole("writer")), /closed/);
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
