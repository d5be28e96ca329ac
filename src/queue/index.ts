/**
 * Inter-agent message queue.
 */

export {
  MessageQueue,
  type Delivery,
  type QueueStats,
  type MessageQueueOptions,
} from "./message-queue.js";
