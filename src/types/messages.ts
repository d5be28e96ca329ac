/**
 * Closed set of messages exchanged over the queue.
 */

import type { WorkStage } from "./pipeline.js";

export type CompletionStatus = "success" | "failure" | "partial";

export interface TaskMessage {
  readonly kind: "task";
  /** Unique per attempt: `${taskId}#${attempt}` */
  readonly id: string;
  /** Logical task id shared by every attempt */
  readonly taskId: string;
  readonly runId: string;
  readonly stage: WorkStage;
  readonly role: string;
  readonly subject: string;
  /** Memory key holding the stage payload */
  readonly payloadRef: string;
  /** Queue destination completions must be sent to */
  readonly replyTo: string;
  readonly createdAt: number;
  readonly attempt: number;
}

export interface CompletionMessage {
  readonly kind: "completion";
  readonly taskId: string;
  /** Id of the task message this completion answers */
  readonly messageId: string;
  readonly runId: string;
  readonly stage: WorkStage;
  readonly subject: string;
  readonly role: string;
  readonly attempt: number;
  readonly status: CompletionStatus;
  readonly resultRef?: string;
  readonly error?: string;
  readonly timestamp: number;
}

export type ResolutionOutcomeKind = "single" | "ranked" | "merged" | "unresolvable";

export interface ResolutionMessage {
  readonly kind: "resolution";
  readonly runId: string;
  readonly stage: WorkStage;
  readonly subject: string;
  readonly outcome: ResolutionOutcomeKind;
  readonly authoritativeRef?: string;
  readonly timestamp: number;
}

export type QueueMessage = TaskMessage | CompletionMessage | ResolutionMessage;

export type Destination =
  | { readonly kind: "role"; readonly role: string }
  | { readonly kind: "topic"; readonly topic: string };

export function toRole(role: string): Destination {
  return { kind: "role", role };
}

export function toTopic(topic: string): Destination {
  return { kind: "topic", topic };
}

export function formatDestination(destination: Destination): string {
  return destination.kind === "role" ? destination.role : `topic:${destination.topic}`;
}
