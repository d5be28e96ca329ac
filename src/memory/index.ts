/**
 * Shared memory store: run-scoped short-term tier plus a durable long-term tier.
 */

export { InMemoryStore, type MemoryStore, type InMemoryStoreOptions } from "./memory-store.js";
export {
  InMemoryLongTermBackend,
  JsonFileLongTermBackend,
  type LongTermBackend,
} from "./long-term.js";
export {
  payloadKey,
  candidateKey,
  resolvedKey,
  resolvedPrefix,
  PAYLOAD_PREFIX,
  CANDIDATE_PREFIX,
  RESOLVED_PREFIX,
} from "./keys.js";
