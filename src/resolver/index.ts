/**
 * Conflict resolution: records, ordering policy, merge strategies.
 */

export {
  ConflictResolver,
  RESOLUTIONS_TOPIC,
  RESOLVER_WRITER,
  type ConflictResolverOptions,
} from "./conflict-resolver.js";
export { ConflictLedger } from "./conflict-ledger.js";
export { KeyedMutex } from "./keyed-mutex.js";
export { shallowMerge, getMergeStrategy, type MergeStrategy } from "./merge.js";
export { orderCandidates, compareCandidates, rankingFor, fingerprint } from "./policy.js";
