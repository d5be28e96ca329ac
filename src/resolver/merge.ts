/**
 * Merge strategies combine several candidate values into one.
 *
 * A strategy receives values best-first (policy order) and either returns
 * the merged value or throws MergeConflictError, in which case the
 * resolver falls back to picking the top-ranked candidate.
 */

import { isDeepStrictEqual } from "node:util";
import { MergeConflictError } from "../errors/index.js";
import type { MergeStrategyName } from "../config/orchestrator/schema.js";

export type MergeStrategy = (subject: string, values: readonly unknown[]) => unknown;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Union of top-level fields. A field present in several values must hold
 * deep-equal values; otherwise the candidates contradict each other.
 */
export const shallowMerge: MergeStrategy = (subject, values) => {
  const merged: Record<string, unknown> = {};
  const conflicts = new Set<string>();

  for (const value of values) {
    if (!isPlainObject(value)) {
      throw new MergeConflictError(subject, ["(non-object value)"]);
    }
    for (const [field, fieldValue] of Object.entries(value)) {
      if (!(field in merged)) {
        merged[field] = fieldValue;
      } else if (!isDeepStrictEqual(merged[field], fieldValue)) {
        conflicts.add(field);
      }
    }
  }

  if (conflicts.size > 0) {
    throw new MergeConflictError(subject, [...conflicts].sort());
  }
  return merged;
};

const STRATEGIES: Record<MergeStrategyName, MergeStrategy | null> = {
  none: null,
  "shallow-merge": shallowMerge,
};

export function getMergeStrategy(name: MergeStrategyName): MergeStrategy | null {
  return STRATEGIES[name];
}
