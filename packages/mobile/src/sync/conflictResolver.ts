import type { CoreInsight, CoreRecord } from '../../../shared/src/types';
import { EmptyConflictSetError } from './errors';
import type { ConflictSet } from './types';

export interface ConflictResolverOptions {
  insightCap: number;
}

const toMs = (iso: string): number => {
  const parsed = Date.parse(iso);
  return Number.isNaN(parsed) ? 0 : parsed;
};

const scoreOf = (insight: CoreInsight): number =>
  Number.isFinite(insight.relevanceScore) ? insight.relevanceScore : 0;

/**
 * Dedupes insights by id (higher relevance wins, first seen on ties), orders
 * them by relevance descending and truncates to `cap`. A non-finite score
 * ranks as 0.
 */
export const normalizeInsights = (
  insights: ReadonlyArray<CoreInsight>,
  cap: number
): CoreInsight[] => {
  const byId = new Map<string, CoreInsight>();
  for (const insight of insights) {
    const existing = byId.get(insight.id);
    if (!existing || scoreOf(insight) > scoreOf(existing)) {
      byId.set(insight.id, insight);
    }
  }

  return [...byId.values()]
    .sort((left, right) => scoreOf(right) - scoreOf(left))
    .slice(0, Math.max(0, cap));
};

export const sortByRecency = (candidates: ReadonlyArray<CoreRecord>): CoreRecord[] => {
  return [...candidates].sort(
    (left, right) => toMs(right.lastUpdatedAtIso) - toMs(left.lastUpdatedAtIso)
  );
};

/**
 * Last-writer-wins for `value` and `lastUpdatedAtIso`; insights are unioned
 * across every candidate. A single candidate is returned as-is.
 */
export const resolveConflict = (
  candidates: ReadonlyArray<CoreRecord>,
  options: ConflictResolverOptions
): CoreRecord => {
  if (candidates.length === 0) {
    throw new EmptyConflictSetError();
  }
  if (candidates.length === 1) {
    return candidates[0];
  }

  const ordered = sortByRecency(candidates);
  const winner = ordered[0];

  return {
    ...winner,
    auxiliaryInsights: normalizeInsights(
      ordered.flatMap((candidate) => candidate.auxiliaryInsights),
      options.insightCap
    ),
  };
};

export const resolveConflictSet = (
  conflicts: ConflictSet,
  options: ConflictResolverOptions
): Map<string, CoreRecord> => {
  const resolved = new Map<string, CoreRecord>();
  for (const [targetId, candidates] of conflicts) {
    if (candidates.length === 0) {
      throw new EmptyConflictSetError(targetId);
    }
    resolved.set(targetId, resolveConflict(candidates, options));
  }
  return resolved;
};
