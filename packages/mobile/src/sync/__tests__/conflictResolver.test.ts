import { describe, expect, it } from 'vitest';
import {
  normalizeInsights,
  resolveConflict,
  resolveConflictSet,
  sortByRecency,
} from '../conflictResolver';
import { EmptyConflictSetError } from '../errors';
import type { ConflictSet } from '../types';
import { insight, makeRecord } from './fixtures';

describe('conflict resolver', () => {
  it('keeps the newest value and merges insights from every candidate', () => {
    const older = makeRecord('optimism', '2026-02-01T00:00:00.000Z', {
      value: { level: 0.2 },
      auxiliaryInsights: [insight('x', 0.4)],
    });
    const newer = makeRecord('optimism', '2026-02-02T00:00:00.000Z', {
      value: { level: 0.8 },
      auxiliaryInsights: [insight('x', 0.9), insight('y', 0.3)],
    });

    const resolved = resolveConflict([older, newer], { insightCap: 5 });

    expect(resolved.value).toEqual({ level: 0.8 });
    expect(resolved.lastUpdatedAtIso).toBe('2026-02-02T00:00:00.000Z');
    expect(resolved.auxiliaryInsights).toEqual([
      { id: 'x', relevanceScore: 0.9 },
      { id: 'y', relevanceScore: 0.3 },
    ]);
  });

  it('returns a lone candidate untouched', () => {
    const only = makeRecord('clarity', '2026-02-01T00:00:00.000Z', {
      auxiliaryInsights: [insight('a', 0.1), insight('a', 0.7)],
    });

    expect(resolveConflict([only], { insightCap: 1 })).toBe(only);
  });

  it('rejects an empty candidate list', () => {
    expect(() => resolveConflict([], { insightCap: 5 })).toThrow(EmptyConflictSetError);
  });

  it('caps the merged insights by relevance', () => {
    const left = makeRecord('focus', '2026-02-01T00:00:00.000Z', {
      auxiliaryInsights: [insight('a', 0.1), insight('b', 0.5), insight('c', 0.9)],
    });
    const right = makeRecord('focus', '2026-02-03T00:00:00.000Z', {
      auxiliaryInsights: [insight('d', 0.7), insight('e', 0.3)],
    });

    const resolved = resolveConflict([left, right], { insightCap: 3 });

    expect(resolved.auxiliaryInsights.map((entry) => entry.id)).toEqual(['c', 'd', 'b']);
  });

  it('leaves the candidates unchanged', () => {
    const left = makeRecord('focus', '2026-02-01T00:00:00.000Z', {
      auxiliaryInsights: [insight('a', 0.2)],
    });
    const right = makeRecord('focus', '2026-02-02T00:00:00.000Z', {
      auxiliaryInsights: [insight('b', 0.6)],
    });

    resolveConflict([left, right], { insightCap: 5 });

    expect(left.auxiliaryInsights).toEqual([{ id: 'a', relevanceScore: 0.2 }]);
    expect(right.auxiliaryInsights).toEqual([{ id: 'b', relevanceScore: 0.6 }]);
  });

  it('prefers the first listed candidate when timestamps tie', () => {
    const first = makeRecord('calm', '2026-02-01T00:00:00.000Z', { value: { level: 0.1 } });
    const second = makeRecord('calm', '2026-02-01T00:00:00.000Z', { value: { level: 0.9 } });

    expect(resolveConflict([first, second], { insightCap: 5 }).value).toEqual({ level: 0.1 });
    expect(sortByRecency([first, second])).toEqual([first, second]);
  });

  it('keeps the first insight seen when scores tie', () => {
    const first = { id: 'x', relevanceScore: 0.5, title: 'first' };
    const second = { id: 'x', relevanceScore: 0.5, title: 'second' };

    expect(normalizeInsights([first, second], 5)).toEqual([first]);
  });

  it('ranks a non-finite relevance score as zero', () => {
    const ranked = normalizeInsights(
      [insight('a', Number.NaN), insight('b', 0.5), insight('a', 0.2), insight('c', Number.NaN)],
      5
    );

    expect(ranked.map((entry) => [entry.id, entry.relevanceScore])).toEqual([
      ['b', 0.5],
      ['a', 0.2],
      ['c', Number.NaN],
    ]);
  });

  it('resolves each entry of a conflict set', () => {
    const conflicts = new Map([
      [
        'optimism',
        [
          makeRecord('optimism', '2026-02-01T00:00:00.000Z'),
          makeRecord('optimism', '2026-02-05T00:00:00.000Z'),
        ],
      ],
      ['calm', [makeRecord('calm', '2026-02-02T00:00:00.000Z')]],
    ]);

    const resolved = resolveConflictSet(conflicts, { insightCap: 5 });

    expect([...resolved.keys()]).toEqual(['optimism', 'calm']);
    expect(resolved.get('optimism')?.lastUpdatedAtIso).toBe('2026-02-05T00:00:00.000Z');
  });

  it('names the target of an empty entry', () => {
    const conflicts: ConflictSet = new Map([['calm', []]]);

    expect(() => resolveConflictSet(conflicts, { insightCap: 5 })).toThrow(
      'Conflict set for "calm" has no candidates.'
    );
  });
});
