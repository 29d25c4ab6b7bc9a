import type { CoreInsight, CoreRecord } from '../../../../shared/src/types';

export const insight = (id: string, relevanceScore: number): CoreInsight => ({
  id,
  relevanceScore,
});

export const makeRecord = (
  id: string,
  lastUpdatedAtIso: string,
  overrides: Partial<Omit<CoreRecord, 'id' | 'lastUpdatedAtIso'>> = {}
): CoreRecord => ({
  id,
  lastUpdatedAtIso,
  value: overrides.value ?? { level: 0.5 },
  auxiliaryInsights: overrides.auxiliaryInsights ?? [],
});

/** Lets queued microtasks (event delivery, promise chains) run. */
export const settle = async (ticks = 10): Promise<void> => {
  for (let index = 0; index < ticks; index += 1) {
    await Promise.resolve();
  }
};
