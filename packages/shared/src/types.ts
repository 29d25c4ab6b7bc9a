export type CoreInsightCategory = 'growth' | 'pattern' | 'milestone' | 'recommendation';

export interface CoreInsight {
  id: string;
  relevanceScore: number;
  title?: string;
  category?: CoreInsightCategory;
  createdAtIso?: string;
}

export interface CoreRecord {
  id: string;
  value: Record<string, unknown>;
  lastUpdatedAtIso: string;
  auxiliaryInsights: CoreInsight[];
}

export type SyncPhase = 'idle' | 'syncing' | 'backoff' | 'stopped';

export interface SyncStateSnapshot {
  isSyncing: boolean;
  phase: SyncPhase;
  consecutiveFailures: number;
  lastSuccessfulSyncAtIso: string | null;
  nextSyncAtIso: string | null;
  queueDepth: number;
}
