import type { SyncCycleStage } from './types';

export interface SyncIssue {
  path: string;
  message: string;
}

export class EmptyConflictSetError extends Error {
  readonly targetId: string | null;

  constructor(targetId: string | null = null) {
    super(
      targetId
        ? `Conflict set for "${targetId}" has no candidates.`
        : 'Conflict set has no candidates.'
    );
    this.name = 'EmptyConflictSetError';
    this.targetId = targetId;
  }
}

export class RecordNotFoundError extends Error {
  readonly targetId: string;

  constructor(targetId: string) {
    super(`Core record "${targetId}" does not exist locally.`);
    this.name = 'RecordNotFoundError';
    this.targetId = targetId;
  }
}

export class SyncConfigError extends Error {
  readonly issues: SyncIssue[];

  constructor(issues: SyncIssue[]) {
    super(`Invalid sync configuration: ${issues.map((issue) => `${issue.path} ${issue.message}`).join('; ')}`);
    this.name = 'SyncConfigError';
    this.issues = issues;
  }
}

export class QueueSnapshotError extends Error {
  readonly issues: SyncIssue[];

  constructor(issues: SyncIssue[]) {
    super(`Queue snapshot rejected: ${issues.map((issue) => `${issue.path} ${issue.message}`).join('; ')}`);
    this.name = 'QueueSnapshotError';
    this.issues = issues;
  }
}

export class SyncCycleError extends Error {
  readonly stage: SyncCycleStage;
  readonly failure: unknown;

  constructor(stage: SyncCycleStage, failure: unknown) {
    super(`Sync cycle aborted during ${stage}: ${describeError(failure)}`);
    this.name = 'SyncCycleError';
    this.stage = stage;
    this.failure = failure;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string' && error.length > 0) return error;
  return 'Unknown error';
};

export const toIssues = (
  rawErrors: ReadonlyArray<{ instancePath?: string; message?: string }>
): SyncIssue[] => {
  return rawErrors.map((entry) => ({
    path: entry.instancePath && entry.instancePath.length > 0 ? entry.instancePath : '/',
    message: entry.message ?? 'invalid value',
  }));
};
