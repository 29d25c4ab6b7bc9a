import Ajv from 'ajv';
import { QueueSnapshotError, toIssues } from './errors';
import type { QueueSnapshot } from './types';

const insightSchema = {
  type: 'object',
  required: ['id', 'relevanceScore'],
  properties: {
    id: { type: 'string', minLength: 1 },
    relevanceScore: { type: 'number' },
    title: { type: 'string' },
    category: { type: 'string', enum: ['growth', 'pattern', 'milestone', 'recommendation'] },
    createdAtIso: { type: 'string' },
  },
} as const;

const coreRecordSchema = {
  type: 'object',
  required: ['id', 'value', 'lastUpdatedAtIso', 'auxiliaryInsights'],
  properties: {
    id: { type: 'string', minLength: 1 },
    value: { type: 'object' },
    lastUpdatedAtIso: { type: 'string' },
    auxiliaryInsights: { type: 'array', items: insightSchema },
  },
} as const;

const updateBaseProperties = {
  id: { type: 'string', minLength: 1 },
  targetId: { type: 'string', minLength: 1 },
  createdAtIso: { type: 'string' },
  lastAttemptAtIso: { type: ['string', 'null'] },
  retryCount: { type: 'integer', minimum: 0 },
} as const;

const updateRequired = ['id', 'targetId', 'kind', 'payload', 'createdAtIso', 'lastAttemptAtIso', 'retryCount'];

export const queueSnapshotSchema = {
  $id: 'https://journal-core-sync.local/schemas/queue-snapshot-v1.json',
  type: 'object',
  additionalProperties: false,
  required: ['version', 'updates'],
  properties: {
    version: { const: 1 },
    updates: {
      type: 'array',
      items: {
        oneOf: [
          {
            type: 'object',
            required: updateRequired,
            properties: {
              ...updateBaseProperties,
              kind: { const: 'record' },
              payload: {
                type: 'object',
                required: ['record'],
                properties: { record: coreRecordSchema },
              },
            },
          },
          {
            type: 'object',
            required: updateRequired,
            properties: {
              ...updateBaseProperties,
              kind: { const: 'batch' },
              payload: {
                type: 'object',
                required: ['records'],
                properties: { records: { type: 'array', minItems: 1, items: coreRecordSchema } },
              },
            },
          },
          {
            type: 'object',
            required: updateRequired,
            properties: {
              ...updateBaseProperties,
              kind: { const: 'metadata' },
              payload: {
                type: 'object',
                required: ['auxiliaryInsights'],
                properties: { auxiliaryInsights: { type: 'array', items: insightSchema } },
              },
            },
          },
        ],
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateQueueSnapshot = ajv.compile<QueueSnapshot>(queueSnapshotSchema);

export const isQueueSnapshot = (value: unknown): value is QueueSnapshot => validateQueueSnapshot(value);

export const parseQueueSnapshot = (value: unknown): QueueSnapshot => {
  if (validateQueueSnapshot(value)) {
    return value;
  }
  throw new QueueSnapshotError(toIssues(validateQueueSnapshot.errors ?? []));
};
