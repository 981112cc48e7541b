// JSON Schemas for persisted records; they guard what the file store loads from disk.
import type { SchemaObject } from 'ajv';

const isoTimestamp = { type: 'string', format: 'date-time' };
const nullableString = { type: ['string', 'null'] };

const recordMeta = {
  id: { type: 'string', minLength: 1 },
  createdAt: isoTimestamp,
  updatedAt: isoTimestamp
};

export const promptRecordSchema: SchemaObject = {
  type: 'object',
  required: ['id', 'createdAt', 'updatedAt', 'slug', 'name', 'type', 'description', 'tags', 'metadata', 'archived', 'parentSlug'],
  properties: {
    ...recordMeta,
    slug: { type: 'string', pattern: '^[a-z0-9][a-z0-9-]*[a-z0-9]$', minLength: 2, maxLength: 100 },
    name: { type: 'string' },
    type: { enum: ['persona', 'skill', 'constraint', 'template', 'meta'] },
    description: { type: 'string' },
    tags: { type: 'array', items: { type: 'string' } },
    metadata: { type: 'object' },
    archived: { type: 'boolean' },
    parentSlug: nullableString
  }
};

export const versionRecordSchema: SchemaObject = {
  type: 'object',
  required: ['id', 'createdAt', 'updatedAt', 'promptId', 'branch', 'version', 'content', 'message', 'author', 'parentVersionId'],
  properties: {
    ...recordMeta,
    promptId: { type: 'string' },
    branch: { type: 'string', minLength: 1 },
    version: { type: 'integer', minimum: 1 },
    content: { type: 'object' },
    message: { type: 'string' },
    author: { type: 'string' },
    parentVersionId: nullableString
  }
};

export const branchRecordSchema: SchemaObject = {
  type: 'object',
  required: ['id', 'createdAt', 'updatedAt', 'promptId', 'name', 'headVersionId', 'baseVersionId', 'status'],
  properties: {
    ...recordMeta,
    promptId: { type: 'string' },
    name: { type: 'string', minLength: 1 },
    headVersionId: nullableString,
    baseVersionId: nullableString,
    status: { enum: ['active', 'merged', 'rejected'] },
    rejectionReason: { type: 'string' }
  }
};

export const usageRecordSchema: SchemaObject = {
  type: 'object',
  required: ['id', 'createdAt', 'updatedAt', 'promptId', 'versionId', 'outcome'],
  properties: {
    ...recordMeta,
    promptId: { type: 'string' },
    versionId: { type: 'string' },
    agentId: { type: 'string' },
    outcome: { enum: ['success', 'failure', 'partial'] },
    latencyMs: { type: 'number', minimum: 0 },
    feedback: { type: 'string' },
    compositionManifest: { type: 'object' }
  }
};
