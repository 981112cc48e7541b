// Shared wiring for service-level specs: an in-memory ledger with the bundled pattern table.
import type { JsonObject } from '../models/prompt';
import { createPromptLedger, type PromptLedger } from '../services/container';
import { InMemoryRecordStore } from '../services/recordStore';

export const TEST_VERSIONING = { defaultBranch: 'main', historyLimitMax: 200, maxContentBytes: 51200 };

export function createTestLedger(overrides: Partial<typeof TEST_VERSIONING> = {}): PromptLedger {
  return createPromptLedger(new InMemoryRecordStore(), { scanner: {}, versioning: { ...TEST_VERSIONING, ...overrides } });
}

export function sectioned(sections: Record<string, string>, extra: JsonObject = {}): JsonObject {
  return { sections: Object.entries(sections).map(([id, content]) => ({ id, content })), ...extra };
}
