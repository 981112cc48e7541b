export const PROMPT_TYPES = ['persona', 'skill', 'constraint', 'template', 'meta'] as const;
export type PromptType = typeof PROMPT_TYPES[number];

export type BranchStatus = 'active' | 'merged' | 'rejected';
export type UsageOutcome = 'success' | 'failure' | 'partial';

/** Any JSON object. Prompt content is always an object at the top level. */
export type JsonObject = Record<string, unknown>;

/** Columns every stored record receives from the store on insert. */
export interface RecordMeta {
  id: string;
  createdAt: string;
  updatedAt: string;
}

export type Stored<T> = T & RecordMeta;

export interface PromptFields {
  slug: string;
  name: string;
  type: PromptType;
  description: string;
  tags: string[];
  metadata: JsonObject;
  archived: boolean;
  parentSlug: string | null; // single-parent inheritance
}

export interface VersionFields {
  promptId: string;
  branch: string;
  version: number; // 1-based position within (promptId, branch)
  content: JsonObject;
  message: string;
  author: string;
  parentVersionId: string | null;
}

export interface BranchFields {
  promptId: string;
  name: string;
  headVersionId: string | null;
  baseVersionId: string | null;
  status: BranchStatus;
  rejectionReason?: string;
}

export interface UsageFields {
  promptId: string;
  versionId: string;
  agentId?: string;
  outcome: UsageOutcome;
  latencyMs?: number;
  feedback?: string;
  compositionManifest?: JsonObject;
}

export type PromptRecord = Stored<PromptFields>;
export type VersionRecord = Stored<VersionFields>;
export type BranchRecord = Stored<BranchFields>;
export type UsageRecord = Stored<UsageFields>;

/** Collection name → field shape. The store is typed against this map. */
export interface CollectionMap {
  prompts: PromptFields;
  prompt_versions: VersionFields;
  prompt_branches: BranchFields;
  prompt_usage_log: UsageFields;
}
export type CollectionName = keyof CollectionMap;
export const COLLECTIONS: readonly CollectionName[] = ['prompts', 'prompt_versions', 'prompt_branches', 'prompt_usage_log'];
