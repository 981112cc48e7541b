// Zod parameter schemas for every tool. The handler registry parses params through these before
// dispatch, so handlers receive typed, defaulted values.
import { z } from 'zod';
import { PROMPT_TYPES } from '../models/prompt';

const zSlug = z.string().min(1);
const zBranch = z.string().min(1).optional();
const zJsonObject = z.record(z.unknown());
const zVersionNumber = z.number().int().min(1);

export const zEmpty = z.object({}).strict();
const zSlugOnly = z.object({ slug: zSlug }).strict();

// Prompts
export const zPromptCreate = z.object({
  slug: zSlug,
  name: z.string().min(1),
  type: z.enum(PROMPT_TYPES),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
  metadata: zJsonObject.optional(),
  parentSlug: z.string().min(1).nullable().optional(),
  content: zJsonObject.optional(),
  initialMessage: z.string().optional(),
  author: z.string().optional(),
}).strict();

export const zPromptGet = zSlugOnly;
export const zPromptList = z.object({
  type: z.enum(PROMPT_TYPES).optional(),
  tag: z.string().optional(),
  search: z.string().optional(),
  archived: z.boolean().optional(),
}).strict();

export const zPromptUpdate = z.object({
  slug: zSlug,
  name: z.string().min(1).optional(),
  type: z.enum(PROMPT_TYPES).optional(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
  metadata: zJsonObject.optional(),
  parentSlug: z.string().min(1).nullable().optional(),
}).strict();

export const zPromptArchive = zSlugOnly;
export const zPromptChain = zSlugOnly;
export const zPromptEffective = z.object({ slug: zSlug, branch: zBranch, version: zVersionNumber.optional() }).strict();

// Versions
const mutationFields = {
  slug: zSlug,
  message: z.string().optional(),
  author: z.string().optional(),
  branch: zBranch,
  acknowledgeReduction: z.boolean().optional(),
};

export const zVersionCreate = z.object({ ...mutationFields, content: zJsonObject }).strict();
export const zVersionPatch = z.object({ ...mutationFields, patch: zJsonObject }).strict();
export const zVersionRestore = z.object({ ...mutationFields, fromVersion: zVersionNumber, patch: zJsonObject.optional() }).strict();
export const zVersionHistory = z.object({ slug: zSlug, branch: zBranch, limit: z.number().int().min(1).optional() }).strict();
export const zVersionGet = z.object({ slug: zSlug, version: zVersionNumber, branch: zBranch }).strict();
export const zVersionRollback = z.object({ slug: zSlug, version: zVersionNumber, author: z.string().optional(), branch: zBranch }).strict();
export const zVersionDiff = z.object({ slug: zSlug, fromVersion: zVersionNumber, toVersion: zVersionNumber, branch: zBranch }).strict();
export const zVersionFieldDiff = z.object({ slug: zSlug, versionA: zVersionNumber, versionB: zVersionNumber, branch: zBranch }).strict();

// Branches
export const zBranchCreate = z.object({ slug: zSlug, name: z.string().min(1), fromBranch: zBranch }).strict();
export const zBranchList = zSlugOnly;
// strategy stays a free string so unknown values surface as unknown_merge_strategy
export const zBranchMerge = z.object({ slug: zSlug, source: z.string().min(1), target: zBranch, strategy: z.string().optional(), author: z.string().optional() }).strict();
export const zBranchReject = z.object({ slug: zSlug, branch: z.string().min(1), reason: z.string().optional() }).strict();
export const zBranchDiff = z.object({ slug: zSlug, branch: z.string().min(1), target: zBranch }).strict();

// Resolution & composition
export const zResolve = z.object({
  slug: zSlug,
  branch: zBranch,
  version: zVersionNumber.optional(),
  strategy: z.enum(['latest', 'pinned', 'best_performing']).optional(),
}).strict();

export const zCompose = z.object({
  persona: zSlug,
  skills: z.array(zSlug).optional(),
  constraints: z.array(zSlug).optional(),
  variables: z.record(z.string()).optional(),
  branch: zBranch,
  strategy: z.enum(['latest', 'best_performing']).optional(),
}).strict();

export const zScan = z.object({ content: zJsonObject }).strict();

// Usage
export const zUsageLog = z.object({
  slug: zSlug,
  versionId: z.string().min(1),
  agentId: z.string().optional(),
  outcome: z.enum(['success', 'failure', 'partial']),
  latencyMs: z.number().min(0).optional(),
  feedback: z.string().optional(),
  compositionManifest: zJsonObject.optional(),
}).strict();
export const zUsageStats = zSlugOnly;

/** Tool name → params schema. */
export const zodMap = {
  'health/check': zEmpty,
  'meta/tools': zEmpty,
  'metrics/snapshot': zEmpty,
  'prompts/create': zPromptCreate,
  'prompts/get': zPromptGet,
  'prompts/list': zPromptList,
  'prompts/update': zPromptUpdate,
  'prompts/archive': zPromptArchive,
  'prompts/chain': zPromptChain,
  'prompts/effective': zPromptEffective,
  'prompts/resolve': zResolve,
  'prompts/compose': zCompose,
  'versions/create': zVersionCreate,
  'versions/patch': zVersionPatch,
  'versions/restore': zVersionRestore,
  'versions/history': zVersionHistory,
  'versions/get': zVersionGet,
  'versions/rollback': zVersionRollback,
  'versions/diff': zVersionDiff,
  'versions/fieldDiff': zVersionFieldDiff,
  'branches/create': zBranchCreate,
  'branches/list': zBranchList,
  'branches/merge': zBranchMerge,
  'branches/reject': zBranchReject,
  'branches/diff': zBranchDiff,
  'content/scan': zScan,
  'usage/log': zUsageLog,
  'usage/stats': zUsageStats,
} satisfies Record<string, z.ZodTypeAny>;

export type ToolName = keyof typeof zodMap;
