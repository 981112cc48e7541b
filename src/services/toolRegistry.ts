/**
 * Tool registry metadata: per-tool description, mutation flag and input JSON Schema.
 * Hosts introspect these through meta/tools; the transport validates params against them
 * before dispatch.
 */
import type { SchemaObject } from 'ajv';
import { PROMPT_TYPES } from '../models/prompt';
import { RESOLVE_STRATEGIES } from './resolver';
import { MERGE_STRATEGIES } from './versionStore';
import type { ToolName } from './toolRegistry.zod';

export interface ToolRegistryEntry {
  name: ToolName;               // JSON-RPC method
  description: string;
  mutation: boolean;            // writes to the store
  inputSchema: SchemaObject;    // always an object schema
}

const str = { type: 'string', minLength: 1 };
const optStr = { type: 'string' };
const int1 = { type: 'integer', minimum: 1 };
const jsonObject = { type: 'object' };
const strArray = { type: 'array', items: { type: 'string' } };

const obj = (required: string[], properties: Record<string, object>): SchemaObject =>
  ({ type: 'object', additionalProperties: false, required, properties });
const empty = obj([], {});
const slugOnly = obj(['slug'], { slug: str });

const mutationProps = { slug: str, message: optStr, author: optStr, branch: str, acknowledgeReduction: { type: 'boolean' } };

const INPUT_SCHEMAS: Record<ToolName, SchemaObject> = {
  'health/check': empty,
  'meta/tools': empty,
  'metrics/snapshot': empty,
  'prompts/create': obj(['slug', 'name', 'type'], {
    slug: str, name: str, type: { type: 'string', enum: PROMPT_TYPES },
    description: optStr, tags: strArray, metadata: jsonObject,
    parentSlug: { type: ['string', 'null'] }, content: jsonObject, initialMessage: optStr, author: optStr,
  }),
  'prompts/get': slugOnly,
  'prompts/list': obj([], { type: { type: 'string', enum: PROMPT_TYPES }, tag: optStr, search: optStr, archived: { type: 'boolean' } }),
  'prompts/update': obj(['slug'], {
    slug: str, name: str, type: { type: 'string', enum: PROMPT_TYPES },
    description: optStr, tags: strArray, metadata: jsonObject, parentSlug: { type: ['string', 'null'] },
  }),
  'prompts/archive': slugOnly,
  'prompts/chain': slugOnly,
  'prompts/effective': obj(['slug'], { slug: str, branch: str, version: int1 }),
  'prompts/resolve': obj(['slug'], { slug: str, branch: str, version: int1, strategy: { type: 'string', enum: RESOLVE_STRATEGIES } }),
  'prompts/compose': obj(['persona'], {
    persona: str, skills: strArray, constraints: strArray,
    variables: { type: 'object', additionalProperties: { type: 'string' } },
    branch: str, strategy: { type: 'string', enum: ['latest', 'best_performing'] },
  }),
  'versions/create': obj(['slug', 'content'], { ...mutationProps, content: jsonObject }),
  'versions/patch': obj(['slug', 'patch'], { ...mutationProps, patch: jsonObject }),
  'versions/restore': obj(['slug', 'fromVersion'], { ...mutationProps, fromVersion: int1, patch: jsonObject }),
  'versions/history': obj(['slug'], { slug: str, branch: str, limit: int1 }),
  'versions/get': obj(['slug', 'version'], { slug: str, version: int1, branch: str }),
  'versions/rollback': obj(['slug', 'version'], { slug: str, version: int1, author: optStr, branch: str }),
  'versions/diff': obj(['slug', 'fromVersion', 'toVersion'], { slug: str, fromVersion: int1, toVersion: int1, branch: str }),
  'versions/fieldDiff': obj(['slug', 'versionA', 'versionB'], { slug: str, versionA: int1, versionB: int1, branch: str }),
  'branches/create': obj(['slug', 'name'], { slug: str, name: str, fromBranch: str }),
  'branches/list': slugOnly,
  // strategy left open: unknown names are reported by the merge itself (known: see MERGE_STRATEGIES)
  'branches/merge': obj(['slug', 'source'], { slug: str, source: str, target: str, strategy: { type: 'string', examples: MERGE_STRATEGIES }, author: optStr }),
  'branches/reject': obj(['slug', 'branch'], { slug: str, branch: str, reason: optStr }),
  'branches/diff': obj(['slug', 'branch'], { slug: str, branch: str, target: str }),
  'content/scan': obj(['content'], { content: jsonObject }),
  'usage/log': obj(['slug', 'versionId', 'outcome'], {
    slug: str, versionId: str, agentId: optStr, outcome: { type: 'string', enum: ['success', 'failure', 'partial'] },
    latencyMs: { type: 'number', minimum: 0 }, feedback: optStr, compositionManifest: jsonObject,
  }),
  'usage/stats': slugOnly,
};

const DESCRIPTIONS: Record<ToolName, string> = {
  'health/check': 'Returns server health status & version.',
  'meta/tools': 'Enumerate available tools & their metadata.',
  'metrics/snapshot': 'Per-tool call counts, error counts and timings.',
  'prompts/create': 'Register a prompt (optionally with initial content committed as version 1).',
  'prompts/get': 'Fetch a prompt record by slug.',
  'prompts/list': 'List prompts filtered by type, tag, text search and archived flag.',
  'prompts/update': 'Update prompt metadata; re-parenting is checked for inheritance cycles.',
  'prompts/archive': 'Soft-delete a prompt (archived prompts stop resolving).',
  'prompts/chain': 'Inheritance chain of a prompt, child first.',
  'prompts/effective': 'Content with the inheritance chain layered root to leaf.',
  'prompts/resolve': 'Pick a version by strategy: latest, pinned or best_performing.',
  'prompts/compose': 'Assemble persona, skills and constraints into one prompt with a manifest.',
  'versions/create': 'Commit new content (scanned, regression-guarded against the head).',
  'versions/patch': 'Deep-merge a partial document onto the head and commit (null deletes a key).',
  'versions/restore': 'Copy an earlier version forward, optionally overlaying a patch.',
  'versions/history': 'Versions on a branch, newest first.',
  'versions/get': 'Fetch one version by number.',
  'versions/rollback': 'Commit a copy of an earlier version as the new head.',
  'versions/diff': 'Section-level diff between two versions, with a text rendering.',
  'versions/fieldDiff': 'Top-level key diff between two versions.',
  'branches/create': 'Create a branch seeded from the head of another branch.',
  'branches/list': 'List branch records of a prompt.',
  'branches/merge': 'Merge a branch into a target using ours, theirs or section_merge.',
  'branches/reject': 'Mark a branch rejected with an optional reason.',
  'branches/diff': 'Compare a branch head against the target head for review.',
  'content/scan': 'Run injection and secret checks on content without committing.',
  'usage/log': 'Record the outcome of using a prompt version.',
  'usage/stats': 'Aggregate usage statistics for a prompt.',
};

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(INPUT_SCHEMAS, name);
}

export function getToolRegistry(): ToolRegistryEntry[] {
  return Object.keys(INPUT_SCHEMAS).filter(isToolName).sort().map(name => ({
    name,
    description: DESCRIPTIONS[name],
    mutation: MUTATION.has(name),
    inputSchema: INPUT_SCHEMAS[name],
  }));
}

export function findTool(name: string): ToolRegistryEntry | undefined {
  return getToolRegistry().find(t => t.name === name);
}

export const MUTATION: ReadonlySet<ToolName> = new Set<ToolName>([
  'prompts/create', 'prompts/update', 'prompts/archive',
  'versions/create', 'versions/patch', 'versions/restore', 'versions/rollback',
  'branches/create', 'branches/merge', 'branches/reject',
  'usage/log',
]);

export const REGISTRY_VERSION = '2026-10-01';
