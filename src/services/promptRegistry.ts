import type { JsonObject, PromptFields, PromptRecord, PromptType } from '../models/prompt';
import { objectField, sectionsOf, type Section } from '../models/content';
import { validateSlug } from './contentSafety';
import { CircularInheritanceError, DuplicateSlugError, NotFoundError } from './errors';
import { logInfo } from './logger';
import type { RecordStore } from './recordStore';
import type { CommitOutcome, VersionStore } from './versionStore';

export interface CreatePromptInput {
  slug: string;
  name: string;
  type: PromptType;
  description?: string;
  tags?: string[];
  metadata?: JsonObject;
  parentSlug?: string | null;
  /** optional initial content, committed as version 1 on the default branch */
  content?: JsonObject;
  initialMessage?: string;
  author?: string;
}

export interface CreatePromptResult {
  prompt: PromptRecord;
  initialVersion?: CommitOutcome;
}

export interface ListPromptsQuery {
  type?: PromptType;
  tag?: string;
  search?: string;
  archived?: boolean;
}

export type PromptUpdate = Partial<Pick<PromptFields, 'name' | 'type' | 'description' | 'tags' | 'metadata' | 'parentSlug'>>;

const LAYERED_KEYS = new Set(['sections', 'variables', 'metadata']);

/** Prompt metadata CRUD and parent-chain resolution. Prompts are archived, never removed. */
export class PromptRegistry {
  constructor(private readonly store: RecordStore, private readonly versions: VersionStore){}

  async createPrompt(input: CreatePromptInput): Promise<CreatePromptResult> {
    validateSlug(input.slug);
    if(await this.getPrompt(input.slug)) throw new DuplicateSlugError(input.slug);
    const parentSlug = input.parentSlug ?? null;
    if(parentSlug !== null && !(await this.getPrompt(parentSlug))){
      throw new NotFoundError(`Parent prompt '${parentSlug}' not found`);
    }
    // gate the initial content before anything is written
    if(input.content) this.versions.vet(input.content, { slug: input.slug });

    const prompt = await this.store.insert('prompts', {
      slug: input.slug,
      name: input.name,
      type: input.type,
      description: input.description ?? '',
      tags: input.tags ?? [],
      metadata: input.metadata ?? {},
      archived: false,
      parentSlug,
    });
    logInfo('registry.prompt_created', { slug: prompt.slug, type: prompt.type, parentSlug });

    if(!input.content) return { prompt };
    const initialVersion = await this.versions.commit(prompt.id, {
      content: input.content,
      message: input.initialMessage ?? 'Initial version',
      author: input.author ?? 'system',
    });
    return { prompt, initialVersion };
  }

  async getPrompt(slug: string): Promise<PromptRecord | undefined> {
    const [row] = await this.store.select('prompts', { filters: { slug } });
    return row;
  }

  async requirePrompt(slug: string): Promise<PromptRecord> {
    const prompt = await this.getPrompt(slug);
    if(!prompt) throw new NotFoundError(`Prompt '${slug}' not found`);
    return prompt;
  }

  async listPrompts(query: ListPromptsQuery = {}): Promise<PromptRecord[]> {
    let rows = await this.store.select('prompts', { filters: { archived: query.archived ?? false, type: query.type } });
    const tag = query.tag;
    if(tag) rows = rows.filter(r => r.tags.includes(tag));
    if(query.search){
      const needle = query.search.toLowerCase();
      rows = rows.filter(r => [r.name, r.description, r.slug].some(v => v.toLowerCase().includes(needle)));
    }
    return rows;
  }

  async updatePrompt(slug: string, changes: PromptUpdate): Promise<PromptRecord> {
    const prompt = await this.requirePrompt(slug);
    if(changes.parentSlug !== undefined && changes.parentSlug !== null){
      await this.assertParentAllowed(slug, changes.parentSlug);
    }
    const updated = await this.store.update('prompts', prompt.id, changes);
    logInfo('registry.prompt_updated', { slug, fields: Object.keys(changes) });
    return updated;
  }

  async archivePrompt(slug: string): Promise<PromptRecord> {
    const prompt = await this.requirePrompt(slug);
    const updated = await this.store.update('prompts', prompt.id, { archived: true });
    logInfo('registry.prompt_archived', { slug });
    return updated;
  }

  // re-parenting must not close a loop back to `slug`
  private async assertParentAllowed(slug: string, parentSlug: string): Promise<void> {
    if(parentSlug === slug) throw new CircularInheritanceError([slug, slug]);
    const path = [slug];
    let current: string | null = parentSlug;
    const seen = new Set<string>();
    while(current !== null){
      if(current === slug) throw new CircularInheritanceError([...path, slug]);
      if(seen.has(current)) break; // pre-existing loop elsewhere; chain walking reports it
      seen.add(current);
      path.push(current);
      const p: PromptRecord | undefined = await this.getPrompt(current);
      if(!p){
        if(current === parentSlug) throw new NotFoundError(`Parent prompt '${parentSlug}' not found`);
        break;
      }
      current = p.parentSlug;
    }
  }

  /** Inheritance chain, child first. */
  async getPromptChain(slug: string): Promise<PromptRecord[]> {
    const chain: PromptRecord[] = [];
    const seen = new Set<string>();
    let current: string | null = slug;
    while(current !== null){
      if(seen.has(current)) throw new CircularInheritanceError([...chain.map(p => p.slug), current]);
      seen.add(current);
      const prompt: PromptRecord | undefined = await this.getPrompt(current);
      if(!prompt) throw new NotFoundError(`Prompt '${current}' not found in inheritance chain`);
      chain.push(prompt);
      current = prompt.parentSlug;
    }
    return chain;
  }

  /**
   * Layer the chain's content root to leaf: sections by id (child wins), variables and metadata
   * shallow-unioned, other top-level keys replaced by the child's. `version` pins the leaf only;
   * ancestors contribute their latest version on `branch`, and ancestors without one are skipped.
   */
  async getEffectiveContent(slug: string, branch: string = this.versions.defaultBranch, version?: number): Promise<JsonObject> {
    const chain = await this.getPromptChain(slug);
    const sections = new Map<string, Section>();
    let variables: JsonObject = {};
    let metadata: JsonObject = {};
    let rest: JsonObject = {};

    for(const prompt of [...chain].reverse()){
      const isLeaf = prompt.slug === slug;
      let content: JsonObject | undefined;
      if(isLeaf && version !== undefined){
        const pinned = await this.versions.getVersion(prompt.id, version, branch);
        if(!pinned) throw new NotFoundError(`Version ${version} of '${slug}' not found on branch '${branch}'`);
        content = pinned.content;
      } else {
        content = (await this.versions.head(prompt.id, branch))?.content;
      }
      if(!content) continue;
      for(const s of sectionsOf(content)) sections.set(s.id, s);
      variables = { ...variables, ...objectField(content, 'variables') };
      metadata = { ...metadata, ...objectField(content, 'metadata') };
      rest = { ...rest, ...Object.fromEntries(Object.entries(content).filter(([k]) => !LAYERED_KEYS.has(k))) };
    }
    return { ...rest, sections: [...sections.values()], variables, metadata };
  }
}

