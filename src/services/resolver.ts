import type { VersionRecord } from '../models/prompt';
import { NotFoundError, ValidationError } from './errors';
import { logDebug, logInfo } from './logger';
import type { PromptRegistry } from './promptRegistry';
import type { UsageLog, VersionPerformance } from './usageLog';
import type { VersionStore } from './versionStore';

export type ResolveStrategy = 'latest' | 'pinned' | 'best_performing';
export const RESOLVE_STRATEGIES: readonly ResolveStrategy[] = ['latest', 'pinned', 'best_performing'];

/** A version needs at least this many recorded uses to be ranked by success rate. */
export const MIN_USES_FOR_RANKING = 3;

export interface ResolveRequest {
  slug: string;
  branch?: string;
  version?: number;
  strategy?: ResolveStrategy;
}

export class Resolver {
  constructor(
    private readonly registry: PromptRegistry,
    private readonly versions: VersionStore,
    private readonly usage: UsageLog,
  ){}

  async resolve(req: ResolveRequest): Promise<VersionRecord> {
    const branch = req.branch ?? this.versions.defaultBranch;
    const strategy = req.strategy ?? 'latest';
    const prompt = await this.registry.getPrompt(req.slug);
    if(!prompt || prompt.archived) throw new NotFoundError(`Prompt '${req.slug}' not found`);

    switch(strategy){
      case 'latest':
        return this.latest(prompt.id, req.slug, branch);
      case 'pinned': {
        if(req.version === undefined) throw new ValidationError('Pinned strategy requires a version number');
        const found = await this.versions.getVersion(prompt.id, req.version, branch);
        if(!found) throw new NotFoundError(`Version ${req.version} of '${req.slug}' not found on branch '${branch}'`);
        return found;
      }
      case 'best_performing':
        return this.bestPerforming(prompt.id, req.slug, branch);
    }
  }

  private async latest(promptId: string, slug: string, branch: string): Promise<VersionRecord> {
    const head = await this.versions.head(promptId, branch);
    if(!head) throw new NotFoundError(`No versions found for '${slug}' on branch '${branch}'`);
    return head;
  }

  // highest success rate among versions with enough uses; ties keep the earliest-used version
  private async bestPerforming(promptId: string, slug: string, branch: string): Promise<VersionRecord> {
    const onBranch = await this.versions.allVersions(promptId, branch);
    const byId = new Map<string, VersionRecord>(onBranch.map(v => [v.id, v]));
    const ranked = (await this.usage.performance(promptId, new Set(byId.keys())))
      .filter(p => p.uses >= MIN_USES_FOR_RANKING);

    let best: VersionPerformance | undefined;
    for(const candidate of ranked){
      if(!best || candidate.successRate > best.successRate) best = candidate;
    }
    const chosen = best ? byId.get(best.versionId) : undefined;
    if(!best || !chosen){
      logDebug('resolver.best_performing_fallback', { slug, branch, rankedVersions: ranked.length });
      return this.latest(promptId, slug, branch);
    }
    logInfo('resolver.best_performing_selected', { slug, branch, version: chosen.version, successRate: best.successRate, uses: best.uses });
    return chosen;
  }
}
