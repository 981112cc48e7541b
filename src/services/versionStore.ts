import type { VersioningConfig } from '../config/runtimeConfig';
import type { BranchRecord, JsonObject, VersionRecord } from '../models/prompt';
import { sectionMerge } from './contentMerger';
import { scanForSecrets, validateContentSize } from './contentSafety';
import { DuplicateBranchError, InjectionBlockedError, NotFoundError, UnknownMergeStrategyError, ValidationError } from './errors';
import type { InjectionScanner, ScanFinding } from './injectionScanner';
import { KeyedMutex } from './keyedMutex';
import { logInfo, logWarn } from './logger';
import type { RecordStore } from './recordStore';

export type MergeStrategy = 'ours' | 'theirs' | 'section_merge';
export const MERGE_STRATEGIES: readonly MergeStrategy[] = ['ours', 'theirs', 'section_merge'];

export function isMergeStrategy(value: string): value is MergeStrategy {
  return MERGE_STRATEGIES.some(s => s === value);
}

/** Content plus commit metadata, before a version number is assigned. */
export interface CommitDraft {
  content: JsonObject;
  message?: string;
  author?: string;
}

/** A committed version together with the advisory findings gathered on the way in. */
export interface CommitOutcome {
  version: VersionRecord;
  scanWarnings: ScanFinding[];
  secretWarnings: string[];
}

export const DEFAULT_HISTORY_LIMIT = 50;

type VersionStoreConfig = Pick<VersioningConfig, 'defaultBranch' | 'historyLimitMax' | 'maxContentBytes'>;

/**
 * Append-only version log per (prompt, branch). Commits and branch creation on one
 * (prompt, branch) are serialized.
 */
export class VersionStore {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly store: RecordStore,
    private readonly scanner: InjectionScanner,
    private readonly cfg: VersionStoreConfig,
  ){}

  get defaultBranch(): string { return this.cfg.defaultBranch; }

  private lineKey(promptId: string, branch: string){ return `line:${promptId}:${branch}`; }

  async head(promptId: string, branch: string = this.cfg.defaultBranch): Promise<VersionRecord | undefined> {
    const rows = await this.store.select('prompt_versions', {
      filters: { promptId, branch },
      orderBy: 'version',
      ascending: false,
      limit: 1,
    });
    return rows[0];
  }

  /** Commit content as the next version of the branch. Critical scan findings reject the commit. */
  commit(promptId: string, draft: CommitDraft, branch: string = this.cfg.defaultBranch): Promise<CommitOutcome> {
    return this.commitDerived(promptId, branch, () => draft);
  }

  /**
   * Read the branch head and derive the draft from it as one serialized step. `derive` may throw
   * to abort (nothing is written in that case).
   */
  commitDerived(
    promptId: string,
    branch: string,
    derive: (head: VersionRecord | undefined) => CommitDraft | Promise<CommitDraft>,
  ): Promise<CommitOutcome> {
    return this.locks.runExclusive(this.lineKey(promptId, branch), async () => {
      const head = await this.head(promptId, branch);
      const draft = await derive(head);
      return this.append(promptId, branch, draft, head);
    });
  }

  /**
   * Gate applied to every commit: size limit, then the injection scan (critical findings throw).
   * Returns the advisory findings.
   */
  vet(content: JsonObject, context: Record<string, unknown> = {}): { scanWarnings: ScanFinding[]; secretWarnings: string[] } {
    validateContentSize(content, this.cfg.maxContentBytes);
    const scan = this.scanner.scan(content);
    if(scan.riskLevel === 'critical'){
      const critical = scan.findings.filter(f => f.severity === 'critical');
      logWarn('scan.commit_blocked', { ...context, findings: critical.map(f => f.patternName) });
      throw new InjectionBlockedError(critical);
    }
    return { scanWarnings: scan.findings, secretWarnings: scanForSecrets(content) };
  }

  // caller holds the line lock
  private async append(promptId: string, branch: string, draft: CommitDraft, head: VersionRecord | undefined): Promise<CommitOutcome> {
    const { scanWarnings, secretWarnings } = this.vet(draft.content, { promptId, branch });

    const version = await this.store.insert('prompt_versions', {
      promptId,
      branch,
      version: head ? head.version + 1 : 1,
      content: draft.content,
      message: draft.message ?? 'Update',
      author: draft.author ?? 'system',
      parentVersionId: head ? head.id : null,
    });

    const [branchRecord] = await this.store.select('prompt_branches', { filters: { promptId, name: branch } });
    if(branchRecord){
      if(branchRecord.status !== 'active'){
        logWarn('vcs.commit_to_closed_branch', { promptId, branch, status: branchRecord.status });
      }
      await this.store.update('prompt_branches', branchRecord.id, { headVersionId: version.id });
    }

    logInfo('vcs.commit', {
      promptId, branch, version: version.version, author: version.author,
      scanWarnings: scanWarnings.length, secretWarnings: secretWarnings.length,
    });
    return { version, scanWarnings, secretWarnings };
  }

  /** Most recent first. */
  async history(promptId: string, branch: string = this.cfg.defaultBranch, limit = DEFAULT_HISTORY_LIMIT): Promise<VersionRecord[]> {
    const bounded = Math.min(Math.max(1, Math.floor(limit)), this.cfg.historyLimitMax);
    return this.store.select('prompt_versions', {
      filters: { promptId, branch },
      orderBy: 'version',
      ascending: false,
      limit: bounded,
    });
  }

  /** Every version on the branch, oldest first; not bounded by the history limit. */
  async allVersions(promptId: string, branch: string = this.cfg.defaultBranch): Promise<VersionRecord[]> {
    return this.store.select('prompt_versions', { filters: { promptId, branch }, orderBy: 'version' });
  }

  async findById(promptId: string, versionId: string): Promise<VersionRecord | undefined> {
    const [row] = await this.store.select('prompt_versions', { filters: { id: versionId, promptId } });
    return row;
  }

  async getVersion(promptId: string, version: number, branch: string = this.cfg.defaultBranch): Promise<VersionRecord | undefined> {
    const [row] = await this.store.select('prompt_versions', { filters: { promptId, branch, version } });
    return row;
  }

  /** Re-commit an old version's content as a new version; undefined when that version does not exist. */
  async rollback(promptId: string, version: number, author = 'system', branch: string = this.cfg.defaultBranch): Promise<CommitOutcome | undefined> {
    const target = await this.getVersion(promptId, version, branch);
    if(!target) return undefined;
    return this.commit(promptId, { content: target.content, message: `Rollback to version ${version}`, author }, branch);
  }

  async listBranches(promptId: string): Promise<BranchRecord[]> {
    return this.store.select('prompt_branches', { filters: { promptId } });
  }

  async getBranch(promptId: string, name: string): Promise<BranchRecord | undefined> {
    const [row] = await this.store.select('prompt_branches', { filters: { promptId, name } });
    return row;
  }

  /**
   * Create `name` from the head of `fromBranch` and seed it with that content as version 1.
   * Runs under the new branch's line lock, so a commit racing onto `name` lands after the seed.
   * If the seed commit fails the fresh branch record is removed again.
   */
  createBranch(promptId: string, name: string, fromBranch: string = this.cfg.defaultBranch): Promise<BranchRecord> {
    if(name === fromBranch) return Promise.reject(new ValidationError(`Branch '${name}' cannot be created from itself`));
    return this.locks.runExclusive(this.lineKey(promptId, name), async () => {
      const existing = await this.getBranch(promptId, name);
      if(existing || await this.head(promptId, name)) throw new DuplicateBranchError(name);

      const sourceHead = await this.head(promptId, fromBranch);
      if(!sourceHead) throw new NotFoundError(`No versions found on branch '${fromBranch}'`);

      const branch = await this.store.insert('prompt_branches', {
        promptId,
        name,
        headVersionId: sourceHead.id,
        baseVersionId: sourceHead.id,
        status: 'active',
      });
      try {
        await this.append(promptId, name, {
          content: sourceHead.content,
          message: `Branch '${name}' from '${fromBranch}' v${sourceHead.version}`,
          author: 'system',
        }, undefined);
      } catch(e){
        await this.store.delete('prompt_branches', branch.id);
        logWarn('vcs.branch_seed_failed', { promptId, branch: name, error: e instanceof Error ? e.message : String(e) });
        throw e;
      }
      logInfo('vcs.branch_created', { promptId, branch: name, fromBranch });
      return (await this.getBranch(promptId, name)) ?? branch;
    });
  }

  /** Produce one new single-parent version on `target` from both heads, then mark `source` merged. */
  async mergeBranch(
    promptId: string,
    source: string,
    target: string = this.cfg.defaultBranch,
    strategy: string = 'theirs',
    author = 'system',
  ): Promise<CommitOutcome> {
    if(!isMergeStrategy(strategy)) throw new UnknownMergeStrategyError(strategy);
    if(source === target) throw new ValidationError(`Cannot merge branch '${source}' into itself`);

    const outcome = await this.commitDerived(promptId, target, async targetHead => {
      const sourceHead = await this.head(promptId, source);
      if(!sourceHead) throw new NotFoundError(`No versions on source branch '${source}'`);
      if(!targetHead) throw new NotFoundError(`No versions on target branch '${target}'`);
      return {
        content: mergeByStrategy(strategy, targetHead.content, sourceHead.content),
        message: `Merge '${source}' into '${target}' (${strategy})`,
        author,
      };
    });

    const sourceBranch = await this.getBranch(promptId, source);
    if(sourceBranch) await this.store.update('prompt_branches', sourceBranch.id, { status: 'merged' });
    logInfo('vcs.branch_merged', { promptId, source, target, strategy, version: outcome.version.version });
    return outcome;
  }

  async rejectBranch(promptId: string, name: string, reason?: string): Promise<BranchRecord> {
    const branch = await this.getBranch(promptId, name);
    if(!branch) throw new NotFoundError(`Branch '${name}' not found`);
    const updated = await this.store.update('prompt_branches', branch.id, {
      status: 'rejected',
      ...(reason !== undefined ? { rejectionReason: reason } : {}),
    });
    logInfo('vcs.branch_rejected', { promptId, branch: name, reason });
    return updated;
  }
}

export function mergeByStrategy(strategy: MergeStrategy, targetContent: JsonObject, sourceContent: JsonObject): JsonObject {
  switch(strategy){
    case 'ours': return targetContent;
    case 'theirs': return sourceContent;
    case 'section_merge': return sectionMerge(targetContent, sourceContent);
  }
}
