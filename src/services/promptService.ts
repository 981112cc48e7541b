import type { BranchRecord, JsonObject, UsageOutcome, UsageRecord, VersionRecord } from '../models/prompt';
import { mergeContent } from './contentMerger';
import { scanForSecrets } from './contentSafety';
import { branchSummary, diff, fieldDiff, humanReadable, type FieldDiff, type SectionDiff } from './differ';
import { NotFoundError, RegressionBlockedError, ValidationError } from './errors';
import type { InjectionScanner, ScanResult } from './injectionScanner';
import { logInfo, logWarn } from './logger';
import type { PromptRegistry } from './promptRegistry';
import { regressionCheck, type RegressionReport, type RegressionWarning } from './regressionGuard';
import type { UsageLog, UsageStats } from './usageLog';
import type { CommitOutcome, VersionStore } from './versionStore';

interface MutationOptions {
  slug: string;
  message?: string;
  author?: string;
  branch?: string;
  /** commit even when the regression guard would block */
  acknowledgeReduction?: boolean;
}

export interface CreateVersionInput extends MutationOptions { content: JsonObject }
export interface PatchVersionInput extends MutationOptions { patch: JsonObject }
export interface RestoreVersionInput extends MutationOptions { fromVersion: number; patch?: JsonObject }

export interface VersionResult extends CommitOutcome {
  /** regression warnings; present only when the guard raised any */
  warnings?: RegressionWarning[];
}

export interface VersionDiffResult extends SectionDiff {
  fromVersion: number;
  toVersion: number;
  text: string;
}

export interface BranchDiffResult {
  branch: string;
  target: string;
  currentContent: JsonObject;
  proposedContent: JsonObject;
  summary: string;
  diff: SectionDiff;
}

export interface LogUsageInput {
  slug: string;
  versionId: string;
  agentId?: string;
  outcome: UsageOutcome;
  latencyMs?: number;
  feedback?: string;
  compositionManifest?: JsonObject;
}

export interface StandaloneScanResult extends ScanResult {
  secretWarnings: string[];
}

/**
 * Slug-addressed operations on versions, branches and usage. Mutations run the regression guard
 * against the branch head inside the same serialized step as the commit.
 */
export class PromptService {
  constructor(
    private readonly registry: PromptRegistry,
    private readonly versions: VersionStore,
    private readonly usage: UsageLog,
    private readonly scanner: InjectionScanner,
  ){}

  private branchOf(branch?: string){ return branch ?? this.versions.defaultBranch; }

  private guard(slug: string, parent: VersionRecord, candidate: JsonObject, acknowledged: boolean): RegressionReport {
    const report = regressionCheck(parent.content, candidate);
    if(report.block && !acknowledged){
      const candidateKeys = new Set(Object.keys(candidate));
      logWarn('guard.regression_blocked', { slug, parentVersion: parent.version, reductionPct: report.contentReductionPct, keysRemoved: report.keysRemoved });
      throw new RegressionBlockedError(report, {
        keysRemoved: report.keysRemoved,
        keysAdded: report.keysAdded,
        keysUnchanged: Object.keys(parent.content).filter(k => candidateKeys.has(k)).sort(),
        parentVersion: parent.version,
        contentReductionPct: report.contentReductionPct,
      }, Object.keys(parent.content).length);
    }
    if(report.warnings.length){
      logWarn('guard.regression_warning', { slug, parentVersion: parent.version, acknowledged, warnings: report.warnings.map(w => w.type) });
    }
    return report;
  }

  private withWarnings(outcome: CommitOutcome, report: RegressionReport | undefined): VersionResult {
    return report && report.warnings.length ? { ...outcome, warnings: report.warnings } : outcome;
  }

  /** Commit new content; guarded against the current head when there is one. */
  async createVersion(input: CreateVersionInput): Promise<VersionResult> {
    const prompt = await this.registry.requirePrompt(input.slug);
    const checked: { report?: RegressionReport } = {};
    const outcome = await this.versions.commitDerived(prompt.id, this.branchOf(input.branch), head => {
      if(head) checked.report = this.guard(input.slug, head, input.content, input.acknowledgeReduction === true);
      return { content: input.content, message: input.message, author: input.author };
    });
    return this.withWarnings(outcome, checked.report);
  }

  /** Deep-merge a partial document onto the head (null deletes a key) and commit the result. */
  async patchVersion(input: PatchVersionInput): Promise<VersionResult> {
    const prompt = await this.registry.requirePrompt(input.slug);
    const branch = this.branchOf(input.branch);
    const checked: { report?: RegressionReport } = {};
    const outcome = await this.versions.commitDerived(prompt.id, branch, head => {
      if(!head) throw new NotFoundError(`No versions found on branch '${branch}'; create the first version instead of patching`);
      const merged = mergeContent(head.content, input.patch);
      checked.report = this.guard(input.slug, head, merged, input.acknowledgeReduction === true);
      return { content: merged, message: input.message, author: input.author };
    });
    return this.withWarnings(outcome, checked.report);
  }

  /** Copy an earlier version's content forward, optionally overlaying a patch. */
  async restoreVersion(input: RestoreVersionInput): Promise<VersionResult> {
    const prompt = await this.registry.requirePrompt(input.slug);
    const branch = this.branchOf(input.branch);
    const source = await this.versions.getVersion(prompt.id, input.fromVersion, branch);
    if(!source) throw new NotFoundError(`Version ${input.fromVersion} not found on branch '${branch}'`);
    const content = input.patch ? mergeContent(source.content, input.patch) : source.content;
    const checked: { report?: RegressionReport } = {};
    const outcome = await this.versions.commitDerived(prompt.id, branch, head => {
      if(head) checked.report = this.guard(input.slug, head, content, input.acknowledgeReduction === true);
      return { content, message: input.message ?? `Restore from version ${input.fromVersion}`, author: input.author };
    });
    return this.withWarnings(outcome, checked.report);
  }

  async history(slug: string, branch?: string, limit?: number): Promise<VersionRecord[]> {
    const prompt = await this.registry.requirePrompt(slug);
    return this.versions.history(prompt.id, this.branchOf(branch), limit);
  }

  async getVersion(slug: string, version: number, branch?: string): Promise<VersionRecord> {
    const prompt = await this.registry.requirePrompt(slug);
    const found = await this.versions.getVersion(prompt.id, version, this.branchOf(branch));
    if(!found) throw new NotFoundError(`Version ${version} not found`);
    return found;
  }

  async rollback(slug: string, version: number, author?: string, branch?: string): Promise<CommitOutcome> {
    const prompt = await this.registry.requirePrompt(slug);
    const outcome = await this.versions.rollback(prompt.id, version, author, this.branchOf(branch));
    if(!outcome) throw new NotFoundError(`Version ${version} not found`);
    return outcome;
  }

  async diffVersions(slug: string, fromVersion: number, toVersion: number, branch?: string): Promise<VersionDiffResult> {
    const [a, b] = await Promise.all([this.getVersion(slug, fromVersion, branch), this.getVersion(slug, toVersion, branch)]);
    const result = diff(a.content, b.content);
    return { fromVersion, toVersion, ...result, text: humanReadable(result) };
  }

  async fieldDiffVersions(slug: string, versionA: number, versionB: number, branch?: string): Promise<FieldDiff> {
    const [a, b] = await Promise.all([this.getVersion(slug, versionA, branch), this.getVersion(slug, versionB, branch)]);
    return fieldDiff(a.content, b.content, versionA, versionB);
  }

  async createBranch(slug: string, name: string, fromBranch?: string): Promise<BranchRecord> {
    const prompt = await this.registry.requirePrompt(slug);
    return this.versions.createBranch(prompt.id, name, this.branchOf(fromBranch));
  }

  async listBranches(slug: string): Promise<BranchRecord[]> {
    const prompt = await this.registry.requirePrompt(slug);
    return this.versions.listBranches(prompt.id);
  }

  async mergeBranch(slug: string, source: string, target?: string, strategy?: string, author?: string): Promise<CommitOutcome> {
    const prompt = await this.registry.requirePrompt(slug);
    return this.versions.mergeBranch(prompt.id, source, this.branchOf(target), strategy, author);
  }

  async rejectBranch(slug: string, branch: string, reason?: string): Promise<BranchRecord> {
    const prompt = await this.registry.requirePrompt(slug);
    return this.versions.rejectBranch(prompt.id, branch, reason);
  }

  /** Proposed (branch head) against current (target head) content, with a one-line review summary. */
  async branchDiff(slug: string, branch: string, target?: string): Promise<BranchDiffResult> {
    const prompt = await this.registry.requirePrompt(slug);
    const targetBranch = this.branchOf(target);
    if(!(await this.versions.getBranch(prompt.id, branch))) throw new NotFoundError(`Branch '${branch}' not found`);
    const proposed = await this.versions.head(prompt.id, branch);
    if(!proposed) throw new NotFoundError(`No versions found on branch '${branch}'`);
    const current = await this.versions.head(prompt.id, targetBranch);
    if(!current) throw new NotFoundError(`No versions found on branch '${targetBranch}'`);
    return {
      branch,
      target: targetBranch,
      currentContent: current.content,
      proposedContent: proposed.content,
      summary: branchSummary(current.content, proposed.content),
      diff: diff(current.content, proposed.content),
    };
  }

  async logUsage(input: LogUsageInput): Promise<UsageRecord> {
    const prompt = await this.registry.requirePrompt(input.slug);
    if(!(await this.versions.findById(prompt.id, input.versionId))){
      throw new ValidationError(`Version '${input.versionId}' does not belong to prompt '${input.slug}'`);
    }
    return this.usage.record({
      promptId: prompt.id,
      versionId: input.versionId,
      agentId: input.agentId,
      outcome: input.outcome,
      latencyMs: input.latencyMs,
      feedback: input.feedback,
      compositionManifest: input.compositionManifest,
    });
  }

  async usageStats(slug: string): Promise<UsageStats & { slug: string }> {
    const prompt = await this.registry.requirePrompt(slug);
    return { slug, ...(await this.usage.stats(prompt.id)) };
  }

  /** Run the commit-time checks without committing. */
  scan(content: JsonObject): StandaloneScanResult {
    const result = this.scanner.scan(content);
    logInfo('scan.standalone', { riskLevel: result.riskLevel, findings: result.findings.length });
    return { ...result, secretWarnings: scanForSecrets(content) };
  }
}
