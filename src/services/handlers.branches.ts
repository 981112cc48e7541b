import type { HandlerRegistry } from '../server/registry';
import type { PromptLedger } from './container';
import { zBranchCreate, zBranchDiff, zBranchList, zBranchMerge, zBranchReject } from './toolRegistry.zod';

export function registerBranchTools(registry: HandlerRegistry, ledger: PromptLedger): void {
  const svc = ledger.prompts;

  registry.register('branches/create', zBranchCreate, p => svc.createBranch(p.slug, p.name, p.fromBranch));
  registry.register('branches/list', zBranchList, async p => {
    const branches = await svc.listBranches(p.slug);
    return { slug: p.slug, count: branches.length, branches };
  });
  registry.register('branches/merge', zBranchMerge, p => svc.mergeBranch(p.slug, p.source, p.target, p.strategy, p.author));
  registry.register('branches/reject', zBranchReject, p => svc.rejectBranch(p.slug, p.branch, p.reason));
  registry.register('branches/diff', zBranchDiff, p => svc.branchDiff(p.slug, p.branch, p.target));
}
