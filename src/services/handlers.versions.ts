import type { HandlerRegistry } from '../server/registry';
import type { PromptLedger } from './container';
import {
  zVersionCreate, zVersionDiff, zVersionFieldDiff, zVersionGet, zVersionHistory, zVersionPatch, zVersionRestore, zVersionRollback,
} from './toolRegistry.zod';

export function registerVersionTools(registry: HandlerRegistry, ledger: PromptLedger): void {
  const svc = ledger.prompts;

  registry.register('versions/create', zVersionCreate, p => svc.createVersion(p));
  registry.register('versions/patch', zVersionPatch, p => svc.patchVersion(p));
  registry.register('versions/restore', zVersionRestore, p => svc.restoreVersion(p));
  registry.register('versions/history', zVersionHistory, async p => {
    const versions = await svc.history(p.slug, p.branch, p.limit);
    return { slug: p.slug, count: versions.length, versions };
  });
  registry.register('versions/get', zVersionGet, p => svc.getVersion(p.slug, p.version, p.branch));
  registry.register('versions/rollback', zVersionRollback, p => svc.rollback(p.slug, p.version, p.author, p.branch));
  registry.register('versions/diff', zVersionDiff, p => svc.diffVersions(p.slug, p.fromVersion, p.toVersion, p.branch));
  registry.register('versions/fieldDiff', zVersionFieldDiff, p => svc.fieldDiffVersions(p.slug, p.versionA, p.versionB, p.branch));
}
