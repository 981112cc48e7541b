import { describe, it, expect } from 'vitest';
import type { UsageOutcome } from '../models/prompt';
import { NotFoundError, ValidationError } from '../services/errors';
import { createTestLedger, sectioned } from './ledgerFixture';

async function threeVersions() {
  const ledger = createTestLedger();
  const { prompt } = await ledger.registry.createPrompt({ slug: 'helper', name: 'Helper', type: 'skill', content: sectioned({ body: 'one' }) });
  const v2 = await ledger.versions.commit(prompt.id, { content: sectioned({ body: 'two' }) });
  const v3 = await ledger.versions.commit(prompt.id, { content: sectioned({ body: 'three' }) });
  const v1 = await ledger.versions.getVersion(prompt.id, 1);
  if(!v1) throw new Error('fixture: version 1 missing');
  return { ...ledger, prompt, ids: { v1: v1.id, v2: v2.version.id, v3: v3.version.id } };
}

async function recordOutcomes(ledger: Awaited<ReturnType<typeof threeVersions>>, versionId: string, outcomes: UsageOutcome[]) {
  for(const outcome of outcomes) await ledger.usage.record({ promptId: ledger.prompt.id, versionId, outcome });
}

describe('Resolver', () => {
  it('defaults to the branch head', async () => {
    const { resolver } = await threeVersions();
    expect((await resolver.resolve({ slug: 'helper' })).version).toBe(3);
  });

  it('pins an exact version', async () => {
    const { resolver } = await threeVersions();
    expect((await resolver.resolve({ slug: 'helper', strategy: 'pinned', version: 2 })).content).toEqual(sectioned({ body: 'two' }));
    await expect(resolver.resolve({ slug: 'helper', strategy: 'pinned' })).rejects.toBeInstanceOf(ValidationError);
    await expect(resolver.resolve({ slug: 'helper', strategy: 'pinned', version: 9 }))
      .rejects.toThrow("Version 9 of 'helper' not found on branch 'main'");
  });

  it('does not resolve archived or unknown prompts', async () => {
    const { resolver, registry } = await threeVersions();
    await expect(resolver.resolve({ slug: 'nope' })).rejects.toBeInstanceOf(NotFoundError);
    await registry.archivePrompt('helper');
    await expect(resolver.resolve({ slug: 'helper' })).rejects.toThrow("Prompt 'helper' not found");
  });

  it('reports a prompt without versions', async () => {
    const { resolver, registry } = createTestLedger();
    await registry.createPrompt({ slug: 'blank', name: 'Blank', type: 'skill' });
    await expect(resolver.resolve({ slug: 'blank' })).rejects.toThrow("No versions found for 'blank' on branch 'main'");
  });

  it('picks the best success rate among versions with enough uses', async () => {
    const ledger = await threeVersions();
    await recordOutcomes(ledger, ledger.ids.v1, ['success', 'success', 'success', 'failure']);
    await recordOutcomes(ledger, ledger.ids.v2, ['success', 'success', 'success']);
    // v3 is perfect but under the ranking threshold
    await recordOutcomes(ledger, ledger.ids.v3, ['success', 'success']);
    expect((await ledger.resolver.resolve({ slug: 'helper', strategy: 'best_performing' })).version).toBe(2);
  });

  it('keeps the earliest-used version on a tie', async () => {
    const ledger = await threeVersions();
    await recordOutcomes(ledger, ledger.ids.v3, ['success', 'failure', 'success']);
    await recordOutcomes(ledger, ledger.ids.v1, ['failure', 'success', 'success']);
    expect((await ledger.resolver.resolve({ slug: 'helper', strategy: 'best_performing' })).version).toBe(3);
  });

  it('falls back to the head without ranked usage', async () => {
    const ledger = await threeVersions();
    await recordOutcomes(ledger, ledger.ids.v1, ['success']);
    expect((await ledger.resolver.resolve({ slug: 'helper', strategy: 'best_performing' })).version).toBe(3);
  });
});

describe('UsageLog', () => {
  it('aggregates outcomes and latency', async () => {
    const ledger = await threeVersions();
    const { usage, prompt, ids } = ledger;
    await usage.record({ promptId: prompt.id, versionId: ids.v1, outcome: 'success', latencyMs: 100 });
    await usage.record({ promptId: prompt.id, versionId: ids.v1, outcome: 'failure', latencyMs: 300 });
    await usage.record({ promptId: prompt.id, versionId: ids.v2, outcome: 'partial' });
    await usage.record({ promptId: prompt.id, versionId: ids.v2, outcome: 'success' });

    expect(await usage.stats(prompt.id)).toEqual({
      totalUses: 4,
      successRate: 0.5,
      avgLatencyMs: 200,
      versionBreakdown: { [ids.v1]: 2, [ids.v2]: 2 },
    });
  });

  it('reports empty stats for an unused prompt', async () => {
    const { usage, prompt } = await threeVersions();
    expect(await usage.stats(prompt.id)).toEqual({ totalUses: 0, successRate: 0, avgLatencyMs: null, versionBreakdown: {} });
  });

  it('restricts performance to the given versions', async () => {
    const ledger = await threeVersions();
    await recordOutcomes(ledger, ledger.ids.v1, ['success', 'failure']);
    await recordOutcomes(ledger, ledger.ids.v2, ['success']);
    expect(await ledger.usage.performance(ledger.prompt.id, new Set([ledger.ids.v1]))).toEqual([
      { versionId: ledger.ids.v1, uses: 2, successes: 1, successRate: 0.5 },
    ]);
  });
});
