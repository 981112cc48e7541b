import type { UsageFields, UsageRecord } from '../models/prompt';
import { logDebug } from './logger';
import type { RecordStore } from './recordStore';

export interface UsageStats {
  totalUses: number;
  successRate: number;
  avgLatencyMs: number | null;
  /** version id → number of recorded uses */
  versionBreakdown: Record<string, number>;
}

export interface VersionPerformance {
  versionId: string;
  uses: number;
  successes: number;
  successRate: number;
}

/** Append-only usage outcomes per prompt version; feeds the best_performing resolver strategy. */
export class UsageLog {
  constructor(private readonly store: RecordStore){}

  async record(entry: UsageFields): Promise<UsageRecord> {
    const row = await this.store.insert('prompt_usage_log', entry);
    logDebug('usage.logged', { promptId: entry.promptId, versionId: entry.versionId, outcome: entry.outcome });
    return row;
  }

  async entries(promptId: string): Promise<UsageRecord[]> {
    return this.store.select('prompt_usage_log', { filters: { promptId } });
  }

  async stats(promptId: string): Promise<UsageStats> {
    const logs = await this.entries(promptId);
    const total = logs.length;
    const successes = logs.filter(l => l.outcome === 'success').length;
    const latencies = logs.flatMap(l => (typeof l.latencyMs === 'number' ? [l.latencyMs] : []));
    const versionBreakdown: Record<string, number> = {};
    for(const l of logs) versionBreakdown[l.versionId] = (versionBreakdown[l.versionId] ?? 0) + 1;
    return {
      totalUses: total,
      successRate: total > 0 ? successes / total : 0,
      avgLatencyMs: latencies.length ? latencies.reduce((a, b) => a + b, 0) / latencies.length : null,
      versionBreakdown,
    };
  }

  /** Per-version success rates in order of first recorded use, optionally restricted to `versionIds`. */
  async performance(promptId: string, versionIds?: ReadonlySet<string>): Promise<VersionPerformance[]> {
    const byVersion = new Map<string, { uses: number; successes: number }>();
    for(const l of await this.entries(promptId)){
      if(versionIds && !versionIds.has(l.versionId)) continue;
      const agg = byVersion.get(l.versionId) ?? { uses: 0, successes: 0 };
      agg.uses++;
      if(l.outcome === 'success') agg.successes++;
      byVersion.set(l.versionId, agg);
    }
    return [...byVersion].map(([versionId, agg]) => ({
      versionId,
      uses: agg.uses,
      successes: agg.successes,
      successRate: agg.successes / agg.uses,
    }));
  }
}
