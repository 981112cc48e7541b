import type { HandlerRegistry } from '../server/registry';
import type { PromptLedger } from './container';
import { zUsageLog, zUsageStats } from './toolRegistry.zod';

export function registerUsageTools(registry: HandlerRegistry, ledger: PromptLedger): void {
  registry.register('usage/log', zUsageLog, p => ledger.prompts.logUsage(p));
  registry.register('usage/stats', zUsageStats, p => ledger.prompts.usageStats(p.slug));
}
