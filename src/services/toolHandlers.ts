import type { HandlerRegistry } from '../server/registry';
import { packageVersion } from '../utils/packageVersion';
import type { PromptLedger } from './container';
import { registerBranchTools } from './handlers.branches';
import { registerComposeTools } from './handlers.compose';
import { registerPromptTools } from './handlers.prompts';
import { registerUsageTools } from './handlers.usage';
import { registerVersionTools } from './handlers.versions';
import { getToolRegistry, MUTATION, REGISTRY_VERSION } from './toolRegistry';
import { zEmpty } from './toolRegistry.zod';

/** Register every tool against `registry`, bound to one ledger instance. */
export function registerAllTools(registry: HandlerRegistry, ledger: PromptLedger): HandlerRegistry {
  registerPromptTools(registry, ledger);
  registerVersionTools(registry, ledger);
  registerBranchTools(registry, ledger);
  registerComposeTools(registry, ledger);
  registerUsageTools(registry, ledger);

  registry.register('health/check', zEmpty, () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    version: packageVersion(),
  }));
  registry.register('metrics/snapshot', zEmpty, () => ({
    generatedAt: new Date().toISOString(),
    methods: registry.metricsSnapshot(),
  }));
  registry.register('meta/tools', zEmpty, () => {
    const methods = registry.listMethods();
    return {
      registryVersion: REGISTRY_VERSION,
      tools: methods.map(method => ({ method, mutation: [...MUTATION].some(m => m === method) })),
      mcp: { tools: getToolRegistry().filter(t => methods.includes(t.name)) },
    };
  });
  return registry;
}
