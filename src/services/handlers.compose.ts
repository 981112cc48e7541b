import type { HandlerRegistry } from '../server/registry';
import type { PromptLedger } from './container';
import { zCompose, zResolve, zScan } from './toolRegistry.zod';

export function registerComposeTools(registry: HandlerRegistry, ledger: PromptLedger): void {
  registry.register('prompts/resolve', zResolve, p => ledger.resolver.resolve(p));
  registry.register('prompts/compose', zCompose, p => ledger.composer.compose(p));
  registry.register('content/scan', zScan, p => ledger.prompts.scan(p.content));
}
