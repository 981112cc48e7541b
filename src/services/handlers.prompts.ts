import type { HandlerRegistry } from '../server/registry';
import type { PromptLedger } from './container';
import {
  zPromptArchive, zPromptChain, zPromptCreate, zPromptEffective, zPromptGet, zPromptList, zPromptUpdate,
} from './toolRegistry.zod';

export function registerPromptTools(registry: HandlerRegistry, ledger: PromptLedger): void {
  const prompts = ledger.registry;

  registry.register('prompts/create', zPromptCreate, p => prompts.createPrompt(p));
  registry.register('prompts/get', zPromptGet, p => prompts.requirePrompt(p.slug));
  registry.register('prompts/list', zPromptList, async p => {
    const items = await prompts.listPrompts(p);
    return { count: items.length, items };
  });
  registry.register('prompts/update', zPromptUpdate, ({ slug, ...changes }) => prompts.updatePrompt(slug, changes));
  registry.register('prompts/archive', zPromptArchive, p => prompts.archivePrompt(p.slug));
  registry.register('prompts/chain', zPromptChain, async p => {
    const chain = await prompts.getPromptChain(p.slug);
    return { slug: p.slug, chain: chain.map(c => c.slug), prompts: chain };
  });
  registry.register('prompts/effective', zPromptEffective, async p => ({
    slug: p.slug,
    content: await prompts.getEffectiveContent(p.slug, p.branch, p.version),
  }));
}
