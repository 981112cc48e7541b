import type { RuntimeConfig } from '../config/runtimeConfig';
import { CompositionEngine } from './composer';
import { FileRecordStore } from './fileRecordStore';
import { InjectionScanner } from './injectionScanner';
import { logInfo } from './logger';
import { PromptRegistry } from './promptRegistry';
import { PromptService } from './promptService';
import { InMemoryRecordStore, type RecordStore } from './recordStore';
import { Resolver } from './resolver';
import { UsageLog } from './usageLog';
import { VersionStore } from './versionStore';

/** Everything a caller layer needs, wired against one record store. */
export interface PromptLedger {
  store: RecordStore;
  scanner: InjectionScanner;
  versions: VersionStore;
  registry: PromptRegistry;
  usage: UsageLog;
  resolver: Resolver;
  composer: CompositionEngine;
  prompts: PromptService;
}

export function createRecordStore(cfg: Pick<RuntimeConfig, 'store' | 'atomicFs'>): RecordStore {
  if(cfg.store.kind === 'file'){
    logInfo('store.opened', { kind: 'file', dir: cfg.store.dataDir });
    return new FileRecordStore(cfg.store.dataDir, cfg.atomicFs);
  }
  logInfo('store.opened', { kind: 'memory' });
  return new InMemoryRecordStore();
}

export function createPromptLedger(
  store: RecordStore,
  cfg: Pick<RuntimeConfig, 'scanner' | 'versioning'>,
  scanner: InjectionScanner = InjectionScanner.fromFile(cfg.scanner.patternsFile),
): PromptLedger {
  const versions = new VersionStore(store, scanner, cfg.versioning);
  const registry = new PromptRegistry(store, versions);
  const usage = new UsageLog(store);
  const resolver = new Resolver(registry, versions, usage);
  const composer = new CompositionEngine(resolver, registry, cfg.versioning.defaultBranch);
  const prompts = new PromptService(registry, versions, usage, scanner);
  return { store, scanner, versions, registry, usage, resolver, composer, prompts };
}
