#!/usr/bin/env node
/**
 * prompt-ledger server entry: config -> store -> services -> tools -> stdio transport.
 */
import { getRuntimeConfig } from '../config/runtimeConfig';
import { createPromptLedger, createRecordStore } from '../services/container';
import { logError, logInfo } from '../services/logger';
import { registerAllTools } from '../services/toolHandlers';
import { HandlerRegistry } from './registry';
import { startTransport } from './transport';

export function main(): void {
  const cfg = getRuntimeConfig();
  const ledger = createPromptLedger(createRecordStore(cfg), cfg);
  const registry = registerAllTools(new HandlerRegistry(), ledger);

  // fail fast on crashes so host clients see an exit instead of a hang
  process.on('uncaughtException', err => {
    logError('process.uncaught_exception', { message: err.message, stack: err.stack });
    setTimeout(() => process.exit(1), 10);
  });
  process.on('unhandledRejection', (reason: unknown) => {
    logError('process.unhandled_rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  });

  startTransport(registry, { logging: cfg.logging });
  logInfo('server.started', { profile: cfg.profile, store: cfg.store.kind, tools: registry.listMethods().length });
}

if(require.main === module){
  main();
}
