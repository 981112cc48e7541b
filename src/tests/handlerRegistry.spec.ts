import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { HandlerRegistry } from '../server/registry';
import { NotFoundError, ValidationError } from '../services/errors';
import { registerAllTools } from '../services/toolHandlers';
import { getToolRegistry } from '../services/toolRegistry';
import { zodMap } from '../services/toolRegistry.zod';
import { createTestLedger } from './ledgerFixture';

function invoke(registry: HandlerRegistry, name: string, params?: unknown): Promise<unknown> {
  const handler = registry.get(name);
  if(!handler) throw new Error(`no handler ${name}`);
  return Promise.resolve(handler(params));
}

describe('HandlerRegistry', () => {
  it('parses params before calling the handler', async () => {
    const registry = new HandlerRegistry();
    registry.register('math/double', z.object({ n: z.number() }).strict(), p => p.n * 2);
    expect(await invoke(registry, 'math/double', { n: 21 })).toBe(42);

    const err = await invoke(registry, 'math/double', { n: 'x' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err instanceof ValidationError && err.message).toBe('Invalid params for math/double');
  });

  it('treats missing params as an empty object', async () => {
    const registry = new HandlerRegistry();
    registry.register('ping', z.object({}).strict(), () => 'pong');
    expect(await invoke(registry, 'ping')).toBe('pong');
  });

  it('refuses duplicate registrations', () => {
    const registry = new HandlerRegistry();
    registry.register('ping', z.object({}), () => 'pong');
    expect(() => registry.register('ping', z.object({}), () => 'again')).toThrow('Handler already registered: ping');
  });

  it('counts calls and errors per method', async () => {
    const registry = new HandlerRegistry();
    registry.register('ok', z.object({}), () => true);
    registry.register('boom', z.object({}), () => { throw new NotFoundError('gone'); });
    await invoke(registry, 'ok');
    await invoke(registry, 'ok');
    await expect(invoke(registry, 'boom')).rejects.toBeInstanceOf(NotFoundError);

    const snap = registry.metricsSnapshot();
    expect(Object.keys(snap)).toEqual(['boom', 'ok']);
    expect(snap.ok).toMatchObject({ count: 2, errors: 0 });
    expect(snap.boom).toMatchObject({ count: 1, errors: 1 });
    expect(snap.ok.avgMs).toBeCloseTo(snap.ok.totalMs / 2);
  });
});

describe('tool wiring', () => {
  it('registers a handler for every published tool', () => {
    const registry = registerAllTools(new HandlerRegistry(), createTestLedger());
    expect(registry.listMethods()).toEqual(getToolRegistry().map(t => t.name));
    expect(getToolRegistry().map(t => t.name)).toEqual(Object.keys(zodMap).sort());
  });

  it('describes itself through meta/tools', async () => {
    const registry = registerAllTools(new HandlerRegistry(), createTestLedger());
    const meta = await invoke(registry, 'meta/tools');
    expect(meta).toMatchObject({ registryVersion: '2026-10-01' });
    const tools = z.object({ tools: z.array(z.object({ method: z.string(), mutation: z.boolean() })) }).parse(meta).tools;
    expect(tools.find(t => t.method === 'versions/patch')).toEqual({ method: 'versions/patch', mutation: true });
    expect(tools.find(t => t.method === 'versions/diff')).toEqual({ method: 'versions/diff', mutation: false });
  });

  it('reports health with the package version', async () => {
    const registry = registerAllTools(new HandlerRegistry(), createTestLedger());
    expect(await invoke(registry, 'health/check')).toMatchObject({ status: 'ok', version: '0.4.0' });
  });
});
