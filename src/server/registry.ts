// In-process tool registry. Every handler is wrapped with param parsing, correlation ids,
// lifecycle logs and timing metrics; the transport only ever dispatches through `get`.
import type { z } from 'zod';
import { LedgerError, ValidationError } from '../services/errors';
import { log, newCorrelationId } from '../services/logger';

export type Handler<TParams = unknown> = (params: TParams) => Promise<unknown> | unknown;

export interface MetricRecord { count: number; errors: number; totalMs: number; maxMs: number }

function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}

function classifyError(e: unknown): string {
  if(e instanceof LedgerError) return e.reason;
  return 'error';
}

export class HandlerRegistry {
  private readonly handlers = new Map<string, Handler>();
  private readonly metrics = new Map<string, MetricRecord>();

  private recordMetric(name: string, ms: number, failed: boolean){
    let rec = this.metrics.get(name);
    if(!rec){ rec = { count: 0, errors: 0, totalMs: 0, maxMs: 0 }; this.metrics.set(name, rec); }
    rec.count++; rec.totalMs += ms; if(ms > rec.maxMs) rec.maxMs = ms;
    if(failed) rec.errors++;
  }

  /** Register `fn` under `name`; params are parsed with `schema` (missing params count as `{}`). */
  register<TParams>(name: string, schema: z.ZodType<TParams, z.ZodTypeDef, unknown>, fn: Handler<TParams>): void {
    if(this.handlers.has(name)) throw new Error(`Handler already registered: ${name}`);
    const wrapped: Handler = async (raw: unknown) => {
      const corr = newCorrelationId();
      const start = process.hrtime.bigint();
      log('info', 'tool_start', { tool: name, correlationId: corr });
      let failed = false;
      try {
        const parsed = schema.safeParse(raw ?? {});
        if(!parsed.success) throw new ValidationError(`Invalid params for ${name}`, formatZodIssues(parsed.error));
        return await fn(parsed.data);
      } catch(e){
        failed = true;
        log('error', 'tool_error', { tool: name, correlationId: corr, data: { reason: classifyError(e), message: e instanceof Error ? e.message : String(e) } });
        throw e;
      } finally {
        const ms = Number(process.hrtime.bigint() - start) / 1_000_000;
        this.recordMetric(name, ms, failed);
        log('info', 'tool_end', { tool: name, correlationId: corr, ms });
      }
    };
    this.handlers.set(name, wrapped);
  }

  get(name: string): Handler | undefined {
    return this.handlers.get(name);
  }

  listMethods(): string[] {
    return [...this.handlers.keys()].sort();
  }

  metricsSnapshot(): Record<string, MetricRecord & { avgMs: number }> {
    const out: Record<string, MetricRecord & { avgMs: number }> = {};
    for(const [name, rec] of [...this.metrics].sort(([a], [b]) => a.localeCompare(b))){
      out[name] = { ...rec, avgMs: rec.count ? rec.totalMs / rec.count : 0 };
    }
    return out;
  }
}
