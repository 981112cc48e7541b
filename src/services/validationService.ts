import type { ValidateFunction } from 'ajv';
import { findTool } from './toolRegistry';
import { compileGuard, formatAjvErrors } from './schemaValidator';

// Pre-dispatch check of raw params against the published JSON Schema contract. The handler
// registry still parses with zod afterwards; this keeps the advertised schemas honest.
const cache = new Map<string, ValidateFunction<unknown> | null>();

function validatorFor(method: string): ValidateFunction<unknown> | null {
  let entry = cache.get(method);
  if(entry === undefined){
    const tool = findTool(method);
    entry = tool ? compileGuard<unknown>(tool.inputSchema) : null;
    cache.set(method, entry);
  }
  return entry;
}

export function validateParams(method: string, params: unknown): { ok: true } | { ok: false; errors: string[] } {
  const validate = validatorFor(method);
  if(!validate) return { ok: true }; // no schema => accept
  if(validate(params === undefined ? {} : params)) return { ok: true };
  return { ok: false, errors: formatAjvErrors(validate.errors) };
}

export function clearValidationCache(){ cache.clear(); }
