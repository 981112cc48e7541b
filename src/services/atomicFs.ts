import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import { logWarn } from './logger';

export interface AtomicWriteOptions {
  /** total attempts (initial + retries) */
  retries: number;
  /** initial backoff, doubled per attempt plus jitter */
  backoffMs: number;
}

const TRANSIENT_CODES = new Set(['EPERM', 'EBUSY', 'EACCES', 'ENOENT']);

export function errnoCode(e: unknown): string | undefined {
  if(e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}

function sleepSync(ms: number){
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function removeTemp(tmp: string){
  try {
    if(fs.existsSync(tmp)) fs.unlinkSync(tmp);
  } catch(e){
    logWarn('store.temp_cleanup_failed', { tmp, error: e instanceof Error ? e.message : String(e) });
  }
}

/**
 * Write JSON to a unique temp file in the destination directory, then rename it over the target.
 * Rename is retried on transient lock errors (virus scanners, indexers, a second process);
 * there is no fallback to a direct write, so readers only ever see a complete file.
 */
export function atomicWriteJson(filePath: string, obj: unknown, opts: AtomicWriteOptions){
  const dir = path.dirname(filePath);
  if(!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  const data = JSON.stringify(obj, null, 2);
  const maxAttempts = Math.max(1, opts.retries);
  const baseBackoff = Math.max(1, opts.backoffMs);
  let lastErr: unknown;
  for(let attempt = 1; attempt <= maxAttempts; attempt++){
    const tmp = path.join(dir, `.${path.basename(filePath)}.${crypto.randomBytes(6).toString('hex')}.tmp`);
    try {
      fs.writeFileSync(tmp, data, 'utf8');
      fs.renameSync(tmp, filePath);
      return;
    } catch(err){
      lastErr = err;
      removeTemp(tmp);
      const code = errnoCode(err);
      if(!code || !TRANSIENT_CODES.has(code) || attempt === maxAttempts) break;
      sleepSync(baseBackoff * Math.pow(2, attempt - 1) + Math.floor(Math.random() * baseBackoff));
    }
  }
  throw lastErr instanceof Error ? lastErr : new Error(`atomicWriteJson failed for ${filePath}`);
}
