import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { getRuntimeConfig, type LogLevel } from '../config/runtimeConfig';

export interface LogRecord {
  ts: string; // ISO timestamp
  level: LogLevel;
  evt: string; // short event key, e.g. vcs.commit
  msg?: string;
  tool?: string;
  ms?: number;
  data?: unknown;
  correlationId?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

// Per-call correlation id (one per tool invocation)
export function newCorrelationId(){ return crypto.randomBytes(8).toString('hex'); }

let logFileHandle: fs.WriteStream | null = null;
let logFilePath: string | undefined;
let exitHookInstalled = false;

function loggingCfg(){
  return getRuntimeConfig().logging;
}

function openLogFile(file: string): void {
  if(logFileHandle && logFilePath === file) return;
  closeLogFile();
  const dir = path.dirname(file);
  if(!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  logFileHandle = fs.createWriteStream(file, { flags: 'a', encoding: 'utf8' });
  logFilePath = file;
  logFileHandle.on('error', err => {
    process.stderr.write(`[logger] log file error ${file}: ${err.message}\n`);
    logFileHandle = null;
  });
  logFileHandle.write(`\n=== prompt-ledger session started: ${new Date().toISOString()} ===\n`);
  if(!exitHookInstalled){
    exitHookInstalled = true;
    process.on('exit', () => closeLogFile());
  }
}

/** Flush and detach the file sink (stderr output is unaffected). */
export function closeLogFile(): void {
  if(logFileHandle && !logFileHandle.destroyed){
    logFileHandle.end(`=== session ended: ${new Date().toISOString()} ===\n`);
  }
  logFileHandle = null;
  logFilePath = undefined;
}

export function formatRecord(rec: LogRecord, json: boolean): string {
  if(json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.evt, rec.msg || ''];
  if(rec.tool) parts.push(`[${rec.tool}]`);
  if(rec.correlationId) parts.push(`cid=${rec.correlationId}`);
  if(rec.ms !== undefined) parts.push(`${rec.ms}ms`);
  if(rec.data !== undefined) parts.push(JSON.stringify(rec.data));
  return parts.filter(Boolean).join(' ');
}

function emit(rec: LogRecord){
  const cfg = loggingCfg();
  if(LEVEL_RANK[rec.level] > LEVEL_RANK[cfg.level]) return;
  const line = formatRecord(rec, cfg.json);

  // stdout belongs to the JSON-RPC transport; diagnostics always go to stderr
  process.stderr.write(line + '\n');

  if(!cfg.file) return;
  if(cfg.sync){
    // deterministic mode (tests, crash forensics): bypass the buffered stream
    fs.mkdirSync(path.dirname(cfg.file), { recursive: true });
    fs.appendFileSync(cfg.file, line + '\n', 'utf8');
    return;
  }
  openLogFile(cfg.file);
  if(logFileHandle && !logFileHandle.destroyed){
    logFileHandle.write(line + '\n');
  }
}

export function log(level: LogRecord['level'], evt: string, fields: Omit<LogRecord,'level'|'evt'|'ts'> = {}){
  emit({ ts: new Date().toISOString(), level, evt, ...fields });
}

export const logDebug = (evt:string, f?:unknown)=> log('debug', evt, { data:f });
export const logInfo = (evt:string, f?:unknown)=> log('info', evt, { data:f });
export const logWarn = (evt:string, f?:unknown)=> log('warn', evt, { data:f });
export const logError = (evt:string, f?:unknown)=> log('error', evt, { data:f });
