/**
 * stdio JSON-RPC 2.0 transport, one request per line.
 *
 * stdout carries protocol frames only; diagnostics go to stderr. Handlers come from a
 * HandlerRegistry instance so several transports (tests) can run side by side.
 */
import { createInterface } from 'readline';
import type { LoggingConfig } from '../config/runtimeConfig';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { LedgerError, RPC_CODES, toSemanticError } from '../services/errors';
import { validateParams } from '../services/validationService';
import { packageVersion } from '../utils/packageVersion';
import type { HandlerRegistry } from './registry';

type RpcId = string | number | null;

interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: RpcId;
  method: string;
  params?: unknown;
}
interface JsonRpcSuccess {
  jsonrpc: '2.0';
  id: RpcId;
  result: unknown;
}
interface JsonRpcError {
  jsonrpc: '2.0';
  id: RpcId;
  error: { code: number; message: string; data?: unknown };
}

type JsonRpcResponse = JsonRpcSuccess | JsonRpcError;

export const PROTOCOL_VERSION = '2025-06-18';
export const SERVER_NAME = 'prompt-ledger';

function makeError(id: RpcId | undefined, code: number, message: string, data?: unknown): JsonRpcError {
  return { jsonrpc: '2.0', id: id ?? null, error: { code, message, data } };
}

function parseRequest(raw: unknown): JsonRpcRequest | { invalid: true; id: RpcId } {
  if(!raw || typeof raw !== 'object' || Array.isArray(raw)) return { invalid: true, id: null };
  const id = 'id' in raw && (typeof raw.id === 'string' || typeof raw.id === 'number' || raw.id === null) ? raw.id : undefined;
  const method = 'method' in raw ? raw.method : undefined;
  const jsonrpc = 'jsonrpc' in raw ? raw.jsonrpc : undefined;
  if(jsonrpc !== '2.0' || typeof method !== 'string' || !method) return { invalid: true, id: id ?? null };
  return { jsonrpc: '2.0', id, method, params: 'params' in raw ? raw.params : undefined };
}

function requestedProtocol(params: unknown): string {
  if(params && typeof params === 'object' && 'protocolVersion' in params && typeof params.protocolVersion === 'string'){
    return params.protocolVersion;
  }
  return PROTOCOL_VERSION;
}

export interface TransportOptions {
  input?: NodeJS.ReadableStream;        // defaults to process.stdin
  output?: NodeJS.WritableStream;       // defaults to process.stdout
  stderr?: NodeJS.WritableStream;       // defaults to process.stderr
  logging?: Pick<LoggingConfig, 'verbose' | 'protocol'>; // defaults to runtime config
}

export interface TransportHandle {
  close(): void;
}

export function startTransport(registry: HandlerRegistry, opts: TransportOptions = {}): TransportHandle {
  const logging = opts.logging ?? getRuntimeConfig().logging;
  const verbose = logging.verbose;
  const protocolLog = logging.protocol; // parsed frame summaries
  const output = opts.output ?? process.stdout;
  const version = packageVersion();

  const log = (level: 'info'|'error'|'debug', msg: string, extra?: unknown) => {
    if(level === 'debug' && !verbose && !protocolLog) return;
    const line = `[${new Date().toISOString()}] [${level}] ${msg}`;
    (opts.stderr ?? process.stderr).write(line + (extra !== undefined ? ` ${JSON.stringify(extra)}` : '') + '\n');
  };

  if(verbose){
    log('info', 'startup', { version, pid: process.pid, node: process.version, tools: registry.listMethods().length, protocolLog });
  }

  // Handshake: initialize result is flushed first, then server/ready and tools/list_changed
  let initialized = false;
  let readyEmitted = false;
  function emitReady(reason: string){
    if(readyEmitted) return;
    readyEmitted = true;
    output.write(JSON.stringify({ jsonrpc: '2.0', method: 'server/ready', params: { version, reason } }) + '\n');
    output.write(JSON.stringify({ jsonrpc: '2.0', method: 'notifications/tools/list_changed', params: {} }) + '\n');
  }

  // readline without `output`, so request lines are never echoed back to stdout
  const rl = createInterface({ input: opts.input ?? process.stdin });
  const respondFn = (obj: JsonRpcResponse) => {
    if(protocolLog){
      log('debug', 'send', 'error' in obj ? { id: obj.id, error: obj.error.code } : { id: obj.id, ok: true });
    }
    output.write(JSON.stringify(obj) + '\n');
  };

  // a request without an id is a notification: it never gets a response, error or not
  const replyError = (req: JsonRpcRequest, code: number, message: string, data?: unknown) => {
    if(req.id === undefined) return;
    respondFn(makeError(req.id, code, message, data));
  };

  const respondWithError = (req: JsonRpcRequest, e: unknown) => {
    if(e instanceof LedgerError){
      const semantic = toSemanticError(e, { method: req.method });
      log('debug', 'handler_error', { method: req.method, reason: e.reason, code: e.code });
      replyError(req, semantic.code, semantic.message, semantic.data);
      return;
    }
    const message = e instanceof Error ? e.message : String(e);
    log('error', 'handler_error', { method: req.method, message });
    replyError(req, RPC_CODES.internal, 'Internal error', { method: req.method, message });
  };

  const dispatch = async (req: JsonRpcRequest) => {
    const handler = registry.get(req.method);
    if(!handler){
      const available = registry.listMethods();
      log('debug', 'method_not_found', { requested: req.method, availableCount: available.length });
      replyError(req, RPC_CODES.methodNotFound, 'Method not found', { method: req.method, available });
      return;
    }
    // contract check against the published JSON Schema before the handler's own parsing
    const validation = validateParams(req.method, req.params);
    if(!validation.ok){
      replyError(req, RPC_CODES.invalidParams, 'Invalid params', { method: req.method, errors: validation.errors });
      return;
    }
    if(!initialized) log('debug', 'call_before_initialize', { method: req.method });
    try {
      const result = await handler(req.params);
      if(req.id !== undefined && req.id !== null) respondFn({ jsonrpc: '2.0', id: req.id, result });
    } catch(e){
      respondWithError(req, e);
    }
  };

  rl.on('line', (line: string) => {
    const trimmed = line.trim();
    if(!trimmed) return;
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      log('error', 'parse_error', { raw: trimmed.slice(0, 200) });
      respondFn(makeError(null, RPC_CODES.parseError, 'Parse error'));
      return;
    }
    const req = parseRequest(raw);
    if('invalid' in req){
      respondFn(makeError(req.id, RPC_CODES.invalidRequest, 'Invalid Request'));
      return;
    }
    if(protocolLog) log('debug', 'recv', { id: req.id ?? null, method: req.method });

    if(req.method === 'initialize'){
      if(initialized){
        replyError(req, RPC_CODES.invalidRequest, 'Already initialized');
        return;
      }
      initialized = true;
      const result = {
        protocolVersion: requestedProtocol(req.params),
        serverInfo: { name: SERVER_NAME, version },
        capabilities: { tools: { listChanged: true } },
      };
      output.write(JSON.stringify({ jsonrpc: '2.0', id: req.id ?? 1, result }) + '\n', () => {
        setTimeout(() => emitReady('post-initialize'), 0);
      });
      return;
    }
    if(req.method === 'notifications/initialized') return;
    if(req.method === 'shutdown'){
      if(req.id !== undefined && req.id !== null) respondFn({ jsonrpc: '2.0', id: req.id, result: { shuttingDown: true } });
      rl.close();
      return;
    }
    dispatch(req).catch(e => respondWithError(req, e));
  });

  return { close: () => rl.close() };
}
