import type { RegressionReport } from './regressionGuard';
import type { ScanFinding } from './injectionScanner';

// JSON-RPC error payload derived from a LedgerError; __semantic marks it as already mapped.
export interface SemanticRpcErrorShape<TData extends Record<string, unknown> = Record<string, unknown>> {
  code: number;
  message: string;
  data: TData;
  __semantic: true;
}

export const RPC_CODES = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internal: -32603,
  notFound: -32004,
  conflict: -32009,
  blocked: -32010,
} as const;

export type ErrorReason =
  | 'not_found'
  | 'duplicate_slug'
  | 'duplicate_branch'
  | 'injection_blocked'
  | 'content_regression_blocked'
  | 'circular_inheritance'
  | 'unknown_merge_strategy'
  | 'validation_failed';

/**
 * Base class for every failure the core raises on purpose. `httpStatus` is the
 * status a caller layer is expected to translate the error to.
 */
export abstract class LedgerError extends Error {
  abstract readonly reason: ErrorReason;
  abstract readonly code: number;
  abstract readonly httpStatus: number;

  constructor(message: string){
    super(message);
    this.name = new.target.name;
  }

  /** Machine-readable detail carried next to the message. */
  detail(): Record<string, unknown> { return {}; }
}

export class NotFoundError extends LedgerError {
  readonly reason = 'not_found';
  readonly code = RPC_CODES.notFound;
  readonly httpStatus = 404;
}

export class DuplicateSlugError extends LedgerError {
  readonly reason = 'duplicate_slug';
  readonly code = RPC_CODES.conflict;
  readonly httpStatus = 409;
  constructor(readonly slug: string){
    super(`Prompt with slug '${slug}' already exists`);
  }
  override detail(){ return { slug: this.slug }; }
}

export class DuplicateBranchError extends LedgerError {
  readonly reason = 'duplicate_branch';
  readonly code = RPC_CODES.conflict;
  readonly httpStatus = 409;
  constructor(readonly branch: string){
    super(`Branch '${branch}' already exists for this prompt`);
  }
  override detail(){ return { branch: this.branch }; }
}

export class InjectionBlockedError extends LedgerError {
  readonly reason = 'injection_blocked';
  readonly code = RPC_CODES.blocked;
  readonly httpStatus = 422;
  constructor(readonly findings: ScanFinding[]){
    super(`Critical injection findings detected: ${findings.map(f => `${f.patternName}: ${f.description}`).join('; ')}`);
  }
  override detail(){ return { findings: this.findings }; }
}

export interface RegressionBlockDiff {
  keysRemoved: string[];
  keysAdded: string[];
  keysUnchanged: string[];
  parentVersion: number;
  contentReductionPct: number;
}

export class RegressionBlockedError extends LedgerError {
  readonly reason = 'content_regression_blocked';
  readonly code = RPC_CODES.conflict;
  readonly httpStatus = 409;
  constructor(readonly report: RegressionReport, readonly diff: RegressionBlockDiff, parentKeyCount: number){
    super(
      `New version removes ${report.keysRemoved.length}/${parentKeyCount} keys and reduces content by ` +
      `${report.contentReductionPct}%. This looks accidental. To proceed, set acknowledgeReduction: true.`
    );
  }
  override detail(){ return { error: this.reason, diff: this.diff, report: this.report }; }
}

export class CircularInheritanceError extends LedgerError {
  readonly reason = 'circular_inheritance';
  readonly code = RPC_CODES.invalidParams;
  readonly httpStatus = 400;
  constructor(readonly cycle: string[]){
    super(`Circular inheritance detected: ${cycle.join(' → ')}`);
  }
  override detail(){ return { cycle: this.cycle }; }
}

export class UnknownMergeStrategyError extends LedgerError {
  readonly reason = 'unknown_merge_strategy';
  readonly code = RPC_CODES.invalidParams;
  readonly httpStatus = 400;
  constructor(readonly strategy: string){
    super(`Unknown merge strategy: ${strategy}`);
  }
  override detail(){ return { strategy: this.strategy }; }
}

export class ValidationError extends LedgerError {
  readonly reason = 'validation_failed';
  readonly code = RPC_CODES.invalidParams;
  readonly httpStatus = 400;
  constructor(message: string, readonly issues: string[] = []){
    super(message);
  }
  override detail(){ return this.issues.length ? { issues: this.issues } : {}; }
}

/** Convert a typed core error into the wire shape; anything else is left to the caller. */
export function toSemanticError(e: LedgerError, extra: Record<string, unknown> = {}): SemanticRpcErrorShape {
  return {
    code: e.code,
    message: e.message,
    data: { ...extra, reason: e.reason, httpStatus: e.httpStatus, ...e.detail() },
    __semantic: true,
  };
}
