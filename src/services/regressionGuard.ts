import type { JsonObject } from '../models/prompt';
import { classifyContent, isJsonObject, jsonSize } from '../models/content';
import { round } from './differ';

export const WARN_REDUCTION_PCT = 20;
export const BLOCK_REDUCTION_PCT = 50;
export const BLOCK_KEYS_REMOVED_PCT = 50;

export type RegressionWarning =
  | { type: 'keys_removed'; detail: { keys: string[] }; message: string }
  | { type: 'fields_emptied'; detail: { fields: string[] }; message: string }
  | { type: 'content_reduction'; detail: { reductionPct: number; fromSize: number; toSize: number }; message: string };

export interface RegressionReport {
  keysRemoved: string[];
  keysAdded: string[];
  fieldsEmptied: string[];
  contentReductionPct: number;
  keysRemovedPct: number;
  warn: boolean;
  block: boolean;
  warnings: RegressionWarning[];
}

function truthy(value: unknown): boolean {
  if(Array.isArray(value)) return value.length > 0;
  if(isJsonObject(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

function isEmptied(value: unknown): boolean {
  return value === '' || (Array.isArray(value) && value.length === 0);
}

/** Compare a candidate document to its predecessor; thresholds are fixed. */
export function regressionCheck(parent: JsonObject, candidate: JsonObject): RegressionReport {
  const parentKeys = classifyContent(parent).topLevelKeys();
  const candidateKeys = classifyContent(candidate).topLevelKeys();
  const candidateSet = new Set(candidateKeys);
  const parentSet = new Set(parentKeys);

  const keysRemoved = parentKeys.filter(k => !candidateSet.has(k)).sort();
  const keysAdded = candidateKeys.filter(k => !parentSet.has(k)).sort();
  const fieldsEmptied = parentKeys
    .filter(k => candidateSet.has(k) && truthy(parent[k]) && isEmptied(candidate[k]))
    .sort();

  const fromSize = jsonSize(parent);
  const toSize = jsonSize(candidate);
  const contentReductionPct = fromSize > 0 && toSize < fromSize ? round((1 - toSize / fromSize) * 100, 1) : 0;
  const keysRemovedPct = parentKeys.length ? round((keysRemoved.length / parentKeys.length) * 100, 1) : 0;

  const warnings: RegressionWarning[] = [];
  if(keysRemoved.length){
    warnings.push({
      type: 'keys_removed',
      detail: { keys: keysRemoved },
      message: `Removed ${keysRemoved.length} top-level key(s): ${keysRemoved.join(', ')}`,
    });
  }
  if(fieldsEmptied.length){
    warnings.push({
      type: 'fields_emptied',
      detail: { fields: fieldsEmptied },
      message: `Emptied ${fieldsEmptied.length} field(s): ${fieldsEmptied.join(', ')}`,
    });
  }
  if(contentReductionPct > WARN_REDUCTION_PCT){
    warnings.push({
      type: 'content_reduction',
      detail: { reductionPct: contentReductionPct, fromSize, toSize },
      message: `Content reduced by ${contentReductionPct}% (${fromSize} -> ${toSize} chars)`,
    });
  }

  return {
    keysRemoved,
    keysAdded,
    fieldsEmptied,
    contentReductionPct,
    keysRemovedPct,
    warn: keysRemoved.length > 0 || contentReductionPct > WARN_REDUCTION_PCT,
    block: contentReductionPct > BLOCK_REDUCTION_PCT || keysRemovedPct > BLOCK_KEYS_REMOVED_PCT,
    warnings,
  };
}
