import { isDeepStrictEqual } from 'util';
import type { JsonObject } from '../models/prompt';
import { jsonSize, objectField, sectionMap, sectionText } from '../models/content';

export type SectionChange =
  | { sectionId: string; type: 'added'; content: string }
  | { sectionId: string; type: 'removed'; content: string }
  | { sectionId: string; type: 'modified'; before: string; after: string; similarity: number }
  | { sectionId: '_variables' | '_metadata'; type: 'modified'; before: JsonObject; after: JsonObject };

export interface SectionDiff {
  changes: SectionChange[];
  summary: string;
}

export type FieldChange =
  | { field: string; action: 'removed' | 'added' }
  | { field: string; action: 'modified'; fromLength: number; toLength: number };

export interface FieldDiffSummary {
  added: number;
  removed: number;
  modified: number;
  unchanged: number;
  contentChangePct: number;
}

export interface FieldDiff {
  fromVersion: number;
  toVersion: number;
  changes: FieldChange[];
  summary: FieldDiffSummary;
}

export function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function lcsLength(a: string, b: string): number {
  if(!a.length || !b.length) return 0;
  // two-row dynamic programming table
  let prev = new Array<number>(b.length + 1).fill(0);
  let cur = new Array<number>(b.length + 1).fill(0);
  for(let i = 1; i <= a.length; i++){
    for(let j = 1; j <= b.length; j++){
      cur[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], cur[j - 1]);
    }
    [prev, cur] = [cur, prev];
  }
  return prev[b.length];
}

/** Normalized similarity 2*LCS/(|a|+|b|) in 0..1, rounded to two decimals; 1 for two empty strings. */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  if(total === 0) return 1;
  return round((2 * lcsLength(a, b)) / total, 2);
}

/** Section-level diff: sections keyed by id, variables and metadata compared whole. */
export function diff(oldContent: JsonObject, newContent: JsonObject): SectionDiff {
  const oldSections = sectionMap(oldContent);
  const newSections = sectionMap(newContent);
  const changes: SectionChange[] = [];

  for(const [id, oldSection] of oldSections){
    const newSection = newSections.get(id);
    if(!newSection){
      changes.push({ sectionId: id, type: 'removed', content: sectionText(oldSection) });
      continue;
    }
    const before = sectionText(oldSection);
    const after = sectionText(newSection);
    if(before !== after){
      changes.push({ sectionId: id, type: 'modified', before, after, similarity: similarity(before, after) });
    }
  }
  for(const [id, newSection] of newSections){
    if(!oldSections.has(id)) changes.push({ sectionId: id, type: 'added', content: sectionText(newSection) });
  }

  for(const key of ['variables', 'metadata'] as const){
    const before = objectField(oldContent, key);
    const after = objectField(newContent, key);
    if(!isDeepStrictEqual(before, after)){
      changes.push({ sectionId: key === 'variables' ? '_variables' : '_metadata', type: 'modified', before, after });
    }
  }

  const count = (t: SectionChange['type']) => changes.filter(c => c.type === t).length;
  const parts: string[] = [];
  if(count('added')) parts.push(`${count('added')} section(s) added`);
  if(count('removed')) parts.push(`${count('removed')} section(s) removed`);
  if(count('modified')) parts.push(`${count('modified')} section(s) modified`);
  return { changes, summary: parts.length ? parts.join(', ') : 'No changes' };
}

const byKey = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Top-level key comparison that makes no assumption about the document shape. */
export function fieldDiff(oldContent: JsonObject, newContent: JsonObject, fromVersion: number, toVersion: number): FieldDiff {
  const oldKeys = Object.keys(oldContent);
  const newKeys = Object.keys(newContent);
  const oldSet = new Set(oldKeys);
  const newSet = new Set(newKeys);

  const removed = oldKeys.filter(k => !newSet.has(k)).sort(byKey);
  const added = newKeys.filter(k => !oldSet.has(k)).sort(byKey);
  const shared = oldKeys.filter(k => newSet.has(k)).sort(byKey);

  const changes: FieldChange[] = [
    ...removed.map(field => ({ field, action: 'removed' as const })),
    ...added.map(field => ({ field, action: 'added' as const })),
  ];
  let unchanged = 0;
  let modified = 0;
  for(const field of shared){
    if(isDeepStrictEqual(oldContent[field], newContent[field])){
      unchanged++;
      continue;
    }
    modified++;
    changes.push({ field, action: 'modified', fromLength: jsonSize(oldContent[field]), toLength: jsonSize(newContent[field]) });
  }

  const oldTotal = jsonSize(oldContent);
  const newTotal = jsonSize(newContent);
  const contentChangePct = oldTotal > 0 ? round(((newTotal - oldTotal) / oldTotal) * 100, 1) : 0;

  return {
    fromVersion,
    toVersion,
    changes,
    summary: { added: added.length, removed: removed.length, modified, unchanged, contentChangePct },
  };
}

function clip(value: unknown, max: number): string {
  const s = typeof value === 'string' ? value : JSON.stringify(value);
  return `${s.slice(0, max)}...`;
}

/** Plain-text rendering of a section diff, one line (or three for modifications) per change. */
export function humanReadable(result: SectionDiff): string {
  const lines = [`Summary: ${result.summary}`, ''];
  for(const change of result.changes){
    const tag = `[${change.sectionId}]`;
    switch(change.type){
      case 'added':
        lines.push(`+ ${tag} Added: ${clip(change.content, 100)}`);
        break;
      case 'removed':
        lines.push(`- ${tag} Removed: ${clip(change.content, 100)}`);
        break;
      case 'modified':
        lines.push(`~ ${tag} Modified (similarity: ${'similarity' in change ? change.similarity : '?'})`);
        lines.push(`  Before: ${clip(change.before, 80)}`);
        lines.push(`  After:  ${clip(change.after, 80)}`);
        break;
    }
  }
  return lines.join('\n');
}

/**
 * One-line review summary between a target branch's content and a proposed branch's content:
 * sections by id, variables by key, metadata as a whole.
 */
export function branchSummary(current: JsonObject, proposed: JsonObject): string {
  const cur = sectionMap(current);
  const next = sectionMap(proposed);
  const parts: string[] = [];

  const addedSections = [...next.keys()].filter(id => !cur.has(id));
  const removedSections = [...cur.keys()].filter(id => !next.has(id));
  const modifiedSections = [...cur.keys()].filter(id => {
    const other = next.get(id);
    const mine = cur.get(id);
    return other !== undefined && mine !== undefined && sectionText(mine) !== sectionText(other);
  });
  if(addedSections.length) parts.push(`Added ${addedSections.length} new section(s): ${addedSections.join(', ')}`);
  if(removedSections.length) parts.push(`Removed ${removedSections.length} section(s): ${removedSections.join(', ')}`);
  if(modifiedSections.length) parts.push(`Modified ${modifiedSections.length} section(s): ${modifiedSections.join(', ')}`);

  const curVars = objectField(current, 'variables');
  const nextVars = objectField(proposed, 'variables');
  const addedVars = Object.keys(nextVars).filter(k => !(k in curVars));
  const removedVars = Object.keys(curVars).filter(k => !(k in nextVars));
  const modifiedVars = Object.keys(curVars).filter(k => k in nextVars && !isDeepStrictEqual(curVars[k], nextVars[k]));
  if(addedVars.length) parts.push(`Added ${addedVars.length} variable(s)`);
  if(removedVars.length) parts.push(`Removed ${removedVars.length} variable(s)`);
  if(modifiedVars.length) parts.push(`Modified ${modifiedVars.length} variable(s)`);

  if(!isDeepStrictEqual(objectField(current, 'metadata'), objectField(proposed, 'metadata'))) parts.push('Modified metadata');

  return parts.length ? parts.join('; ') : 'No changes detected';
}
