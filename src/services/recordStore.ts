import crypto from 'crypto';
import { isDeepStrictEqual } from 'util';
import type { CollectionMap, CollectionName, Stored } from '../models/prompt';
import { NotFoundError } from './errors';

export type Row<C extends CollectionName> = Stored<CollectionMap[C]>;

export interface SelectOptions<C extends CollectionName> {
  /** equality filters; undefined values are ignored */
  filters?: Partial<Row<C>>;
  orderBy?: keyof Row<C> & string;
  ascending?: boolean;
  limit?: number;
}

/**
 * Keyed-record persistence consumed by every core service.
 * Single-record insert and update are atomic; select filters by equality only.
 */
export interface RecordStore {
  insert<C extends CollectionName>(collection: C, record: CollectionMap[C]): Promise<Row<C>>;
  select<C extends CollectionName>(collection: C, opts?: SelectOptions<C>): Promise<Row<C>[]>;
  update<C extends CollectionName>(collection: C, id: string, partial: Partial<CollectionMap[C]>): Promise<Row<C>>;
  delete<C extends CollectionName>(collection: C, id: string): Promise<void>;
}

type Tables = { [C in CollectionName]: Map<string, Row<C>> };

function fieldsOf(row: object): Map<string, unknown> {
  return new Map<string, unknown>(Object.entries(row));
}

function compareValues(a: unknown, b: unknown): number {
  if(typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = a === undefined || a === null ? '' : String(a);
  const sb = b === undefined || b === null ? '' : String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

export function matchesFilters(row: object, filters: object | undefined): boolean {
  if(!filters) return true;
  const fields = fieldsOf(row);
  for(const [key, expected] of Object.entries(filters)){
    if(expected === undefined) continue;
    if(!isDeepStrictEqual(fields.get(key), expected)) return false;
  }
  return true;
}

/** Apply filters, stable ordering and limit to rows given in insertion order. */
export function applySelect<R extends object>(rows: R[], opts: { filters?: object; orderBy?: string; ascending?: boolean; limit?: number } = {}): R[] {
  let out = rows.filter(r => matchesFilters(r, opts.filters));
  const orderBy = opts.orderBy;
  if(orderBy){
    const dir = opts.ascending === false ? -1 : 1;
    out = out
      .map((row, index) => ({ row, index, key: fieldsOf(row).get(orderBy) }))
      .sort((a, b) => dir * compareValues(a.key, b.key) || a.index - b.index)
      .map(e => e.row);
  }
  if(opts.limit !== undefined && opts.limit >= 0) out = out.slice(0, opts.limit);
  return out;
}

/** Process-local store; rows are cloned on the way in and out so callers never share state with it. */
export class InMemoryRecordStore implements RecordStore {
  private readonly tables: Tables = {
    prompts: new Map(),
    prompt_versions: new Map(),
    prompt_branches: new Map(),
    prompt_usage_log: new Map(),
  };

  async insert<C extends CollectionName>(collection: C, record: CollectionMap[C]): Promise<Row<C>> {
    const now = new Date().toISOString();
    const row: Row<C> = { ...structuredClone(record), id: crypto.randomUUID(), createdAt: now, updatedAt: now };
    this.tables[collection].set(row.id, row);
    return structuredClone(row);
  }

  async select<C extends CollectionName>(collection: C, opts: SelectOptions<C> = {}): Promise<Row<C>[]> {
    return applySelect([...this.tables[collection].values()], opts).map(r => structuredClone(r));
  }

  async update<C extends CollectionName>(collection: C, id: string, partial: Partial<CollectionMap[C]>): Promise<Row<C>> {
    const existing = this.tables[collection].get(id);
    if(!existing) throw new NotFoundError(`Record '${id}' not found in ${collection}`);
    const row: Row<C> = { ...existing, ...structuredClone(partial), id, createdAt: existing.createdAt, updatedAt: new Date().toISOString() };
    this.tables[collection].set(id, row);
    return structuredClone(row);
  }

  async delete<C extends CollectionName>(collection: C, id: string): Promise<void> {
    this.tables[collection].delete(id);
  }

  /** Current rows of a collection in insertion order (copies). */
  rows<C extends CollectionName>(collection: C): Row<C>[] {
    return [...this.tables[collection].values()].map(r => structuredClone(r));
  }

  /** Replace a collection's contents, keeping the given order. */
  load<C extends CollectionName>(collection: C, rows: Row<C>[]): void {
    const table = this.tables[collection];
    table.clear();
    for(const r of rows) table.set(r.id, structuredClone(r));
  }
}
