import fs from 'fs';
import path from 'path';
import type { ValidateFunction } from 'ajv';
import { COLLECTIONS, type CollectionMap, type CollectionName } from '../models/prompt';
import { branchRecordSchema, promptRecordSchema, usageRecordSchema, versionRecordSchema } from '../schemas';
import { atomicWriteJson, type AtomicWriteOptions } from './atomicFs';
import { InMemoryRecordStore, type RecordStore, type Row, type SelectOptions } from './recordStore';
import { compileGuard, formatAjvErrors } from './schemaValidator';
import { logInfo, logWarn } from './logger';

type RowGuards = { [C in CollectionName]: ValidateFunction<Row<C>> };

const guards: RowGuards = {
  prompts: compileGuard<Row<'prompts'>>(promptRecordSchema),
  prompt_versions: compileGuard<Row<'prompt_versions'>>(versionRecordSchema),
  prompt_branches: compileGuard<Row<'prompt_branches'>>(branchRecordSchema),
  prompt_usage_log: compileGuard<Row<'prompt_usage_log'>>(usageRecordSchema),
};

/**
 * One JSON array file per collection under `dir`. Everything is loaded (and schema-checked) once at
 * construction; every mutation rewrites its collection file atomically or is undone.
 */
export class FileRecordStore implements RecordStore {
  private readonly mem = new InMemoryRecordStore();

  constructor(private readonly dir: string, private readonly writeOpts: AtomicWriteOptions){
    fs.mkdirSync(dir, { recursive: true });
    for(const c of COLLECTIONS) this.loadCollection(c);
  }

  filePath(collection: CollectionName): string {
    return path.join(this.dir, `${collection}.json`);
  }

  private loadCollection<C extends CollectionName>(collection: C): void {
    const fp = this.filePath(collection);
    if(!fs.existsSync(fp)) return;
    const parsed: unknown = JSON.parse(fs.readFileSync(fp, 'utf8'));
    if(!Array.isArray(parsed)) throw new Error(`Corrupt store file ${fp}: expected a JSON array`);
    const guard: ValidateFunction<Row<C>> = guards[collection];
    const rows: Row<C>[] = [];
    parsed.forEach((candidate: unknown, index) => {
      if(!guard(candidate)){
        throw new Error(`Corrupt store file ${fp}: record ${index} ${formatAjvErrors(guard.errors).join('; ')}`);
      }
      rows.push(candidate);
    });
    this.mem.load(collection, rows);
    logInfo('store.collection_loaded', { collection, count: rows.length });
  }

  /**
   * Apply a mutation in memory and persist it. When the write fails the collection is restored
   * to its previous rows, so memory never holds what the file does not.
   */
  private async mutate<C extends CollectionName, T>(collection: C, apply: () => Promise<T>): Promise<T> {
    const before = this.mem.rows(collection);
    const result = await apply();
    try {
      atomicWriteJson(this.filePath(collection), this.mem.rows(collection), this.writeOpts);
    } catch(e){
      this.mem.load(collection, before);
      logWarn('store.flush_failed', { collection, error: e instanceof Error ? e.message : String(e) });
      throw e;
    }
    return result;
  }

  insert<C extends CollectionName>(collection: C, record: CollectionMap[C]): Promise<Row<C>> {
    return this.mutate(collection, () => this.mem.insert(collection, record));
  }

  select<C extends CollectionName>(collection: C, opts?: SelectOptions<C>): Promise<Row<C>[]> {
    return this.mem.select(collection, opts);
  }

  update<C extends CollectionName>(collection: C, id: string, partial: Partial<CollectionMap[C]>): Promise<Row<C>> {
    return this.mutate(collection, () => this.mem.update(collection, id, partial));
  }

  delete<C extends CollectionName>(collection: C, id: string): Promise<void> {
    return this.mutate(collection, () => this.mem.delete(collection, id));
  }
}
