import type { RecordPredicate, RecordStore } from '../contracts/recordStore';
import { fail, ok } from '../contracts/outcome';
import type { DuplicateKey, NotFound, Outcome, ValidationError } from '../contracts/outcome';
import { paginate, searchRecords } from '../query/filter';
import { validate } from '../validation/validate';
import type { FieldSchema } from '../validation/validate';
import type { RecordId, StoredRecord } from '../types';

export interface RecordStats {
  total: number;
  matchingPredicateCount: number;
}

export interface RecordServiceOptions<F, K extends RecordId> {
  store: RecordStore<F, K>;
  schema: FieldSchema<F>;
  /** Text field searched by `readMany`. */
  searchField: keyof F & string;
  /** Predicate counted by `stats`; counts nothing when omitted. */
  statsPredicate?: RecordPredicate<StoredRecord<F, K>>;
  /** Label used in not-found messages, e.g. "User". */
  entity: string;
}

/**
 * Call contract consumed by the routes: validates the candidate,
 * then hands it to the store. Every failure comes back as a typed outcome.
 */
export class RecordService<F, K extends RecordId> {
  private readonly store: RecordStore<F, K>;
  private readonly schema: FieldSchema<F>;
  private readonly searchField: keyof F & string;
  private readonly statsPredicate: RecordPredicate<StoredRecord<F, K>>;
  readonly entity: string;

  constructor(options: RecordServiceOptions<F, K>) {
    this.store = options.store;
    this.schema = options.schema;
    this.searchField = options.searchField;
    this.statsPredicate = options.statsPredicate ?? (() => false);
    this.entity = options.entity;
  }

  create(fields: unknown): Outcome<StoredRecord<F, K>, ValidationError | DuplicateKey> {
    const candidate = validate(this.schema, fields);
    if (!candidate.ok) return candidate;
    return this.store.insert(candidate.value);
  }

  read(id: K): Outcome<StoredRecord<F, K>, NotFound> {
    const found = this.store.get(id);
    if (!found.ok) return fail(this.notFound(found.error));
    return found;
  }

  readMany(skip: number, limit: number, filterText?: string): StoredRecord<F, K>[] {
    // filter first, then page
    const matches = searchRecords(this.store.snapshot(), this.searchField, filterText);
    return paginate(matches, { skip, limit });
  }

  update(id: K, fields: unknown): Outcome<StoredRecord<F, K>, NotFound | ValidationError | DuplicateKey> {
    const candidate = validate(this.schema, fields);
    if (!candidate.ok) return candidate;
    const updated = this.store.update(id, candidate.value);
    if (!updated.ok && updated.error.code === 'not_found') return fail(this.notFound(updated.error));
    return updated;
  }

  delete(id: K): Outcome<true, NotFound> {
    const removed = this.store.delete(id);
    if (!removed.ok) return fail(this.notFound(removed.error));
    return ok(true);
  }

  stats(): RecordStats {
    // recomputed on every call over the live records
    return {
      total: this.store.size,
      matchingPredicateCount: this.store.countBy(this.statsPredicate),
    };
  }

  findFirst(predicate: RecordPredicate<StoredRecord<F, K>>): StoredRecord<F, K> | undefined {
    return this.store.find(predicate);
  }

  private notFound(error: NotFound): NotFound {
    return { ...error, message: `${this.entity} not found` };
  }
}
