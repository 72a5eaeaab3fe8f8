import { MemoryRecordStore } from '../storage/memoryRecordStore';
import { UuidIdAllocator } from '../storage/ids';
import { directoryUserFieldsSchema, inventoryItemFieldsSchema } from '../validation/inventory';
import type { DirectoryUserFields, DirectoryUserRecord, InventoryItemFields, UuidId } from '../types';
import { RecordService } from './recordService';

export type InventoryItemService = RecordService<InventoryItemFields, UuidId>;
export type DirectoryUserService = RecordService<DirectoryUserFields, UuidId>;

export interface InventoryServices {
  items: InventoryItemService;
  users: DirectoryUserService;
}

export interface InventoryServiceOptions {
  clock?: () => Date;
  generateId?: () => string;
}

export function createInventoryServices(options: InventoryServiceOptions = {}): InventoryServices {
  const ids = new UuidIdAllocator(options.generateId);

  const items = new RecordService<InventoryItemFields, UuidId>({
    store: new MemoryRecordStore<InventoryItemFields, UuidId>({ ids, clock: options.clock }),
    schema: inventoryItemFieldsSchema,
    searchField: 'name',
    entity: 'Item',
  });

  const users = new RecordService<DirectoryUserFields, UuidId>({
    store: new MemoryRecordStore<DirectoryUserFields, UuidId>({ ids, uniqueBy: 'email', clock: options.clock }),
    schema: directoryUserFieldsSchema,
    searchField: 'username',
    entity: 'User',
  });

  return { items, users };
}

/** A directory user is addressed by either its username or its email. */
export function matchesHandle(handle: string) {
  return (user: DirectoryUserRecord) => user.username === handle || user.email === handle;
}

/** Removes every directory user matching `handle`; returns how many were removed. */
export function deleteByHandle(users: DirectoryUserService, handle: string): number {
  const matches = matchesHandle(handle);
  let removed = 0;
  for (let user = users.findFirst(matches); user; user = users.findFirst(matches)) {
    const result = users.delete(user.id);
    if (!result.ok) break;
    removed += 1;
  }
  return removed;
}
