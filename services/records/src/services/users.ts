import { MemoryRecordStore } from '../storage/memoryRecordStore';
import { SequentialIdAllocator } from '../storage/ids';
import { userFieldsSchema } from '../validation/users';
import type { SequentialId, UserFields, UserRecord } from '../types';
import { RecordService } from './recordService';

export type UserService = RecordService<UserFields, SequentialId>;

export interface UserServiceOptions {
  clock?: () => Date;
}

export function createUserService(options: UserServiceOptions = {}): UserService {
  const store = new MemoryRecordStore<UserFields, SequentialId>({
    ids: new SequentialIdAllocator(),
    uniqueBy: 'email',
    clock: options.clock,
  });
  return new RecordService({
    store,
    schema: userFieldsSchema,
    searchField: 'name',
    statsPredicate: (user: UserRecord) => user.is_active,
    entity: 'User',
  });
}
