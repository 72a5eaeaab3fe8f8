import { describe, expect, it } from 'vitest';
import { createUserService } from '../src/services/users';
import { createInventoryServices, deleteByHandle, matchesHandle } from '../src/services/inventory';

const clock = () => new Date('2024-01-01T12:00:00.000Z');

describe('user service', () => {
  it('create, duplicate, delete, then stats', () => {
    const users = createUserService({ clock });

    const created = users.create({ name: 'John Doe', email: 'john@x.com', age: 30 });
    expect(created.ok && created.value.id).toBe(1);

    const read = users.read(1);
    expect(read).toEqual({
      ok: true,
      value: {
        id: 1,
        name: 'John Doe',
        email: 'john@x.com',
        age: 30,
        is_active: true,
        created_at: '2024-01-01T12:00:00.000Z',
      },
    });

    const dup = users.create({ name: 'Other John', email: 'john@x.com' });
    expect(!dup.ok && dup.error.code).toBe('duplicate_key');

    expect(users.delete(1)).toEqual({ ok: true, value: true });
    expect(users.read(1)).toEqual({ ok: false, error: { code: 'not_found', id: 1, message: 'User not found' } });
    expect(users.stats()).toEqual({ total: 0, matchingPredicateCount: 0 });
  });

  it('validates before touching the store', () => {
    const users = createUserService({ clock });
    const invalid = users.create({ name: 'No Email' });
    expect(!invalid.ok && invalid.error.code).toBe('validation_failed');

    const first = users.create({ name: 'Ann', email: 'ann@x.com' });
    expect(first.ok && first.value.id).toBe(1);
  });

  it('update reports each failure kind distinctly', () => {
    const users = createUserService({ clock });
    users.create({ name: 'Ann', email: 'ann@x.com' });
    users.create({ name: 'Bob', email: 'bob@x.com' });

    const missing = users.update(9, { name: 'Zed', email: 'zed@x.com' });
    expect(!missing.ok && missing.error).toEqual({ code: 'not_found', id: 9, message: 'User not found' });

    const invalid = users.update(1, { name: 'Ann', email: 'not-an-email' });
    expect(!invalid.ok && invalid.error.code).toBe('validation_failed');

    const taken = users.update(1, { name: 'Ann', email: 'bob@x.com' });
    expect(!taken.ok && taken.error.code).toBe('duplicate_key');

    const same = users.update(1, { name: 'Ann B.', email: 'ann@x.com', is_active: false });
    expect(same.ok && same.value).toEqual({
      id: 1,
      name: 'Ann B.',
      email: 'ann@x.com',
      is_active: false,
      created_at: '2024-01-01T12:00:00.000Z',
    });
  });

  it('reads many with a name filter applied before paging', () => {
    const users = createUserService({ clock });
    users.create({ name: 'Alice Smith', email: 'alice@x.com' });
    users.create({ name: 'Bob Jones', email: 'bob@x.com' });
    users.create({ name: 'Carol SMITH', email: 'carol@x.com' });
    users.create({ name: 'Dan Smithers', email: 'dan@x.com' });

    expect(users.readMany(0, 100).map((u) => u.id)).toEqual([1, 2, 3, 4]);
    expect(users.readMany(0, 100, 'smith').map((u) => u.id)).toEqual([1, 3, 4]);
    expect(users.readMany(1, 1, 'smith').map((u) => u.id)).toEqual([3]);
    expect(users.readMany(4, 1)).toEqual([]);
  });

  it('counts active users', () => {
    const users = createUserService({ clock });
    users.create({ name: 'Ann', email: 'ann@x.com' });
    users.create({ name: 'Bob', email: 'bob@x.com', is_active: false });
    users.create({ name: 'Cy', email: 'cy@x.com', is_active: true });
    expect(users.stats()).toEqual({ total: 3, matchingPredicateCount: 2 });
  });
});

describe('inventory services', () => {
  function sequence() {
    let n = 0;
    return () => `00000000-0000-4000-8000-00000000000${++n}`;
  }

  it('assigns generated uuids across items and users', () => {
    const { items, users } = createInventoryServices({ clock, generateId: sequence() });
    const item = items.create({
      name: 'Widget Adapter',
      releaseDate: '2016-08-29T09:12:33.001Z',
      manufacturer: { name: 'ACME Corporation' },
    });
    const user = users.create({ username: 'johndoe', email: 'johndoe@example.com' });

    expect(item.ok && item.value.id).toBe('00000000-0000-4000-8000-000000000001');
    expect(user.ok && user.value.id).toBe('00000000-0000-4000-8000-000000000002');
  });


  it('counts no items as matching in stats', () => {
    const { items } = createInventoryServices({ clock });
    items.create({ name: 'A', releaseDate: '2020-01-01T00:00:00Z', manufacturer: { name: 'M', homePage: 'www.m.example' } });
    expect(items.stats()).toEqual({ total: 1, matchingPredicateCount: 0 });
  });

  it('finds and removes directory users by username or email', () => {
    const { users } = createInventoryServices({ clock });
    users.create({ username: 'johndoe', email: 'johndoe@example.com' });
    users.create({ username: 'janedoe', email: 'jane@example.com' });
    users.create({ username: 'johndoe', email: 'second-john@example.com' });

    expect(users.findFirst(matchesHandle('jane@example.com'))?.username).toBe('janedoe');
    expect(users.findFirst(matchesHandle('johndoe'))?.email).toBe('johndoe@example.com');

    expect(deleteByHandle(users, 'johndoe')).toBe(2);
    expect(users.readMany(0, 10).map((u) => u.username)).toEqual(['janedoe']);
    expect(deleteByHandle(users, 'johndoe')).toBe(0);
  });
});
