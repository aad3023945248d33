import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryDatabase, type Database } from './index';
import { num, oneOf, optNum, optStr, str } from './rows';

describe('Database', () => {
  let db: Database;

  beforeEach(async () => {
    db = await createInMemoryDatabase();
  });

  it('creates every table', () => {
    const names = db
      .query("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .map((row) => str(row, 'name'));
    expect(names).toEqual([
      'auto_relist_history',
      'auto_relist_rules',
      'backfill_runs',
      'failed_imports',
      'items',
      'marketplace_credentials',
      'notifications',
      'raw_events',
      'sales',
      'subscriptions',
      'watermarks',
    ]);
  });

  it('binds booleans and undefined', () => {
    db.run(
      'INSERT INTO items (id, user_id, title, active, location_code, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?)',
      ['itm_1', 'u1', 'Lamp', false, undefined, 1, 1],
    );
    const row = db.get('SELECT active, location_code FROM items WHERE id = ?', ['itm_1']);
    expect(row?.active).toBe(0);
    expect(row?.location_code).toBeNull();
  });

  it('returns modified row counts from run', () => {
    db.run('INSERT INTO watermarks (user_id, stream, cursor_at, updated_at) VALUES (?, ?, ?, ?)', ['u1', 'a', 1, 1]);
    db.run('INSERT INTO watermarks (user_id, stream, cursor_at, updated_at) VALUES (?, ?, ?, ?)', ['u1', 'b', 1, 1]);
    expect(db.run('UPDATE watermarks SET cursor_at = 5 WHERE user_id = ?', ['u1'])).toBe(2);
    expect(db.run('UPDATE watermarks SET cursor_at = 5 WHERE user_id = ?', ['nobody'])).toBe(0);
  });

  it('rolls back a failed transaction', () => {
    expect(() =>
      db.transaction(() => {
        db.run('INSERT INTO watermarks (user_id, stream, cursor_at, updated_at) VALUES (?, ?, ?, ?)', ['u1', 'a', 1, 1]);
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(db.query('SELECT * FROM watermarks')).toHaveLength(0);
  });

  it('joins nested transactions into the outer one', () => {
    const result = db.transaction(() => {
      db.run('INSERT INTO watermarks (user_id, stream, cursor_at, updated_at) VALUES (?, ?, ?, ?)', ['u1', 'a', 1, 1]);
      return db.transaction(() => {
        db.run('INSERT INTO watermarks (user_id, stream, cursor_at, updated_at) VALUES (?, ?, ?, ?)', ['u1', 'b', 1, 1]);
        return 'done';
      });
    });
    expect(result).toBe('done');
    expect(db.query('SELECT * FROM watermarks')).toHaveLength(2);
  });

  it('allows only one active item per listing id', () => {
    const insert = (id: string, active: number) =>
      db.run(
        'INSERT INTO items (id, user_id, external_listing_id, title, active, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?)',
        [id, 'u1', 'L-1', 'Lamp', active, 1, 1],
      );
    insert('itm_1', 0);
    insert('itm_2', 1);
    expect(() => insert('itm_3', 1)).toThrow();
  });
});

describe('row readers', () => {
  const row = { a: 'text', b: 4, c: null, d: '7.5', s: 'processed' };

  it('reads typed values', () => {
    expect(str(row, 'a')).toBe('text');
    expect(str(row, 'b')).toBe('4');
    expect(optStr(row, 'c')).toBeNull();
    expect(num(row, 'd')).toBe(7.5);
    expect(optNum(row, 'c')).toBeNull();
    expect(oneOf(row, 's', ['received', 'processed'] as const)).toBe('processed');
  });

  it('rejects values outside the allowed set', () => {
    expect(() => oneOf(row, 's', ['received'] as const)).toThrow('Column s has unexpected value processed');
    expect(() => num(row, 'a')).toThrow('Column a is not numeric');
  });
});
