import { describe, it, expect } from 'vitest';
import { createDb, getRawDb, inTransaction, CREATE_SCHEMA_SQL } from '../src/db.js';
import { addTask, countTasks } from '../src/queries/task-queries.js';

describe('createDb', () => {
  it('creates an in-memory database', () => {
    const raw = getRawDb(createDb());
    expect(raw.name).toBe(':memory:');
    raw.close();
  });

  it('creates the tasks table', () => {
    const raw = getRawDb(createDb());
    const tables = raw.prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    ).all();
    expect(tables).toEqual([{ name: 'tasks' }]);
  });

  it('returns independent stores', () => {
    const a = createDb();
    const b = createDb();
    addTask(a, { title: 'only in a' });
    expect(countTasks(a)).toBe(1);
    expect(countTasks(b)).toBe(0);
  });

  it('rejects statuses outside the closed set', () => {
    const raw = getRawDb(createDb());
    const insert = () => raw.prepare(
      "INSERT INTO tasks (id, title, status, created_at, updated_at) VALUES ('x', 't', 'done', '', '')",
    ).run();
    expect(insert).toThrow(/CHECK constraint failed/);
  });
});

describe('inTransaction', () => {
  it('returns the callback result', () => {
    expect(inTransaction(createDb(), () => 42)).toBe(42);
  });

  it('rolls back every write when the callback throws', () => {
    const db = createDb();
    expect(() => inTransaction(db, () => {
      addTask(db, { title: 'doomed' });
      throw new Error('boom');
    })).toThrow('boom');
    expect(countTasks(db)).toBe(0);
  });
});

describe('CREATE_SCHEMA_SQL', () => {
  it('is idempotent (can run twice without error)', () => {
    const raw = getRawDb(createDb());
    expect(() => raw.exec(CREATE_SCHEMA_SQL)).not.toThrow();
  });
});
