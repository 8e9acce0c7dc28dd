import { describe, it, expect } from 'vitest';
import {
  parseNewTask,
  parseTaskPatch,
  parseTaskFilters,
  parseDeleteAllQuery,
  type ParseResult,
} from '../../src/validation/task-input.js';
import { toTaskRecord, TaskRecordSchema } from '../../src/wire/task-record.js';
import type { Task } from '../../src/types/task.js';
import { createDb } from '../../src/db.js';
import { addTask, updateTask } from '../../src/queries/task-queries.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function fields<T>(result: ParseResult<T>): string[] {
  return result.type === 'validation-error' ? result.issues.map(i => i.field) : [];
}

describe('parseNewTask', () => {
  it('maps the wire payload to a new task', () => {
    const result = parseNewTask({
      title: 'Ship it',
      description: 'Tag the release',
      priority: 'high',
      estimated_hours: 1.5,
      due_date: '2030-01-01T10:00:00+02:00',
    });
    expect(result).toEqual({
      type: 'success',
      data: {
        title: 'Ship it',
        description: 'Tag the release',
        priority: 'high',
        estimatedHours: 1.5,
        dueDate: '2030-01-01T08:00:00.000Z',
      },
    });
  });

  it('fills absent optional fields with null', () => {
    const result = parseNewTask({ title: 'Ship it' });
    expect(result.type === 'success' && result.data).toEqual({
      title: 'Ship it',
      description: null,
      priority: undefined,
      estimatedHours: null,
      dueDate: null,
    });
  });

  it('ignores unknown fields such as status', () => {
    const result = parseNewTask({ title: 'Ship it', status: 'completed' });
    expect(result.type).toBe('success');
    expect(result.type === 'success' && 'status' in result.data).toBe(false);
  });

  it('rejects an empty or overlong title', () => {
    expect(fields(parseNewTask({ title: '' }))).toEqual(['title']);
    expect(fields(parseNewTask({ title: 'x'.repeat(101) }))).toEqual(['title']);
    expect(parseNewTask({ title: 'x'.repeat(100) }).type).toBe('success');
  });

  it('rejects a missing title', () => {
    expect(fields(parseNewTask({}))).toEqual(['title']);
  });

  it('rejects an overlong description', () => {
    expect(fields(parseNewTask({ title: 't', description: 'd'.repeat(501) }))).toEqual(['description']);
  });

  it('rejects an unknown priority', () => {
    expect(fields(parseNewTask({ title: 't', priority: 'critical' }))).toEqual(['priority']);
  });

  it('bounds estimated hours to 0.1..100', () => {
    expect(fields(parseNewTask({ title: 't', estimated_hours: 0.05 }))).toEqual(['estimated_hours']);
    expect(fields(parseNewTask({ title: 't', estimated_hours: 100.5 }))).toEqual(['estimated_hours']);
    expect(parseNewTask({ title: 't', estimated_hours: 0.1 }).type).toBe('success');
    expect(parseNewTask({ title: 't', estimated_hours: 100 }).type).toBe('success');
  });

  it('rejects a due date that is not an ISO timestamp', () => {
    const result = parseNewTask({ title: 't', due_date: 'tomorrow' });
    expect(result.type === 'validation-error' && result.issues).toEqual([
      { field: 'due_date', message: 'Invalid ISO-8601 timestamp' },
    ]);
  });

  it('reads a timestamp without offset as local time', () => {
    const result = parseNewTask({ title: 't', due_date: '2030-01-01T10:00:00' });
    expect(result.type === 'success' && result.data.dueDate).toBe(new Date(2030, 0, 1, 10, 0, 0).toISOString());
  });

  it('counts title length in code points', () => {
    expect(parseNewTask({ title: '\u{1F525}'.repeat(60) }).type).toBe('success');
    expect(parseNewTask({ title: '\u{1F525}'.repeat(100) }).type).toBe('success');
    expect(fields(parseNewTask({ title: '\u{1F525}'.repeat(101) }))).toEqual(['title']);
  });

  it('counts description length in code points', () => {
    expect(parseNewTask({ title: 't', description: '\u{1F4DD}'.repeat(500) }).type).toBe('success');
    expect(fields(parseNewTask({ title: 't', description: '\u{1F4DD}'.repeat(501) }))).toEqual(['description']);
  });

  it('reports a non-object body against the body itself', () => {
    expect(fields(parseNewTask(null))).toEqual(['body']);
  });

  it('joins issues into the failure message', () => {
    const result = parseNewTask({ title: 't', due_date: 'tomorrow' });
    expect(result.type === 'validation-error' && result.message).toBe('due_date: Invalid ISO-8601 timestamp');
  });
});

describe('parseTaskPatch', () => {
  it('reads a timestamp without offset as local time', () => {
    const result = parseTaskPatch({ due_date: '2030-01-01T10:00:00' });
    expect(result.type === 'success' && result.data.dueDate).toBe(new Date(2030, 0, 1, 10, 0, 0).toISOString());
  });

  it('counts title length in code points', () => {
    expect(parseTaskPatch({ title: '\u{1F525}'.repeat(100) }).type).toBe('success');
    expect(fields(parseTaskPatch({ title: '\u{1F525}'.repeat(101) }))).toEqual(['title']);
  });

  it('leaves absent fields undefined', () => {
    const result = parseTaskPatch({});
    expect(result.type).toBe('success');
    if (result.type !== 'success') return;
    expect(Object.values(result.data).every(v => v === undefined)).toBe(true);
  });

  it('keeps explicit nulls for clearable fields', () => {
    const result = parseTaskPatch({ description: null, estimated_hours: null, actual_hours: null, due_date: null });
    expect(result.type === 'success' && result.data).toMatchObject({
      description: null,
      estimatedHours: null,
      actualHours: null,
      dueDate: null,
    });
  });

  it('refuses null for title, priority and status', () => {
    expect(fields(parseTaskPatch({ title: null }))).toEqual(['title']);
    expect(fields(parseTaskPatch({ priority: null }))).toEqual(['priority']);
    expect(fields(parseTaskPatch({ status: null }))).toEqual(['status']);
  });

  it('rejects an unknown status', () => {
    expect(fields(parseTaskPatch({ status: 'done' }))).toEqual(['status']);
  });

  it('bounds actual hours to 0..200', () => {
    expect(parseTaskPatch({ actual_hours: 0 }).type).toBe('success');
    expect(parseTaskPatch({ actual_hours: 200 }).type).toBe('success');
    expect(fields(parseTaskPatch({ actual_hours: -1 }))).toEqual(['actual_hours']);
    expect(fields(parseTaskPatch({ actual_hours: 250 }))).toEqual(['actual_hours']);
  });

  it('maps snake_case names to the patch', () => {
    const result = parseTaskPatch({ status: 'in_progress', actual_hours: 3 });
    expect(result.type === 'success' && result.data).toMatchObject({ status: 'in_progress', actualHours: 3 });
  });
});

describe('parseTaskFilters', () => {
  it('applies defaults', () => {
    expect(parseTaskFilters({})).toEqual({
      type: 'success',
      data: { status: undefined, priority: undefined, overdueOnly: false, limit: 100 },
    });
  });

  it('parses every filter', () => {
    const result = parseTaskFilters({ status: 'pending', priority: 'urgent', overdue_only: 'true', limit: '5' });
    expect(result).toEqual({
      type: 'success',
      data: { status: 'pending', priority: 'urgent', overdueOnly: true, limit: 5 },
    });
  });

  it('accepts 1 and 1000 as limits', () => {
    expect(parseTaskFilters({ limit: '1' }).type).toBe('success');
    expect(parseTaskFilters({ limit: '1000' }).type).toBe('success');
  });

  it('rejects limits outside 1..1000 and non-numbers', () => {
    expect(fields(parseTaskFilters({ limit: '0' }))).toEqual(['limit']);
    expect(fields(parseTaskFilters({ limit: '1001' }))).toEqual(['limit']);
    expect(fields(parseTaskFilters({ limit: 'abc' }))).toEqual(['limit']);
    expect(fields(parseTaskFilters({ limit: '2.5' }))).toEqual(['limit']);
  });

  it('reads overdue flags in any case', () => {
    for (const value of ['True', 'TRUE', 't', 'Y', 'yes', 'On', '1']) {
      expect(parseTaskFilters({ overdue_only: value })).toMatchObject({ type: 'success', data: { overdueOnly: true } });
    }
    for (const value of ['False', 'f', 'N', 'no', 'OFF', '0']) {
      expect(parseTaskFilters({ overdue_only: value })).toMatchObject({ type: 'success', data: { overdueOnly: false } });
    }
  });

  it('rejects an unknown overdue flag value', () => {
    expect(fields(parseTaskFilters({ overdue_only: 'maybe' }))).toEqual(['overdue_only']);
  });
});

describe('parseDeleteAllQuery', () => {
  it('defaults force to false', () => {
    expect(parseDeleteAllQuery({})).toEqual({ type: 'success', data: false });
  });

  it('reads force flags', () => {
    expect(parseDeleteAllQuery({ force: 'true' })).toEqual({ type: 'success', data: true });
    expect(parseDeleteAllQuery({ force: '0' })).toEqual({ type: 'success', data: false });
    expect(parseDeleteAllQuery({ force: 'True' })).toEqual({ type: 'success', data: true });
    expect(parseDeleteAllQuery({ force: 'y' })).toEqual({ type: 'success', data: true });
    expect(parseDeleteAllQuery({ force: 'F' })).toEqual({ type: 'success', data: false });
  });

  it('rejects an unknown flag value', () => {
    expect(fields(parseDeleteAllQuery({ force: 'maybe' }))).toEqual(['force']);
  });
});

describe('toTaskRecord', () => {
  const task: Task = {
    id: 'task-1',
    title: 'Wire me',
    description: null,
    priority: 'urgent',
    status: 'in_progress',
    estimatedHours: 2,
    actualHours: null,
    dueDate: '2026-03-02T12:00:00.000Z',
    createdAt: '2026-03-01T12:00:00.000Z',
    updatedAt: '2026-03-01T12:30:00.000Z',
    isOverdue: false,
    sortOrder: 4,
  };

  it('renders snake_case fields and drops the sort order', () => {
    expect(toTaskRecord(task)).toEqual({
      id: 'task-1',
      title: 'Wire me',
      description: null,
      priority: 'urgent',
      status: 'in_progress',
      estimated_hours: 2,
      actual_hours: null,
      due_date: '2026-03-02T12:00:00.000Z',
      created_at: '2026-03-01T12:00:00.000Z',
      updated_at: '2026-03-01T12:30:00.000Z',
      is_overdue: false,
    });
  });

  it('produces records the record schema accepts', () => {
    expect(TaskRecordSchema.safeParse(toTaskRecord(task)).success).toBe(true);
  });
});

describe('local timestamps against the due-date rule', () => {
  it('rejects a local due date in the past on create', () => {
    const parsed = parseNewTask({ title: 't', due_date: '2020-01-01T10:00:00' });
    expect(parsed.type).toBe('success');
    if (parsed.type !== 'success') return;

    const result = addTask(createDb(), parsed.data, NOW);
    expect(result.type === 'validation-error' && result.issues).toEqual([
      { field: 'due_date', message: 'Due date must be in the future' },
    ]);
  });

  it('rejects a local due date in the past on update', () => {
    const db = createDb();
    const created = addTask(db, { title: 't' }, NOW);
    if (created.type !== 'success') throw new Error('addTask failed');
    const patch = parseTaskPatch({ due_date: '2020-01-01T10:00:00' });
    if (patch.type !== 'success') throw new Error('parseTaskPatch failed');

    const result = updateTask(db, created.data.id, patch.data, NOW);
    expect(result.type).toBe('validation-error');
  });

  it('accepts a local due date in the future', () => {
    const parsed = parseNewTask({ title: 't', due_date: '2030-01-01T10:00:00' });
    if (parsed.type !== 'success') throw new Error('parseNewTask failed');
    expect(addTask(createDb(), parsed.data, NOW).type).toBe('success');
  });
});
