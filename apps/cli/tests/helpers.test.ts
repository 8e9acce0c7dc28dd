import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { TaskStatus, Priority } from '@tasktrack/core';
import {
  parseStatus,
  parsePriorityArg,
  parseHours,
  parseDueArg,
  isClearValue,
  resolveServerUrl,
  unwrap,
  $try,
  DEFAULT_SERVER_URL,
} from '../src/helpers.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  process.exitCode = undefined;
  vi.restoreAllMocks();
});

describe('parseStatus', () => {
  it('parses "pending"', () => {
    expect(parseStatus('pending')).toBe(TaskStatus.Pending);
  });

  it('parses "in-progress"', () => {
    expect(parseStatus('in-progress')).toBe(TaskStatus.InProgress);
  });

  it('parses "in_progress"', () => {
    expect(parseStatus('in_progress')).toBe(TaskStatus.InProgress);
  });

  it('parses "wip"', () => {
    expect(parseStatus('wip')).toBe(TaskStatus.InProgress);
  });

  it('parses "done"', () => {
    expect(parseStatus('done')).toBe(TaskStatus.Completed);
  });

  it('parses "canceled"', () => {
    expect(parseStatus('canceled')).toBe(TaskStatus.Cancelled);
  });

  it('is case-insensitive', () => {
    expect(parseStatus('DONE')).toBe(TaskStatus.Completed);
    expect(parseStatus('In-Progress')).toBe(TaskStatus.InProgress);
  });

  it('returns null for unknown status', () => {
    expect(parseStatus('invalid')).toBeNull();
  });
});

describe('parsePriorityArg', () => {
  it('parses "urgent"', () => {
    expect(parsePriorityArg('urgent')).toBe(Priority.Urgent);
  });

  it('parses "p1"', () => {
    expect(parsePriorityArg('p1')).toBe(Priority.Urgent);
  });

  it('parses "2"', () => {
    expect(parsePriorityArg('2')).toBe(Priority.High);
  });

  it('parses "medium"', () => {
    expect(parsePriorityArg('medium')).toBe(Priority.Medium);
  });

  it('parses "p4"', () => {
    expect(parsePriorityArg('p4')).toBe(Priority.Low);
  });

  it('returns null for unknown', () => {
    expect(parsePriorityArg('critical')).toBeNull();
  });
});

describe('parseHours', () => {
  it('parses decimals', () => {
    expect(parseHours('1.5')).toBe(1.5);
  });

  it('returns null for text', () => {
    expect(parseHours('abc')).toBeNull();
  });

  it('returns null for an empty string', () => {
    expect(parseHours('  ')).toBeNull();
  });
});

describe('parseDueArg', () => {
  it('adds hour offsets to now', () => {
    expect(parseDueArg('4h', NOW)).toBe('2026-03-01T16:00:00.000Z');
  });

  it('adds day and week offsets to now', () => {
    expect(parseDueArg('2d', NOW)).toBe('2026-03-03T12:00:00.000Z');
    expect(parseDueArg('1w', NOW)).toBe('2026-03-08T12:00:00.000Z');
  });

  it('normalizes timestamps with an offset to UTC', () => {
    expect(parseDueArg('2026-03-05T10:00:00+02:00', NOW)).toBe('2026-03-05T08:00:00.000Z');
  });

  it('returns null for garbage', () => {
    expect(parseDueArg('soon', NOW)).toBeNull();
  });
});

describe('isClearValue', () => {
  it('matches "none" in any case', () => {
    expect(isClearValue('None')).toBe(true);
    expect(isClearValue('nothing')).toBe(false);
  });
});

describe('resolveServerUrl', () => {
  it('prefers the explicit url', () => {
    expect(resolveServerUrl('http://a:1', { TASKTRACK_URL: 'http://b:2' })).toBe('http://a:1');
  });

  it('falls back to TASKTRACK_URL', () => {
    expect(resolveServerUrl(undefined, { TASKTRACK_URL: 'http://b:2' })).toBe('http://b:2');
  });

  it('falls back to the local default', () => {
    expect(resolveServerUrl(undefined, {})).toBe(DEFAULT_SERVER_URL);
  });
});

describe('unwrap', () => {
  it('returns data on success', () => {
    expect(unwrap({ type: 'success', data: 42 })).toBe(42);
    expect(process.exitCode).toBeUndefined();
  });

  it('prints the error and fails the process', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(unwrap({ type: 'http-error', status: 404, message: 'Task not found' })).toBeNull();
    expect(consoleSpy).toHaveBeenCalledWith('Task not found (404)');
    expect(process.exitCode).toBe(1);
  });
});

describe('$try', () => {
  it('calls the wrapped function', async () => {
    const fn = vi.fn();
    await $try(fn);
    expect(fn).toHaveBeenCalledOnce();
  });

  it('catches errors and logs them', async () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    await $try(async () => {
      throw new Error('test error');
    });
    expect(consoleSpy).toHaveBeenCalledWith('test error');
    expect(process.exitCode).toBe(1);
  });
});
