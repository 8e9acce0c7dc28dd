/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { TaskStatus, Priority, TaskStatusName, PriorityName, type TaskRecord } from '@tasktrack/core';

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

// --- Formatting functions ---

export function formatCheckbox(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Completed: return chalk.green('[x]');
    case TaskStatus.InProgress: return chalk.yellow('[-]');
    case TaskStatus.Cancelled: return chalk.dim('[~]');
    case TaskStatus.Pending: return chalk.gray('[ ]');
  }
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.Urgent: return chalk.red.bold('!!!');
    case Priority.High: return chalk.red('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric', timeZone: 'UTC' });
}

export function formatDueDate(task: Pick<TaskRecord, 'due_date' | 'status' | 'is_overdue'>, now: Date = new Date()): string {
  if (!task.due_date) return '';

  const due = new Date(task.due_date);
  if (task.is_overdue) {
    const lateDays = Math.floor((now.getTime() - due.getTime()) / DAY);
    return lateDays > 0 ? chalk.red(`  OVERDUE (${lateDays}d)`) : chalk.red('  OVERDUE');
  }

  const remaining = due.getTime() - now.getTime();
  if (task.status !== TaskStatus.Completed && remaining > 0 && remaining < DAY) {
    return chalk.yellow(`  Due: in ${Math.ceil(remaining / HOUR)}h`);
  }
  return chalk.dim(`  Due: ${formatMonthDay(due)}`);
}

export function formatHours(hours: number | null): string {
  return hours == null ? '-' : `${hours}h`;
}

/** One-line summary used by list, add and update */
export function formatTaskLine(task: TaskRecord, now: Date = new Date()): string {
  const id = chalk.dim(`(${task.id})`);
  return `${id} ${formatPriority(task.priority)} ${formatCheckbox(task.status)} ${chalk.bold(task.title)}${formatDueDate(task, now)}`;
}

export function formatTaskDetails(task: TaskRecord): string[] {
  const lines = [
    `${chalk.bold('ID:')}          ${task.id}`,
    `${chalk.bold('Title:')}       ${task.title}`,
    `${chalk.bold('Status:')}      ${TaskStatusName[task.status]}`,
    `${chalk.bold('Priority:')}    ${PriorityName[task.priority]}`,
    `${chalk.bold('Due:')}         ${task.due_date ?? '-'}${task.is_overdue ? chalk.red(' (overdue)') : ''}`,
    `${chalk.bold('Estimated:')}   ${formatHours(task.estimated_hours)}`,
    `${chalk.bold('Actual:')}      ${formatHours(task.actual_hours)}`,
    `${chalk.bold('Created:')}     ${task.created_at.replace('T', ' ').slice(0, 16)}`,
    `${chalk.bold('Updated:')}     ${task.updated_at.replace('T', ' ').slice(0, 16)}`,
  ];
  if (task.description) {
    lines.push(`${chalk.bold('Description:')}`, task.description);
  }
  return lines;
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
