/**
 * chalk-based output formatting for task listings and command results.
 */

import chalk from 'chalk';
import type { Task, TaskPage } from '@tasklane/core';

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length] ?? chalk.white;
}

const DAY_MS = 86_400_000;

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

/** Priority as a fixed-width gauge: 70+ high, 40+ medium, 1+ low */
export function formatPriority(priority: number): string {
  if (priority >= 70) return chalk.red.bold('>>>');
  if (priority >= 40) return chalk.yellow('>> ');
  if (priority > 0) return chalk.blue('>  ');
  return chalk.dim('·  ');
}

function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric', timeZone: 'UTC' });
}

export function formatDueDate(dueDate: string | null, completed: boolean, now: Date = new Date()): string {
  if (!dueDate) return '';

  const due = new Date(dueDate);
  if (Number.isNaN(due.getTime())) return chalk.dim(`  Due: ${dueDate}`);
  if (completed) return chalk.dim(`  Due: ${formatMonthDay(due)}`);

  if (due.getTime() < now.getTime()) {
    const days = Math.floor((startOfUtcDay(now) - startOfUtcDay(due)) / DAY_MS);
    return chalk.red(days > 0 ? `  OVERDUE (${days}d)` : '  OVERDUE');
  }

  const diff = Math.floor((startOfUtcDay(due) - startOfUtcDay(now)) / DAY_MS);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  return chalk.dim(`  Due: ${formatMonthDay(due)}`);
}

export function formatTags(tags: readonly string[]): string {
  if (tags.length === 0) return '';
  const formatted = tags.map(t => tagColor(t)(`#${t}`));
  return '  ' + formatted.join(' ');
}

/** One listing line: id, priority, checkbox, title, due date, tags */
export function formatTask(task: Task, now: Date = new Date()): string {
  const taskId = chalk.dim(`(${task.id})`);
  const title = task.archived ? chalk.dim.strikethrough(task.title) : chalk.bold(task.title);
  const subtask = task.parentId ? chalk.dim(`  ↑ ${task.parentId}`) : '';
  return `${taskId} ${formatPriority(task.priority)} ${formatCheckbox(task.completed)} ${title}`
    + `${formatDueDate(task.dueDate, task.completed, now)}${formatTags(task.tags)}${subtask}`;
}

export function formatPageSummary(page: TaskPage): string {
  if (page.total === 0) return 'No tasks found';
  if (page.data.length === 0) return `No tasks past offset ${page.offset} (${page.total} total)`;
  return `Showing ${page.offset + 1}-${page.offset + page.data.length} of ${page.total}`;
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
