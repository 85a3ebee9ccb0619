import { ValidationError } from './errors.js';
import { PRIORITIES, type Priority, type TaskStatus } from './model.js';

const STATUS_TOKENS = new Map<string, TaskStatus>([
  ['todo', 'todo'],
  ['progress', 'in_progress'],
  ['done', 'done'],
]);

export function parseStatus(token: string): TaskStatus {
  const status = STATUS_TOKENS.get(token.trim().toLowerCase());
  if (!status) throw new ValidationError('Invalid status. Use: todo, progress, done');
  return status;
}

function isPriority(s: string): s is Priority {
  return (PRIORITIES as readonly string[]).includes(s);
}

export function parsePriority(token: string): Priority {
  const p = token.trim().toLowerCase();
  if (!isPriority(p)) throw new ValidationError('Invalid priority. Use: low, medium, high, urgent');
  return p;
}

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Strict `YYYY-MM-DD`, returned as local midnight. Rolled-over dates like 2025-02-30 are rejected. */
export function parseDueDate(token: string): Date {
  const m = DATE_RE.exec(token.trim());
  if (m) {
    const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
    const d = new Date(year, month - 1, day);
    if (d.getFullYear() === year && d.getMonth() === month - 1 && d.getDate() === day) return d;
  }
  throw new ValidationError('Invalid date format. Use: YYYY-MM-DD');
}

/** Empty segments are kept so that they fail the user lookup instead of clearing the list. */
export function parseIdList(token: string): string[] {
  return token.split(',').map((s) => s.trim());
}

/** Local calendar date, the inverse of parseDueDate. */
export function formatDate(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}
