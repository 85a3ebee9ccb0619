import { PRIORITY_LABELS, STATUS_LABELS, type Task, type User } from './model.js';
import { formatDate } from './parse.js';
import type { TaskStatistics } from './tracker/queries.js';

type Column = { header: string; width: number };

function row(cells: string[], cols: Column[]) {
  return cells
    .map((c, i) => c.padEnd(cols[i]?.width ?? 0))
    .join(' ')
    .trimEnd();
}

function table(cols: Column[], ruleWidth: number, rows: string[][]): string[] {
  return [row(cols.map((c) => c.header), cols), '-'.repeat(ruleWidth), ...rows.map((r) => row(r, cols))];
}

const USER_COLUMNS: Column[] = [
  { header: 'ID', width: 40 },
  { header: 'Name', width: 20 },
  { header: 'Email', width: 30 },
  { header: 'Role', width: 15 },
];

const TASK_COLUMNS: Column[] = [
  { header: 'ID', width: 40 },
  { header: 'Title', width: 25 },
  { header: 'Status', width: 12 },
  { header: 'Priority', width: 10 },
  { header: 'Due Date', width: 12 },
  { header: 'Assignees', width: 15 },
];

// fixed rule lengths, not derived from the column widths
const USER_RULE = 105;
const TASK_RULE = 125;

export function userTable(users: User[]): string[] {
  if (!users.length) return ['No users found.'];
  return table(
    USER_COLUMNS,
    USER_RULE,
    users.map((u) => [u.id, u.name, u.email, u.role]),
  );
}

export function taskTable(tasks: Task[]): string[] {
  if (!tasks.length) return ['No tasks found.'];
  return table(
    TASK_COLUMNS,
    TASK_RULE,
    tasks.map((t) => [
      t.id,
      t.title,
      STATUS_LABELS[t.status],
      PRIORITY_LABELS[t.priority],
      t.dueDate ? formatDate(t.dueDate) : 'None',
      `${t.assignees.length} user(s)`,
    ]),
  );
}

export function statisticsLines(stats: TaskStatistics): string[] {
  return [
    'Task statistics',
    `- total tasks: ${stats.totalTasks}`,
    `- to do: ${stats.todoTasks}`,
    `- in progress: ${stats.inProgressTasks}`,
    `- done: ${stats.doneTasks}`,
    `- overdue: ${stats.overdueTasks}`,
    `- total users: ${stats.totalUsers}`,
  ];
}
