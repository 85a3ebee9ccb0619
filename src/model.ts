import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ValidationError } from './errors.js';

export type TaskStatus = 'todo' | 'in_progress' | 'done';

export type Priority = 'low' | 'medium' | 'high' | 'urgent';

export const TASK_STATUSES: readonly TaskStatus[] = ['todo', 'in_progress', 'done'];

export const PRIORITIES: readonly Priority[] = ['low', 'medium', 'high', 'urgent'];

export const STATUS_LABELS: Record<TaskStatus, string> = {
  todo: 'To Do',
  in_progress: 'In Progress',
  done: 'Done',
};

export const PRIORITY_LABELS: Record<Priority, string> = {
  low: 'Low',
  medium: 'Medium',
  high: 'High',
  urgent: 'Urgent',
};

export interface User {
  readonly id: string;
  name: string;
  email: string;
  role: string;
}

export interface Task {
  readonly id: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: Priority;
  /** Absent means no deadline. */
  dueDate?: Date;
  /** User ids. Not kept in sync with the user collection except on delete. */
  assignees: string[];
  readonly createdAt: Date;
  updatedAt: Date;
}

export interface NewUser {
  name: string;
  email: string;
  role?: string;
}

export interface NewTask {
  title: string;
  description?: string;
  priority?: Priority;
  dueDate?: Date;
}

const notBlank = (s: string) => s.trim().length > 0;

export const UserNameSchema = z.string().refine(notBlank, 'User name cannot be empty');

export const UserEmailSchema = z
  .string()
  .refine(notBlank, 'User email cannot be empty')
  .refine((s) => s.includes('@'), 'Invalid email format');

export const TaskTitleSchema = z.string().refine(notBlank, 'Task title cannot be empty');

const UserSchema = z.object({
  name: UserNameSchema,
  email: UserEmailSchema,
  role: z.string(),
});

const TaskSchema = z.object({
  title: TaskTitleSchema,
  description: z.string(),
});

/**
 * Parse with a zod schema, turning failures into a ValidationError whose
 * message is the first failed check.
 */
export function validate<T>(schema: z.ZodType<T>, input: unknown): T {
  const res = schema.safeParse(input);
  if (res.success) return res.data;
  const issues = res.error.issues.map((i) => i.message);
  throw new ValidationError(issues[0] ?? 'Invalid input', issues);
}

export function buildUser(input: NewUser, id: string = randomUUID()): User {
  const data = validate(UserSchema, { ...input, role: input.role ?? 'User' });
  return { id, name: data.name, email: data.email, role: data.role };
}

export function buildTask(input: NewTask, now = new Date(), id: string = randomUUID()): Task {
  const data = validate(TaskSchema, { title: input.title, description: input.description ?? '' });
  return {
    id,
    title: data.title,
    description: data.description,
    status: 'todo',
    priority: input.priority ?? 'medium',
    dueDate: input.dueDate,
    assignees: [],
    createdAt: now,
    updatedAt: now,
  };
}

/** Returns true when the assignee list changed. */
export function assignUser(task: Task, userId: string, now = new Date()): boolean {
  if (task.assignees.includes(userId)) return false;
  task.assignees.push(userId);
  task.updatedAt = now;
  return true;
}

/** Returns true when the assignee list changed. */
export function unassignUser(task: Task, userId: string, now = new Date()): boolean {
  const idx = task.assignees.indexOf(userId);
  if (idx === -1) return false;
  task.assignees.splice(idx, 1);
  task.updatedAt = now;
  return true;
}

export function updateStatus(task: Task, status: TaskStatus, now = new Date()): void {
  task.status = status;
  task.updatedAt = now;
}

export function isOverdue(task: Task, now = new Date()): boolean {
  if (!task.dueDate || task.status === 'done') return false;
  return task.dueDate.getTime() < now.getTime();
}

export interface UserRecord {
  id: string;
  name: string;
  email: string;
  role: string;
}

export interface TaskRecord {
  id: string;
  title: string;
  description: string;
  status: string;
  priority: string;
  dueDate: string | null;
  assignees: string[];
  createdAt: string;
  updatedAt: string;
}

export function serializeUser(user: User): UserRecord {
  return { id: user.id, name: user.name, email: user.email, role: user.role };
}

export function serializeTask(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: STATUS_LABELS[task.status],
    priority: PRIORITY_LABELS[task.priority],
    dueDate: task.dueDate ? task.dueDate.toISOString() : null,
    assignees: [...task.assignees],
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
  };
}
