import { randomUUID } from 'node:crypto';
import {
  assignUser,
  buildTask,
  buildUser,
  TaskTitleSchema,
  unassignUser,
  updateStatus,
  UserEmailSchema,
  UserNameSchema,
  validate,
  type Priority,
  type Task,
  type TaskStatus,
  type User,
} from '../model.js';
import { silentLogger, type Logger } from '../log.js';
import {
  filterByDueDate,
  filterByPriority,
  filterByStatus,
  filterByUser,
  filterOverdue,
  search,
  statistics,
  type TaskStatistics,
} from './queries.js';

export interface TrackerOptions {
  /** Clock for timestamps and overdue checks. Default: wall clock. */
  now?: () => Date;
  idFactory?: () => string;
  /**
   * Validate name/email/title on update with the same rules as creation.
   * Default: false (updates are applied verbatim).
   */
  strictUpdates?: boolean;
  /** Drop repeated ids passed to reassignTask. Default: false. */
  dedupeReassign?: boolean;
  logger?: Logger;
}

export interface UserUpdate {
  name?: string;
  email?: string;
  role?: string;
}

export interface TaskUpdate {
  title?: string;
  description?: string;
  status?: TaskStatus;
  priority?: Priority;
  dueDate?: Date;
}

export interface TaskDraft {
  description?: string;
  priority?: Priority;
  dueDate?: Date;
}

/**
 * Owns the user and task collections. Every operation is synchronous and runs
 * to completion; callers sharing an instance across async work must serialize
 * access themselves.
 *
 * Unknown ids are reported as `false` / `undefined`, never thrown.
 */
export class TrackerEngine {
  private users = new Map<string, User>();
  private tasks = new Map<string, Task>();

  private readonly now: () => Date;
  private readonly nextId: () => string;
  private readonly strictUpdates: boolean;
  private readonly dedupeReassign: boolean;
  private readonly log: Logger;

  constructor(opts: TrackerOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.nextId = opts.idFactory ?? randomUUID;
    this.strictUpdates = !!opts.strictUpdates;
    this.dedupeReassign = !!opts.dedupeReassign;
    this.log = opts.logger ?? silentLogger;
  }

  // users

  createUser(name: string, email: string, role = 'User'): User {
    const user = buildUser({ name, email, role }, this.nextId());
    this.users.set(user.id, user);
    this.log.debug('user created', { id: user.id });
    return user;
  }

  getUser(id: string): User | undefined {
    return this.users.get(id);
  }

  listUsers(): User[] {
    return [...this.users.values()];
  }

  updateUser(id: string, patch: UserUpdate): boolean {
    const user = this.users.get(id);
    if (!user) return false;

    if (this.strictUpdates) {
      if (patch.name !== undefined) validate(UserNameSchema, patch.name);
      if (patch.email !== undefined) validate(UserEmailSchema, patch.email);
    }

    if (patch.name !== undefined) user.name = patch.name;
    if (patch.email !== undefined) user.email = patch.email;
    if (patch.role !== undefined) user.role = patch.role;

    this.log.debug('user updated', { id });
    return true;
  }

  /** Removes the user and unassigns it from every task. */
  deleteUser(id: string): boolean {
    if (!this.users.has(id)) return false;

    const now = this.now();
    let touched = 0;
    for (const task of this.tasks.values()) {
      if (unassignUser(task, id, now)) touched++;
    }

    this.users.delete(id);
    this.log.debug('user deleted', { id, unassignedFrom: touched });
    return true;
  }

  findUserByEmail(email: string): User | undefined {
    for (const user of this.users.values()) {
      if (user.email === email) return user;
    }
    return undefined;
  }

  // tasks

  createTask(title: string, draft: TaskDraft = {}): Task {
    const task = buildTask({ title, ...draft }, this.now(), this.nextId());
    this.tasks.set(task.id, task);
    this.log.debug('task created', { id: task.id });
    return task;
  }

  getTask(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  listTasks(): Task[] {
    return [...this.tasks.values()];
  }

  updateTask(id: string, patch: TaskUpdate): boolean {
    const task = this.tasks.get(id);
    if (!task) return false;

    if (this.strictUpdates && patch.title !== undefined) validate(TaskTitleSchema, patch.title);

    const now = this.now();
    if (patch.title !== undefined) task.title = patch.title;
    if (patch.description !== undefined) task.description = patch.description;
    if (patch.status !== undefined) updateStatus(task, patch.status, now);
    if (patch.priority !== undefined) task.priority = patch.priority;
    if (patch.dueDate !== undefined) task.dueDate = patch.dueDate;
    task.updatedAt = now;

    this.log.debug('task updated', { id, fields: Object.keys(patch) });
    return true;
  }

  deleteTask(id: string): boolean {
    const deleted = this.tasks.delete(id);
    if (deleted) this.log.debug('task deleted', { id });
    return deleted;
  }

  // assignment

  assignTaskToUser(taskId: string, userId: string): boolean {
    const task = this.tasks.get(taskId);
    if (!task || !this.users.has(userId)) return false;
    if (assignUser(task, userId, this.now())) this.log.debug('task assigned', { taskId, userId });
    return true;
  }

  /** Only the task has to exist; the user may already be gone. */
  unassignTaskFromUser(taskId: string, userId: string): boolean {
    const task = this.tasks.get(taskId);
    if (!task) return false;
    if (unassignUser(task, userId, this.now())) this.log.debug('task unassigned', { taskId, userId });
    return true;
  }

  /**
   * Replace the assignee list. Every id must belong to an existing user,
   * otherwise nothing changes and false is returned.
   */
  reassignTask(taskId: string, userIds: string[]): boolean {
    const task = this.tasks.get(taskId);
    if (!task) return false;
    if (!userIds.every((id) => this.users.has(id))) return false;

    task.assignees = this.dedupeReassign ? [...new Set(userIds)] : [...userIds];
    task.updatedAt = this.now();
    this.log.debug('task reassigned', { taskId, assignees: task.assignees });
    return true;
  }

  // queries

  tasksByUser(userId: string): Task[] {
    return filterByUser(this.tasks.values(), userId);
  }

  tasksByStatus(status: TaskStatus): Task[] {
    return filterByStatus(this.tasks.values(), status);
  }

  tasksByPriority(priority: Priority): Task[] {
    return filterByPriority(this.tasks.values(), priority);
  }

  tasksByDueDateRange(start?: Date, end?: Date): Task[] {
    return filterByDueDate(this.tasks.values(), start, end);
  }

  overdueTasks(): Task[] {
    return filterOverdue(this.tasks.values(), this.now());
  }

  taskStatistics(): TaskStatistics {
    return statistics(this.listTasks(), this.users.size, this.now());
  }

  searchTasks(query: string): Task[] {
    return search(this.tasks.values(), query);
  }
}
