import { isOverdue, type Priority, type Task, type TaskStatus } from '../model.js';

export interface TaskStatistics {
  totalTasks: number;
  todoTasks: number;
  inProgressTasks: number;
  doneTasks: number;
  overdueTasks: number;
  totalUsers: number;
}

export function filterByUser(tasks: Iterable<Task>, userId: string): Task[] {
  return [...tasks].filter((t) => t.assignees.includes(userId));
}

export function filterByStatus(tasks: Iterable<Task>, status: TaskStatus): Task[] {
  return [...tasks].filter((t) => t.status === status);
}

export function filterByPriority(tasks: Iterable<Task>, priority: Priority): Task[] {
  return [...tasks].filter((t) => t.priority === priority);
}

/** Inclusive on both ends; a missing bound is open. Tasks without a due date never match. */
export function filterByDueDate(tasks: Iterable<Task>, start?: Date, end?: Date): Task[] {
  return [...tasks].filter((t) => {
    if (!t.dueDate) return false;
    const due = t.dueDate.getTime();
    if (start && due < start.getTime()) return false;
    if (end && due > end.getTime()) return false;
    return true;
  });
}

export function filterOverdue(tasks: Iterable<Task>, now: Date): Task[] {
  return [...tasks].filter((t) => isOverdue(t, now));
}

export function search(tasks: Iterable<Task>, query: string): Task[] {
  const q = query.toLowerCase();
  return [...tasks].filter(
    (t) => t.title.toLowerCase().includes(q) || t.description.toLowerCase().includes(q),
  );
}

export function statistics(tasks: Task[], userCount: number, now: Date): TaskStatistics {
  return {
    totalTasks: tasks.length,
    todoTasks: filterByStatus(tasks, 'todo').length,
    inProgressTasks: filterByStatus(tasks, 'in_progress').length,
    doneTasks: filterByStatus(tasks, 'done').length,
    overdueTasks: filterOverdue(tasks, now).length,
    totalUsers: userCount,
  };
}
