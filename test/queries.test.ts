import { beforeEach, describe, expect, it } from 'vitest';
import { TrackerEngine } from '../src/tracker/engine.js';

const NOW = new Date('2025-01-10T12:00:00.000Z');
const day = (d: number) => new Date(Date.UTC(2025, 0, d));

describe('TrackerEngine queries', () => {
  let engine: TrackerEngine;

  beforeEach(() => {
    engine = new TrackerEngine({ now: () => NOW });
  });

  it('filters by user, status and priority in insertion order', () => {
    const u = engine.createUser('Ann', 'ann@x.com');
    const a = engine.createTask('A', { priority: 'high' });
    const b = engine.createTask('B');
    const c = engine.createTask('C', { priority: 'high' });
    engine.assignTaskToUser(c.id, u.id);
    engine.assignTaskToUser(a.id, u.id);
    engine.updateTask(b.id, { status: 'done' });

    expect(engine.tasksByUser(u.id)).toEqual([a, c]);
    expect(engine.tasksByUser('nobody')).toEqual([]);
    expect(engine.tasksByStatus('todo')).toEqual([a, c]);
    expect(engine.tasksByStatus('done')).toEqual([b]);
    expect(engine.tasksByStatus('in_progress')).toEqual([]);
    expect(engine.tasksByPriority('high')).toEqual([a, c]);
    expect(engine.tasksByPriority('urgent')).toEqual([]);
  });

  it('selects due dates within an inclusive range', () => {
    const early = engine.createTask('early', { dueDate: day(1) });
    const start = engine.createTask('start', { dueDate: day(5) });
    const mid = engine.createTask('mid', { dueDate: day(7) });
    const end = engine.createTask('end', { dueDate: day(9) });
    const late = engine.createTask('late', { dueDate: day(20) });
    engine.createTask('no due date');

    expect(engine.tasksByDueDateRange(day(5), day(9))).toEqual([start, mid, end]);
    expect(engine.tasksByDueDateRange(day(9))).toEqual([end, late]);
    expect(engine.tasksByDueDateRange(undefined, day(5))).toEqual([early, start]);
    expect(engine.tasksByDueDateRange()).toEqual([early, start, mid, end, late]);
  });

  it('finds overdue tasks relative to the clock on every call', () => {
    let clock = NOW;
    const timed = new TrackerEngine({ now: () => clock });
    const past = timed.createTask('past', { dueDate: day(9) });
    const finished = timed.createTask('finished', { dueDate: day(1) });
    timed.updateTask(finished.id, { status: 'done' });
    timed.createTask('exactly now', { dueDate: NOW });
    const future = timed.createTask('future', { dueDate: day(11) });
    timed.createTask('undated');

    expect(timed.overdueTasks()).toEqual([past]);

    clock = day(12);
    expect(timed.overdueTasks().map((t) => t.title)).toEqual(['past', 'exactly now', 'future']);
    expect(timed.overdueTasks()).toContain(future);
  });

  it('searches title and description case-insensitively', () => {
    const bug = engine.createTask('fix bug');
    const docs = engine.createTask('Docs', { description: 'Fix the README' });
    engine.createTask('Unrelated');

    expect(engine.searchTasks('FIX')).toEqual([bug, docs]);
    expect(engine.searchTasks('readme')).toEqual([docs]);
    expect(engine.searchTasks('missing')).toEqual([]);
    expect(engine.searchTasks('')).toHaveLength(3);
  });

  it('reports zeroed statistics for an empty engine', () => {
    expect(engine.taskStatistics()).toEqual({
      totalTasks: 0,
      todoTasks: 0,
      inProgressTasks: 0,
      doneTasks: 0,
      overdueTasks: 0,
      totalUsers: 0,
    });
  });

  it('recomputes statistics from current state', () => {
    engine.createUser('Ann', 'ann@x.com');
    engine.createUser('Bob', 'bob@x.com');
    engine.createTask('todo overdue', { dueDate: day(2) });
    const p = engine.createTask('in progress');
    const d = engine.createTask('done but late', { dueDate: day(2) });
    engine.updateTask(p.id, { status: 'in_progress' });
    engine.updateTask(d.id, { status: 'done' });

    expect(engine.taskStatistics()).toEqual({
      totalTasks: 3,
      todoTasks: 1,
      inProgressTasks: 1,
      doneTasks: 1,
      overdueTasks: 1,
      totalUsers: 2,
    });

    engine.deleteTask(d.id);
    expect(engine.taskStatistics().totalTasks).toBe(2);
    expect(engine.taskStatistics().doneTasks).toBe(0);
  });
});
