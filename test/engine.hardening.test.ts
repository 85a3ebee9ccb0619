import { describe, expect, it } from 'vitest';
import { TrackerEngine } from '../src/tracker/engine.js';
import { createLogger } from '../src/log.js';
import { ValidationError } from '../src/errors.js';

describe('TrackerEngine hardening', () => {
  it('strict updates reject a bad email and leave the user untouched', () => {
    const engine = new TrackerEngine({ strictUpdates: true });
    const u = engine.createUser('Ann', 'ann@x.com');

    expect(() => engine.updateUser(u.id, { name: 'Annie', email: 'no-at-sign' })).toThrow('Invalid email format');
    expect(u.name).toBe('Ann');
    expect(u.email).toBe('ann@x.com');
  });

  it('strict updates reject a blank name', () => {
    const engine = new TrackerEngine({ strictUpdates: true });
    const u = engine.createUser('Ann', 'ann@x.com');
    expect(() => engine.updateUser(u.id, { name: '  ' })).toThrow(ValidationError);
  });

  it('strict updates still report unknown users as false', () => {
    const engine = new TrackerEngine({ strictUpdates: true });
    expect(engine.updateUser('ghost', { email: 'bad' })).toBe(false);
  });

  it('strict updates reject a blank title without touching updatedAt', () => {
    let clock = new Date('2025-01-10T12:00:00.000Z');
    const engine = new TrackerEngine({ strictUpdates: true, now: () => clock });
    const t = engine.createTask('Write spec');

    clock = new Date('2025-01-10T13:00:00.000Z');
    expect(() => engine.updateTask(t.id, { title: '', status: 'done' })).toThrow('Task title cannot be empty');
    expect(t.title).toBe('Write spec');
    expect(t.status).toBe('todo');
    expect(t.updatedAt.toISOString()).toBe('2025-01-10T12:00:00.000Z');
  });

  it('dedupeReassign keeps the first occurrence of each id', () => {
    const engine = new TrackerEngine({ dedupeReassign: true });
    const a = engine.createUser('Ann', 'ann@x.com');
    const b = engine.createUser('Bob', 'bob@x.com');
    const t = engine.createTask('Write spec');

    expect(engine.reassignTask(t.id, [b.id, a.id, b.id])).toBe(true);
    expect(t.assignees).toEqual([b.id, a.id]);
  });

  it('logs mutations at debug level', () => {
    const lines: string[] = [];
    const logger = createLogger('debug', {
      scope: 'engine',
      sink: (_lvl, line) => lines.push(line),
      clock: () => new Date('2025-01-01T00:00:00.000Z'),
    });
    const engine = new TrackerEngine({ logger, idFactory: () => 'u1' });

    engine.createUser('Ann', 'ann@x.com');
    engine.deleteUser('u1');

    expect(lines).toEqual([
      '2025-01-01T00:00:00.000Z DEBUG [engine] user created {"id":"u1"}',
      '2025-01-01T00:00:00.000Z DEBUG [engine] user deleted {"id":"u1","unassignedFrom":0}',
    ]);
  });
});
