import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, closeDb, type TaskDb } from '../../src/db.js';
import { TaskService } from '../../src/services/task-service.js';
import type { DataResult } from '../../src/types/results.js';
import type { Task } from '../../src/types/task.js';

let db: TaskDb;
let service: TaskService;
let tick: number;
let idCounter: number;

const BASE = Date.UTC(2024, 0, 15, 10, 30);

/** Each call is one second after the previous one */
function clock(): Date {
  return new Date(BASE + 1000 * tick++);
}

function nextId(): string {
  idCounter += 1;
  return `00000000-0000-4000-8000-${String(idCounter).padStart(12, '0')}`;
}

function unwrap(result: DataResult<Task>): Task {
  if (result.type !== 'success') throw new Error(`expected success, got ${result.type}`);
  return result.data;
}

beforeEach(() => {
  db = createTestDb();
  tick = 0;
  idCounter = 0;
  service = new TaskService(db, { clock, generateId: nextId });
});

describe('create', () => {
  it('creates a pending task with equal timestamps', () => {
    const task = unwrap(service.create({ title: 'Buy milk', description: 'two litres' }));
    expect(task).toEqual({
      id: '00000000-0000-4000-8000-000000000001',
      title: 'Buy milk',
      description: 'two litres',
      completed: false,
      createdAt: '2024-01-15T10:30:00.000Z',
      updatedAt: '2024-01-15T10:30:00.000Z',
    });
    expect(unwrap(service.getById(task.id))).toEqual(task);
  });

  it('ignores a supplied completed flag', () => {
    const task = unwrap(service.create({ title: 'Buy milk', completed: true }));
    expect(task.completed).toBe(false);
  });

  it('stores a missing description as null', () => {
    expect(unwrap(service.create({ title: 'Buy milk' })).description).toBeNull();
  });

  it.each([0, 1, 2, 121])('rejects a title of length %i', (length) => {
    const result = service.create({ title: 'x'.repeat(length) });
    expect(result.type).toBe('invalid');
    if (result.type === 'invalid') {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.field).toBe('title');
    }
  });

  it.each([3, 120])('accepts a title of length %i', (length) => {
    expect(service.create({ title: 'x'.repeat(length) }).type).toBe('success');
  });

  it('lists every violated field', () => {
    const result = service.create({ title: 'ab', description: 'x'.repeat(2001) });
    expect(result).toEqual({
      type: 'invalid',
      errors: [
        { field: 'title', message: 'Title must be between 3 and 120 characters' },
        { field: 'description', message: 'Description must not exceed 2000 characters' },
      ],
    });
  });

  it('does not touch the store when validation fails', () => {
    service.create({ title: '' });
    expect(service.stats().total).toBe(0);
  });

  it('generates UUIDs by default', () => {
    const task = unwrap(new TaskService(db).create({ title: 'Buy milk' }));
    expect(task.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});

describe('getById', () => {
  it('returns not-found for a missing id', () => {
    expect(service.getById('missing')).toEqual({ type: 'not-found', taskId: 'missing' });
  });
});

describe('update', () => {
  it('overwrites title and description and refreshes updatedAt', () => {
    const created = unwrap(service.create({ title: 'Buy milk', description: 'old' }));
    const updated = unwrap(service.update(created.id, { title: 'Buy milk and bread', description: null }));

    expect(updated).toEqual({
      ...created,
      title: 'Buy milk and bread',
      description: null,
      updatedAt: '2024-01-15T10:30:01.000Z',
    });
    expect(unwrap(service.getById(created.id))).toEqual(updated);
  });

  it('clears the description when it is omitted', () => {
    const created = unwrap(service.create({ title: 'Buy milk', description: 'old' }));
    expect(unwrap(service.update(created.id, { title: 'Buy milk' })).description).toBeNull();
  });

  it('leaves completed unchanged when omitted', () => {
    const created = unwrap(service.create({ title: 'Buy milk' }));
    service.toggle(created.id);
    expect(unwrap(service.update(created.id, { title: 'Buy milk' })).completed).toBe(true);
  });

  it('treats a null completed as not supplied', () => {
    const created = unwrap(service.create({ title: 'Buy milk' }));
    service.toggle(created.id);
    expect(unwrap(service.update(created.id, { title: 'Buy milk', completed: null })).completed).toBe(true);
  });

  it('sets completed exactly when supplied', () => {
    const created = unwrap(service.create({ title: 'Buy milk' }));
    expect(unwrap(service.update(created.id, { title: 'Buy milk', completed: true })).completed).toBe(true);
    expect(unwrap(service.update(created.id, { title: 'Buy milk', completed: false })).completed).toBe(false);
  });

  it('returns not-found for a missing id', () => {
    expect(service.update('missing', { title: 'Buy milk' })).toEqual({ type: 'not-found', taskId: 'missing' });
  });

  it('validates before looking the task up', () => {
    const result = service.update('missing', { title: 'no' });
    expect(result.type).toBe('invalid');
  });

  it('never moves updatedAt before createdAt', () => {
    const times = [BASE + 60_000, BASE];
    const backwards = new TaskService(db, { clock: () => new Date(times.shift() ?? BASE) });
    const created = unwrap(backwards.create({ title: 'Buy milk' }));
    const updated = unwrap(backwards.update(created.id, { title: 'Buy oat milk' }));
    expect(updated.updatedAt).toBe(created.createdAt);
  });

  it('lets the later of two writes win', () => {
    const created = unwrap(service.create({ title: 'Buy milk' }));
    service.update(created.id, { title: 'First writer', completed: true });
    service.update(created.id, { title: 'Second writer' });

    const stored = unwrap(service.getById(created.id));
    expect(stored.title).toBe('Second writer');
    expect(stored.completed).toBe(true);
    expect(stored.updatedAt).toBe('2024-01-15T10:30:02.000Z');
  });
});

describe('toggle', () => {
  it('flips completed and refreshes updatedAt', () => {
    const created = unwrap(service.create({ title: 'Buy milk' }));
    const toggled = unwrap(service.toggle(created.id));
    expect(toggled.completed).toBe(true);
    expect(toggled.updatedAt).toBe('2024-01-15T10:30:01.000Z');
    expect(toggled.createdAt).toBe(created.createdAt);
  });

  it('is its own inverse', () => {
    const created = unwrap(service.create({ title: 'Buy milk' }));
    service.toggle(created.id);
    const back = unwrap(service.toggle(created.id));
    expect(back.completed).toBe(created.completed);
    expect(back.updatedAt).toBe('2024-01-15T10:30:02.000Z');
  });

  it('returns not-found for a missing id', () => {
    expect(service.toggle('missing')).toEqual({ type: 'not-found', taskId: 'missing' });
  });
});

describe('delete', () => {
  it('removes the task permanently', () => {
    const created = unwrap(service.create({ title: 'Buy milk' }));
    expect(service.delete(created.id)).toEqual({ type: 'success' });
    expect(service.getById(created.id)).toEqual({ type: 'not-found', taskId: created.id });
  });

  it('fails again on a second delete', () => {
    const created = unwrap(service.create({ title: 'Buy milk' }));
    service.delete(created.id);
    expect(service.delete(created.id)).toEqual({ type: 'not-found', taskId: created.id });
  });

  it('returns not-found for a missing id', () => {
    expect(service.delete('missing')).toEqual({ type: 'not-found', taskId: 'missing' });
  });
});

describe('list', () => {
  beforeEach(() => {
    service.create({ title: 'Buy milk' });
    service.create({ title: 'Pay rent' });
    const third = unwrap(service.create({ title: 'Clean kitchen', description: 'spilled MILK' }));
    service.toggle(third.id);
  });

  it('returns newest first with defaults', () => {
    const page = service.list();
    expect(page.content.map(t => t.title)).toEqual(['Clean kitchen', 'Pay rent', 'Buy milk']);
    expect(page).toMatchObject({ page: 0, size: 10, totalElements: 3, totalPages: 1, first: true, last: true });
  });

  it('returns only completed tasks', () => {
    const page = service.list({ completed: true });
    expect(page.content.every(t => t.completed)).toBe(true);
    expect(page.content.map(t => t.title)).toEqual(['Clean kitchen']);
  });

  it('combines completed and search', () => {
    expect(service.list({ completed: true, search: 'milk' }).content.map(t => t.title)).toEqual(['Clean kitchen']);
    expect(service.list({ completed: false, search: 'milk' }).content.map(t => t.title)).toEqual(['Buy milk']);
  });

  it('clamps the window', () => {
    expect(service.list({ size: 150 }).size).toBe(100);
    expect(service.list({ size: 0 }).size).toBe(10);
    expect(service.list({ size: -3 }).size).toBe(10);
    expect(service.list({ page: -1 }).page).toBe(0);
  });
});

describe('stats', () => {
  it('counts completed and pending tasks', () => {
    const a = unwrap(service.create({ title: 'Buy milk' }));
    service.create({ title: 'Pay rent' });
    service.toggle(a.id);
    expect(service.stats()).toEqual({ total: 2, completed: 1, pending: 1 });
  });
});

describe('store failures', () => {
  it('throws when the connection is closed', () => {
    closeDb(db);
    expect(() => service.create({ title: 'Buy milk' })).toThrow();
  });
});
