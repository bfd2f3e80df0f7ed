import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { TaskRegistry } from './task-registry';

describe('TaskRegistry', () => {
  let clock: number;
  let registry: TaskRegistry;

  beforeEach(() => {
    clock = 1_000;
    registry = new TaskRegistry({ now: () => clock });
  });

  test('creates a pending task', () => {
    const state = registry.create({ id: 't1', name: 'report', mode: 'text' });

    expect(state).toEqual({
      id: 't1',
      name: 'report',
      mode: 'text',
      total: 0,
      done: 0,
      embedded: 0,
      pages: 0,
      status: 'pending',
      errors: [],
      emptyResults: 0,
      control: { paused: false, stop: false },
      usageTotals: { prompt: 0, completion: 0, total: 0 },
      createdAt: 1_000,
      updatedAt: 1_000,
      pausedMs: 0,
    });
    expect(registry.get('t1')).toBe(state);
  });

  test('generates ids', () => {
    const a = registry.create({ name: 'a', mode: 'text' });
    const b = registry.create({ name: 'b', mode: 'table' });

    expect(a.id).toMatch(/^task_/);
    expect(a.id).not.toBe(b.id);
  });

  test('rejects duplicate ids', () => {
    registry.create({ id: 't1', name: 'a', mode: 'text' });

    expect(() => registry.create({ id: 't1', name: 'b', mode: 'text' })).toThrow(
      '[TaskRegistry] Task t1 already exists',
    );
  });

  test('snapshots are detached copies', () => {
    registry.create({ id: 't1', name: 'a', mode: 'text' });

    const snapshot = registry.snapshot('t1');
    snapshot?.errors.push({ item: null, reason: 'x' });

    expect(registry.get('t1')?.errors).toEqual([]);
    expect(registry.snapshot('missing')).toBeUndefined();
  });

  test('updates live records', () => {
    registry.create({ id: 't1', name: 'a', mode: 'text' });

    expect(
      registry.update('t1', (state) => {
        state.done = 3;
      }),
    ).toBe(true);
    expect(registry.get('t1')?.done).toBe(3);
    expect(registry.update('missing', () => {})).toBe(false);
  });

  test('lists and deletes', () => {
    registry.create({ id: 't1', name: 'a', mode: 'text' });
    registry.create({ id: 't2', name: 'b', mode: 'text' });

    expect(registry.list().map((s) => s.id)).toEqual(['t1', 't2']);
    expect(registry.delete('t1')).toBe(true);
    expect(registry.delete('t1')).toBe(false);
    expect(registry.size).toBe(1);
  });

  describe('eviction', () => {
    function finish(id: string, finishedAt: number): void {
      registry.update(id, (state) => {
        state.status = 'completed';
        state.finishedAt = finishedAt;
      });
    }

    test('evicts terminal tasks past retention only', () => {
      registry.create({ id: 'old', name: 'a', mode: 'text' });
      registry.create({ id: 'recent', name: 'b', mode: 'text' });
      registry.create({ id: 'running', name: 'c', mode: 'text' });
      finish('old', 1_000);
      finish('recent', 9_000);
      registry.update('running', (state) => {
        state.status = 'in_progress';
      });

      expect(registry.evictExpired(5_000, 10_000)).toEqual(['old']);
      expect(registry.list().map((s) => s.id)).toEqual(['recent', 'running']);
    });

    test('notifies removal listeners on eviction and delete', () => {
      const removed: string[] = [];
      const off = registry.onRemoved((id) => removed.push(id));
      registry.create({ id: 'old', name: 'a', mode: 'text' });
      registry.create({ id: 'other', name: 'b', mode: 'text' });
      finish('old', 1_000);

      registry.evictExpired(5_000, 10_000);
      registry.delete('other');
      registry.delete('other');
      off();
      registry.create({ id: 'late', name: 'c', mode: 'text' });
      registry.delete('late');

      expect(removed).toEqual(['old', 'other']);
    });

    test('keeps a task exactly at the retention boundary', () => {
      registry.create({ id: 't1', name: 'a', mode: 'text' });
      finish('t1', 5_000);

      expect(registry.evictExpired(5_000, 10_000)).toEqual([]);
    });

    describe('periodic sweep', () => {
      beforeEach(() => {
        vi.useFakeTimers();
      });

      afterEach(() => {
        registry.stopEviction();
        vi.useRealTimers();
      });

      test('sweeps on every interval until stopped', () => {
        registry.create({ id: 't1', name: 'a', mode: 'text' });
        registry.create({ id: 't2', name: 'b', mode: 'text' });
        finish('t1', 1_000);

        registry.startEviction(60_000, 10_000);
        clock = 20_000;
        vi.advanceTimersByTime(60_000);
        expect(registry.get('t1')).toBeUndefined();

        finish('t2', 1_000);
        registry.stopEviction();
        vi.advanceTimersByTime(120_000);
        expect(registry.get('t2')).toBeDefined();
      });
    });
  });
});
