import { describe, it, expect } from 'vitest';
import { Frontier, hasCapacity, remainingBudget } from './frontier.js';

const ref = (id: string, title = `Title ${id}`) => ({ id, title });

describe('Frontier', () => {
  it('dequeues in FIFO order', () => {
    const frontier = new Frontier();
    frontier.enqueue(ref('a'), 0, 'text a');
    frontier.enqueue(ref('b'), 1, 'text b');
    frontier.enqueue(ref('c'), 1, 'text c');

    expect(frontier.dequeue()?.ref.id).toBe('a');
    expect(frontier.dequeue()?.ref.id).toBe('b');
    expect(frontier.dequeue()?.ref.id).toBe('c');
    expect(frontier.dequeue()).toBeUndefined();
  });

  it('rejects an id that is already queued without changing state', () => {
    const frontier = new Frontier();
    expect(frontier.enqueue(ref('a', 'First'), 0, 'one')).toBe(true);
    expect(frontier.enqueue(ref('a', 'Different title'), 3, 'two')).toBe(false);

    expect(frontier.pendingCount).toBe(1);
    const item = frontier.dequeue();
    expect(item).toEqual({ ref: { id: 'a', title: 'First' }, distance: 0, text: 'one' });
  });

  it('rejects an id that was already visited', () => {
    const frontier = new Frontier();
    frontier.enqueue(ref('a'), 0, 'text');
    frontier.dequeue();

    expect(frontier.enqueue(ref('a'), 1, 'again')).toBe(false);
    expect(frontier.isEmpty).toBe(true);
  });

  it('never dequeues an id twice under repeated enqueues', () => {
    const frontier = new Frontier();
    const ids = ['x', 'y', 'x', 'z', 'y', 'x'];
    const seen: string[] = [];

    for (const id of ids) {
      frontier.enqueue(ref(id), 0, id);
      if (id === 'z') {
        const item = frontier.dequeue();
        if (item) seen.push(item.ref.id);
      }
    }
    for (const id of ids) {
      frontier.enqueue(ref(id), 1, id);
    }
    let item = frontier.dequeue();
    while (item) {
      seen.push(item.ref.id);
      item = frontier.dequeue();
    }

    expect(seen).toEqual(['x', 'y', 'z']);
    expect(new Set(seen).size).toBe(seen.length);
  });

  it('moves an id from queued to visited on dequeue', () => {
    const frontier = new Frontier();
    frontier.enqueue(ref('a'), 0, 'text');

    expect(frontier.isKnown('a')).toBe(true);
    expect(frontier.isVisited('a')).toBe(false);

    frontier.dequeue();

    expect(frontier.isKnown('a')).toBe(true);
    expect(frontier.isVisited('a')).toBe(true);
    expect(frontier.visitedCount).toBe(1);
    expect(frontier.pendingCount).toBe(0);
    expect(frontier.visitedIds()).toEqual(['a']);
  });

  it('hands out frozen work items', () => {
    const frontier = new Frontier();
    const source = ref('a', 'Original');
    frontier.enqueue(source, 0, 'text');
    source.title = 'Mutated';

    const item = frontier.dequeue();
    expect(item?.ref.title).toBe('Original');
    expect(Object.isFrozen(item)).toBe(true);
  });
});

describe('budget helpers', () => {
  it('clamps the remaining budget at zero', () => {
    expect(remainingBudget(3, 5)).toBe(2);
    expect(remainingBudget(5, 5)).toBe(0);
    expect(remainingBudget(7, 5)).toBe(0);
  });

  it('reports capacity while processed is below the maximum', () => {
    const frontier = new Frontier();
    expect(hasCapacity(4, 5)).toBe(true);
    expect(frontier.hasCapacity(5, 5)).toBe(false);
    expect(frontier.remainingBudget(1, 5)).toBe(4);
  });
});
