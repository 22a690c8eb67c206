/**
 * Crawl frontier: FIFO work queue plus visited/queued id sets.
 *
 * An id is added to `visited` only when it is dequeued, so
 * visited and queued ids never overlap.
 */

import type { DocumentRef, WorkItem } from './types.js';

export function remainingBudget(processedCount: number, maxTotal: number): number {
  return Math.max(0, maxTotal - processedCount);
}

export function hasCapacity(processedCount: number, maxTotal: number): boolean {
  return remainingBudget(processedCount, maxTotal) > 0;
}

export class Frontier {
  private readonly queue: WorkItem[] = [];
  private readonly queuedIds = new Set<string>();
  private readonly visited = new Set<string>();
  private readonly visitOrder: string[] = [];

  /**
   * Append to the tail unless the id is already visited or queued.
   */
  enqueue(ref: DocumentRef, distance: number, text: string): boolean {
    if (this.isKnown(ref.id)) {
      return false;
    }
    const item: WorkItem = Object.freeze({
      ref: Object.freeze({ id: ref.id, title: ref.title }),
      distance,
      text,
    });
    this.queue.push(item);
    this.queuedIds.add(ref.id);
    return true;
  }

  dequeue(): WorkItem | undefined {
    const item = this.queue.shift();
    if (!item) {
      return undefined;
    }
    this.queuedIds.delete(item.ref.id);
    this.visited.add(item.ref.id);
    this.visitOrder.push(item.ref.id);
    return item;
  }

  remainingBudget(processedCount: number, maxTotal: number): number {
    return remainingBudget(processedCount, maxTotal);
  }

  hasCapacity(processedCount: number, maxTotal: number): boolean {
    return hasCapacity(processedCount, maxTotal);
  }

  isKnown(id: string): boolean {
    return this.visited.has(id) || this.queuedIds.has(id);
  }

  isVisited(id: string): boolean {
    return this.visited.has(id);
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  get isEmpty(): boolean {
    return this.queue.length === 0;
  }

  /** Visited ids in dequeue order */
  visitedIds(): readonly string[] {
    return [...this.visitOrder];
  }
}
