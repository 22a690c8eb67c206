/**
 * Append-only collection of fact records for one crawl run
 */

import type { FactRecord, WorkItem } from './types.js';

export class FactCollection {
  private readonly items: FactRecord[] = [];

  /**
   * Stamp each payload with the item's provenance and append it
   */
  append(item: WorkItem, payloads: ReadonlyArray<Record<string, string>>): FactRecord[] {
    const stamped = payloads.map(payload => ({
      sourceId: item.ref.id,
      distance: item.distance,
      title: item.ref.title,
      payload: { ...payload },
    }));
    this.items.push(...stamped);
    return stamped;
  }

  get size(): number {
    return this.items.length;
  }

  records(): FactRecord[] {
    return this.items.map(record => ({ ...record, payload: { ...record.payload } }));
  }
}
