import { createHash } from 'node:crypto';
import type { ClassificationResult } from '@ticket-triage/domain';

/** Case- and whitespace-insensitive key for a ticket's text. */
export function fingerprint(title: string, description: string): string {
  const text = `${title} ${description}`.toLowerCase().replace(/\s+/g, ' ').trim();
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Bounded LRU keyed by ticket fingerprint.
 * Map iteration order is insertion order, so the first key is the least recently used.
 */
export class ClassificationCache {
  private readonly entries = new Map<string, ClassificationResult>();

  constructor(readonly capacity: number = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get(key: string): ClassificationResult | undefined {
    const hit = this.entries.get(key);
    if (hit === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, hit);
    return hit;
  }

  set(key: string, value: ClassificationResult): void {
    this.entries.delete(key);
    this.entries.set(key, value);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
