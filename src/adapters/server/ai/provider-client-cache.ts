// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/provider-client-cache`
 * Purpose: Bounded least-recently-used cache of provider clients keyed by secret.
 * Scope: Generic LRU over Map insertion order. Does not create clients itself; callers pass a factory.
 * Invariants:
 *   - size() never exceeds capacity
 *   - A hit moves the entry to most-recently-used
 *   - The factory runs at most once per key while the key stays cached
 * Side-effects: none
 * Links: genai-provider.adapter
 * @internal
 */

export class ProviderClientCache<TClient> {
  private readonly entries = new Map<string, TClient>();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  getOrCreate(key: string, factory: (key: string) => TClient): TClient {
    const hit = this.entries.get(key);
    if (hit !== undefined) {
      this.entries.delete(key);
      this.entries.set(key, hit);
      return hit;
    }

    const created = factory(key);
    this.entries.set(key, created);
    if (this.entries.size > this.capacity) {
      // Oldest entry is first in insertion order
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    return created;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  size(): number {
    return this.entries.size;
  }
}
