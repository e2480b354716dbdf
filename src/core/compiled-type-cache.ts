import type { Fact } from '../types/fact.js';

/** A compiled fact class, ready to instantiate. */
export interface CompiledFactType {
  readonly typeName: string;
  /** Fingerprint of the schema revision the class was generated from. */
  readonly fingerprint: string;
  /** Generated source the class was compiled from. */
  readonly source: string;
  /** Creates an instance with every field at its default. */
  construct(): Fact;
}

export interface CompiledTypeCacheConfig {
  /** Upper bound on cached classes; least recently used is evicted first. */
  maxEntries?: number;
}

export interface CompiledTypeCacheStats {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
}

const DEFAULT_MAX_ENTRIES = 256;

/**
 * Compiled fact classes keyed by schema name. An entry only answers lookups
 * for the fingerprint it was compiled from; a different fingerprint is a
 * miss and the next `set` replaces it.
 */
export class CompiledTypeCache {
  private readonly entries: Map<string, CompiledFactType> = new Map();
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(config: CompiledTypeCacheConfig = {}) {
    const max = config.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${max}`);
    }
    this.maxEntries = max;
  }

  get(typeName: string, fingerprint: string): CompiledFactType | undefined {
    const entry = this.entries.get(typeName);
    if (!entry || entry.fingerprint !== fingerprint) {
      this.misses++;
      return undefined;
    }
    // Re-insert to mark as most recently used
    this.entries.delete(typeName);
    this.entries.set(typeName, entry);
    this.hits++;
    return entry;
  }

  set(entry: CompiledFactType): void {
    this.entries.delete(entry.typeName);
    this.entries.set(entry.typeName, entry);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  has(typeName: string): boolean {
    return this.entries.has(typeName);
  }

  invalidate(typeName: string): boolean {
    return this.entries.delete(typeName);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): CompiledTypeCacheStats {
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
