import { getRandomValues, randomUUID } from 'node:crypto';
import type { MatriculaRecord } from '@rgi-reader/shared';

// Base62 characters for short code generation
const BASE62_CHARS = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

export const SHORT_CODE_MIN_LENGTH = 4;
export const SHORT_CODE_MAX_LENGTH = 12;

/**
 * Generate a random short code for result links
 * @param length - Length of the code (default: 8)
 * @returns Random base62 string
 */
export const generateShortCode = (length = 8): string => {
  const bytes = getRandomValues(new Uint8Array(length));
  return Array.from(bytes)
    .map((b) => BASE62_CHARS[b % BASE62_CHARS.length])
    .join('');
};

/**
 * Same PDF, model and DPI give the same extraction
 */
export interface ExtractionCacheKey {
  checksum: string;
  model: string;
  dpi: number;
}

export interface CachedExtraction extends ExtractionCacheKey {
  id: string;
  code: string;
  filename: string | null;
  pageCount: number;
  record: MatriculaRecord;
  createdAt: Date;
}

export interface CacheEntryInput {
  filename: string | null;
  pageCount: number;
  record: MatriculaRecord;
}

export interface ResultCache {
  find(key: ExtractionCacheKey): Promise<CachedExtraction | null>;
  /** Returns null when the entry could not be stored */
  save(key: ExtractionCacheKey, entry: CacheEntryInput): Promise<CachedExtraction | null>;
  findByCode(code: string): Promise<CachedExtraction | null>;
  deleteByCode(code: string): Promise<boolean>;
}

const keyOf = ({ checksum, model, dpi }: ExtractionCacheKey): string => `${checksum}|${model}|${dpi}`;

/**
 * Default number of results the in-memory cache holds
 */
export const DEFAULT_MEMORY_CACHE_ENTRIES = 200;

/**
 * Process-local cache, used when no database is configured
 * Holds at most `maxEntries` results; the least recently used one is evicted first.
 */
export class MemoryResultCache implements ResultCache {
  // Map order is recency order: first entry is the least recently used
  private readonly byCode = new Map<string, CachedExtraction>();
  private readonly codeByKey = new Map<string, string>();

  constructor(private readonly maxEntries = DEFAULT_MEMORY_CACHE_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`Cache size must be a positive integer, got ${maxEntries}`);
    }
  }

  async find(key: ExtractionCacheKey): Promise<CachedExtraction | null> {
    const code = this.codeByKey.get(keyOf(key));
    return code ? this.touch(code) : null;
  }

  async save(key: ExtractionCacheKey, entry: CacheEntryInput): Promise<CachedExtraction> {
    const existing = await this.find(key);
    const cached: CachedExtraction = {
      ...key,
      ...entry,
      id: existing?.id ?? randomUUID(),
      code: existing?.code ?? this.uniqueCode(),
      createdAt: new Date(),
    };

    this.byCode.delete(cached.code);
    this.byCode.set(cached.code, cached);
    this.codeByKey.set(keyOf(key), cached.code);
    console.log(`[Cache] Stored result ${cached.code} for ${key.checksum.substring(0, 8)}... (${key.model}, ${key.dpi} DPI)`);

    this.evictOverflow();
    return cached;
  }

  async findByCode(code: string): Promise<CachedExtraction | null> {
    return this.touch(code);
  }

  async deleteByCode(code: string): Promise<boolean> {
    const cached = this.byCode.get(code);
    if (!cached) {
      return false;
    }

    this.remove(cached);
    return true;
  }

  get size(): number {
    return this.byCode.size;
  }

  /**
   * Look up an entry and mark it as most recently used
   */
  private touch(code: string): CachedExtraction | null {
    const cached = this.byCode.get(code);
    if (!cached) {
      return null;
    }

    this.byCode.delete(code);
    this.byCode.set(code, cached);
    return cached;
  }

  private remove(cached: CachedExtraction): void {
    this.byCode.delete(cached.code);
    this.codeByKey.delete(keyOf(cached));
  }

  private evictOverflow(): void {
    for (const oldest of this.byCode.values()) {
      if (this.byCode.size <= this.maxEntries) {
        return;
      }
      this.remove(oldest);
      console.log(`[Cache] Evicted result ${oldest.code} (limit: ${this.maxEntries} entries)`);
    }
  }

  private uniqueCode(): string {
    let code = generateShortCode();
    while (this.byCode.has(code)) {
      code = generateShortCode();
    }
    return code;
  }
}
