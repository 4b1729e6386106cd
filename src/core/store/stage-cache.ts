/**
 * StageCache - memoizes a stage's raw output by cache key.
 *
 * The cache attaches no meaning to keys; computing them is the stage's job.
 */

export interface CacheEntry {
  key: string;
  stageName: string;
  output: string;
  createdAt: Date;
}

export interface StageCache {
  lookup(key: string): Promise<CacheEntry | undefined>;
  store(key: string, stageName: string, output: string): Promise<CacheEntry>;
  /** Most recently stored entry for a stage, whatever its key. */
  latestFor(stageName: string): Promise<CacheEntry | undefined>;
}

export class InMemoryStageCache implements StageCache {
  private entries = new Map<string, CacheEntry>();
  private latest = new Map<string, string>();

  async lookup(key: string): Promise<CacheEntry | undefined> {
    const entry = this.entries.get(key);
    return entry ? { ...entry } : undefined;
  }

  async store(key: string, stageName: string, output: string): Promise<CacheEntry> {
    const entry: CacheEntry = { key, stageName, output, createdAt: new Date() };
    this.entries.set(key, entry);
    this.latest.set(stageName, key);
    return { ...entry };
  }

  async latestFor(stageName: string): Promise<CacheEntry | undefined> {
    const key = this.latest.get(stageName);
    return key ? this.lookup(key) : undefined;
  }

  get size(): number {
    return this.entries.size;
  }
}
