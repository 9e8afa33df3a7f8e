import { EventEmitter } from 'node:events';
import { Mutex } from 'async-mutex';
import { canonicalize } from '../util/urlScope.js';
import type {
  Discovery,
  DiscoveryKind,
  FindingCategory,
  FindingsSnapshot,
  FrontierEntry,
  ProgressSnapshot,
} from './types.js';

export type DiscoveryListener = (discovery: Discovery) => void;

/**
 * Why an entry was dropped at dequeue time
 */
export type SkipReason = 'visited' | 'too_deep';

export interface SkippedEntry {
  entry: FrontierEntry;
  reason: SkipReason;
}

export interface TakeResult {
  entry?: FrontierEntry;
  skipped: SkippedEntry[];
}

/**
 * True when `depth` is past the configured bound. A bound of 0 is unlimited.
 */
export function exceedsMaxDepth(depth: number, maxDepth: number): boolean {
  return maxDepth > 0 && depth > maxDepth;
}

/**
 * All mutable state of one crawl run behind one lock: frontier, visited and
 * scheduled sets, findings and progress counters.
 *
 * Every mutation runs inside `runExclusive` as a synchronous block, so the
 * lock is never held across a network call. Discovery events are emitted
 * from inside the lock and therefore arrive in first-discovery order.
 */
export class CrawlState extends EventEmitter {
  private readonly mutex = new Mutex();
  private readonly frontier: FrontierEntry[] = [];
  private readonly visited = new Set<string>();
  /** URL → shallowest depth it was scheduled at */
  private readonly scheduled = new Map<string, number>();
  private readonly htmlPages = new Set<string>();
  private readonly backendEndpoints = new Set<string>();
  private readonly functionNames = new Set<string>();
  private readonly discoveryLog: Discovery[] = [];
  private crawled = 0;
  private claimed = 0;
  private currentDepth = 0;
  private failed = 0;
  private skipped = 0;

  /**
   * @param maxDepth depth bound applied at enqueue and dequeue, 0 = unlimited
   */
  constructor(readonly seed: string, readonly maxDepth = 0) {
    super();
    this.frontier.push({ url: seed, depth: 0 });
    this.scheduled.set(seed, 0);
  }

  onDiscovery(listener: DiscoveryListener): () => void {
    this.on('discovery', listener);
    return () => {
      this.off('discovery', listener);
    };
  }

  /**
   * Dequeue the next processable entry and mark it visited. Entries already
   * visited or past the depth bound are discarded on the way. The returned
   * entry carries the shallowest depth its URL was scheduled at.
   *
   * The entry counts as queued until `startEntry` or `dropEntry` is called.
   */
  async takeNext(): Promise<TakeResult> {
    return this.mutex.runExclusive(() => {
      const skipped: SkippedEntry[] = [];
      let next = this.frontier.shift();
      while (next) {
        const depth = this.scheduled.get(next.url) ?? next.depth;
        if (this.visited.has(next.url)) {
          skipped.push({ entry: next, reason: 'visited' });
        } else if (exceedsMaxDepth(depth, this.maxDepth)) {
          skipped.push({ entry: next, reason: 'too_deep' });
        } else {
          next = { url: next.url, depth };
          break;
        }
        next = this.frontier.shift();
      }
      this.skipped += skipped.length;

      if (next) {
        this.visited.add(next.url);
        this.claimed += 1;
      }
      return { entry: next, skipped };
    });
  }

  /**
   * A taken entry begins processing
   */
  async startEntry(entry: FrontierEntry): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.claimed -= 1;
      this.crawled += 1;
      this.currentDepth = entry.depth;
    });
  }

  /**
   * A taken entry is abandoned before processing (cancellation)
   */
  async dropEntry(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.claimed -= 1;
    });
  }

  /**
   * Append `url` unless it is past the depth bound, visited, or scheduled
   * before. Check and mark happen under one lock hold, so a URL enters the
   * frontier at most once. Scheduling an already queued URL at a shallower
   * depth lowers the depth it will be processed at.
   */
  async enqueue(url: string, depth: number): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      if (exceedsMaxDepth(depth, this.maxDepth) || this.visited.has(url)) return false;

      const scheduledAt = this.scheduled.get(url);
      if (scheduledAt !== undefined) {
        if (depth < scheduledAt) this.scheduled.set(url, depth);
        return false;
      }

      this.scheduled.set(url, depth);
      this.frontier.push({ url, depth });
      return true;
    });
  }

  /**
   * Store the canonical form of `url` under `category`. A key already held
   * in either category is left alone.
   */
  async recordEndpoint(url: string, category: FindingCategory): Promise<boolean> {
    const key = canonicalize(url);
    return this.mutex.runExclusive(() => {
      if (this.htmlPages.has(key) || this.backendEndpoints.has(key)) return false;
      (category === 'html' ? this.htmlPages : this.backendEndpoints).add(key);
      this.announce(category, key);
      return true;
    });
  }

  /**
   * Merge function names, returning the ones seen for the first time
   */
  async recordFunctions(names: Iterable<string>): Promise<string[]> {
    return this.mutex.runExclusive(() => {
      const added: string[] = [];
      for (const name of names) {
        if (this.functionNames.has(name)) continue;
        this.functionNames.add(name);
        added.push(name);
        this.announce('function', name);
      }
      return added;
    });
  }

  async recordFailure(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.failed += 1;
    });
  }

  async snapshot(): Promise<ProgressSnapshot> {
    return this.mutex.runExclusive(() => ({
      crawled: this.crawled,
      queued: this.frontier.length + this.claimed,
      depth: this.currentDepth,
      htmlCount: this.htmlPages.size,
      backendCount: this.backendEndpoints.size,
      functionCount: this.functionNames.size,
      failed: this.failed,
      skipped: this.skipped,
    }));
  }

  async findings(): Promise<FindingsSnapshot> {
    return this.mutex.runExclusive(() => ({
      htmlPages: [...this.htmlPages].sort(),
      backendEndpoints: [...this.backendEndpoints].sort(),
      functions: [...this.functionNames].sort(),
    }));
  }

  async discoveries(): Promise<Discovery[]> {
    return this.mutex.runExclusive(() => this.discoveryLog.map((d) => ({ ...d })));
  }

  private announce(kind: DiscoveryKind, value: string): void {
    const discovery: Discovery = { kind, value, sequence: this.discoveryLog.length + 1 };
    this.discoveryLog.push(discovery);
    this.emit('discovery', discovery);
  }
}
