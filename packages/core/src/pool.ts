// ============================================================================
// @jsonjet/core — Object Pool
// ============================================================================
//
// Synchronous free-list pool. An acquired object is owned by exactly one
// caller until it is released; encode calls never suspend, so acquire and
// release always happen within one synchronous run.
// ============================================================================

import { isDebugEnabled, logPoolDiscard } from './logger.js';

/**
 * Configuration options for the object pool.
 */
export interface ObjectPoolOptions<T> {
  /** Name used in log events */
  name: string;
  /** Factory function to create new objects */
  factory: () => T;
  /** Reset an object before it goes back on the free list */
  reset?: (obj: T) => void;
  /**
   * Decide whether a released object may be kept. Returning false drops it
   * (it is left to the garbage collector).
   */
  validate?: (obj: T) => boolean;
  /** Size reported in the discard log event */
  sizeOf?: (obj: T) => number;
  /** Limit reported in the discard log event */
  sizeLimit?: number;
  /** Maximum number of idle objects kept (default: 32) */
  maxIdle?: number;
}

/**
 * Object pool counters.
 */
export interface ObjectPoolStats {
  /** Objects created by the factory */
  created: number;
  /** Acquisitions served from the free list */
  reused: number;
  /** Released objects dropped by `validate` or because the pool was full */
  discarded: number;
  /** Objects currently on the free list */
  idle: number;
}

/**
 * Generic pool for reusing objects between calls.
 *
 * @example
 * ```ts
 * const pool = new ObjectPool({ name: 'scratch', factory: () => [] as number[], reset: (a) => { a.length = 0; } });
 * const scratch = pool.acquire();
 * try {
 *   scratch.push(1, 2, 3);
 * } finally {
 *   pool.release(scratch);
 * }
 * ```
 */
export class ObjectPool<T> {
  private readonly free: T[] = [];
  private readonly options: ObjectPoolOptions<T>;
  private readonly maxIdle: number;
  private created = 0;
  private reused = 0;
  private discarded = 0;

  constructor(options: ObjectPoolOptions<T>) {
    this.options = options;
    this.maxIdle = options.maxIdle ?? 32;
    if (this.maxIdle < 0) {
      throw new RangeError('maxIdle must be >= 0');
    }
  }

  /** Take an object off the free list, or create one. */
  acquire(): T {
    const obj = this.free.pop();
    if (obj !== undefined) {
      this.reused++;
      return obj;
    }
    this.created++;
    return this.options.factory();
  }

  /** Hand an object back. It must not be used by the caller afterwards. */
  release(obj: T): void {
    const { validate, reset, sizeOf, sizeLimit, name } = this.options;
    if (validate && !validate(obj)) {
      this.discarded++;
      if (sizeOf && sizeLimit !== undefined && isDebugEnabled()) {
        logPoolDiscard(name, sizeOf(obj), sizeLimit);
      }
      return;
    }
    if (this.free.length >= this.maxIdle) {
      this.discarded++;
      return;
    }
    reset?.(obj);
    this.free.push(obj);
  }

  stats(): ObjectPoolStats {
    return {
      created: this.created,
      reused: this.reused,
      discarded: this.discarded,
      idle: this.free.length,
    };
  }

  /** Drop every idle object and zero the counters. */
  clear(): void {
    this.free.length = 0;
    this.created = 0;
    this.reused = 0;
    this.discarded = 0;
  }
}
