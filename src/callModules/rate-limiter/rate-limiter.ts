// src/callModules/rate-limiter/rate-limiter.ts
import { Logger } from '@nestjs/common';
import { CampaignCancelledError } from '../../common/errors/call-errors';

export interface Permit {
  readonly id: number;
  readonly grantedAt: number;
}

export interface RateLimiterOptions {
  /** Max grants inside any window. */
  limit: number;
  /** Rolling window length, 60s unless overridden. */
  windowMs?: number;
  name?: string;
}

interface Waiter {
  resolve: (permit: Permit) => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

const ONE_MINUTE_MS = 60_000;

/**
 * Sliding-window limiter over call initiations.
 *
 * Every grant is timestamped; a new grant is only handed out while fewer than
 * `limit` grants fall inside the last `windowMs`. Waiters are served strictly
 * in arrival order. All bookkeeping happens synchronously inside `pump`, so
 * concurrent workers on the event loop never observe a half-updated window.
 */
export class RateLimiter {
  private readonly logger = new Logger(RateLimiter.name);
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly name: string;

  private readonly window: Permit[] = [];
  private readonly outstanding = new Set<number>();
  private readonly waiters: Waiter[] = [];
  private timer: NodeJS.Timeout | null = null;
  private nextId = 1;
  private disposed = false;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RangeError(`Rate limit must be a positive integer (got ${options.limit})`);
    }
    const windowMs = options.windowMs ?? ONE_MINUTE_MS;
    if (!(windowMs > 0)) throw new RangeError(`Rate window must be > 0ms (got ${windowMs})`);

    this.limit = options.limit;
    this.windowMs = windowMs;
    this.name = options.name ?? 'default';
  }

  /** Number of callers waiting for a permit. */
  get pending(): number {
    return this.waiters.length;
  }

  /** Grants currently counted against the window. */
  get inWindow(): number {
    this.prune(Date.now());
    return this.window.length;
  }

  acquire(signal?: AbortSignal): Promise<Permit> {
    if (this.disposed) return Promise.reject(this.disposedError());
    if (signal?.aborted) return Promise.reject(new CampaignCancelledError());

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const idx = this.waiters.indexOf(waiter);
          if (idx >= 0) this.waiters.splice(idx, 1);
          reject(new CampaignCancelledError());
          this.schedule(Date.now());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
      this.pump();
    });
  }

  /**
   * Hands a permit back. `used: false` means no call was placed with it, so
   * its slot is returned to the window.
   */
  release(permit: Permit, options: { used?: boolean } = {}): void {
    if (!this.outstanding.delete(permit.id)) {
      throw new Error(`Permit ${permit.id} is not outstanding on rate limiter "${this.name}"`);
    }
    if (options.used === false) {
      const idx = this.window.findIndex((p) => p.id === permit.id);
      if (idx >= 0) this.window.splice(idx, 1);
      this.pump();
    }
  }

  /** Rejects every waiter, and every later `acquire`, as a cancellation. */
  dispose(): void {
    this.disposed = true;
    this.clearTimer();
    const waiting = this.waiters.splice(0);
    for (const w of waiting) {
      this.detach(w);
      w.reject(this.disposedError());
    }
    if (waiting.length) this.logger.warn(`[dispose] rejected ${waiting.length} waiter(s) on "${this.name}"`);
  }

  private pump(): void {
    const now = Date.now();
    this.prune(now);

    while (this.waiters.length > 0 && this.window.length < this.limit) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      this.detach(waiter);

      const permit: Permit = Object.freeze({ id: this.nextId++, grantedAt: now });
      this.window.push(permit);
      this.outstanding.add(permit.id);
      waiter.resolve(permit);
    }

    this.schedule(now);
  }

  private prune(now: number): void {
    while (this.window.length > 0 && this.window[0].grantedAt + this.windowMs <= now) {
      this.window.shift();
    }
  }

  /** Wakes up when the oldest grant leaves the window, if anyone is still waiting. */
  private schedule(now: number): void {
    this.clearTimer();
    if (this.waiters.length === 0 || this.window.length === 0) return;

    const wait = Math.max(0, this.window[0].grantedAt + this.windowMs - now);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pump();
    }, wait);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private disposedError(): CampaignCancelledError {
    return new CampaignCancelledError(`Rate limiter "${this.name}" is disposed`);
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }
}
