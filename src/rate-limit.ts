import { getHeader } from './errors.js';
import type { ResponseHeaders } from './transport.js';

export interface RateLimitState {
  limit: number | null;
  remaining: number | null;
  resetAt: Date | null;
}

function readInt(headers: ResponseHeaders, name: string): number | null {
  const raw = getHeader(headers, name);
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isInteger(value) ? value : null;
}

/**
 * Rate-limit budget shared by every request in a run.
 *
 * GitHub reports the budget on each response; the transport feeds every
 * response's headers in here and the batch driver consults it before
 * starting another PR. Responses without rate-limit headers leave the
 * last known values untouched.
 */
export class RateLimitBudget {
  private limit: number | null = null;
  private remaining: number | null = null;
  private resetAt: Date | null = null;

  update(headers: ResponseHeaders): void {
    const limit = readInt(headers, 'x-ratelimit-limit');
    const remaining = readInt(headers, 'x-ratelimit-remaining');
    const reset = readInt(headers, 'x-ratelimit-reset');

    if (limit !== null) this.limit = limit;
    if (remaining !== null) this.remaining = remaining;
    if (reset !== null) this.resetAt = new Date(reset * 1000);
  }

  snapshot(): RateLimitState {
    return { limit: this.limit, remaining: this.remaining, resetAt: this.resetAt };
  }

  /** True once the known remaining budget is at or below `threshold`. */
  isLow(threshold: number): boolean {
    return this.remaining !== null && this.remaining <= threshold;
  }

  msUntilReset(now: number = Date.now()): number {
    if (!this.resetAt) return 0;
    return Math.max(0, this.resetAt.getTime() - now);
  }
}
