import { logger } from "./logger";

export const DEFAULT_RETRY_AFTER_SECONDS = 3600;

const RETRY_HINT_PATTERNS = [/Retry will occur after:\s*(\d+)\s*s/, /retry after\s*(\d+)\s*second/i];

/**
 * Best-effort extraction of a retry delay from a free-text error message.
 * Falls back to one hour when no known pattern matches.
 */
export function parseRetryAfterSeconds(hint: string): number {
  for (const pattern of RETRY_HINT_PATTERNS) {
    const match = pattern.exec(hint);
    if (match) {
      return Number(match[1]);
    }
  }

  return DEFAULT_RETRY_AFTER_SECONDS;
}

export interface RateLimitSnapshot {
  retryAfterSeconds: number;
  availableAt: string;
  message: string;
}

interface ActiveLimit {
  retryAfterSeconds: number;
  availableAtMs: number;
  message: string;
}

export class RateLimitTracker {
  private active: ActiveLimit | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  isLimited(): boolean {
    if (!this.active) {
      return false;
    }

    if (this.now() >= this.active.availableAtMs) {
      logger.info("Rate limit window has passed. Remote calls are allowed again.");
      this.active = null;
      return false;
    }

    return true;
  }

  recordLimit(retryAfterSeconds: number, context: string): void {
    const availableAtMs = this.now() + retryAfterSeconds * 1000;
    this.active = {
      retryAfterSeconds,
      availableAtMs,
      message: `Rate limited during ${context}`
    };

    logger.warn(
      `Rate limited during ${context}. retryAfterSeconds=${retryAfterSeconds} availableAt=${new Date(availableAtMs).toISOString()}`
    );
  }

  clear(): void {
    this.active = null;
  }

  statusAvailableAt(): Date | null {
    return this.isLimited() && this.active ? new Date(this.active.availableAtMs) : null;
  }

  snapshot(): RateLimitSnapshot | null {
    if (!this.isLimited() || !this.active) {
      return null;
    }

    return {
      retryAfterSeconds: this.active.retryAfterSeconds,
      availableAt: new Date(this.active.availableAtMs).toISOString(),
      message: this.active.message
    };
  }

  /** Re-arms a throttle persisted by an earlier process; expired snapshots are ignored. */
  restore(snapshot: RateLimitSnapshot): void {
    const availableAtMs = Date.parse(snapshot.availableAt);
    if (!Number.isFinite(availableAtMs) || availableAtMs <= this.now()) {
      return;
    }

    this.active = {
      retryAfterSeconds: snapshot.retryAfterSeconds,
      availableAtMs,
      message: snapshot.message
    };
  }
}
