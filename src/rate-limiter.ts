import type { Clock } from "./ledger.js";

export type RateLimiterOptions = {
  requestsPerHour: number;
  burst: number;
  /** Tokens in the bucket at start; a restarted process refills from here. */
  initialTokens?: number;
  now?: Clock;
};

export type RateLimiter = {
  tryAcquire: () => boolean;
  available: () => number;
  saturation: () => number;
  msUntilNextToken: () => number;
};

export const createRateLimiter = ({
  requestsPerHour,
  burst,
  initialTokens = 0,
  now = Date.now
}: RateLimiterOptions): RateLimiter => {
  if (burst <= 0 || requestsPerHour <= 0) {
    throw new RangeError("burst and requestsPerHour must be positive");
  }

  const perMs = requestsPerHour / 3_600_000;
  let tokens = Math.min(burst, initialTokens);
  let refilledAt = now();

  const refill = () => {
    const current = now();
    const elapsed = Math.max(0, current - refilledAt);
    tokens = Math.min(burst, tokens + elapsed * perMs);
    refilledAt = current;
  };

  return {
    tryAcquire: () => {
      refill();
      if (tokens < 1) {
        return false;
      }
      tokens -= 1;
      return true;
    },
    available: () => {
      refill();
      return tokens;
    },
    saturation: () => {
      refill();
      return 1 - tokens / burst;
    },
    msUntilNextToken: () => {
      refill();
      return tokens >= 1 ? 0 : Math.ceil((1 - tokens) / perMs);
    }
  };
};
