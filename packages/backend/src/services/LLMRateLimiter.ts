import { setTimeout as delay } from "node:timers/promises";
import type { LLMCallPhase, LLMRateLimitConfig } from "./llmTypes.js";

/** Chat stages share one budget; vision and embedding calls each get their own. */
export type LLMCallLane = "chat" | "vision" | "embedding";

const WINDOW_MS = 60_000;

export function laneForPhase(phase: LLMCallPhase): LLMCallLane {
  switch (phase) {
    case "vision":
      return "vision";
    case "embedding":
      return "embedding";
    case "router":
    case "triage":
    case "self_care":
    case "doctor_referral":
    case "clarification":
      return "chat";
  }
}

export class LLMTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`LLM request timeout after ${timeoutMs}ms`);
    this.name = "LLMTimeoutError";
  }
}

export interface LaneStats {
  inFlight: number;
  waiting: number;
  startedInWindow: number;
}

/**
 * Admission control for one lane: a concurrency cap plus a sliding one-minute request window.
 * A slot is held for a single attempt, so retry backoff does not block other callers.
 */
class LaneBudget {
  private inFlight = 0;
  private readonly waiting: Array<() => void> = [];
  private readonly startedAt: number[] = [];
  private reopenTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly maxConcurrent: number,
    private readonly requestsPerMinute: number
  ) {}

  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      this.waiting.push(() => resolve(this.releaser()));
      this.admit();
    });
  }

  stats(): LaneStats {
    this.forgetExpired(Date.now());
    return {
      inFlight: this.inFlight,
      waiting: this.waiting.length,
      startedInWindow: this.startedAt.length
    };
  }

  private admit(): void {
    while (this.waiting.length > 0 && this.inFlight < this.maxConcurrent) {
      const now = Date.now();
      this.forgetExpired(now);

      const oldest = this.startedAt[0];
      if (oldest !== undefined && this.startedAt.length >= this.requestsPerMinute) {
        this.reopenAfter(oldest + WINDOW_MS - now);
        return;
      }

      const grant = this.waiting.shift();
      if (grant === undefined) {
        return;
      }
      this.inFlight += 1;
      this.startedAt.push(now);
      grant();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.inFlight -= 1;
      this.admit();
    };
  }

  private forgetExpired(now: number): void {
    const firstLive = this.startedAt.findIndex((startedAt) => startedAt > now - WINDOW_MS);
    this.startedAt.splice(0, firstLive === -1 ? this.startedAt.length : firstLive);
  }

  private reopenAfter(waitMs: number): void {
    if (this.reopenTimer) {
      return;
    }
    this.reopenTimer = setTimeout(() => {
      this.reopenTimer = null;
      this.admit();
    }, Math.max(0, waitMs));
  }
}

export class LLMRateLimiter {
  private readonly config: LLMRateLimitConfig;
  private readonly lanes = new Map<LLMCallLane, LaneBudget>();

  constructor(config: Partial<LLMRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 60_000
    };
  }

  /**
   * Runs `task` within the budget of the lane `phase` belongs to. Transient failures are retried
   * with exponential backoff; each attempt is admitted and timed separately.
   */
  async run<T>(phase: LLMCallPhase, task: () => Promise<T>): Promise<T> {
    const lane = this.lane(laneForPhase(phase));

    for (let attempt = 0; ; attempt += 1) {
      const release = await lane.acquire();
      try {
        return await withDeadline(task(), this.config.timeoutMs);
      } catch (error) {
        if (attempt >= this.config.maxRetries || !isRetryableError(error)) {
          throw error;
        }
      } finally {
        release();
      }
      await delay(this.config.retryDelayMs * 2 ** attempt);
    }
  }

  stats(lane: LLMCallLane): LaneStats {
    return this.lane(lane).stats();
  }

  private lane(name: LLMCallLane): LaneBudget {
    let lane = this.lanes.get(name);
    if (!lane) {
      lane = new LaneBudget(this.config.maxConcurrent, this.config.requestsPerMinute);
      this.lanes.set(name, lane);
    }
    return lane;
  }
}

async function withDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) {
    return work;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new LLMTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Transient failures: rate limiting, upstream 5xx, dropped connections and timeouts.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof LLMTimeoutError) {
    return true;
  }
  if (typeof error !== "object" || error === null) {
    return false;
  }

  const status = "status" in error ? error.status : undefined;
  if (typeof status === "number") {
    return status === 429 || status >= 500;
  }

  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string" && ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED"].includes(code)) {
    return true;
  }

  const message = "message" in error ? error.message : undefined;
  if (typeof message === "string") {
    return /timeout|timed out|temporarily unavailable/i.test(message);
  }
  return false;
}
