export interface Clock {
  now(): number;
}

export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`deadline of ${timeoutMs}ms exceeded`);
    this.name = "DeadlineExceededError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A wall-clock bound handed to a unit of work. The work checks it
 * cooperatively through `throwIfExpired()` or forwards `signal` to calls
 * that accept one.
 */
export class Deadline {
  readonly timeoutMs: number;
  private readonly startedAt: number;
  private readonly controller = new AbortController();

  constructor(timeoutMs: number, private readonly clock: Clock = Date) {
    this.timeoutMs = Math.max(0, timeoutMs);
    this.startedAt = clock.now();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted || this.remainingMs() <= 0;
  }

  remainingMs(): number {
    return Math.max(0, this.timeoutMs - (this.clock.now() - this.startedAt));
  }

  throwIfExpired(): void {
    if (this.expired) {
      throw new DeadlineExceededError(this.timeoutMs);
    }
  }

  expire(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new DeadlineExceededError(this.timeoutMs));
    }
  }
}

export async function runWithDeadline<T>(
  work: (deadline: Deadline) => Promise<T>,
  timeoutMs: number,
  clock: Clock = Date,
): Promise<T> {
  const deadline = new Deadline(timeoutMs, clock);
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      deadline.expire();
      reject(new DeadlineExceededError(deadline.timeoutMs));
    }, deadline.timeoutMs);
  });

  try {
    return await Promise.race([work(deadline), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/** Cumulative budget the driving loop consults before starting each unit. */
export class RunBudget {
  readonly totalMs: number;
  private readonly startedAt: number;

  constructor(totalMs: number, private readonly clock: Clock = Date) {
    this.totalMs = Math.max(0, totalMs);
    this.startedAt = clock.now();
  }

  elapsedMs(): number {
    return this.clock.now() - this.startedAt;
  }

  get exhausted(): boolean {
    return this.elapsedMs() > this.totalMs;
  }
}
