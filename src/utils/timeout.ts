import { TimeoutError } from './errors';

/**
 * Races `promise` against a timer. The timer is always cleared, so a settled
 * race leaves nothing pending on the event loop.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), Math.max(0, timeoutMs));
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Wall-clock budget shared by every step of one coordination run. */
export class Deadline {
  private readonly expiresAt: number;

  constructor(budgetMs: number, private readonly now: () => number = Date.now) {
    this.expiresAt = now() + budgetMs;
  }

  remaining(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    return this.remaining() === 0;
  }

  /** Per-call timeout, capped by whatever is left of the run. */
  budget(callTimeoutMs: number): number {
    return Math.min(callTimeoutMs, this.remaining());
  }
}
