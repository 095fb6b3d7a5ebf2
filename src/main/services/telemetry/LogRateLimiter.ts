export type Clock = () => number;

export class LogRateLimiter<K = string> {
  private readonly lastLoggedAt = new Map<K, number>();

  constructor(
    private readonly cooldownMs: number,
    private readonly now: Clock = Date.now
  ) {}

  isReady(key: K): boolean {
    const last = this.lastLoggedAt.get(key);
    return last === undefined || this.now() - last > this.cooldownMs;
  }

  mark(key: K): void {
    this.lastLoggedAt.set(key, this.now());
  }

  tryAcquire(key: K): boolean {
    if (!this.isReady(key)) {
      return false;
    }

    this.mark(key);
    return true;
  }

  lastLogged(key: K): number | null {
    return this.lastLoggedAt.get(key) ?? null;
  }
}
