/**
 * Per-user check throttle, independent of the upstream rate limiter.
 * A user is let through at most once per `cooldownMs`.
 */
export class UserCooldownGate {
  private readonly lastChecked = new Map<string, number>();

  constructor(
    private readonly cooldownMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** True (and starts a new cooldown) when the user may be checked now. */
  admit(userId: string): boolean {
    const now = this.now();
    const last = this.lastChecked.get(userId);
    if (last !== undefined && now - last < this.cooldownMs) return false;
    this.lastChecked.set(userId, now);
    return true;
  }

  /** Forget users whose cooldown has lapsed. */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [userId, at] of this.lastChecked) {
      if (now - at >= this.cooldownMs) {
        this.lastChecked.delete(userId);
        removed++;
      }
    }
    return removed;
  }
}
