/**
 * Process-wide cancellation flag. Loops check `raised` between iterations; `wait`
 * sleeps but wakes early once the signal is raised.
 */
export class StopSignal {
  private isRaised = false;
  private readonly wakers = new Set<() => void>();

  get raised(): boolean {
    return this.isRaised;
  }

  raise(): void {
    if (this.isRaised) return;
    this.isRaised = true;
    for (const wake of this.wakers) wake();
    this.wakers.clear();
  }

  wait(ms: number): Promise<void> {
    if (this.isRaised || ms <= 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wakers.delete(done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wakers.add(done);
    });
  }
}
