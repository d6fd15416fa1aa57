/**
 * Caps how many runs execute at once. Synchronous, in-memory.
 */
export class ConcurrencyGate {
  private readonly active = new Set<string>();

  constructor(private readonly limit: number) {}

  acquire(runId: string): boolean {
    if (this.active.size >= this.limit || this.active.has(runId)) {
      return false;
    }
    this.active.add(runId);
    return true;
  }

  release(runId: string): void {
    this.active.delete(runId);
  }

  activeCount(): number {
    return this.active.size;
  }
}
