// src/utils/single-flight.ts
import type { ReentrancyGuard } from '../contracts/concurrency';

/** At most one holder at a time; a second caller is turned away, not queued. */
export class SingleFlight implements ReentrancyGuard {
  private running = false;

  guardReentrancy(): boolean {
    if (this.running) return false;
    this.running = true;
    return true;
  }

  release(): void {
    this.running = false;
  }
}
