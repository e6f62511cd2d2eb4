import type { CallRecord } from './types.js';

/**
 * Ledger of model invocations for one report run.
 *
 * One instance is shared by every section generator of a run (it travels in
 * the invocation context), so the closing disclosure can say which model
 * actually wrote the commentary.
 */
export class ModelTracker {
  private calls: CallRecord[] = [];

  trackCall(model: string, succeeded = true): void {
    this.calls.push({ model, succeeded });
  }

  private countSuccesses(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const call of this.calls) {
      if (!call.succeeded) continue;
      counts.set(call.model, (counts.get(call.model) ?? 0) + 1);
    }
    return counts;
  }

  /**
   * Successful calls per model.
   */
  getUsageStats(): Record<string, number> {
    return Object.fromEntries(this.countSuccesses());
  }

  /**
   * Most-used model. On a tie the model that succeeded first wins.
   */
  getPrimaryModel(): string | undefined {
    let primary: string | undefined;
    let best = 0;
    for (const [model, count] of this.countSuccesses()) {
      if (count > best) {
        primary = model;
        best = count;
      }
    }
    return primary;
  }

  getAllCalls(): CallRecord[] {
    return [...this.calls];
  }

  getTotalCalls(): number {
    return this.calls.length;
  }

  getSuccessfulCallsCount(): number {
    return this.calls.filter((call) => call.succeeded).length;
  }

  reset(): void {
    this.calls = [];
  }
}
