/**
 * Pages that could not be fetched in a run. One ledger per run, never global.
 */
export class FailureLedger {
  private readonly pages = new Set<number>();

  /**
   * Returns false when the page was already recorded.
   */
  record(page: number): boolean {
    if (this.pages.has(page)) return false;
    this.pages.add(page);
    return true;
  }

  has(page: number): boolean {
    return this.pages.has(page);
  }

  get size(): number {
    return this.pages.size;
  }

  snapshot(): number[] {
    return [...this.pages].sort((a, b) => a - b);
  }
}
