/**
 * Breakage Counter
 *
 * Running total of bottles recorded as broken while breakage mode is on.
 */
export class BreakageCounter {
  private total = 0;

  get totalBreakage(): number {
    return this.total;
  }

  increment(amount: number): void {
    this.total += amount;
  }
}
