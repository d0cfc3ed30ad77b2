/** Millilitres in one US fluid ounce. */
export const ML_PER_FL_OZ = 29.5735;

/** Truncating fl oz to ml conversion (12 fl oz -> 354 ml). */
export const flOzToMl = (flOz: number): number => Math.trunc(flOz * ML_PER_FL_OZ);

/**
 * Container Size
 *
 * Volume of a single container. `size` is in ml when `isMetric` is set, fl oz otherwise.
 */
export class ContainerSize {
  constructor(
    private metric: boolean,
    private amount: number
  ) {}

  get isMetric(): boolean {
    return this.metric;
  }

  get size(): number {
    return this.amount;
  }

  get sizeInMl(): number {
    return this.metric ? this.amount : flOzToMl(this.amount);
  }

  /**
   * Display form, always in ml. Non-metric sizes keep their original fl oz value alongside.
   */
  sizeWithUnits(): string {
    if (this.metric) {
      return `${this.amount} ml`;
    }
    return `${this.sizeInMl} ml (Converted from ${this.amount} fl oz)`;
  }

  /** Switch the unit flag without converting the stored amount. */
  setIsMetric(metric: boolean): void {
    this.metric = metric;
  }

  /**
   * Replace the stored amount. With `convertToMetric`, a non-metric container is converted
   * to ml and flagged metric.
   */
  setSize(newSize: number, convertToMetric = false): void {
    this.amount = newSize;
    if (convertToMetric && !this.metric) {
      this.amount = flOzToMl(newSize);
      this.metric = true;
    }
  }

  clone(): ContainerSize {
    return new ContainerSize(this.metric, this.amount);
  }
}
