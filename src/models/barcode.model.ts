export class Barcode {
  constructor(private current: number) {}

  get value(): number {
    return this.current;
  }

  setValue(newValue: number): void {
    this.current = newValue;
  }
}
