import { Barcode } from './barcode.model';
import { ContainerSize } from './container-size.model';
import { BeerCandidate } from '../types/beer.types';

/**
 * Beer
 *
 * A stocked beer record. The id stays 0 until the inventory accepts the beer.
 */
export class Beer {
  id = 0;
  style: string;
  name: string;
  strengthPercent: number;
  size: ContainerSize;
  quantity: number;
  readonly barcode: Barcode;
  lastUpdated: Date;

  constructor(candidate: BeerCandidate, now: Date = new Date()) {
    this.style = candidate.style;
    this.name = candidate.name;
    this.strengthPercent = candidate.strengthPercent;
    this.size = candidate.size.clone();
    this.quantity = candidate.quantity;
    this.barcode = new Barcode(candidate.barcode);
    this.lastUpdated = now;
  }

  touch(now: Date): void {
    this.lastUpdated = now;
  }
}
