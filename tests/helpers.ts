import { ContainerSize } from '../src/models/container-size.model';
import { BeerCandidate } from '../src/types/beer.types';
import { Clock } from '../src/services/inventory.service';

export const CLOCK_START = new Date(2024, 4, 1, 10, 0, 0);

/**
 * Clock that advances one second per call, starting at CLOCK_START
 */
export function createTestClock(): Clock {
  let ticks = 0;
  return () => new Date(CLOCK_START.getTime() + 1000 * ticks++);
}

export function exampleIpa(overrides: Partial<BeerCandidate> = {}): BeerCandidate {
  return {
    style: 'IPA',
    name: 'Example IPA',
    strengthPercent: 6.5,
    size: new ContainerSize(true, 355),
    quantity: 24,
    barcode: 123456,
    ...overrides,
  };
}

export function sampleStout(overrides: Partial<BeerCandidate> = {}): BeerCandidate {
  return {
    style: 'Stout',
    name: 'Sample Stout',
    strengthPercent: 7.0,
    size: new ContainerSize(false, 12),
    quantity: 12,
    barcode: 789012,
    ...overrides,
  };
}
