import { Beer } from '../models/beer.model';
import { BeerSnapshot, CountsByName, TOTAL_KEY } from '../types/beer.types';
import { logger } from '../config/logger';

/**
 * Inventory Repository
 *
 * In-memory store for live beers and the per-name / total count map.
 * Count keys are only ever adjusted, never deleted.
 */
export class InventoryRepository {
  private beers: Beer[] = [];
  private counts = new Map<string, number>();
  private nextId = 1;

  /**
   * Assign the next id, append the beer and add its quantity to the counts
   */
  insert(beer: Beer): Beer {
    beer.id = this.nextId++;
    this.beers.push(beer);
    this.applyCount(beer.name, beer.quantity);

    logger.debug('Beer stored', { id: beer.id, name: beer.name });
    return beer;
  }

  findById(id: number): Beer | null {
    return this.beers.find((beer) => beer.id === id) ?? null;
  }

  findByName(name: string): Beer | null {
    return this.beers.find((beer) => beer.name === name) ?? null;
  }

  findAll(): Beer[] {
    return [...this.beers];
  }

  /**
   * Remove a beer and subtract its quantity from the counts
   */
  deleteById(id: number): Beer | null {
    const index = this.beers.findIndex((beer) => beer.id === id);
    if (index === -1) return null;

    const [removed] = this.beers.splice(index, 1);
    if (!removed) return null;

    this.applyCount(removed.name, -removed.quantity);

    logger.debug('Beer deleted', { id, name: removed.name });
    return removed;
  }

  /**
   * Add `delta` to a name's count and to the total
   */
  applyCount(name: string, delta: number): void {
    this.bump(name, delta);
    this.bump(TOTAL_KEY, delta);
  }

  hasCountKey(key: string): boolean {
    return this.counts.has(key);
  }

  getCount(key: string): number | undefined {
    return this.counts.get(key);
  }

  /**
   * Copy of the count map. Keys are sorted by code unit before the object is built, so
   * integer-like names still enumerate first in numeric order, as object keys always do.
   */
  getCounts(): CountsByName {
    const entries = [...this.counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries);
  }

  /**
   * Map a stored beer to the read-only shape handed to callers
   */
  toSnapshot(beer: Beer): BeerSnapshot {
    return {
      id: beer.id,
      style: beer.style,
      name: beer.name,
      strengthPercent: beer.strengthPercent,
      size: {
        isMetric: beer.size.isMetric,
        size: beer.size.size,
        sizeInMl: beer.size.sizeInMl,
        label: beer.size.sizeWithUnits(),
      },
      quantity: beer.quantity,
      barcode: beer.barcode.value,
      lastUpdated: new Date(beer.lastUpdated.getTime()),
    };
  }

  private bump(key: string, delta: number): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + delta);
  }
}
