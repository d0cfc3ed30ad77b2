import { InventoryRepository } from '../repositories/inventory.repository';
import { Beer } from '../models/beer.model';
import { BreakageCounter } from '../models/breakage-counter.model';
import {
  AddConfirmation,
  BeerCandidate,
  BeerPatch,
  BeerSnapshot,
  CountsByName,
  EditConfirmation,
  FlaggedBreakage,
  RemoveConfirmation,
  TOTAL_KEY,
} from '../types/beer.types';
import {
  AppError,
  beerIdNotFound,
  beerNameNotFound,
  duplicateName,
  inventoryEmpty,
  invalidQuantity,
  nameConflict,
  reservedName,
} from '../types/error.types';
import { OperationFailure, OperationResult } from '../types/result.types';
import { createErrorResult, createSuccessResult } from '../utils/response-factory';
import { logger } from '../config/logger';

export type Clock = () => Date;

/**
 * Inventory Service
 *
 * Stock operations for the bottle inventory. Rejected operations return a failure result
 * and leave every count, list and counter exactly as they were.
 *
 * Breakage mode is sticky: once flagged, every later add is also recorded as broken stock.
 */
export class InventoryService {
  private breakageFlagged = false;
  private flaggedBreakage: FlaggedBreakage[] = [];
  private breakage = new BreakageCounter();

  constructor(
    private inventoryRepo: InventoryRepository,
    private clock: Clock = () => new Date()
  ) {}

  /**
   * Add a beer to stock
   *
   * Rejects:
   * - a quantity that is not a positive integer (INVALID_QUANTITY)
   * - the reserved total key as a name (RESERVED_NAME)
   * - a name already used by a live beer (DUPLICATE_NAME)
   */
  addItem(candidate: BeerCandidate): OperationResult<AddConfirmation> {
    logger.info('Adding beer', { name: candidate.name, quantity: candidate.quantity });

    if (!Number.isInteger(candidate.quantity) || candidate.quantity <= 0) {
      return this.reject('add', invalidQuantity(candidate.quantity));
    }
    if (candidate.name === TOTAL_KEY) {
      return this.reject('add', reservedName(candidate.name));
    }
    if (this.inventoryRepo.findByName(candidate.name)) {
      return this.reject('add', duplicateName(candidate.name));
    }

    const beer = this.inventoryRepo.insert(new Beer(candidate, this.clock()));

    if (this.breakageFlagged) {
      this.flaggedBreakage.push({ name: beer.name, quantity: beer.quantity });
      this.breakage.increment(beer.quantity);
      logger.warn('Breakage has been flagged while adding beer', {
        name: beer.name,
        quantity: beer.quantity,
        totalBreakage: this.breakage.totalBreakage,
      });
    }

    logger.info('Beer added successfully', { id: beer.id, name: beer.name });
    return createSuccessResult(
      { beer: this.inventoryRepo.toSnapshot(beer), flaggedAsBreakage: this.breakageFlagged },
      `${beer.quantity} bottles of ${beer.name} added to stock.`
    );
  }

  /**
   * Remove a beer entirely by its id
   *
   * The beer's whole quantity leaves both its name count and the total.
   */
  removeById(id: number): OperationResult<RemoveConfirmation> {
    logger.info('Removing beer', { id });

    const removed = this.inventoryRepo.deleteById(id);
    if (!removed) {
      return this.reject('remove', beerIdNotFound(id));
    }

    logger.info('Beer removed successfully', { id, name: removed.name });
    return createSuccessResult(
      { id, name: removed.name, quantity: removed.quantity },
      `${removed.quantity} bottles of ${removed.name} removed from stock.`
    );
  }

  /**
   * Edit a live beer located by name
   *
   * Empty or missing strings keep their value; supplied numbers and flags overwrite.
   * Size edits replace the amount without converting, then apply the unit flag.
   * Counts follow quantity changes and renames.
   */
  editItem(name: string, patch: BeerPatch): OperationResult<EditConfirmation> {
    logger.info('Editing beer', { name, patch });

    const beer = this.inventoryRepo.findByName(name);
    if (!beer) {
      return this.reject('edit', beerNameNotFound(name));
    }

    const nextName = patch.name ? patch.name : beer.name;
    if (nextName !== beer.name) {
      if (nextName === TOTAL_KEY) {
        return this.reject('edit', reservedName(nextName));
      }
      if (this.inventoryRepo.findByName(nextName)) {
        return this.reject('edit', nameConflict(beer.name, nextName));
      }
    }
    if (
      patch.quantity !== undefined &&
      (!Number.isInteger(patch.quantity) || patch.quantity < 0)
    ) {
      return this.reject('edit', invalidQuantity(patch.quantity));
    }

    const previousName = beer.name;
    const previousQuantity = beer.quantity;
    const nextQuantity = patch.quantity ?? previousQuantity;

    if (nextName !== previousName) {
      this.inventoryRepo.applyCount(previousName, -previousQuantity);
      this.inventoryRepo.applyCount(nextName, nextQuantity);
    } else if (nextQuantity !== previousQuantity) {
      this.inventoryRepo.applyCount(previousName, nextQuantity - previousQuantity);
    }

    beer.name = nextName;
    beer.quantity = nextQuantity;
    if (patch.style) beer.style = patch.style;
    if (patch.strengthPercent !== undefined) beer.strengthPercent = patch.strengthPercent;
    if (patch.barcode !== undefined) beer.barcode.setValue(patch.barcode);

    if (patch.size !== undefined || patch.isMetric !== undefined) {
      const size = beer.size.clone();
      if (patch.size !== undefined) size.setSize(patch.size);
      if (patch.isMetric !== undefined) size.setIsMetric(patch.isMetric);
      beer.size = size;
    }

    beer.touch(this.clock());

    logger.info('Beer details updated', { id: beer.id, previousName, name: beer.name });
    return createSuccessResult(
      { beer: this.inventoryRepo.toSnapshot(beer), previousName },
      'Beer details updated.'
    );
  }

  /**
   * Switch breakage recording on. There is no way back.
   */
  flagBreakage(): void {
    if (!this.breakageFlagged) {
      logger.info('Breakage flagged');
    }
    this.breakageFlagged = true;
  }

  isBreakageFlagged(): boolean {
    return this.breakageFlagged;
  }

  breakageTotal(): number {
    return this.breakage.totalBreakage;
  }

  /**
   * Total bottles in stock; INVENTORY_EMPTY until the first successful add
   */
  totalCount(): OperationResult<number> {
    logger.debug('Reading total count');

    const total = this.inventoryRepo.getCount(TOTAL_KEY);
    if (total === undefined) {
      return this.reject('total', inventoryEmpty());
    }

    return createSuccessResult(total, `Total beer count in stock: ${total} bottles.`);
  }

  /**
   * Whether a name has ever been counted. Stays true after its last beer is removed.
   */
  exists(name: string): boolean {
    return this.inventoryRepo.hasCountKey(name);
  }

  listItems(): BeerSnapshot[] {
    logger.debug('Listing beers');
    return this.inventoryRepo.findAll().map((beer) => this.inventoryRepo.toSnapshot(beer));
  }

  listFlaggedBreakage(): FlaggedBreakage[] {
    return this.flaggedBreakage.map((entry) => ({ ...entry }));
  }

  countsByType(): CountsByName {
    return this.inventoryRepo.getCounts();
  }

  private reject(operation: string, error: AppError): OperationFailure {
    logger.warn(`Beer ${operation} rejected`, { code: error.code, ...error.details });
    return createErrorResult(error);
  }
}
