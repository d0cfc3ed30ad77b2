import { InventoryService } from '../services/inventory.service';
import { beerCandidateSchema, beerPatchSchema, removeBeerSchema } from '../validators/beer.validator';
import { validate } from '../validators/validate';
import { safeHandler } from '../utils/safe-handler';
import {
  formatBeerList,
  formatCounts,
  formatFlaggedBreakage,
} from '../utils/report-format';

/**
 * Inventory Controller
 *
 * Entry points for a menu or script caller: raw answers in, display lines out.
 */
export class InventoryController {
  constructor(private inventoryService: InventoryService) {}

  /**
   * Add a beer from raw field values
   */
  addBeer = safeHandler((input: unknown) => {
    const candidate = validate(beerCandidateSchema, input);
    const result = this.inventoryService.addItem(candidate);

    if (!result.ok) return [result.error.message];

    const lines = [result.message];
    if (result.data.flaggedAsBreakage) {
      lines.push('Breakage has been flagged while adding beer.');
    }
    return lines;
  });

  /**
   * Remove a beer by the id shown in the beer list
   */
  removeBeer = safeHandler((input: unknown) => {
    const { id } = validate(removeBeerSchema, input);
    const result = this.inventoryService.removeById(id);

    return [result.ok ? result.message : result.error.message];
  });

  /**
   * Edit the beer currently called `name`
   */
  editBeer = safeHandler((name: string, input: unknown) => {
    const patch = validate(beerPatchSchema, input);
    const result = this.inventoryService.editItem(name.trim(), patch);

    return [result.ok ? result.message : result.error.message];
  });

  flagBreakage = safeHandler(() => {
    this.inventoryService.flagBreakage();
    return ['Breakage flagging enabled. Every beer added from now on is recorded as breakage.'];
  });

  showBeers = safeHandler(() => formatBeerList(this.inventoryService.listItems()));

  showFlaggedBreakage = safeHandler(() => {
    const lines = formatFlaggedBreakage(this.inventoryService.listFlaggedBreakage());
    if (this.inventoryService.isBreakageFlagged()) {
      lines.push(`Total breakage: ${this.inventoryService.breakageTotal()} bottles.`);
    }
    return lines;
  });

  showCounts = safeHandler(() => formatCounts(this.inventoryService.countsByType()));

  showTotal = safeHandler(() => {
    const result = this.inventoryService.totalCount();
    return [result.ok ? result.message : result.error.message];
  });

  /**
   * Whether a name has ever been stocked
   */
  checkExists = safeHandler((name: string) => [
    this.inventoryService.exists(name)
      ? `'${name}' is known to the inventory.`
      : `'${name}' has never been stocked.`,
  ]);
}
