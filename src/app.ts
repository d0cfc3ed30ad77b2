import { InventoryController } from './controllers/inventory.controller';
import { InventoryRepository } from './repositories/inventory.repository';
import { Clock, InventoryService } from './services/inventory.service';
import { logger } from './config/logger';

export interface Inventory {
  service: InventoryService;
  controller: InventoryController;
}

/**
 * Creates and wires an empty inventory: repository, service and controller
 */
export function createInventory(clock?: Clock): Inventory {
  const service = new InventoryService(new InventoryRepository(), clock);
  const controller = new InventoryController(service);

  logger.debug('Inventory configured successfully');

  return { service, controller };
}
