export { createInventory } from './app';
export type { Inventory } from './app';
export { ContainerSize, ML_PER_FL_OZ, flOzToMl } from './models/container-size.model';
export { Barcode } from './models/barcode.model';
export { Beer } from './models/beer.model';
export { BreakageCounter } from './models/breakage-counter.model';
export { InventoryRepository } from './repositories/inventory.repository';
export { InventoryService } from './services/inventory.service';
export type { Clock } from './services/inventory.service';
export { InventoryController } from './controllers/inventory.controller';
export { AppError, ErrorCode } from './types/error.types';
export { runDemo } from './demo';
export { TOTAL_KEY } from './types/beer.types';
export type {
  AddConfirmation,
  BeerCandidate,
  BeerPatch,
  BeerSnapshot,
  CountsByName,
  EditConfirmation,
  FlaggedBreakage,
  RemoveConfirmation,
} from './types/beer.types';
export type { OperationFailure, OperationResult, OperationSuccess } from './types/result.types';
