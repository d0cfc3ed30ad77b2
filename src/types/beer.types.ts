/**
 * Beer domain types
 */
import { ContainerSize } from '../models/container-size.model';

/** Reserved count key holding the sum over every live beer. */
export const TOTAL_KEY = 'Total';

// Fields a caller supplies to add a beer
export interface BeerCandidate {
  style: string;
  name: string;
  strengthPercent: number;
  size: ContainerSize;
  quantity: number;
  barcode: number;
}

// Edit input; empty or missing strings keep the current value
export interface BeerPatch {
  name?: string;
  style?: string;
  strengthPercent?: number;
  size?: number;
  isMetric?: boolean;
  quantity?: number;
  barcode?: number;
}

export interface ContainerSizeView {
  isMetric: boolean;
  size: number;
  sizeInMl: number;
  label: string;
}

// Read-only copy of a live beer handed to callers
export interface BeerSnapshot {
  id: number;
  style: string;
  name: string;
  strengthPercent: number;
  size: ContainerSizeView;
  quantity: number;
  barcode: number;
  lastUpdated: Date;
}

export interface FlaggedBreakage {
  name: string;
  quantity: number;
}

export interface AddConfirmation {
  beer: BeerSnapshot;
  flaggedAsBreakage: boolean;
}

export interface RemoveConfirmation {
  id: number;
  name: string;
  quantity: number;
}

export interface EditConfirmation {
  beer: BeerSnapshot;
  previousName: string;
}

export type CountsByName = Record<string, number>;
