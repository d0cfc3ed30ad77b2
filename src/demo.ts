import { env } from './config/environment';
import { Inventory, createInventory } from './app';

// Demonstration stock, entered the way a prompt would receive it
const DEMO_STOCK = [
  {
    style: 'IPA',
    name: 'Example IPA',
    strengthPercent: '6.5',
    size: '355',
    isMetric: '1',
    quantity: '24',
    barcode: '000000123456',
  },
  {
    style: 'Stout',
    name: 'Sample Stout',
    strengthPercent: '7.0',
    size: '12',
    isMetric: '0',
    quantity: '12',
    barcode: '000000789012',
  },
];

/**
 * Stock the demonstration beers and collect every report
 */
export function runDemo(
  inventory: Inventory = createInventory(),
  flagBreakage: boolean = env.FLAG_BREAKAGE_ON_START
): string[] {
  const { controller } = inventory;
  const lines: string[] = [];

  if (flagBreakage) {
    lines.push(...controller.flagBreakage());
  }
  for (const answers of DEMO_STOCK) {
    lines.push(...controller.addBeer(answers));
  }

  lines.push(
    ...controller.showBeers(),
    ...controller.showFlaggedBreakage(),
    ...controller.showCounts(),
    ...controller.showTotal()
  );

  return lines;
}
