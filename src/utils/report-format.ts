import { BeerSnapshot, CountsByName, FlaggedBreakage } from '../types/beer.types';

const SEPARATOR = '-----------------------';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as `YYYY-MM-DD HH:mm:ss`
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatBeerList(beers: BeerSnapshot[]): string[] {
  const lines = ['List of added beers:'];
  for (const beer of beers) {
    lines.push(
      `ID: ${beer.id}`,
      `Name: ${beer.name}`,
      `Style: ${beer.style}`,
      `Alcohol Content: ${beer.strengthPercent}%`,
      `Container Size: ${beer.size.label}`,
      `Quantity: ${beer.quantity} bottles`,
      `Barcode: ${beer.barcode}`,
      `Updated Date: ${formatTimestamp(beer.lastUpdated)}`,
      SEPARATOR
    );
  }
  return lines;
}

export function formatFlaggedBreakage(entries: FlaggedBreakage[]): string[] {
  if (entries.length === 0) {
    return ['No beers flagged for breakage.'];
  }

  const lines = ['List of flagged beers for breakage:'];
  for (const entry of entries) {
    lines.push(`Name: ${entry.name}`, `Quantity: ${entry.quantity} bottles`, SEPARATOR);
  }
  return lines;
}

export function formatCounts(counts: CountsByName): string[] {
  return [
    'Total counts of each beer type:',
    ...Object.entries(counts).map(([name, count]) => `${name}: ${count} bottles`),
  ];
}
