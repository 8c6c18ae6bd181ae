import { DataStore } from '../src/data/loaders';
import { TankConfigInput, parseTankConfig } from '../src/models/schemas';
import { PartQuantity, TankConfig } from '../src/models/types';

/**
 * Sums emitted quantities per part number.
 */
export function quantities(parts: Array<Pick<PartQuantity, 'partNo' | 'quantity'>>): Record<string, number> {
  const totals: Record<string, number> = {};
  for (const part of parts) {
    totals[part.partNo] = (totals[part.partNo] ?? 0) + part.quantity;
  }
  return totals;
}

export function buildTankConfig(input: unknown): TankConfig {
  return parseTankConfig(input, {
    fittingTypes: DataStore.fittings.map(fitting => fitting.partNo),
    defaultExchangeRate: 3.75
  });
}

export function geometry(width: number, lengths: number[], height: number): TankConfigInput['geometry'] {
  return {
    width,
    length1: lengths[0] ?? 0,
    length2: lengths[1] ?? 0,
    length3: lengths[2] ?? 0,
    length4: lengths[3] ?? 0,
    height
  };
}
