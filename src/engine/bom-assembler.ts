import { PriceWeightCatalog } from '../data/loaders';
import { InternalInvariantViolationError } from '../errors';
import {
  BOM_CATEGORIES,
  BomCategory,
  BomResult,
  CapacitySummary,
  PartLineItem,
  PartQuantity
} from '../models/types';
import { TankDecomposition } from './dimensions';
import { round2 } from './math';
import { mergeParts } from './part-list';

// Freeboard kept empty above the water line
export const FREEBOARD = 0.2;

export interface AssemblyInput {
  parts: PartQuantity[];
  dims: TankDecomposition;
  /** Number of identical tanks ordered */
  tankQuantity: number;
  exchangeRate: number;
  catalog: PriceWeightCatalog;
}

export function computeCapacity(dims: TankDecomposition): CapacitySummary {
  const width = dims.width.value;
  const length = dims.totalLength;
  const height = dims.height.value;

  return {
    nominalCapacity: round2(width * length * height),
    actualCapacity: round2(Math.max(0, width * length * (height - FREEBOARD))),
    surfaceArea: round2(2 * (width * length + width * height + length * height) + width * height * dims.partitions),
    partitionCount: dims.partitions
  };
}

function assertValidQuantity(part: PartQuantity): void {
  if (!Number.isInteger(part.quantity) || part.quantity < 0) {
    throw new InternalInvariantViolationError(
      `${part.category} produced quantity ${part.quantity} for ${part.partNo}`
    );
  }
}

function emptyTotals(): Record<BomCategory, number> {
  return {
    'Panels': 0,
    'Steel Skid': 0,
    'Bolts & Nuts': 0,
    'External Reinforcing': 0,
    'Internal Reinforcing': 0,
    'Tie Rods': 0,
    'ETC': 0,
    'Fittings': 0
  };
}

/**
 * Merges every calculator's output into the final BOM and prices it.
 */
export function assembleBom(input: AssemblyInput): BomResult {
  const { dims, tankQuantity, exchangeRate, catalog } = input;
  input.parts.forEach(assertValidQuantity);

  const merged = mergeParts(input.parts);
  const ordered = BOM_CATEGORIES.flatMap(category => merged.filter(part => part.category === category));

  const lineItems: PartLineItem[] = ordered.map(part => {
    const entry = catalog.resolve(part.partNo);
    const quantity = part.quantity * tankQuantity;
    return {
      partNo: part.partNo,
      partName: entry.partName || part.description,
      quantity,
      category: part.category,
      unitPrice: entry.unitPrice,
      unitWeight: entry.unitWeight,
      totalPrice: round2(entry.unitPrice * quantity),
      totalWeight: round2(entry.unitWeight * quantity)
    };
  });

  const costByCategory = emptyTotals();
  const weightByCategory = emptyTotals();
  for (const item of lineItems) {
    costByCategory[item.category] = round2(costByCategory[item.category] + item.totalPrice);
    weightByCategory[item.category] = round2(weightByCategory[item.category] + item.totalWeight);
  }

  const totalUsd = round2(BOM_CATEGORIES.reduce((sum, category) => sum + costByCategory[category], 0));
  const totalKg = round2(BOM_CATEGORIES.reduce((sum, category) => sum + weightByCategory[category], 0));

  return {
    capacity: computeCapacity(dims),
    lineItems,
    costSummary: {
      byCategory: costByCategory,
      totalUsd,
      exchangeRate,
      totalLocal: round2(totalUsd * exchangeRate)
    },
    weightSummary: {
      byCategory: weightByCategory,
      totalKg
    }
  };
}
