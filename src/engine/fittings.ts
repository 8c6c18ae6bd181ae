import { FittingSelection, PartQuantity } from '../models/types';
import { TankDecomposition } from './dimensions';
import { mergeParts } from './part-list';

// [capacity below, size mm]; the last entry covers everything larger
type SizeBand = readonly [number, number];

const DRAIN_BANDS: readonly SizeBand[] = [[10, 40], [50, 50], [100, 65], [200, 80], [500, 100], [Infinity, 150]];
const OVERFLOW_BANDS: readonly SizeBand[] = [[10, 50], [50, 65], [100, 80], [200, 100], [500, 125], [Infinity, 150]];
const FLANGE_BANDS: readonly SizeBand[] = [[20, 50], [50, 65], [100, 80], [200, 100], [500, 125], [Infinity, 150]];

export function fittingPartNo(family: string, sizeMm: number): string {
  return `${family}-${String(sizeMm).padStart(3, '0')}A`;
}

function sizeFor(bands: readonly SizeBand[], capacity: number): number {
  const band = bands.find(([limit]) => capacity < limit);
  return band ? band[1] : bands[bands.length - 1][1];
}

/**
 * Standard fitting set sized by nominal capacity: a drain and an overflow per
 * compartment, plus an inlet and outlet flange.
 */
export function recommendFittings(dims: TankDecomposition): FittingSelection[] {
  const capacity = dims.width.value * dims.totalLength * dims.height.value;
  const compartments = dims.partitions + 1;

  return [
    { fittingType: fittingPartNo('WSD', sizeFor(DRAIN_BANDS, capacity)), quantity: compartments, position: 'drain' },
    { fittingType: fittingPartNo('WSF', sizeFor(OVERFLOW_BANDS, capacity)), quantity: compartments, position: 'overflow' },
    { fittingType: fittingPartNo('WFL', sizeFor(FLANGE_BANDS, capacity)), quantity: 2, position: 'inlet/outlet' }
  ];
}

/**
 * User-selected fittings go straight onto the BOM; repeated selections of one fitting are summed.
 */
export function resolveFittings(selections: FittingSelection[]): PartQuantity[] {
  return mergeParts(
    selections
      .filter(selection => selection.quantity > 0)
      .map(selection => ({
        partNo: selection.fittingType,
        description: selection.position ? `Fitting at ${selection.position}` : 'Fitting',
        quantity: selection.quantity,
        category: 'Fittings' as const
      }))
  );
}
