import { InvalidGeometryError } from '../errors';
import { TankGeometry } from '../models/types';

export type HalfFraction = 0 | 0.5;

export interface DimensionDecomposition {
  value: number;
  /** Whole panel units below the value */
  count: number;
  fraction: HalfFraction;
}

export interface TankDecomposition {
  width: DimensionDecomposition;
  /** Active length sections in slot order (length1 first, absent slots skipped) */
  lengths: DimensionDecomposition[];
  height: DimensionDecomposition;
  /** L_O: sum of active raw lengths */
  totalLength: number;
  /** L_O_C: sum of active length counts */
  totalLengthCount: number;
  /** L_O_F: sum of active length fractions */
  totalLengthFraction: number;
  /** Number of active lengths carrying a half unit */
  lengthHalfCount: number;
  /** N_PA: nonzero slots among length2..length4 */
  partitions: number;
}

export function decompose(value: number): DimensionDecomposition {
  const count = Math.trunc(value);
  const remainder = value - count;
  if (remainder === 0) {
    return { value, count, fraction: 0 };
  }
  if (remainder === 0.5) {
    return { value, count, fraction: 0.5 };
  }
  throw new InvalidGeometryError([`${value} is not on the 0.5 grid`]);
}

/**
 * Half-unit encoding: a half panel counts as 1, none as 0.
 * Every formula that multiplies by "the fraction" goes through here.
 */
export function halfUnits(dimension: DimensionDecomposition): 0 | 1 {
  return dimension.fraction === 0.5 ? 1 : 0;
}

export function hasHalf(dimension: DimensionDecomposition): boolean {
  return dimension.fraction === 0.5;
}

export function decomposeTank(geometry: TankGeometry): TankDecomposition {
  const slots = [geometry.length1, geometry.length2, geometry.length3, geometry.length4];
  const lengths = slots.filter(length => length > 0).map(decompose);
  const partitions = slots.slice(1).filter(length => length > 0).length;

  return {
    width: decompose(geometry.width),
    lengths,
    height: decompose(geometry.height),
    totalLength: lengths.reduce((sum, l) => sum + l.value, 0),
    totalLengthCount: lengths.reduce((sum, l) => sum + l.count, 0),
    totalLengthFraction: lengths.reduce((sum, l) => sum + l.fraction, 0),
    lengthHalfCount: lengths.filter(hasHalf).length,
    partitions
  };
}
