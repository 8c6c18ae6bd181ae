import { LookupTables } from '../data/loaders';
import { PartQuantity, TieRodMaterial, TieRodSpec } from '../models/types';
import { DimensionDecomposition, TankDecomposition } from './dimensions';
import { PartList } from './part-list';

// Length lost to the end fittings on every rod
export const END_FITTING_ALLOWANCE_MM = 120;
export const SEGMENT_LENGTH_MM = 4000;

export interface TieRodResult {
  parts: PartQuantity[];
  multiplier: number;
  /** Rods spanning the width, one set per length grid line */
  widthRods: number;
  /** Rods spanning the total length, one set per width grid line */
  lengthRods: number;
}

export function tieRodSpecCode(spec: TieRodSpec): string {
  return spec === 'M16' ? '16M' : '12M';
}

export function tieRodMaterialSuffix(material: TieRodMaterial): string {
  return material.toLowerCase().includes('coated') ? 'SA4C' : 'SA4';
}

/**
 * Splits a required rod length into catalog segments.
 * Anything longer than the longest standard rod is built from 4000mm pieces plus one remainder piece.
 */
export function tieRodSegments(requiredMm: number, tables: LookupTables): number[] {
  if (requiredMm <= tables.maxTieRodLength) {
    return [tables.tieRodLength(requiredMm)];
  }

  const fullSegments = Math.floor(requiredMm / SEGMENT_LENGTH_MM);
  const remainder = requiredMm - fullSegments * SEGMENT_LENGTH_MM;
  const segments: number[] = Array.from({ length: fullSegments }, () => tables.tieRodLength(SEGMENT_LENGTH_MM));
  if (remainder > 0) {
    segments.push(tables.tieRodLength(remainder));
  }
  return segments;
}

export function rodLengthMm(span: number): number {
  return Math.round(span * 1000) - END_FITTING_ALLOWANCE_MM;
}

// Grid lines inside a section; a section longer than one unit loses its end line to the wall
function adjustedCount(dimension: DimensionDecomposition): number {
  return dimension.value > 1 ? dimension.count - 1 : dimension.count;
}

export function calculateTieRods(
  dims: TankDecomposition,
  material: TieRodMaterial,
  spec: TieRodSpec,
  tables: LookupTables
): TieRodResult {
  const multiplier = tables.heightMultiplier(dims.height.value);
  if (multiplier === 0) {
    return { parts: [], multiplier, widthRods: 0, lengthRods: 0 };
  }

  const specCode = tieRodSpecCode(spec);
  const suffix = tieRodMaterialSuffix(material);

  const partitionCorrection = dims.height.value > 2 ? dims.partitions * (3 * dims.height.count - 5) : 0;
  const widthRods = multiplier * dims.lengths.reduce((sum, l) => sum + adjustedCount(l), 0) + partitionCorrection;
  const lengthRods = dims.width.value > 1 ? multiplier * adjustedCount(dims.width) : 0;

  const byLength = new Map<number, number>();
  let connectors = 0;
  const addRods = (rods: number, span: number) => {
    if (rods <= 0) return;
    const segments = tieRodSegments(rodLengthMm(span), tables);
    for (const segment of segments) {
      byLength.set(segment, (byLength.get(segment) ?? 0) + rods);
    }
    connectors += rods * (segments.length - 1);
  };

  addRods(widthRods, dims.width.value);
  addRods(lengthRods, dims.totalLength);

  const parts = new PartList('Tie Rods');
  const diameter = spec === 'M16' ? 'M16' : 'M12';
  for (const length of [...byLength.keys()].sort((a, b) => a - b)) {
    parts.add(`TR-${specCode}${length}${suffix}`, `Tie rod ${diameter} ${length}mm`, byLength.get(length) ?? 0);
  }
  parts.add(`TC-${specCode}60${suffix}`, `Tie rod connector ${diameter}`, connectors);

  const rodEnds = 4 * (widthRods + lengthRods);
  parts
    .add(`NUT(${suffix})`, 'Tie rod nut', rodEnds)
    .add(`BW(${suffix})`, 'Tie rod bonded washer', rodEnds);

  return { parts: parts.toArray(), multiplier, widthRods, lengthRods };
}
