import { describe, test, expect } from '@jest/globals';
import { DataStore } from '../src/data/loaders';
import { decomposeTank } from '../src/engine/dimensions';
import {
  calculateTieRods,
  rodLengthMm,
  tieRodMaterialSuffix,
  tieRodSegments,
  tieRodSpecCode
} from '../src/engine/tie-rod-calculator';
import { TankHeight, TieRodMaterial, TieRodSpec } from '../src/models/types';
import { quantities } from './helpers';

function tieRods(
  width: number,
  lengths: number[],
  height: TankHeight,
  material: TieRodMaterial = 'SS316',
  spec: TieRodSpec = 'M12'
) {
  const dims = decomposeTank({
    width,
    length1: lengths[0] ?? 0,
    length2: lengths[1] ?? 0,
    length3: lengths[2] ?? 0,
    length4: lengths[3] ?? 0,
    height,
    quantity: 1
  });
  return calculateTieRods(dims, material, spec, DataStore.tables);
}

describe('Tie Rod Calculator', () => {
  test('should subtract the end fittings from the span', () => {
    expect(rodLengthMm(5)).toBe(4880);
    expect(rodLengthMm(2.5)).toBe(2380);
  });

  test('should keep short rods in one piece', () => {
    expect(tieRodSegments(4880, DataStore.tables)).toEqual([4880]);
  });

  test('should split long rods into 4000mm segments plus a remainder', () => {
    expect(tieRodSegments(9880, DataStore.tables)).toEqual([4000, 4000, 1880]);
    expect(tieRodSegments(7880, DataStore.tables)).toEqual([4000, 3880]);
  });

  test('should map spec and material onto part codes', () => {
    expect(tieRodSpecCode('M16')).toBe('16M');
    expect(tieRodSpecCode('3mH_Tie_Rod(2+1)')).toBe('12M');
    expect(tieRodMaterialSuffix('SS304')).toBe('SA4');
    expect(tieRodMaterialSuffix('SS316+PE Coated')).toBe('SA4C');
  });

  test('should need no tie rods on low tanks', () => {
    const result = tieRods(5, [5], 1.5);
    expect(result.multiplier).toBe(0);
    expect(result.parts).toEqual([]);
  });

  test('should run one layer across a 5 x 5 x 2 tank', () => {
    const result = tieRods(5, [5], 2);

    expect(result.widthRods).toBe(4);
    expect(result.lengthRods).toBe(4);
    expect(quantities(result.parts)).toEqual({
      'TR-12M4880SA4': 8,
      'NUT(SA4)': 32,
      'BW(SA4)': 32
    });
  });

  test('should segment rods and add connectors on a partitioned tank', () => {
    const result = tieRods(10, [4, 2, 2], 3);

    expect(result.widthRods).toBe(23);
    expect(result.lengthRods).toBe(27);
    expect(quantities(result.parts)).toEqual({
      'TR-12M1880SA4': 23,
      'TR-12M3880SA4': 27,
      'TR-12M4000SA4': 73,
      'TC-12M60SA4': 73,
      'NUT(SA4)': 200,
      'BW(SA4)': 200
    });
  });

  test('should order rod lines by length', () => {
    const rodParts = tieRods(10, [4, 2, 2], 3).parts
      .map(part => part.partNo)
      .filter(partNo => partNo.startsWith('TR-'));
    expect(rodParts).toEqual(['TR-12M1880SA4', 'TR-12M3880SA4', 'TR-12M4000SA4']);
  });

  test('should carry the coated suffix and M16 code through every line', () => {
    expect(quantities(tieRods(5, [5], 3, 'SS304+PET coated', 'M16').parts)).toEqual({
      'TR-16M4880SA4C': 24,
      'NUT(SA4C)': 96,
      'BW(SA4C)': 96
    });
  });
});
