import { describe, test, expect } from '@jest/globals';
import { DataStore } from '../src/data/loaders';
import { decomposeTank } from '../src/engine/dimensions';
import { calculateEtc, roofSupporters } from '../src/engine/etc-calculator';
import { calculatePanels } from '../src/engine/panel-calculator';
import { calculateReinforcing } from '../src/engine/reinforcing-calculator';
import { AccessoryOptions, TankHeight } from '../src/models/types';
import { quantities } from './helpers';

const DEFAULT_ACCESSORIES: AccessoryOptions = {
  levelIndicator: 'General',
  internalLadderMaterial: 'GRP',
  internalLadderQty: -1,
  externalLadderMaterial: 'HDG',
  externalLadderQty: -1
};

function dimsOf(width: number, lengths: number[], height: TankHeight) {
  return decomposeTank({
    width,
    length1: lengths[0] ?? 0,
    length2: lengths[1] ?? 0,
    length3: lengths[2] ?? 0,
    length4: lengths[3] ?? 0,
    height,
    quantity: 1
  });
}

function etc(width: number, lengths: number[], height: TankHeight, options: Partial<AccessoryOptions> = {}) {
  const dims = dimsOf(width, lengths, height);
  const panels = calculatePanels(
    dims,
    { productType: 'MNT', insulation: 'Non-Insulated', useSidePanel1x1: false, usePartitionPanel1x1: false },
    DataStore.tables
  );
  const reinforcing = calculateReinforcing(dims, 'Non-Insulated', DataStore.tables);
  return { panels, reinforcing, result: calculateEtc({ dims, options: { ...DEFAULT_ACCESSORIES, ...options }, panels, reinforcing }) };
}

describe('ETC Calculator', () => {
  describe('Roof supporters', () => {
    test('should cover the open roof of an unpartitioned tank', () => {
      expect(roofSupporters(dimsOf(5, [5], 2))).toBe(4);
      expect(roofSupporters(dimsOf(2, [3], 2))).toBe(1);
      expect(roofSupporters(dimsOf(1, [1], 1))).toBe(0);
    });

    test('should scale with the roof grid on a partitioned tank', () => {
      expect(roofSupporters(dimsOf(10, [4, 2, 2], 3))).toBe(16);
      expect(roofSupporters(dimsOf(10, [5, 5, 5], 4))).toBe(32);
    });
  });

  test('should fit out a 5 x 5 x 2 tank', () => {
    expect(quantities(etc(5, [5], 2).result.parts)).toEqual({
      'WAV-0050A': 1,
      'WRS-2000F': 4,
      'WLD-2000FI': 1,
      'WLD-2000ZO': 1,
      Silicon: 3,
      'WLV-2000SET(G)': 1,
      'WST-0050RO': 284,
      'WST-0120RO': 9
    });
  });

  test('should fit one ladder and gauge per compartment', () => {
    expect(quantities(etc(10, [4, 2, 2], 3).result.parts)).toEqual({
      'WAV-0100A': 3,
      'WRS-3000F': 16,
      'WLD-3000FI': 3,
      'WLD-3000ZO': 1,
      Silicon: 8,
      'WLV-3000SET(G)': 3,
      'WST-0050RO': 1020,
      'WST-0120RO': 13
    });
  });

  test('should honour explicit ladder quantities and materials', () => {
    const counts = quantities(
      etc(10, [4, 2, 2], 3, {
        levelIndicator: 'Sensor',
        internalLadderMaterial: 'SS304',
        internalLadderQty: 2,
        externalLadderMaterial: 'SS316',
        externalLadderQty: 0
      }).result.parts
    );

    expect(counts['WLD-3000SI']).toBe(2);
    expect(counts['WLD-3000SO']).toBeUndefined();
    expect(counts['WLV-0000SET(S)']).toBe(3);
  });

  test('should add air vents by roof area on large roofs', () => {
    const counts = quantities(etc(10, [12], 3, { levelIndicator: 'No needed' }).result.parts);

    expect(counts['WAV-0100A']).toBe(4);
    expect(counts['WRS-3000F']).toBe(25);
    expect(Object.keys(counts).some(partNo => partNo.startsWith('WLV-'))).toBe(false);
  });

  test('should equal panel tape plus reinforcing tape', () => {
    const { panels, reinforcing, result } = etc(5, [5], 5);

    expect(panels.tapeSubtotal).toBe(590);
    expect(reinforcing.tapeSubtotal).toBe(14);
    expect(result.sealingTape50).toBe(604);
    expect(quantities(result.parts)['WST-0050RO']).toBe(604);
    expect(result.sealingTape120).toBe(21);
  });

  test('should leave half-metre heights below 4m to the panel tape', () => {
    const { panels, reinforcing, result } = etc(5, [5], 3.5);

    expect(panels.tapeSubtotal).toBe(386);
    expect(reinforcing.tapeSubtotal).toBe(0);
    expect(quantities(result.parts)['WST-0050RO']).toBe(386);
  });
});
