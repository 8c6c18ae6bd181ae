import { describe, test, expect } from '@jest/globals';
import { DataStore } from '../src/data/loaders';
import { decomposeTank } from '../src/engine/dimensions';
import { calculatePanels } from '../src/engine/panel-calculator';
import { PanelOptions, TankGeometry, TankHeight } from '../src/models/types';
import { quantities } from './helpers';

const DEFAULT_OPTIONS: PanelOptions = {
  productType: 'MNT',
  insulation: 'Non-Insulated',
  useSidePanel1x1: false,
  usePartitionPanel1x1: false
};

function tank(width: number, lengths: number[], height: TankHeight): TankGeometry {
  return {
    width,
    length1: lengths[0] ?? 0,
    length2: lengths[1] ?? 0,
    length3: lengths[2] ?? 0,
    length4: lengths[3] ?? 0,
    height,
    quantity: 1
  };
}

function panels(geometry: TankGeometry, options: Partial<PanelOptions> = {}) {
  return calculatePanels(decomposeTank(geometry), { ...DEFAULT_OPTIONS, ...options }, DataStore.tables);
}

describe('Panel Calculator', () => {
  test('should lay out a plain 5 x 5 x 2 tank', () => {
    const result = panels(tank(5, [5], 2));

    expect(quantities(result.parts)).toEqual({
      MF00M: 1,
      RF00M: 24,
      BF20M: 24,
      DN20M: 1,
      SL20S: 20
    });
    expect(result.tapeSubtotal).toBe(284);
  });

  test('should add half panels for a half-unit width', () => {
    const result = panels(tank(5.5, [5], 2));

    expect(quantities(result.parts)).toEqual({
      MF00M: 1,
      RF00M: 24,
      RH10M: 5,
      BF20M: 24,
      BH20M: 5,
      DN20M: 1,
      SL20S: 20,
      SH20M: 2
    });
  });

  test('should add quarter panels when both axes carry a half unit', () => {
    const counts = quantities(panels(tank(5.5, [4.5], 2)).parts);

    expect(counts.RQ10M).toBe(1);
    expect(counts.BQ20M).toBe(1);
    expect(counts.RF00M).toBe(18);
    expect(counts.RH10M).toBe(9);
    expect(counts.SH20M).toBe(4);
  });

  test('should add one manhole per compartment', () => {
    const counts = quantities(panels(tank(10, [4, 2, 2], 3)).parts);
    expect(counts.MF00M).toBe(3);
    expect(counts.DN30M).toBe(3);
  });

  test('should build every wall tier and partition row on a multi-tier tank', () => {
    const result = panels(tank(10, [4, 2, 2], 3));

    expect(quantities(result.parts)).toEqual({
      MF00M: 3,
      RF00M: 77,
      BF30M: 57,
      BF30P: 20,
      DN30M: 3,
      SL20T: 32,
      SL20TL: 2,
      SL20TR: 2,
      SF30L: 32,
      SF30LL: 2,
      SF30LR: 2,
      PL20TCB: 20,
      PF30M: 20
    });
    expect(result.tapeSubtotal).toBe(1020);
  });

  test('should use a single partition row below 2.5m', () => {
    const result = panels(tank(4, [3, 2], 2));

    // Side ring (16) and partition row (4) share the SL20S code
    expect(quantities(result.parts)).toEqual({
      MF00M: 2,
      RF00M: 18,
      BF20M: 14,
      BF20P: 4,
      DN20M: 2,
      SL20S: 20,
      SL20SL: 1,
      SL20SR: 1
    });
    expect(result.tapeSubtotal).toBe(300);
  });

  test('should add half partition panels for a half-unit width', () => {
    const counts = quantities(panels(tank(4.5, [3, 2], 2)).parts);
    expect(counts.SH20M).toBe(3);
    expect(counts.BH20M).toBe(4);
  });

  test('should switch to 1x1 side and partition panels', () => {
    const counts = quantities(panels(tank(4, [3, 2], 2), { useSidePanel1x1: true, usePartitionPanel1x1: true }).parts);

    expect(counts.SF20S).toBe(20);
    expect(counts.SF20SL).toBe(1);
    expect(counts.SL20S).toBeUndefined();
  });

  test('should emit nothing when panels are not included', () => {
    const result = panels(tank(5, [5], 2), { productType: 'Not Included' });
    expect(result.parts).toEqual([]);
    expect(result.tapeSubtotal).toBe(0);
  });

  test('should never emit a zero or negative quantity', () => {
    const result = panels(tank(1, [1], 1));
    result.parts.forEach(part => expect(part.quantity).toBeGreaterThan(0));
  });
});
