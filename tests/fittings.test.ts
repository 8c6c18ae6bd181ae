import { describe, test, expect } from '@jest/globals';
import { DataStore } from '../src/data/loaders';
import { decomposeTank } from '../src/engine/dimensions';
import { fittingPartNo, recommendFittings, resolveFittings } from '../src/engine/fittings';
import { TankHeight } from '../src/models/types';

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

describe('Fittings', () => {
  test('should pad the size to three digits', () => {
    expect(fittingPartNo('WSB', 20)).toBe('WSB-020A');
    expect(fittingPartNo('WFL', 150)).toBe('WFL-150A');
  });

  describe('Recommended set', () => {
    test('should size a small tank at the bottom of every range', () => {
      expect(recommendFittings(dimsOf(2, [2], 1))).toEqual([
        { fittingType: 'WSD-040A', quantity: 1, position: 'drain' },
        { fittingType: 'WSF-050A', quantity: 1, position: 'overflow' },
        { fittingType: 'WFL-050A', quantity: 2, position: 'inlet/outlet' }
      ]);
    });

    test('should move up a size once the capacity reaches a boundary', () => {
      const types = recommendFittings(dimsOf(2, [2.5], 2)).map(fitting => fitting.fittingType);
      expect(types).toEqual(['WSD-050A', 'WSF-065A', 'WFL-050A']);
    });

    test('should size a 5 x 5 x 2 tank', () => {
      const types = recommendFittings(dimsOf(5, [5], 2)).map(fitting => fitting.fittingType);
      expect(types).toEqual(['WSD-065A', 'WSF-080A', 'WFL-080A']);
    });

    test('should fit a drain and overflow per compartment', () => {
      expect(recommendFittings(dimsOf(10, [4, 2, 2], 3))).toEqual([
        { fittingType: 'WSD-100A', quantity: 3, position: 'drain' },
        { fittingType: 'WSF-125A', quantity: 3, position: 'overflow' },
        { fittingType: 'WFL-125A', quantity: 2, position: 'inlet/outlet' }
      ]);
    });

    test('should use the largest sizes above 500 m3', () => {
      const types = recommendFittings(dimsOf(10, [5, 5, 5], 4)).map(fitting => fitting.fittingType);
      expect(types).toEqual(['WSD-150A', 'WSF-150A', 'WFL-150A']);
    });

    test('should only recommend listed fittings', () => {
      const listed = DataStore.fittings.map(fitting => fitting.partNo);
      [dimsOf(1, [1], 1), dimsOf(3, [3], 3), dimsOf(6, [6], 3), dimsOf(12, [6, 6], 5)].forEach(dims => {
        recommendFittings(dims).forEach(fitting => expect(listed).toContain(fitting.fittingType));
      });
    });
  });

  test('should sum repeated selections and drop zero quantities', () => {
    expect(resolveFittings([
      { fittingType: 'WSB-025A', quantity: 2, position: 'sample' },
      { fittingType: 'WOF-100A', quantity: 0, position: '' },
      { fittingType: 'WSB-025A', quantity: 1, position: '' }
    ])).toEqual([
      { partNo: 'WSB-025A', description: 'Fitting at sample', quantity: 3, category: 'Fittings' }
    ]);
  });
});
