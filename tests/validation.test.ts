import { describe, test, expect } from '@jest/globals';
import { InvalidGeometryError, UnresolvedOptionError } from '../src/errors';
import { validateTankConfig } from '../src/models/schemas';
import { DataStore } from '../src/data/loaders';
import { buildTankConfig, geometry } from './helpers';

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof InvalidGeometryError || error instanceof UnresolvedOptionError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected validation to fail');
}

describe('Request Validation', () => {
  test('should fill every option with its default', () => {
    const config = buildTankConfig({ geometry: geometry(5, [5], 2) });

    expect(config.geometry).toEqual({ width: 5, length1: 5, length2: 0, length3: 0, length4: 0, height: 2, quantity: 1 });
    expect(config.panelOptions).toEqual({
      productType: 'MNT',
      insulation: 'Non-Insulated',
      useSidePanel1x1: false,
      usePartitionPanel1x1: false
    });
    expect(config.steelOptions).toEqual({
      steelSkid: 'Default',
      boltsNuts: 'EXT:HDG/INT:SS316',
      tieRodMaterial: 'SS316',
      tieRodSpec: 'M12'
    });
    expect(config.accessoryOptions).toEqual({
      levelIndicator: 'General',
      internalLadderMaterial: 'GRP',
      internalLadderQty: -1,
      externalLadderMaterial: 'HDG',
      externalLadderQty: -1
    });
    expect(config.fittings).toEqual([]);
    expect(config.recommendedFittings).toBe(false);
    expect(config.exchangeRate).toBe(3.75);
  });

  test('should accept known fittings and default their position', () => {
    const config = buildTankConfig({
      geometry: geometry(5, [5], 2),
      fittings: [{ fittingType: 'WFL-100A', quantity: 2 }]
    });
    expect(config.fittings).toEqual([{ fittingType: 'WFL-100A', quantity: 2, position: '' }]);
  });

  describe('Geometry', () => {
    test('should reject a width off the half grid', () => {
      expect(() => buildTankConfig({ geometry: geometry(5.3, [5], 2) })).toThrow(InvalidGeometryError);
      expect(issuesOf(() => buildTankConfig({ geometry: geometry(5.3, [5], 2) })))
        .toEqual(['geometry.width: must be a multiple of 0.5']);
    });

    test('should reject heights outside the standard set', () => {
      expect(issuesOf(() => buildTankConfig({ geometry: geometry(5, [5], 2.2) })))
        .toEqual(['geometry.height: must be one of 1, 1.5, 2, 2.5, 3, 3.5, 4, 4.5, 5']);
    });

    test('should reject dimensions beyond the maximum', () => {
      expect(() => buildTankConfig({ geometry: geometry(25, [5], 2) })).toThrow(InvalidGeometryError);
    });

    test('should reject a missing geometry', () => {
      expect(issuesOf(() => buildTankConfig({ geometry: undefined }))).toEqual(['geometry: Required']);
    });

    test('should report geometry before options', () => {
      expect(() =>
        buildTankConfig({ geometry: geometry(5.3, [5], 2), steelOptions: { tieRodSpec: 'M20' } })
      ).toThrow(InvalidGeometryError);
    });
  });

  describe('Options', () => {
    test('should reject values outside a closed option set', () => {
      const issues = issuesOf(() =>
        buildTankConfig({ geometry: geometry(5, [5], 2), steelOptions: { steelSkid: 'Channel 200' } })
      );

      expect(issues).toHaveLength(1);
      expect(issues[0].startsWith('steelOptions.steelSkid: Invalid enum value')).toBe(true);
    });

    test('should surface option errors as unresolved options', () => {
      expect(() =>
        buildTankConfig({ geometry: geometry(5, [5], 2), accessoryOptions: { internalLadderQty: 6 } })
      ).toThrow(UnresolvedOptionError);
    });

    test('should reject unknown fitting types', () => {
      expect(issuesOf(() =>
        buildTankConfig({ geometry: geometry(5, [5], 2), fittings: [{ fittingType: 'WFL-999A', quantity: 1 }] })
      )).toEqual(['fittings.0.fittingType: is not a known fitting type']);
    });
  });

  test('should list violations without throwing', () => {
    const result = validateTankConfig(
      { geometry: geometry(5.3, [5], 2), panelOptions: { insulation: 'Foam' } },
      { fittingTypes: DataStore.fittings.map(f => f.partNo), defaultExchangeRate: 3.75 }
    );

    expect(result.isValid).toBe(false);
    expect(result.violations).toHaveLength(2);
    expect(result.violations[0]).toBe('geometry.width: must be a multiple of 0.5');
  });
});
