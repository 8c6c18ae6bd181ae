import { LookupTables, PanelSlot } from '../data/loaders';
import { PanelOptions, PartQuantity } from '../models/types';
import { TankDecomposition, halfUnits } from './dimensions';
import { PartList } from './part-list';

export const MANHOLE_PANEL = 'MF00M';
export const ROOF_FULL_PANEL = 'RF00M';
export const ROOF_HALF_PANEL = 'RH10M';
export const ROOF_QUARTER_PANEL = 'RQ10M';

// Roof-full correction, currently zero for every catalogued layout
export const ROOF_FULL_ADJUSTMENT = 0;

const MULTI_TIER_FROM_HEIGHT = 2.5;

export interface PanelResult {
  parts: PartQuantity[];
  /** 50mm sealing tape consumed by panel joints */
  tapeSubtotal: number;
}

export function calculatePanels(
  dims: TankDecomposition,
  options: PanelOptions,
  tables: LookupTables
): PanelResult {
  if (options.productType === 'Not Included') {
    return { parts: [], tapeSubtotal: 0 };
  }

  const height = dims.height.value;
  const wc = dims.width.count;
  const lc = dims.totalLengthCount;
  const npa = dims.partitions;
  const widthHalf = halfUnits(dims.width);
  const lengthHalves = dims.lengthHalfCount;
  const multiTier = height >= MULTI_TIER_FROM_HEIGHT;
  const code = (slot: PanelSlot) => tables.panelCode(height, slot);

  const parts = new PartList('Panels');

  // Roof
  const manholes = 1 + npa;
  const quarters = widthHalf === 1 ? lengthHalves : 0;
  parts
    .add(MANHOLE_PANEL, 'Roof panel with manhole', manholes)
    .add(ROOF_FULL_PANEL, 'Roof panel full', Math.max(0, wc * lc - manholes - quarters - ROOF_FULL_ADJUSTMENT))
    .add(ROOF_HALF_PANEL, 'Roof panel half', wc * lengthHalves + widthHalf * lc)
    .add(ROOF_QUARTER_PANEL, 'Roof panel quarter', quarters);

  // Bottom: partition strips replace one full row per partition, drains take one slot per compartment
  parts
    .add(code('bottom_full'), 'Bottom panel full', Math.max(0, wc * lc - wc * npa - manholes))
    .add(code('bottom_partition'), 'Bottom panel partition strip', wc * npa)
    .add(
      code('bottom_half'),
      'Bottom panel half',
      Math.max(0, wc * lengthHalves + widthHalf * lc - (widthHalf === 1 ? npa : 0))
    )
    .add(code('bottom_quarter'), 'Bottom panel quarter', quarters)
    .add(code('drain'), 'Bottom panel with drain', manholes);

  // Side walls, one ring per tier; partition joints replace a full panel with a left/right corner pair
  const sideFull = Math.max(0, 2 * (wc + lc) - 2 * npa);
  const addSideTier = (tierCode: string, description: string) => {
    parts
      .add(tierCode, description, sideFull)
      .add(`${tierCode}L`, `${description} corner left`, npa)
      .add(`${tierCode}R`, `${description} corner right`, npa);
  };

  addSideTier(code(options.useSidePanel1x1 ? 'side_top_1x1' : 'side_top'), 'Side panel');
  if (multiTier) {
    if (tables.hasPanelCode(height, 'side_mid')) {
      addSideTier(code('side_mid'), 'Side panel middle tier');
    }
    addSideTier(code('side_low'), 'Side panel lower tier');
  }
  parts.add(code('side_half'), 'Side panel half', 2 * (widthHalf + lengthHalves));

  // Partition walls span the width once per partition
  if (npa > 0) {
    if (multiTier) {
      parts.add(code('partition_top'), 'Partition panel top', wc * npa);
      if (tables.hasPanelCode(height, 'partition_mid')) {
        parts.add(code('partition_mid'), 'Partition panel middle', wc * npa);
      }
      parts.add(code('partition_low'), 'Partition panel lower', wc * npa);
    } else {
      parts
        .add(code(options.usePartitionPanel1x1 ? 'partition_full_1x1' : 'partition_full'), 'Partition panel', wc * npa)
        .add(code('partition_half'), 'Partition panel half', widthHalf * npa);
    }
  }

  return {
    parts: parts.toArray(),
    tapeSubtotal: panelTape(dims)
  };
}

function panelTape(dims: TankDecomposition): number {
  const perimeterUnits = dims.width.count + dims.totalLengthCount;
  const floorUnits = dims.width.count * dims.totalLengthCount;
  const heightCount = dims.height.count;

  if (dims.partitions > 0) {
    return 6 * floorUnits + 10 * perimeterUnits * heightCount;
  }
  return 8 * perimeterUnits + (4 * floorUnits + 2) * heightCount;
}
