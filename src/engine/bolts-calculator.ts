import { BoltOption, PartQuantity } from '../models/types';
import { TankDecomposition } from './dimensions';
import { roundDown, roundUp } from './math';
import { PartList, mergeParts } from './part-list';
import { ReinforcingResult } from './reinforcing-calculator';
import { SteelSkidResult } from './steel-skid-calculator';

export type BoltGrade = 'HDG' | 'SS304' | 'SS316';

export interface BoltMaterials {
  /** Panel assembly bolts on the outside of the shell */
  external: BoltGrade | null;
  /** Joint bolts inside the shell */
  internal: BoltGrade | null;
  /** Bolts that fix reinforcing members */
  reinforcing: BoltGrade | null;
}

// 316 fasteners are stocked under the SA4 code as well
const GRADE_SUFFIX: Record<BoltGrade, string> = {
  HDG: 'Z',
  SS304: 'SA4',
  SS316: 'SA4'
};

const RUBBER_SUFFIX: Record<BoltGrade, string> = {
  HDG: 'RD',
  SS304: 'RSA4',
  SS316: 'RSA4'
};

function parseGrade(option: string, key: string): BoltGrade | null {
  const match = new RegExp(`(?:^|[/+])${key}:(HDG|SS304|SS316)`).exec(option);
  if (!match) return null;
  switch (match[1]) {
    case 'HDG':
      return 'HDG';
    case 'SS304':
      return 'SS304';
    case 'SS316':
      return 'SS316';
    default:
      return null;
  }
}

/**
 * Splits a combined option such as "EXT:HDG/INT:SS304+R/F:HDG" into independent grades.
 * Reinforcing bolts follow the internal grade unless R/F names its own.
 */
export function parseBoltOption(option: BoltOption): BoltMaterials {
  if (option === 'Except All Bolts') {
    return { external: null, internal: null, reinforcing: null };
  }
  if (option === 'Except Panel Assemble Bolts') {
    return { external: null, internal: null, reinforcing: 'HDG' };
  }

  const internal = parseGrade(option, 'INT');
  return {
    external: parseGrade(option, 'EXT'),
    internal,
    reinforcing: parseGrade(option, 'R/F') ?? internal
  };
}

export interface BoltsResult {
  parts: PartQuantity[];
  materials: BoltMaterials;
}

export interface BoltsInput {
  dims: TankDecomposition;
  option: BoltOption;
  steelSkid: SteelSkidResult;
  reinforcing: ReinforcingResult;
  spareFactor: number;
}

/**
 * Corner bolts step with whole metres of height: 32 per metre up to 3m,
 * then 96 plus 10 per metre above 3m.
 */
export function cornerBolts(heightCount: number): number {
  return heightCount < 4 ? 32 * heightCount : 96 + 10 * (heightCount - 3);
}

export function calculateBolts(input: BoltsInput): BoltsResult {
  const { dims, option, steelSkid, reinforcing, spareFactor } = input;
  const materials = parseBoltOption(option);

  const height = dims.height.value;
  const hc = dims.height.count;
  const wc = dims.width.count;
  const lc = dims.totalLengthCount;
  const npa = dims.partitions;
  const totalLength = dims.totalLength;
  const perimeterUnits = wc + lc;
  const perimeter = 2 * perimeterUnits;
  const innerJoints = Math.max(0, wc - 1) + Math.max(0, lc - 1);
  const tall = height >= 4;
  const long = totalLength > 10;

  const parts = new PartList('Bolts & Nuts');

  if (materials.external) {
    const suffix = GRADE_SUFFIX[materials.external];

    // Length-wise joints plus height-tiered corner bolts; partitions double the run
    let lengthJoints = perimeterUnits + 2 * innerJoints + cornerBolts(hc);
    if (npa > 0) lengthJoints *= 2;
    if (tall && long) lengthJoints += roundDown(npa * (totalLength - 10) * 12.4);
    parts.add(`WBT-1440${suffix}`, 'Bolt set M14x40', lengthJoints);

    // Vertical joints at the four corners, 8 bolts per metre on both flanges
    parts.add(`WBT-1035${suffix}`, 'Bolt set M10x35', height * 8 * 2 * 4 + 4 * Math.max(0, hc - 2));

    // Panel-to-panel joint grid over roof, floor and every wall row
    let panelGrid = 8 * perimeter + 8 * (perimeter + 2 * innerJoints) * hc;
    if (npa > 0) {
      panelGrid += 28 * npa * wc;
      if (tall) panelGrid += npa * wc * 21 * (hc - 2);
    }
    parts.add(`WBT-1050${suffix}`, 'Bolt set M10x50', panelGrid);

    // Perimeter rubber bolts on the bottom ring and each extra tier
    let perimeterBolts = 32;
    if (hc > 2) perimeterBolts += 8 * perimeterUnits * (hc - 2);
    if (hc > 3) perimeterBolts += 8 * (perimeterUnits - 2) * (hc - 3);
    perimeterBolts += 8 * npa;
    if (tall && long) perimeterBolts += 2 * npa;
    parts.add(`WBT-14120${RUBBER_SUFFIX[materials.external]}`, 'Rubber bolt set M14x120', perimeterBolts);
  }

  // Skid to panel flange, two per frame end on both sides
  const skidGrade = materials.external ?? materials.reinforcing;
  if (skidGrade && !steelSkid.excluded) {
    parts.add(`WBT-1240${GRADE_SUFFIX[skidGrade]}`, 'Bolt set M12x40', 2 * 2 * perimeterUnits);
  }

  if (materials.internal) {
    const suffix = GRADE_SUFFIX[materials.internal];
    let jointM10x35 = 8 * perimeter;
    let jointM10x50 = 8 * perimeterUnits;
    if (npa > 0) {
      jointM10x35 += npa * wc * 10;
      if (tall) jointM10x35 += roundDown(npa * perimeterUnits * (hc - 2) * 4.2);
      jointM10x50 += npa * wc * hc * 16 + npa * 16;
      if (tall && long) jointM10x50 += roundDown(npa * wc * 3.6 * (hc - 2));
    }
    parts.add(`WBT-1035${suffix}`, 'Bolt set M10x35 internal', jointM10x35);
    parts.add(`WBT-1050${suffix}`, 'Bolt set M10x50 internal', jointM10x50);
  }

  if (materials.reinforcing && npa > 0) {
    const rubber = RUBBER_SUFFIX[materials.reinforcing];
    parts.add(`WBT-1058${rubber}`, 'Rubber bolt set M10x58', roundDown(npa * wc * (tall ? 14.4 : 12.8)));
    // Eight bolts per 1616 cross plate, four per 1780
    parts.add(
      `WBT-14120${rubber}`,
      'Rubber bolt set M14x120',
      8 * reinforcing.crossPlate1616 + 4 * reinforcing.crossPlate1780
    );
  }

  // Spare stock applies once per SKU, after both rubber-bolt sources are combined
  const withSpares = mergeParts(parts.toArray()).map(part => ({
    ...part,
    quantity: roundUp(part.quantity * spareFactor)
  }));

  return { parts: withSpares, materials };
}
