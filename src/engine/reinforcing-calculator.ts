import { LookupTables } from '../data/loaders';
import { BomCategory, InsulationType, PartQuantity } from '../models/types';
import { TankDecomposition } from './dimensions';
import { roundDown } from './math';

export const CROSS_PLATE_1616 = 'WCP-1616SA4';
export const CROSS_PLATE_1780 = 'WCP-1780SA4';

/**
 * Everything a tier rule may read. Built once per calculation.
 */
export interface ReinforcingContext {
  /** 0 for the lowest band, +1 per height band; bands depend on shell insulation */
  tier: number;
  widthCount: number;
  lengthCount: number;
  partitions: number;
  totalLength: number;
  height: number;
  heightMm: number;
  /** W_C + L_O_C */
  perimeterUnits: number;
  /** Panel joints inside the width plus inside the length */
  innerJoints: number;
  /** Panel joints along the total length */
  lengthJoints: number;
  longTank: boolean;
}

interface Contribution {
  when: (ctx: ReinforcingContext) => boolean;
  amount: (ctx: ReinforcingContext) => number;
}

interface MemberRule {
  partNo: string | ((ctx: ReinforcingContext) => string);
  description: string;
  contributions: Contribution[];
}

const always = () => true;
const fromTier = (tier: number) => (ctx: ReinforcingContext) => ctx.tier >= tier;
const partitioned = (ctx: ReinforcingContext) => ctx.partitions > 0;
const perPartitionWidth = (ctx: ReinforcingContext, factor: number) =>
  roundDown(ctx.partitions * ctx.widthCount * factor);

export const EXTERNAL_RULES: readonly MemberRule[] = [
  {
    partNo: 'WFB-0950ZP',
    description: 'Reinforcing plate 950 edge',
    contributions: [
      { when: always, amount: ctx => 2 * ctx.perimeterUnits },
      { when: fromTier(2), amount: ctx => (2 * ctx.perimeterUnits + 4) * (ctx.tier - 1) },
      { when: fromTier(3), amount: ctx => 4 * (ctx.tier - 2) },
      { when: partitioned, amount: ctx => perPartitionWidth(ctx, ctx.longTank ? 1.6 : 1.4) }
    ]
  },
  {
    partNo: 'WFB-0880ZP',
    description: 'Reinforcing plate 880 partition',
    contributions: [{ when: ctx => partitioned(ctx) && ctx.tier >= 2, amount: ctx => 2 * ctx.partitions }]
  },
  {
    partNo: 'WFB-0950Z',
    description: 'Reinforcing plate 950',
    contributions: [{ when: fromTier(2), amount: ctx => 4 * Math.max(0, ctx.perimeterUnits - 1) * (ctx.tier - 1) }]
  },
  {
    partNo: 'WFB-0950ZL',
    description: 'Reinforcing plate 950 long',
    contributions: [{ when: fromTier(3), amount: ctx => 2 * ctx.innerJoints }]
  },
  {
    partNo: 'WFB-1200Z',
    description: 'Reinforcing plate 1200',
    contributions: [{ when: always, amount: ctx => 2 * ctx.innerJoints }]
  },
  {
    partNo: 'WCF-2000Z',
    description: 'Corner frame 2000',
    contributions: [
      { when: fromTier(3), amount: ctx => 4 * (ctx.tier - 1) },
      { when: ctx => ctx.tier === 2, amount: () => 4 }
    ]
  },
  {
    partNo: 'WCF-1000Z',
    description: 'Corner frame 1000',
    contributions: [{ when: ctx => ctx.tier === 2, amount: () => 4 }]
  },
  {
    partNo: ctx => `WCF-${ctx.heightMm}Z`,
    description: 'Corner frame',
    contributions: [{ when: ctx => ctx.tier <= 1, amount: () => 4 }]
  },
  {
    partNo: 'WCP-1780Z',
    description: 'Cross plate 1780',
    contributions: [
      { when: fromTier(1), amount: ctx => 4 * ctx.lengthJoints + 2 * ctx.partitions },
      { when: fromTier(2), amount: ctx => 8 * (ctx.tier - 1) ** 2 },
      { when: ctx => ctx.tier >= 3 && ctx.longTank, amount: ctx => roundDown((ctx.totalLength - 10) * 3.2) }
    ]
  },
  {
    partNo: 'WCP-1616Z',
    description: 'Cross plate 1616',
    contributions: [
      { when: fromTier(2), amount: ctx => ctx.lengthJoints * (ctx.longTank ? 3 : 4) * (ctx.tier - 1) }
    ]
  }
];

const partitionWall = (ctx: ReinforcingContext) => partitioned(ctx) && ctx.tier >= 2;

export const INTERNAL_RULES: readonly MemberRule[] = [
  {
    partNo: 'WCP-1760SA4',
    description: 'Tie rod bracket 1760',
    contributions: [
      { when: always, amount: ctx => 4 * ctx.lengthJoints },
      { when: partitioned, amount: ctx => perPartitionWidth(ctx, ctx.longTank ? 1.5 : 2) }
    ]
  },
  {
    partNo: 'WCP-17160SA4',
    description: 'Tie rod bracket 17160',
    contributions: [
      { when: fromTier(2), amount: ctx => 4 * ctx.lengthJoints * (ctx.tier - 1) },
      {
        when: ctx => partitioned(ctx) && ctx.tier >= 2,
        amount: ctx => perPartitionWidth(ctx, ctx.longTank ? 1.1 : 1.8) * (ctx.tier - 1)
      }
    ]
  },
  {
    partNo: 'WBR-9090SA4',
    description: 'Angle bracket 90x90',
    contributions: [
      { when: ctx => ctx.tier === 2, amount: () => 4 },
      { when: fromTier(3), amount: ctx => 4 * (ctx.tier + 3) + 13 * ctx.partitions }
    ]
  },
  {
    partNo: CROSS_PLATE_1616,
    description: 'Cross plate 1616 stainless',
    contributions: [{ when: partitionWall, amount: ctx => perPartitionWidth(ctx, ctx.tier >= 3 ? 1.8 : 0.9) }]
  },
  {
    partNo: CROSS_PLATE_1780,
    description: 'Cross plate 1780 stainless',
    contributions: [{ when: partitionWall, amount: ctx => perPartitionWidth(ctx, 0.9) }]
  },
  {
    partNo: 'WFB-0880SA4',
    description: 'Partition plate 880',
    contributions: [{ when: partitionWall, amount: ctx => perPartitionWidth(ctx, 0.9) }]
  },
  {
    partNo: 'WFB-0880PSA4',
    description: 'Partition plate 880P',
    contributions: [{ when: partitionWall, amount: ctx => perPartitionWidth(ctx, 1.1) }]
  },
  {
    partNo: 'WFB-0950SA4',
    description: 'Partition plate 950',
    contributions: [{ when: partitionWall, amount: ctx => perPartitionWidth(ctx, ctx.tier >= 3 ? 4.9 : 2) }]
  },
  {
    partNo: 'WFB-0950PSA4',
    description: 'Partition plate 950P',
    contributions: [{ when: ctx => partitionWall(ctx) && ctx.tier >= 3, amount: ctx => perPartitionWidth(ctx, 2.1) }]
  },
  {
    partNo: 'WFB-1200SA4',
    description: 'Partition plate 1200',
    contributions: [{ when: partitionWall, amount: ctx => perPartitionWidth(ctx, 0.9) }]
  }
];

export interface ReinforcingResult {
  external: PartQuantity[];
  internal: PartQuantity[];
  tier: number;
  /** Internal cross plates, read by the bolts calculator */
  crossPlate1616: number;
  crossPlate1780: number;
  tapeSubtotal: number;
}

export function isShellInsulated(insulation: InsulationType): boolean {
  return insulation === 'Insulated' || insulation === 'Insulated(Roof,Side)';
}

/**
 * Height band index. Plain shells pair 1.5/2, 2.5/3, 3.5/4, 4.5/5;
 * insulated shells pair 2/2.5, 3/3.5, 4/4.5.
 */
export function reinforcingTier(height: number, insulated: boolean): number {
  return insulated ? Math.ceil(height - 0.5) - 1 : Math.ceil(height) - 1;
}

export function buildReinforcingContext(dims: TankDecomposition, tier: number): ReinforcingContext {
  const widthCount = dims.width.count;
  const lengthCount = dims.totalLengthCount;
  return {
    tier,
    widthCount,
    lengthCount,
    partitions: dims.partitions,
    totalLength: dims.totalLength,
    height: dims.height.value,
    heightMm: Math.round(dims.height.value * 1000),
    perimeterUnits: widthCount + lengthCount,
    innerJoints: Math.max(0, widthCount - 1) + Math.max(0, lengthCount - 1),
    lengthJoints: Math.max(0, lengthCount - 1),
    longTank: dims.totalLength > 10
  };
}

export function evaluateRules(
  rules: readonly MemberRule[],
  ctx: ReinforcingContext,
  category: BomCategory
): PartQuantity[] {
  const totals = new Map<string, PartQuantity>();
  for (const rule of rules) {
    const quantity = rule.contributions
      .filter(contribution => contribution.when(ctx))
      .reduce((sum, contribution) => sum + contribution.amount(ctx), 0);
    if (quantity === 0) continue;

    const partNo = typeof rule.partNo === 'string' ? rule.partNo : rule.partNo(ctx);
    const existing = totals.get(partNo);
    if (existing) {
      existing.quantity += quantity;
    } else {
      totals.set(partNo, { partNo, description: rule.description, quantity, category });
    }
  }
  return [...totals.values()];
}

/**
 * Extra 50mm tape for mid-height seams, per whole metre of height above 3m.
 * Independent of the shell insulation.
 */
export function reinforcingTape(ctx: ReinforcingContext): number {
  if (ctx.height < 4) return 0;
  if (ctx.partitions === 0) {
    return Math.max(0, ctx.perimeterUnits - 3) * (Math.floor(ctx.height) - 3);
  }
  return ctx.longTank ? roundDown((ctx.totalLength - 10) * 5.8) : 0;
}

export function calculateReinforcing(
  dims: TankDecomposition,
  insulation: InsulationType,
  tables: LookupTables
): ReinforcingResult {
  const tier = reinforcingTier(dims.height.value, isShellInsulated(insulation));
  const ctx = buildReinforcingContext(dims, tier);

  const external = evaluateRules(EXTERNAL_RULES, ctx, 'External Reinforcing');
  // Internal members carry the tie rods, so they exist only where tie rods do
  const internal = tables.heightMultiplier(dims.height.value) > 0
    ? evaluateRules(INTERNAL_RULES, ctx, 'Internal Reinforcing')
    : [];

  const quantityOf = (partNo: string) =>
    internal.filter(part => part.partNo === partNo).reduce((sum, part) => sum + part.quantity, 0);

  return {
    external,
    internal,
    tier,
    crossPlate1616: quantityOf(CROSS_PLATE_1616),
    crossPlate1780: quantityOf(CROSS_PLATE_1780),
    tapeSubtotal: reinforcingTape(ctx)
  };
}
