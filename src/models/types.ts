// Core types for the tank BOM engine

export const TANK_HEIGHTS = [1.0, 1.5, 2.0, 2.5, 3.0, 3.5, 4.0, 4.5, 5.0] as const;

export const PRODUCT_TYPES = ['MNT', 'Not Included'] as const;
export const INSULATION_TYPES = [
  'Non-Insulated',
  'Insulated',
  'Insulated Roof Only',
  'Non-insulated(Roof Only)',
  'Insulated(Roof,Side)'
] as const;
export const STEEL_SKID_TYPES = ['Default', 'Angle 75', 'Channel 125', 'Channel 150', 'Except SKB'] as const;
export const BOLT_OPTIONS = [
  'EXT:HDG/INT:SS304+R/F:HDG',
  'EXT:HDG/INT:SS304+R/F:SS304',
  'EXT:SS304/INT:SS316',
  'EXT:HDG/INT:SS316',
  'EXT:SS304/INT:SS304',
  'EXT:SS316/INT:SS316',
  'Except All Bolts',
  'Except Panel Assemble Bolts'
] as const;
export const TIE_ROD_MATERIALS = ['SS304', 'SS316', 'SS304+PET coated', 'SS316+PE Coated'] as const;
export const TIE_ROD_SPECS = ['M12', 'M16', '3mH_Tie_Rod(1+1)', '3mH_Tie_Rod(2+1)'] as const;
export const LEVEL_INDICATORS = ['General', 'Sensor', 'No needed'] as const;
export const INTERNAL_LADDER_MATERIALS = ['GRP', 'SS304', 'SS316L'] as const;
export const EXTERNAL_LADDER_MATERIALS = ['HDG', 'SS304', 'SS316'] as const;

export type TankHeight = typeof TANK_HEIGHTS[number];
export type ProductType = typeof PRODUCT_TYPES[number];
export type InsulationType = typeof INSULATION_TYPES[number];
export type SteelSkidType = typeof STEEL_SKID_TYPES[number];
export type BoltOption = typeof BOLT_OPTIONS[number];
export type TieRodMaterial = typeof TIE_ROD_MATERIALS[number];
export type TieRodSpec = typeof TIE_ROD_SPECS[number];
export type LevelIndicator = typeof LEVEL_INDICATORS[number];
export type InternalLadderMaterial = typeof INTERNAL_LADDER_MATERIALS[number];
export type ExternalLadderMaterial = typeof EXTERNAL_LADDER_MATERIALS[number];

export interface TankGeometry {
  width: number;
  length1: number;
  length2: number;
  length3: number;
  length4: number;
  height: TankHeight;
  quantity: number;
}

export interface PanelOptions {
  productType: ProductType;
  insulation: InsulationType;
  useSidePanel1x1: boolean;
  usePartitionPanel1x1: boolean;
}

export interface SteelOptions {
  steelSkid: SteelSkidType;
  boltsNuts: BoltOption;
  tieRodMaterial: TieRodMaterial;
  tieRodSpec: TieRodSpec;
}

export interface AccessoryOptions {
  levelIndicator: LevelIndicator;
  internalLadderMaterial: InternalLadderMaterial;
  // -1 means "use the computed default"
  internalLadderQty: number;
  externalLadderMaterial: ExternalLadderMaterial;
  externalLadderQty: number;
}

export interface FittingSelection {
  fittingType: string;
  quantity: number;
  position: string;
}

export interface TankConfig {
  geometry: TankGeometry;
  panelOptions: PanelOptions;
  steelOptions: SteelOptions;
  accessoryOptions: AccessoryOptions;
  fittings: FittingSelection[];
  /** Add the standard drain, overflow and flange set sized by capacity */
  recommendedFittings: boolean;
  exchangeRate: number;
}

export type BomCategory =
  | 'Panels'
  | 'Steel Skid'
  | 'Bolts & Nuts'
  | 'External Reinforcing'
  | 'Internal Reinforcing'
  | 'Tie Rods'
  | 'ETC'
  | 'Fittings';

// Result ordering and summary ordering follow this list
export const BOM_CATEGORIES: readonly BomCategory[] = [
  'Panels',
  'Steel Skid',
  'Bolts & Nuts',
  'External Reinforcing',
  'Internal Reinforcing',
  'Tie Rods',
  'ETC',
  'Fittings'
];

/**
 * A single part emission from a calculator, before catalog resolution.
 */
export interface PartQuantity {
  partNo: string;
  description: string;
  quantity: number;
  category: BomCategory;
}

export interface PartLineItem {
  partNo: string;
  partName: string;
  quantity: number;
  category: BomCategory;
  unitPrice: number;
  unitWeight: number;
  totalPrice: number;
  totalWeight: number;
}

export interface CapacitySummary {
  nominalCapacity: number;
  actualCapacity: number;
  surfaceArea: number;
  partitionCount: number;
}

export interface CostSummary {
  byCategory: Record<BomCategory, number>;
  totalUsd: number;
  exchangeRate: number;
  totalLocal: number;
}

export interface WeightSummary {
  byCategory: Record<BomCategory, number>;
  totalKg: number;
}

export interface BomResult {
  capacity: CapacitySummary;
  lineItems: PartLineItem[];
  costSummary: CostSummary;
  weightSummary: WeightSummary;
}

export interface ValidationResult {
  isValid: boolean;
  violations: string[];
}

export interface BomReport {
  reference: string;
  config: TankConfig;
  bom: BomResult;
  generatedAt: string;
}
