import { z } from 'zod';
import { InvalidGeometryError, UnresolvedOptionError } from '../errors';
import {
  BOLT_OPTIONS,
  EXTERNAL_LADDER_MATERIALS,
  INSULATION_TYPES,
  INTERNAL_LADDER_MATERIALS,
  LEVEL_INDICATORS,
  PRODUCT_TYPES,
  STEEL_SKID_TYPES,
  TANK_HEIGHTS,
  TIE_ROD_MATERIALS,
  TIE_ROD_SPECS,
  TankConfig,
  TankHeight,
  ValidationResult
} from './types';

/**
 * Input schemas for a tank BOM request
 */

export const MAX_DIMENSION = 20;
export const MAX_LADDER_QTY = 5;

const onHalfGrid = (value: number) => Number.isInteger(value * 2);

export function isTankHeight(value: number): value is TankHeight {
  return TANK_HEIGHTS.some(height => height === value);
}

const dimension = (min: number) =>
  z.number()
    .min(min)
    .max(MAX_DIMENSION)
    .refine(onHalfGrid, { message: 'must be a multiple of 0.5' });

export const TankGeometrySchema = z.object({
  width: dimension(0.5).describe('Tank width in metres'),
  length1: dimension(0.5).describe('First compartment length in metres'),
  length2: dimension(0).default(0),
  length3: dimension(0).default(0),
  length4: dimension(0).default(0),
  height: z.number().refine(isTankHeight, { message: `must be one of ${TANK_HEIGHTS.join(', ')}` }),
  quantity: z.number().int().min(1).default(1)
});

export const PanelOptionsSchema = z.object({
  productType: z.enum(PRODUCT_TYPES).default('MNT'),
  insulation: z.enum(INSULATION_TYPES).default('Non-Insulated'),
  useSidePanel1x1: z.boolean().default(false),
  usePartitionPanel1x1: z.boolean().default(false)
});

export const SteelOptionsSchema = z.object({
  steelSkid: z.enum(STEEL_SKID_TYPES).default('Default'),
  boltsNuts: z.enum(BOLT_OPTIONS).default('EXT:HDG/INT:SS316'),
  tieRodMaterial: z.enum(TIE_ROD_MATERIALS).default('SS316'),
  tieRodSpec: z.enum(TIE_ROD_SPECS).default('M12')
});

const ladderQuantity = z.number().int().min(-1).max(MAX_LADDER_QTY).default(-1);

export const AccessoryOptionsSchema = z.object({
  levelIndicator: z.enum(LEVEL_INDICATORS).default('General'),
  internalLadderMaterial: z.enum(INTERNAL_LADDER_MATERIALS).default('GRP'),
  internalLadderQty: ladderQuantity,
  externalLadderMaterial: z.enum(EXTERNAL_LADDER_MATERIALS).default('HDG'),
  externalLadderQty: ladderQuantity
});

export interface TankConfigSchemaOptions {
  fittingTypes: readonly string[];
  defaultExchangeRate: number;
}

export function createTankConfigSchema(options: TankConfigSchemaOptions) {
  const FittingSelectionSchema = z.object({
    fittingType: z.string().refine(type => options.fittingTypes.includes(type), {
      message: 'is not a known fitting type'
    }),
    quantity: z.number().int().min(0),
    position: z.string().default('')
  });

  return z.object({
    geometry: TankGeometrySchema,
    panelOptions: PanelOptionsSchema.default({}),
    steelOptions: SteelOptionsSchema.default({}),
    accessoryOptions: AccessoryOptionsSchema.default({}),
    fittings: z.array(FittingSelectionSchema).default([]),
    recommendedFittings: z.boolean().default(false),
    exchangeRate: z.number().positive().default(options.defaultExchangeRate)
  });
}

export type TankConfigInput = z.input<ReturnType<typeof createTankConfigSchema>>;

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : 'request';
  return `${where}: ${issue.message}`;
}

function isGeometryIssue(issue: z.ZodIssue): boolean {
  return issue.path.length === 0 || issue.path[0] === 'geometry';
}

/**
 * Parses a raw request into a complete configuration.
 * Geometry problems are reported before option problems.
 */
export function parseTankConfig(input: unknown, options: TankConfigSchemaOptions): TankConfig {
  const result = createTankConfigSchema(options).safeParse(input);
  if (result.success) {
    return result.data;
  }

  const geometryIssues = result.error.issues.filter(isGeometryIssue);
  if (geometryIssues.length > 0) {
    throw new InvalidGeometryError(geometryIssues.map(formatIssue));
  }
  throw new UnresolvedOptionError(result.error.issues.map(formatIssue));
}

export function validateTankConfig(input: unknown, options: TankConfigSchemaOptions): ValidationResult {
  const result = createTankConfigSchema(options).safeParse(input);
  return {
    isValid: result.success,
    violations: result.success ? [] : result.error.issues.map(formatIssue)
  };
}
