import { LookupTables, PriceWeightCatalog } from '../data/loaders';
import { BomResult, PartQuantity, TankConfig } from '../models/types';
import { assembleBom } from './bom-assembler';
import { BoltsResult, calculateBolts } from './bolts-calculator';
import { CalculationTraceLogger } from './calculation-trace';
import { TankDecomposition, decomposeTank } from './dimensions';
import { EtcResult, calculateEtc } from './etc-calculator';
import { recommendFittings, resolveFittings } from './fittings';
import { PanelResult, calculatePanels } from './panel-calculator';
import { ReinforcingResult, calculateReinforcing } from './reinforcing-calculator';
import { SteelSkidResult, calculateSteelSkid } from './steel-skid-calculator';
import { TieRodResult, calculateTieRods } from './tie-rod-calculator';

export const DEFAULT_SPARE_FACTOR = 1;

export interface EngineDependencies {
  tables: LookupTables;
  catalog: PriceWeightCatalog;
  /** Spare-stock multiplier applied to every bolt SKU */
  spareFactor?: number;
  trace?: CalculationTraceLogger;
}

export interface CalculatorOutputs {
  dims: TankDecomposition;
  panels: PanelResult;
  steelSkid: SteelSkidResult;
  tieRods: TieRodResult;
  reinforcing: ReinforcingResult;
  bolts: BoltsResult;
  etc: EtcResult;
  fittings: PartQuantity[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function runStage<T>(
  trace: CalculationTraceLogger | undefined,
  stage: string,
  run: () => T,
  lineCount: (result: T) => number
): T {
  const started = Date.now();
  try {
    const result = run();
    trace?.logStage(stage, lineCount(result), Date.now() - started);
    return result;
  } catch (error) {
    trace?.logStage(stage, 0, Date.now() - started, false, errorMessage(error));
    throw error;
  }
}

/**
 * Runs every calculator in dependency order.
 * Reinforcing feeds Bolts (cross plates); Panels and Reinforcing feed ETC (sealing tape).
 */
export function runCalculators(config: TankConfig, deps: EngineDependencies): CalculatorOutputs {
  const { tables, trace } = deps;
  const { geometry, panelOptions, steelOptions, accessoryOptions } = config;

  const dims = runStage(trace, 'dimensions', () => decomposeTank(geometry), () => 0);

  const panels = runStage(trace, 'panels', () => calculatePanels(dims, panelOptions, tables), r => r.parts.length);
  const steelSkid = runStage(
    trace,
    'steel-skid',
    () => calculateSteelSkid(dims, steelOptions.steelSkid),
    r => r.parts.length
  );
  const tieRods = runStage(
    trace,
    'tie-rods',
    () => calculateTieRods(dims, steelOptions.tieRodMaterial, steelOptions.tieRodSpec, tables),
    r => r.parts.length
  );
  const reinforcing = runStage(
    trace,
    'reinforcing',
    () => calculateReinforcing(dims, panelOptions.insulation, tables),
    r => r.external.length + r.internal.length
  );
  const bolts = runStage(
    trace,
    'bolts',
    () =>
      calculateBolts({
        dims,
        option: steelOptions.boltsNuts,
        steelSkid,
        reinforcing,
        spareFactor: deps.spareFactor ?? DEFAULT_SPARE_FACTOR
      }),
    r => r.parts.length
  );
  const etc = runStage(
    trace,
    'etc',
    () => calculateEtc({ dims, options: accessoryOptions, panels, reinforcing }),
    r => r.parts.length
  );
  const fittings = runStage(
    trace,
    'fittings',
    () => resolveFittings(config.recommendedFittings ? [...recommendFittings(dims), ...config.fittings] : config.fittings),
    r => r.length
  );

  return { dims, panels, steelSkid, tieRods, reinforcing, bolts, etc, fittings };
}

export function collectParts(outputs: CalculatorOutputs): PartQuantity[] {
  return [
    ...outputs.panels.parts,
    ...outputs.steelSkid.parts,
    ...outputs.bolts.parts,
    ...outputs.reinforcing.external,
    ...outputs.reinforcing.internal,
    ...outputs.tieRods.parts,
    ...outputs.etc.parts,
    ...outputs.fittings
  ];
}

export function calculateBom(config: TankConfig, deps: EngineDependencies): BomResult {
  const outputs = runCalculators(config, deps);

  const bom = runStage(
    deps.trace,
    'assembly',
    () =>
      assembleBom({
        parts: collectParts(outputs),
        dims: outputs.dims,
        tankQuantity: config.geometry.quantity,
        exchangeRate: config.exchangeRate,
        catalog: deps.catalog
      }),
    r => r.lineItems.length
  );

  deps.trace?.complete({ line_items: bom.lineItems.length, total_usd: bom.costSummary.totalUsd });
  return bom;
}
