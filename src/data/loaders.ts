import fs from 'fs';
import { parse } from 'csv-parse/sync';
import path from 'path';
import { config } from '../config';
import {
  InternalInvariantViolationError,
  InvalidGeometryError,
  UnknownCatalogPartError
} from '../errors';

export interface CatalogEntry {
  partNo: string;
  partName: string;
  unitPrice: number;
  unitWeight: number;
}

export interface FittingEntry {
  partNo: string;
  family: string;
  description: string;
  sizeMm: number;
}

export const PANEL_SLOTS = [
  'bottom_full',
  'bottom_partition',
  'bottom_half',
  'bottom_quarter',
  'drain',
  'side_top',
  'side_top_1x1',
  'side_half',
  'side_mid',
  'side_low',
  'partition_top',
  'partition_mid',
  'partition_low',
  'partition_full',
  'partition_full_1x1',
  'partition_half'
] as const;

export type PanelSlot = typeof PANEL_SLOTS[number];

/**
 * Read-only lookup tables shared by every calculation.
 */
export interface LookupTables {
  heightMultiplier(height: number): number;
  /** Nearest standard tie-rod length (mm) for a required length; ties go to the shorter rod. */
  tieRodLength(requiredMm: number): number;
  readonly maxTieRodLength: number;
  panelCode(height: number, slot: PanelSlot): string;
  hasPanelCode(height: number, slot: PanelSlot): boolean;
}

export interface PriceWeightCatalog {
  resolve(partNo: string): CatalogEntry;
  has(partNo: string): boolean;
  readonly size: number;
}

type CsvRow = Record<string, string>;

function readCsv(dataDir: string, fileName: string): CsvRow[] {
  const filePath = path.join(dataDir, fileName);
  const content = fs.readFileSync(filePath, 'utf-8');

  const records: CsvRow[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true
  });
  return records;
}

function parseNumber(value: string | undefined, fileName: string, column: string): number {
  const parsed = Number(value);
  if (value === undefined || value === '' || Number.isNaN(parsed)) {
    throw new Error(`${fileName}: column "${column}" has non-numeric value "${value ?? ''}"`);
  }
  return parsed;
}

function isPanelSlot(value: string): value is PanelSlot {
  return PANEL_SLOTS.some(slot => slot === value);
}

const heightKey = (height: number): string => height.toFixed(1);

export function loadHeightMultipliers(dataDir: string = config.dataDir): Map<string, number> {
  const file = 'height_multipliers.csv';
  const multipliers = new Map<string, number>();
  for (const row of readCsv(dataDir, file)) {
    multipliers.set(
      heightKey(parseNumber(row.height, file, 'height')),
      parseNumber(row.multiplier, file, 'multiplier')
    );
  }
  return multipliers;
}

export function loadTieRodLengths(dataDir: string = config.dataDir): number[] {
  const file = 'tie_rod_lengths.csv';
  return readCsv(dataDir, file)
    .map(row => parseNumber(row.length_mm, file, 'length_mm'))
    .sort((a, b) => a - b);
}

export function loadPanelCodes(dataDir: string = config.dataDir): Map<string, string> {
  const file = 'panel_codes.csv';
  const codes = new Map<string, string>();
  for (const row of readCsv(dataDir, file)) {
    const slot = row.slot ?? '';
    if (!isPanelSlot(slot)) {
      throw new Error(`${file}: unknown panel slot "${slot}"`);
    }
    codes.set(`${heightKey(parseNumber(row.height, file, 'height'))}:${slot}`, row.code ?? '');
  }
  return codes;
}

export function loadCatalog(dataDir: string = config.dataDir): CatalogEntry[] {
  const file = 'catalog.csv';
  return readCsv(dataDir, file).map(row => ({
    partNo: row.part_no ?? '',
    partName: row.part_name ?? '',
    unitPrice: parseNumber(row.unit_price_usd, file, 'unit_price_usd'),
    unitWeight: parseNumber(row.unit_weight_kg, file, 'unit_weight_kg')
  }));
}

export function loadFittings(dataDir: string = config.dataDir): FittingEntry[] {
  const file = 'fittings.csv';
  return readCsv(dataDir, file).map(row => ({
    partNo: row.part_no ?? '',
    family: row.family ?? '',
    description: row.description ?? '',
    sizeMm: parseNumber(row.size_mm, file, 'size_mm')
  }));
}

export function createLookupTables(
  multipliers: Map<string, number>,
  tieRodLengths: number[],
  panelCodes: Map<string, string>
): LookupTables {
  const lengths = [...tieRodLengths].sort((a, b) => a - b);
  if (lengths.length === 0) {
    throw new Error('Tie-rod length table is empty');
  }

  return Object.freeze({
    heightMultiplier(height: number): number {
      const multiplier = multipliers.get(heightKey(height));
      if (multiplier === undefined) {
        throw new InvalidGeometryError([`height ${height} has no multiplier entry`]);
      }
      return multiplier;
    },

    tieRodLength(requiredMm: number): number {
      let best = lengths[0];
      for (const candidate of lengths) {
        if (Math.abs(candidate - requiredMm) < Math.abs(best - requiredMm)) {
          best = candidate;
        }
      }
      return best;
    },

    maxTieRodLength: lengths[lengths.length - 1],

    panelCode(height: number, slot: PanelSlot): string {
      const code = panelCodes.get(`${heightKey(height)}:${slot}`);
      if (!code) {
        throw new InternalInvariantViolationError(`No panel code for height ${height}, slot ${slot}`);
      }
      return code;
    },

    hasPanelCode(height: number, slot: PanelSlot): boolean {
      return panelCodes.has(`${heightKey(height)}:${slot}`);
    }
  });
}

export function createCatalog(entries: CatalogEntry[]): PriceWeightCatalog {
  const byPartNo = new Map<string, CatalogEntry>();
  for (const entry of entries) {
    byPartNo.set(entry.partNo, Object.freeze({ ...entry }));
  }

  return Object.freeze({
    resolve(partNo: string): CatalogEntry {
      const entry = byPartNo.get(partNo);
      if (!entry) {
        throw new UnknownCatalogPartError(partNo);
      }
      return entry;
    },
    has(partNo: string): boolean {
      return byPartNo.has(partNo);
    },
    size: byPartNo.size
  });
}

export interface TankDataStore {
  tables: LookupTables;
  catalog: PriceWeightCatalog;
  fittings: FittingEntry[];
}

export function loadDataStore(dataDir: string = config.dataDir): TankDataStore {
  return {
    tables: createLookupTables(
      loadHeightMultipliers(dataDir),
      loadTieRodLengths(dataDir),
      loadPanelCodes(dataDir)
    ),
    catalog: createCatalog(loadCatalog(dataDir)),
    fittings: loadFittings(dataDir)
  };
}

// Preload all data once per process
const initial = loadDataStore();

export const DataStore = {
  ...initial,
  reload: (dataDir: string = config.dataDir) => {
    Object.assign(DataStore, loadDataStore(dataDir));
  }
};
