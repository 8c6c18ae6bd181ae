import { AccessoryOptions, PartQuantity } from '../models/types';
import { TankDecomposition } from './dimensions';
import { roundDown, roundUp } from './math';
import { PanelResult } from './panel-calculator';
import { PartList } from './part-list';
import { ReinforcingResult } from './reinforcing-calculator';

export const SEALING_TAPE_50 = 'WST-0050RO';
export const SEALING_TAPE_120 = 'WST-0120RO';
export const SILICONE = 'Silicon';

const SMALL_VENT_CAPACITY = 100;
const ROOF_AREA_PER_VENT = 30;
export const DEFAULT_QUANTITY = -1;

export interface EtcInput {
  dims: TankDecomposition;
  options: AccessoryOptions;
  panels: PanelResult;
  reinforcing: ReinforcingResult;
}

export interface EtcResult {
  parts: PartQuantity[];
  sealingTape50: number;
  sealingTape120: number;
}

const heightCode = (height: number) => String(Math.round(height * 1000)).padStart(4, '0');

export function roofSupporters(dims: TankDecomposition): number {
  if (dims.partitions > 0) {
    return roundDown((dims.width.count * dims.totalLengthCount) / 5) + (dims.totalLength > 10 ? 2 : 0);
  }
  const width = dims.width.value;
  const length = dims.totalLength;
  if (length <= 1 || width <= 1) return 0;
  return roundUp(((width - 1) * (length - 1)) / 4);
}

export function calculateEtc(input: EtcInput): EtcResult {
  const { dims, options, panels, reinforcing } = input;
  const height = dims.height.value;
  const width = dims.width.value;
  const totalLength = dims.totalLength;
  const compartments = dims.partitions + 1;
  const mm = heightCode(height);

  const parts = new PartList('ETC');

  const nominalCapacity = width * totalLength * height;
  parts.add(
    nominalCapacity < SMALL_VENT_CAPACITY ? 'WAV-0050A' : 'WAV-0100A',
    'Air vent',
    Math.max(compartments, roundUp((width * totalLength) / ROOF_AREA_PER_VENT))
  );

  parts.add(`WRS-${mm}F`, 'Roof supporter', roofSupporters(dims));

  const internalLadders =
    options.internalLadderQty === DEFAULT_QUANTITY ? compartments : options.internalLadderQty;
  const externalLadders = options.externalLadderQty === DEFAULT_QUANTITY ? 1 : options.externalLadderQty;
  parts
    .add(`WLD-${mm}${options.internalLadderMaterial === 'GRP' ? 'FI' : 'SI'}`, 'Internal ladder', internalLadders)
    .add(`WLD-${mm}${options.externalLadderMaterial === 'HDG' ? 'ZO' : 'SO'}`, 'External ladder', externalLadders);

  parts.add(SILICONE, 'Silicone sealant', Math.max(1, roundUp(0.1 * width * totalLength)));

  switch (options.levelIndicator) {
    case 'General':
      parts.add(`WLV-${mm}SET(G)`, 'Level indicator gauge set', compartments);
      break;
    case 'Sensor':
      parts.add('WLV-0000SET(S)', 'Level indicator sensor set', compartments);
      break;
    case 'No needed':
      break;
  }

  const sealingTape50 = panels.tapeSubtotal + reinforcing.tapeSubtotal;
  const sealingTape120 = roundDown(4 * height + 1);
  parts
    .add(SEALING_TAPE_50, 'Sealing tape 50mm', sealingTape50)
    .add(SEALING_TAPE_120, 'Sealing tape 120mm', sealingTape120);

  return { parts: parts.toArray(), sealingTape50, sealingTape120 };
}
