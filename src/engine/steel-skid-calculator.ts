import { PartQuantity, SteelSkidType } from '../models/types';
import { TankDecomposition } from './dimensions';
import { roundDown, roundUp } from './math';
import { PartList } from './part-list';

export type SkidFamily = 'angle75' | 'channel125' | 'channel150';

interface SkidProfile {
  label: string;
  mainConnector: string;
  crossConnector: string;
  mainFrame: string;
  widthFrame: string;
  /** Side width-frame class used when the rounded width is odd */
  oddSideClass: string;
  sideSubFrame: string;
  cornerSubFrame: string;
}

const SKID_PROFILES: Record<SkidFamily, SkidProfile> = {
  angle75: {
    label: 'angle 75',
    mainConnector: 'WBR-7575Z',
    crossConnector: 'WBR-0240Z',
    mainFrame: 'AL',
    widthFrame: 'AS',
    oddSideClass: '1570',
    sideSubFrame: 'WFF-0957AMZ',
    cornerSubFrame: 'WFF-1063AMZ'
  },
  channel125: {
    label: 'channel 125',
    mainConnector: 'WBR-0120Z',
    crossConnector: 'WBR-21590Z',
    mainFrame: 'CL',
    widthFrame: 'CS',
    oddSideClass: '1560',
    sideSubFrame: 'WFF-0962AMZ',
    cornerSubFrame: 'WFF-1053AMZ'
  },
  channel150: {
    label: 'channel 150',
    mainConnector: 'WBR-0150Z',
    crossConnector: 'WBR-22310Z',
    mainFrame: 'HCL',
    widthFrame: 'HCS',
    oddSideClass: '1560',
    sideSubFrame: 'WFF-0962AMZ',
    cornerSubFrame: 'WFF-1053AMZ'
  }
};

const EVEN_SIDE_CLASS = '2060';
const CENTER_SUB_FRAME = 'WFF-0994AMZ';
const LINER = 'LNR-3.0T';
const ANCHOR = 'WBR-5010Z';

// Liner sheet density per skid grid cell
export const LINER_FACTOR = 4.6;

export interface SteelSkidResult {
  parts: PartQuantity[];
  family: SkidFamily;
  excluded: boolean;
}

export function resolveSkidFamily(skidType: SteelSkidType, height: number): SkidFamily {
  switch (skidType) {
    case 'Angle 75':
      return 'angle75';
    case 'Channel 125':
      return 'channel125';
    case 'Channel 150':
      return 'channel150';
    case 'Default':
    case 'Except SKB':
      if (height > 4.3) return 'channel150';
      if (height > 2.5) return 'channel125';
      return 'angle75';
  }
}

export function calculateSteelSkid(dims: TankDecomposition, skidType: SteelSkidType): SteelSkidResult {
  const family = resolveSkidFamily(skidType, dims.height.value);
  const profile = SKID_PROFILES[family];
  const width = dims.width.value;
  const totalLength = dims.totalLength;
  const wc = dims.width.count;
  const lc = dims.totalLengthCount;

  const parts = new PartList('Steel Skid');

  // Connectors
  parts
    .add(profile.mainConnector, `Main connector ${profile.label}`, roundDown((width + 1) * 2))
    .add(profile.crossConnector, `Cross connector ${profile.label}`, width > 5 || totalLength > 5 ? 8 : 4);

  // Main frames run the length in 2m and 1m pieces, one line per width grid line
  const lengthUnits = Math.ceil(totalLength);
  const frameLines = wc + 1;
  parts
    .add(`WFF-1990${profile.mainFrame}Z`, `Main frame 1990 ${profile.label}`, Math.floor(lengthUnits / 2) * frameLines)
    .add(`WFF-0990${profile.mainFrame}Z`, `Main frame 990 ${profile.label}`, (lengthUnits % 2) * frameLines);

  // Width frames: parity of the rounded width picks the side class and the centre run
  if (width >= 2) {
    const widthUnits = Math.ceil(width);
    const centreFrame = `WFF-2000${profile.widthFrame}Z`;
    if (widthUnits < 3) {
      parts.add(centreFrame, `Width frame centre ${profile.label}`, 2);
    } else {
      const odd = widthUnits % 2 === 1;
      const sideClass = odd ? profile.oddSideClass : EVEN_SIDE_CLASS;
      const centrePerRow = odd ? (widthUnits - 3) / 2 : (widthUnits - 4) / 2;
      parts
        .add(centreFrame, `Width frame centre ${profile.label}`, 2 * centrePerRow)
        .add(`WFF-${sideClass}${profile.widthFrame}ZR`, `Width frame side ${sideClass} right`, 2)
        .add(`WFF-${sideClass}${profile.widthFrame}ZL`, `Width frame side ${sideClass} left`, 2);
    }
  }

  // Sub frames between main frame joints
  const joints = Math.max(0, lc - 1);
  parts
    .add(profile.sideSubFrame, 'Sub frame side', 2 * joints)
    .add(profile.cornerSubFrame, 'Sub frame corner', joints)
    .add(CENTER_SUB_FRAME, 'Sub frame centre', Math.max(0, wc - 3) * joints);

  parts
    .add(LINER, 'Rubber liner', roundUp((Math.ceil(width) + 1) * (lengthUnits + 1) * LINER_FACTOR))
    .add(ANCHOR, 'Anchor bracket', roundDown(width + totalLength) * (dims.height.value >= 4 ? 2 : 1));

  const excluded = skidType === 'Except SKB';
  const computed = parts.toArray();

  return {
    // An excluded skid keeps every line so the category still reports, all at zero
    parts: excluded ? computed.map(part => ({ ...part, quantity: 0 })) : computed,
    family,
    excluded
  };
}
