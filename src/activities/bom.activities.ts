import { DataStore } from '../data/loaders';
import { config } from '../config';
import { BomReport, BomResult, TankConfig, ValidationResult } from '../models/types';
import { parseTankConfig, validateTankConfig } from '../models/schemas';
import { calculateBom } from '../engine/calculation-engine';
import { CalculationTraceLogger } from '../engine/calculation-trace';
import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

function schemaOptions() {
  return {
    fittingTypes: DataStore.fittings.map(fitting => fitting.partNo),
    defaultExchangeRate: config.defaultExchangeRate
  };
}

/**
 * Activity to check a raw request without throwing
 */
export async function checkTankRequest(request: unknown): Promise<ValidationResult> {
  return validateTankConfig(request, schemaOptions());
}

/**
 * Activity to turn a raw request into a complete tank configuration
 */
export async function validateTankRequest(request: unknown): Promise<TankConfig> {
  return parseTankConfig(request, schemaOptions());
}

export interface CalculateOptions {
  saveTrace?: boolean;
  runsDir?: string;
}

/**
 * Activity to derive and price the bill of materials
 */
export async function calculateTankBom(
  tankConfig: TankConfig,
  reference: string,
  options: CalculateOptions = {}
): Promise<BomResult> {
  const trace = new CalculationTraceLogger(reference, describeTank(tankConfig));

  try {
    return calculateBom(tankConfig, {
      tables: DataStore.tables,
      catalog: DataStore.catalog,
      spareFactor: config.boltSpareFactor,
      trace
    });
  } finally {
    console.log(trace.getSummary());
    if (options.saveTrace) {
      const tracePath = trace.save(options.runsDir ?? config.runsDir);
      console.log(`Trace saved to: ${tracePath}`);
    }
  }
}

/**
 * Activity to write the report as JSON and Markdown, returning the Markdown path
 */
export async function persistBomReport(report: BomReport, runsDir: string = config.runsDir): Promise<string> {
  if (!fs.existsSync(runsDir)) {
    fs.mkdirSync(runsDir, { recursive: true });
  }

  const timestamp = report.generatedAt.replace(/[:.]/g, '-');
  const filename = `bom-${timestamp}-${uuidv4().substring(0, 8)}.md`;
  const markdownPath = path.join(runsDir, filename);

  fs.writeFileSync(markdownPath.replace(/\.md$/, '.json'), JSON.stringify(report, null, 2), 'utf-8');
  fs.writeFileSync(markdownPath, generateMarkdown(report), 'utf-8');

  return markdownPath;
}

export function describeTank(tankConfig: TankConfig): string {
  const { geometry } = tankConfig;
  const lengths = [geometry.length1, geometry.length2, geometry.length3, geometry.length4].filter(l => l > 0);
  return `${geometry.width} x ${lengths.join('+')} x ${geometry.height}`;
}

/**
 * Helper function to render a report as Markdown
 */
export function generateMarkdown(report: BomReport): string {
  const { reference, config: tankConfig, bom } = report;
  const { geometry, panelOptions, steelOptions, accessoryOptions } = tankConfig;

  let markdown = `# Tank Bill of Materials

## Reference
- **Reference:** ${reference}
- **Tank (W x L x H, m):** ${describeTank(tankConfig)}
- **Quantity:** ${geometry.quantity}

## Options
- **Product:** ${panelOptions.productType} (${panelOptions.insulation})
- **Steel Skid:** ${steelOptions.steelSkid}
- **Bolts & Nuts:** ${steelOptions.boltsNuts}
- **Tie Rods:** ${steelOptions.tieRodSpec} ${steelOptions.tieRodMaterial}
- **Level Indicator:** ${accessoryOptions.levelIndicator}
- **Ladders:** internal ${accessoryOptions.internalLadderMaterial}, external ${accessoryOptions.externalLadderMaterial}

## Capacity
- **Nominal:** ${bom.capacity.nominalCapacity} m3
- **Actual:** ${bom.capacity.actualCapacity} m3
- **Surface Area:** ${bom.capacity.surfaceArea} m2
- **Partitions:** ${bom.capacity.partitionCount}
`;

  markdown += `
## Bill of Materials
| Category | Part No | Name | Quantity | Unit Price | Total Price | Total Weight (kg) |
|----------|---------|------|----------|------------|-------------|-------------------|
`;
  bom.lineItems.forEach(item => {
    markdown += `| ${item.category} | ${item.partNo} | ${item.partName} | ${item.quantity} | $${item.unitPrice.toFixed(2)} | $${item.totalPrice.toFixed(2)} | ${item.totalWeight.toFixed(2)} |\n`;
  });

  markdown += `
## Cost Summary
`;
  for (const [category, subtotal] of Object.entries(bom.costSummary.byCategory)) {
    markdown += `- **${category}:** $${subtotal.toFixed(2)}\n`;
  }
  markdown += `- **Total (USD):** $${bom.costSummary.totalUsd.toFixed(2)}\n`;
  markdown += `- **Total (local, rate ${bom.costSummary.exchangeRate}):** ${bom.costSummary.totalLocal.toFixed(2)}\n`;

  markdown += `
## Weight Summary
- **Total:** ${bom.weightSummary.totalKg.toFixed(2)} kg
`;

  markdown += `
---
*Generated on ${report.generatedAt}*\n`;

  return markdown;
}
