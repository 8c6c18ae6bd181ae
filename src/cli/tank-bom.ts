#!/usr/bin/env node
import { config } from '../config';
import { Connection, WorkflowClient } from '@temporalio/client';
import { Command, InvalidArgumentError } from 'commander';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { nanoid } from 'nanoid';
import { bomWorkflow } from '../workflows/bom.workflow';
import {
  calculateTankBom,
  describeTank,
  persistBomReport,
  validateTankRequest
} from '../activities/bom.activities';
import { DataStore } from '../data/loaders';
import { BomError, InvalidGeometryError, UnresolvedOptionError } from '../errors';
import {
  BOLT_OPTIONS,
  BOM_CATEGORIES,
  BomReport,
  EXTERNAL_LADDER_MATERIALS,
  FittingSelection,
  INSULATION_TYPES,
  INTERNAL_LADDER_MATERIALS,
  LEVEL_INDICATORS,
  PRODUCT_TYPES,
  STEEL_SKID_TYPES,
  TANK_HEIGHTS,
  TIE_ROD_MATERIALS,
  TIE_ROD_SPECS
} from '../models/types';
import { TankConfigInput } from '../models/schemas';

interface CalculateCliOptions {
  width: number;
  length1: number;
  length2: number;
  length3: number;
  length4: number;
  height: number;
  quantity: number;
  productType?: string;
  insulation?: string;
  side1x1?: boolean;
  partition1x1?: boolean;
  steelSkid?: string;
  bolts?: string;
  tieRodMaterial?: string;
  tieRodSpec?: string;
  levelIndicator?: string;
  internalLadder?: string;
  internalLadderQty?: number;
  externalLadder?: string;
  externalLadderQty?: number;
  fitting: FittingSelection[];
  recommendedFittings?: boolean;
  exchangeRate?: number;
  json?: boolean;
  trace?: boolean;
  save?: boolean;
  submit?: boolean;
}

function parseNumberArg(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

// TYPE[:QTY][@POSITION], e.g. WFL-100A:2@inlet
function collectFitting(value: string, previous: FittingSelection[]): FittingSelection[] {
  const match = /^([^:@]+)(?::(\d+))?(?:@(.+))?$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError('Expected TYPE[:QTY][@POSITION].');
  }
  return [
    ...previous,
    { fittingType: match[1], quantity: match[2] ? Number(match[2]) : 1, position: match[3] ?? '' }
  ];
}

function buildRequest(options: CalculateCliOptions): unknown {
  // Undefined fields fall back to the schema defaults
  return {
    geometry: {
      width: options.width,
      length1: options.length1,
      length2: options.length2,
      length3: options.length3,
      length4: options.length4,
      height: options.height,
      quantity: options.quantity
    },
    panelOptions: {
      productType: options.productType,
      insulation: options.insulation,
      useSidePanel1x1: options.side1x1,
      usePartitionPanel1x1: options.partition1x1
    },
    steelOptions: {
      steelSkid: options.steelSkid,
      boltsNuts: options.bolts,
      tieRodMaterial: options.tieRodMaterial,
      tieRodSpec: options.tieRodSpec
    },
    accessoryOptions: {
      levelIndicator: options.levelIndicator,
      internalLadderMaterial: options.internalLadder,
      internalLadderQty: options.internalLadderQty,
      externalLadderMaterial: options.externalLadder,
      externalLadderQty: options.externalLadderQty
    },
    fittings: options.fitting,
    recommendedFittings: options.recommendedFittings,
    exchangeRate: options.exchangeRate
  };
}

function printReport(report: BomReport): void {
  const { bom } = report;

  console.log(chalk.blue(`\n=== Tank ${describeTank(report.config)} (${report.reference}) ===`));
  console.log(
    `Capacity: ${bom.capacity.nominalCapacity} m3 nominal, ${bom.capacity.actualCapacity} m3 actual, ` +
    `${bom.capacity.partitionCount} partition(s)`
  );

  for (const category of BOM_CATEGORIES) {
    const items = bom.lineItems.filter(item => item.category === category);
    if (items.length === 0) continue;
    console.log(chalk.blue(`\n--- ${category} ---`));
    items.forEach(item => {
      console.log(`${String(item.quantity).padStart(6)} x ${item.partNo.padEnd(16)} ${item.partName}: $${item.totalPrice.toFixed(2)}`);
    });
  }

  console.log(chalk.blue('\n=== Summary ==='));
  console.log(`Line items: ${bom.lineItems.length}`);
  console.log(`Total weight: ${bom.weightSummary.totalKg.toFixed(2)} kg`);
  console.log(chalk.green(`Total: $${bom.costSummary.totalUsd.toFixed(2)} (local ${bom.costSummary.totalLocal.toFixed(2)} @ ${bom.costSummary.exchangeRate})`));
}

function reportError(error: unknown): void {
  if (error instanceof InvalidGeometryError || error instanceof UnresolvedOptionError) {
    console.error(chalk.red(`\n${error.name}:`));
    error.issues.forEach(issue => console.error(chalk.red(`  - ${issue}`)));
  } else if (error instanceof BomError) {
    console.error(chalk.red(`\n${error.name}: ${error.message}`));
  } else {
    console.error(chalk.red('\nError generating BOM:'), error);
  }
  process.exitCode = 1;
}

async function runLocally(request: unknown, options: { trace?: boolean; save?: boolean }): Promise<BomReport> {
  const reference = `tank-bom-${nanoid()}`;
  const tankConfig = await validateTankRequest(request);
  const bom = await calculateTankBom(tankConfig, reference, { saveTrace: options.trace });
  const report: BomReport = { reference, config: tankConfig, bom, generatedAt: new Date().toISOString() };

  if (options.save) {
    const savedPath = await persistBomReport(report);
    console.log(chalk.green(`✓ Report saved to: ${savedPath}`));
  }
  return report;
}

async function runOnTemporal(request: unknown, saveTrace: boolean): Promise<BomReport> {
  const connection = await Connection.connect({ address: config.temporalAddress });
  const client = new WorkflowClient({ connection });
  const workflowId = `tank-bom-${nanoid()}`;

  const handle = await client.start(bomWorkflow, {
    taskQueue: config.taskQueue,
    workflowId,
    args: [{ reference: workflowId, request, saveTrace }]
  });
  console.log(chalk.blue(`Workflow started: ${workflowId}`));

  return handle.result();
}

async function calculate(options: CalculateCliOptions): Promise<void> {
  try {
    const request = buildRequest(options);
    const report = options.submit
      ? await runOnTemporal(request, Boolean(options.trace))
      : await runLocally(request, options);

    if (options.json) {
      console.log(JSON.stringify(report.bom, null, 2));
    } else {
      printReport(report);
    }
  } catch (error) {
    reportError(error);
    if (options.submit) {
      console.log(chalk.yellow('\nMake sure:'));
      console.log('1. Temporal server is running');
      console.log('2. Worker is running (npm run worker)');
    }
  }
}

interface InteractiveAnswers {
  width: number;
  lengths: string;
  height: number;
  quantity: number;
  steelSkid: string;
  boltsNuts: string;
  insulation: string;
  levelIndicator: string;
  recommendedFittings: boolean;
}

async function interactive(): Promise<void> {
  console.log(chalk.blue('\n=== Tank BOM Configurator ===\n'));

  const answers = await inquirer.prompt<InteractiveAnswers>([
    { type: 'number', name: 'width', message: 'Width (m):', default: 5 },
    {
      type: 'input',
      name: 'lengths',
      message: 'Compartment lengths (m, up to 4, e.g. "4+2+2"):',
      default: '5',
      validate: (input: string) => /^\d+(\.5)?(\+\d+(\.5)?){0,3}$/.test(input.trim()) || 'Use lengths like 5 or 4+2+2'
    },
    {
      type: 'list',
      name: 'height',
      message: 'Height (m):',
      choices: TANK_HEIGHTS.map(height => ({ name: height.toFixed(1), value: height })),
      default: 2.0
    },
    { type: 'number', name: 'quantity', message: 'Number of tanks:', default: 1 },
    { type: 'list', name: 'insulation', message: 'Insulation:', choices: [...INSULATION_TYPES] },
    { type: 'list', name: 'steelSkid', message: 'Steel skid:', choices: [...STEEL_SKID_TYPES] },
    { type: 'list', name: 'boltsNuts', message: 'Bolts & nuts:', choices: [...BOLT_OPTIONS], default: 'EXT:HDG/INT:SS316' },
    { type: 'list', name: 'levelIndicator', message: 'Level indicator:', choices: [...LEVEL_INDICATORS] },
    { type: 'confirm', name: 'recommendedFittings', message: 'Add the standard fitting set?', default: true }
  ]);

  const lengths = answers.lengths.trim().split('+').map(Number);
  const geometry: TankConfigInput['geometry'] = {
    width: answers.width,
    length1: lengths[0] ?? 0,
    length2: lengths[1] ?? 0,
    length3: lengths[2] ?? 0,
    length4: lengths[3] ?? 0,
    height: answers.height,
    quantity: answers.quantity
  };

  try {
    const report = await runLocally(
      {
        geometry,
        panelOptions: { insulation: answers.insulation },
        steelOptions: { steelSkid: answers.steelSkid, boltsNuts: answers.boltsNuts },
        accessoryOptions: { levelIndicator: answers.levelIndicator },
        recommendedFittings: answers.recommendedFittings
      },
      { save: true }
    );
    printReport(report);
  } catch (error) {
    reportError(error);
  }
}

function listOptions(): void {
  const groups: Array<[string, readonly (string | number)[]]> = [
    ['Heights (m)', TANK_HEIGHTS],
    ['Product types', PRODUCT_TYPES],
    ['Insulation', INSULATION_TYPES],
    ['Steel skid', STEEL_SKID_TYPES],
    ['Bolts & nuts', BOLT_OPTIONS],
    ['Tie rod material', TIE_ROD_MATERIALS],
    ['Tie rod spec', TIE_ROD_SPECS],
    ['Level indicator', LEVEL_INDICATORS],
    ['Internal ladder', INTERNAL_LADDER_MATERIALS],
    ['External ladder', EXTERNAL_LADDER_MATERIALS],
    ['Fittings', DataStore.fittings.map(f => `${f.partNo} (${f.description} ${f.sizeMm}A)`)]
  ];
  for (const [label, values] of groups) {
    console.log(chalk.blue(`${label}:`));
    values.forEach(value => console.log(`  - ${value}`));
  }
}

// CLI setup
const program = new Command();

program
  .name('tank-bom')
  .description('Panel tank bill-of-materials calculator')
  .version('1.0.0');

program
  .command('calculate')
  .description('Derive the BOM for one tank configuration')
  .requiredOption('--width <m>', 'Tank width', parseNumberArg)
  .requiredOption('--length1 <m>', 'First compartment length', parseNumberArg)
  .option('--length2 <m>', 'Second compartment length (0 = none)', parseNumberArg, 0)
  .option('--length3 <m>', 'Third compartment length (0 = none)', parseNumberArg, 0)
  .option('--length4 <m>', 'Fourth compartment length (0 = none)', parseNumberArg, 0)
  .requiredOption('--height <m>', 'Tank height', parseNumberArg)
  .option('--quantity <n>', 'Number of identical tanks', parseNumberArg, 1)
  .option('--product-type <type>', 'Panel product type')
  .option('--insulation <type>', 'Insulation type')
  .option('--side-1x1', 'Use 1x1 side panels')
  .option('--partition-1x1', 'Use 1x1 partition panels')
  .option('--steel-skid <type>', 'Steel skid family')
  .option('--bolts <option>', 'Bolt material combination')
  .option('--tie-rod-material <material>', 'Tie rod material')
  .option('--tie-rod-spec <spec>', 'Tie rod spec')
  .option('--level-indicator <type>', 'Level indicator type')
  .option('--internal-ladder <material>', 'Internal ladder material')
  .option('--internal-ladder-qty <n>', 'Internal ladder quantity (-1 = default)', parseNumberArg)
  .option('--external-ladder <material>', 'External ladder material')
  .option('--external-ladder-qty <n>', 'External ladder quantity (-1 = default)', parseNumberArg)
  .option('--fitting <spec>', 'Fitting as TYPE[:QTY][@POSITION], repeatable', collectFitting, [])
  .option('--recommended-fittings', 'Add the standard drain, overflow and flange set for the capacity')
  .option('--exchange-rate <rate>', 'USD to local currency rate', parseNumberArg)
  .option('--json', 'Print the BOM as JSON')
  .option('--trace', 'Save a calculation trace under the runs directory')
  .option('--save', 'Save JSON and Markdown reports under the runs directory')
  .option('--submit', 'Run through the Temporal workflow instead of locally')
  .action(async (options: CalculateCliOptions) => {
    await calculate(options);
  });

program
  .command('interactive')
  .description('Configure a tank with prompts')
  .action(async () => {
    await interactive();
  });

program
  .command('options')
  .description('List every accepted option value')
  .action(() => {
    listOptions();
  });

program.parseAsync().catch(error => {
  reportError(error);
});
