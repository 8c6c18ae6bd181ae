import { proxyActivities, log } from '@temporalio/workflow';
import type * as activities from '../activities/bom.activities';
import { BomReport } from '../models/types';

// Calculation failures are deterministic; retrying the same input cannot succeed
const NON_RETRYABLE_ERRORS = [
  'InvalidGeometryError',
  'UnresolvedOptionError',
  'UnknownCatalogPartError',
  'InternalInvariantViolationError'
];

const { validateTankRequest, calculateTankBom, persistBomReport } = proxyActivities<typeof activities>({
  startToCloseTimeout: '2 minutes',
  retry: { nonRetryableErrorTypes: NON_RETRYABLE_ERRORS }
});

export interface BomWorkflowParams {
  reference: string;
  request: unknown;
  saveTrace?: boolean;
}

export async function bomWorkflow(params: BomWorkflowParams): Promise<BomReport> {
  const { reference, request, saveTrace = false } = params;

  // Step 1: Validate the raw request
  const tankConfig = await validateTankRequest(request);

  // Step 2: Derive and price the BOM
  const bom = await calculateTankBom(tankConfig, reference, { saveTrace });

  const report: BomReport = {
    reference,
    config: tankConfig,
    bom,
    generatedAt: new Date().toISOString()
  };

  // Step 3: Persist the report
  const savedPath = await persistBomReport(report);
  log.info('BOM report saved', { reference, savedPath });

  return report;
}
