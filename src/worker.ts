import { config } from './config';
import { Worker, NativeConnection } from '@temporalio/worker';
import * as activities from './activities/bom.activities';

async function run() {
  // Step 1: Connect to the Temporal server
  const connection = await NativeConnection.connect({
    address: config.temporalAddress,
  });

  // Step 2: Register Workflows and Activities with the Worker
  const worker = await Worker.create({
    connection,
    workflowsPath: require.resolve('./workflows/bom.workflow'),
    activities,
    taskQueue: config.taskQueue,
  });

  console.log(`Worker started on queue '${config.taskQueue}'. Press Ctrl+C to exit.`);

  // Step 3: Start accepting tasks
  await worker.run();
}

run().catch((err) => {
  console.error('Worker failed to start', err);
  process.exit(1);
});
