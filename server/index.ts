import 'dotenv/config';
import { getConfig } from '../config/appConfig';
import { loadBankUniverse } from '../config/bankUniverse';
import { PROVIDER_LABELS } from '../services/api/provider';
import { readDataset } from '../services/dataset/csvDataset';
import { createApp } from './app';

const start = async () => {
  const config = getConfig();
  const records = await readDataset(config.datasetPath);
  const app = createApp({
    records,
    universe: loadBankUniverse(),
    projectionYears: config.projectionYears,
    providerName: PROVIDER_LABELS[config.provider],
  });

  app.listen(config.port, () => {
    console.log(`[Server] ${records.length} rows from ${config.datasetPath}`);
    console.log(`[Server] Running on http://localhost:${config.port} (report at /report)`);
  });
};

start().catch(error => {
  console.error('[Server] Failed to start:', error);
  process.exitCode = 1;
});
