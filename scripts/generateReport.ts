import 'dotenv/config';
import Table from 'cli-table3';
import { getConfig } from '../config/appConfig';
import { loadBankUniverse } from '../config/bankUniverse';
import { PROVIDER_LABELS } from '../services/api/provider';
import { analyzeDataset } from '../services/analysis/analysisEngine';
import { readDataset } from '../services/dataset/csvDataset';
import { buildReportHtml, writeReport } from '../services/report/buildReport';
import { formatNumber, formatOutcome, formatPercent } from '../services/utils/format';

const run = async () => {
  const config = getConfig();
  const universe = loadBankUniverse();

  console.log(`Loading ${config.datasetPath}...`);
  const records = await readDataset(config.datasetPath);
  const analysis = analyzeDataset(records, { projectionYears: config.projectionYears });

  const table = new Table({
    head: ['Bank', 'ROE', 'Avg ROE', 'ROE chg', 'Margin', 'Leverage', 'Trend', 'Stability'],
  });
  for (const bank of analysis.banks) {
    table.push([
      bank.entityName,
      formatNumber(bank.latestRoe, 3),
      formatNumber(bank.avgRoe, 3),
      formatOutcome(bank.roeChange, v => formatPercent(v)),
      formatPercent(bank.latestMargin),
      formatNumber(bank.latestLeverage),
      bank.summary.growthTrend,
      bank.summary.stability,
    ]);
  }
  console.log(`\nAnalysis ${analysis.firstYear}-${analysis.latestYear}`);
  console.log(table.toString());

  const html = buildReportHtml(records, analysis, {
    universe,
    providerName: PROVIDER_LABELS[config.provider],
    projectionYears: config.projectionYears,
  });
  await writeReport(config.reportPath, html);
};

run().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
