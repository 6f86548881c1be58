import 'dotenv/config';
import Table from 'cli-table3';
import { getConfig } from '../config/appConfig';
import { loadBankUniverse } from '../config/bankUniverse';
import { createProvider } from '../services/api/provider';
import { prepareDataset } from '../services/dataset/prepareDataset';

// Usage: npm run prepare-data [-- GLE.PA BNP.PA]
const run = async () => {
  const config = getConfig();
  const universe = loadBankUniverse();
  const tickers = process.argv.slice(2);
  const banks = tickers.length > 0
    ? universe.banks.filter(b => tickers.includes(b.ticker))
    : universe.banks;

  if (banks.length === 0) {
    console.error(`No configured bank matches ${tickers.join(', ')}`);
    process.exitCode = 1;
    return;
  }

  console.log(`\nPreparing bank financials for ${banks.length} banks via ${config.provider}...\n`);
  const { records, dropped, failures } = await prepareDataset(createProvider(config), banks, config.datasetPath);

  const table = new Table({
    head: ['Bank', 'Years', 'Rows', 'Dropped'],
    colWidths: [24, 14, 8, 10],
  });
  for (const bank of banks) {
    const rows = records.filter(r => r.entityName === bank.name);
    const years = rows.map(r => r.year);
    table.push([
      bank.name,
      years.length ? `${Math.min(...years)}-${Math.max(...years)}` : '-',
      String(rows.length),
      String(dropped.filter(d => d.entityName === bank.name).length),
    ]);
  }
  console.log('\n' + table.toString());

  if (failures.length > 0) {
    console.warn(`\n${failures.length} bank(s) failed: ${failures.map(f => `${f.bank} (${f.error})`).join('; ')}`);
  }
  console.log(`\nSaved ${records.length} rows to ${config.datasetPath}`);
};

run().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
