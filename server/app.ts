import express from 'express';
import cors from 'cors';
import { analyzeDataset } from '../services/analysis/analysisEngine';
import { buildReportHtml } from '../services/report/buildReport';
import type { BankUniverse } from '../config/bankUniverse';
import type { FinancialRecord } from '../types';

export interface AppDeps {
  records: FinancialRecord[];
  universe: BankUniverse;
  projectionYears: number;
  providerName: string;
}

export const createApp = (deps: AppDeps) => {
  const { records, universe, projectionYears, providerName } = deps;
  const analysis = analyzeDataset(records, { projectionYears });

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', rows: records.length, banks: analysis.banks.length });
  });

  app.get('/api/records', (req, res) => {
    const { bank } = req.query;
    if (bank !== undefined && typeof bank !== 'string') {
      res.status(400).json({ error: 'bank must be a single value' });
      return;
    }
    res.json({ records: bank ? records.filter(r => r.entityName === bank) : records });
  });

  app.get('/api/analysis', (_req, res) => {
    res.json(analysis);
  });

  app.get('/api/analysis/:bank', (req, res) => {
    const found = analysis.banks.find(b => b.entityName === req.params.bank);
    if (!found) {
      res.status(404).json({ error: `Unknown bank: ${req.params.bank}` });
      return;
    }
    res.json(found);
  });

  app.get('/report', (_req, res) => {
    res.type('html').send(buildReportHtml(records, analysis, { universe, projectionYears, providerName }));
  });

  return app;
};
