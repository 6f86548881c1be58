import { promises as fs } from 'fs';
import path from 'path';
import React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import ReportDocument from '../../components/report/ReportDocument';
import { colorFor } from '../../config/bankUniverse';
import type { BankUniverse } from '../../config/bankUniverse';
import type { DatasetAnalysis, FinancialRecord } from '../../types';

export interface ReportOptions {
  universe: BankUniverse;
  title?: string;
  providerName?: string;
  projectionYears: number;
  generatedAt?: Date;
}

export function buildReportHtml(
  records: readonly FinancialRecord[],
  analysis: DatasetAnalysis,
  options: ReportOptions
): string {
  const markup = renderToStaticMarkup(
    <ReportDocument
      title={options.title ?? 'Bank Financial Dashboard'}
      records={[...records]}
      analysis={analysis}
      colorFor={bank => colorFor(options.universe, bank)}
      providerName={options.providerName ?? 'Yahoo Finance'}
      projectionYears={options.projectionYears}
      generatedAt={(options.generatedAt ?? new Date()).toISOString().slice(0, 10)}
    />
  );
  return `<!DOCTYPE html>\n${markup}`;
}

export async function writeReport(filePath: string, html: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, html, 'utf-8');
  console.log(`[Report] Written to ${filePath}`);
}
