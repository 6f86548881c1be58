import React from 'react';
import { LineChart, Home, Scale, Microscope, BookOpen } from 'lucide-react';
import SummaryTab from './SummaryTab';
import ComparisonTab from './ComparisonTab';
import BankAnalysisSection from './BankAnalysisSection';
import MethodologyTab from './MethodologyTab';
import { bankNames } from '../../services/report/chartData';
import type { DatasetAnalysis, FinancialRecord } from '../../types';

export interface ReportDocumentProps {
  title: string;
  records: FinancialRecord[];
  analysis: DatasetAnalysis;
  colorFor: (bank: string) => string;
  providerName: string;
  projectionYears: number;
  generatedAt: string;
}

const TABS = [
  { id: 'summary', label: 'Summary', icon: Home },
  { id: 'comparison', label: 'Comparison', icon: Scale },
  { id: 'analyses', label: 'Detailed analyses', icon: Microscope },
  { id: 'methodology', label: 'Methodology', icon: BookOpen },
] as const;

const TAB_SCRIPT = `
document.querySelectorAll('[data-page]').forEach(function (link) {
  link.addEventListener('click', function () {
    var page = link.getAttribute('data-page');
    document.querySelectorAll('[data-page]').forEach(function (l) { l.classList.remove('active'); });
    document.querySelectorAll('.page-section').forEach(function (s) { s.classList.remove('active'); });
    link.classList.add('active');
    var target = document.getElementById(page);
    if (target) target.classList.add('active');
    window.scrollTo({ top: 0, behavior: 'smooth' });
  });
});
`;

const BASE_STYLES = `
.page-section { display: none; }
.page-section.active { display: block; }
.nav-link.active { color: #6366f1; border-bottom: 3px solid #6366f1; font-weight: 600; }
`;

const ReportDocument: React.FC<ReportDocumentProps> = ({
  title,
  records,
  analysis,
  colorFor,
  providerName,
  projectionYears,
  generatedAt,
}) => {
  const banks = bankNames(records);
  const { firstYear, latestYear } = analysis;

  return (
    <html lang="en">
      <head>
        <meta charSet="UTF-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1.0" />
        <title>{title}</title>
        <script src="https://cdn.tailwindcss.com"></script>
        <style dangerouslySetInnerHTML={{ __html: BASE_STYLES }} />
      </head>
      <body className="bg-slate-50 text-slate-800 font-sans">
        <header className="hero-section text-white text-center pt-14 pb-10" style={{ background: 'linear-gradient(135deg, #6366f1 0%, #8b5cf6 50%, #a855f7 100%)' }}>
          <h1 className="text-4xl font-semibold mb-3 flex items-center justify-center gap-3">
            <LineChart size={36} /> {title}
          </h1>
          <p>In-depth bank analysis {firstYear} - {latestYear}</p>
        </header>

        <main className="max-w-7xl mx-auto px-5">
          <nav className="bg-white rounded-xl shadow -mt-6 mb-8 relative z-10">
            <ul className="flex">
              {TABS.map(({ id, label, icon: Icon }, i) => (
                <li key={id}>
                  <a className={`nav-link flex items-center gap-2 px-7 py-5 cursor-pointer text-slate-500${i === 0 ? ' active' : ''}`} data-page={id}>
                    <Icon size={16} /> {label}
                  </a>
                </li>
              ))}
            </ul>
          </nav>

          <section className="page-section active" id="summary">
            <SummaryTab records={records} banks={banks} firstYear={firstYear} latestYear={latestYear} colorFor={colorFor} />
          </section>
          <section className="page-section" id="comparison">
            <ComparisonTab records={records} banks={banks} latestYear={latestYear} colorFor={colorFor} />
          </section>
          <section className="page-section" id="analyses">
            {analysis.banks.map(bank => (
              <BankAnalysisSection key={bank.entityName} analysis={bank} color={colorFor(bank.entityName)} />
            ))}
          </section>
          <section className="page-section" id="methodology">
            <MethodologyTab providerName={providerName} projectionYears={projectionYears} />
          </section>
        </main>

        <footer className="bg-slate-800 text-white text-center py-10 mt-12">
          <p>Generated {generatedAt}</p>
        </footer>
        <script dangerouslySetInnerHTML={{ __html: TAB_SCRIPT }} />
      </body>
    </html>
  );
};

export default ReportDocument;
