import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import JSON5 from 'json5';
import { z } from 'zod';
import type { BankProfile } from '../types';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_UNIVERSE_PATH = path.resolve(__dirname, 'banks.json5');

const BankUniverseSchema = z.object({
  banks: z
    .array(
      z.object({
        name: z.string().min(1),
        ticker: z.string().min(1),
        color: z.string().regex(/^#[0-9a-fA-F]{6}$/, 'color must be a #rrggbb hex value'),
      })
    )
    .min(1),
  fallbackColor: z.string().regex(/^#[0-9a-fA-F]{6}$/).default('#6366f1'),
});

export interface BankUniverse {
  banks: BankProfile[];
  fallbackColor: string;
}

export const parseBankUniverse = (source: string): BankUniverse => {
  const parsed = BankUniverseSchema.parse(JSON5.parse(source));
  const seen = new Set<string>();
  for (const bank of parsed.banks) {
    if (seen.has(bank.name)) {
      throw new Error(`Duplicate bank "${bank.name}" in bank universe`);
    }
    seen.add(bank.name);
  }
  return parsed;
};

export const loadBankUniverse = (filePath: string = DEFAULT_UNIVERSE_PATH): BankUniverse =>
  parseBankUniverse(fs.readFileSync(filePath, 'utf-8'));

/** Colour lookup with the universe's fallback for banks it does not list. */
export const colorFor = (universe: BankUniverse, bankName: string): string =>
  universe.banks.find(b => b.name === bankName)?.color ?? universe.fallbackColor;
