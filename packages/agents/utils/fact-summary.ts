// Verified data summary: the ground-truth text that the trader cites from
// and the fact checker verifies against. Every value carries a source label.

import type { SourceData } from '../types/data.js';
import { asRecord, formatNumber, readArray, readNumber, readString } from './payload.js';

const SECTOR_NOTES: ReadonlyArray<readonly [string, string]> = [
  [
    'financial',
    '⚠️ [Financial Sector Interpretation] For banks, a D/E ratio above 2000% and an equity ratio in low single digits ' +
      'are structurally normal. Do NOT flag them as dangerous. ' +
      'Assess solvency using the Tier 1 capital ratio (benchmark >= 8%), NPL ratio and NIM instead.',
  ],
  [
    'real estate',
    '⚠️ [Real Estate Sector Interpretation] A high D/E ratio is structurally normal for real estate and REITs. ' +
      'Assess financial health via LTV ratio, NAV and FFO instead.',
  ],
  [
    'utilities',
    '⚠️ [Utilities Sector Interpretation] A high D/E ratio is structurally normal for utilities due to capex intensity. ' +
      'Assess against stable regulated returns.',
  ],
];

export function sectorNote(sector: string): string | null {
  const lower = sector.toLowerCase();
  for (const [key, note] of SECTOR_NOTES) {
    if (lower.includes(key)) return note;
  }
  return null;
}

function statementsSection(payload: unknown, entityId: string): string[] {
  const statements = asRecord(payload);
  if (!statements) return [];
  const filingDate = readString(statements, 'filing_date') ?? 'unknown';
  const filerCode = readString(statements, 'filer_code') ?? '';
  const companyName = readString(statements, 'company_name') ?? entityId;

  const lines = [
    `### Financial Statements [${companyName} / ${filerCode}]`,
    `Source label: \`FILING ${filingDate}\``,
  ];
  const metrics = asRecord(statements.metrics);
  if (metrics) {
    for (const [key, value] of Object.entries(metrics)) {
      if (value !== null && value !== undefined) lines.push(`- ${key}: ${String(value)}`);
    }
  }
  return lines;
}

function ratesSection(payload: unknown): string[] {
  const rates = asRecord(payload);
  if (!rates) return [];
  const seriesCode = readString(rates, 'series_code') ?? 'POLICY';
  const name = readString(rates, 'name') ?? 'Policy Rate';
  const unit = readString(rates, 'unit') ?? '%';

  const lines = ['### Policy Rates', `Source label: \`RATES ${seriesCode}\``];
  const latest = asRecord(rates.latest);
  if (latest) {
    lines.push(`- ${name}: ${readString(latest, 'value') ?? '?'} ${unit} (${readString(latest, 'date') ?? '?'})`);
  }
  for (const entry of readArray(rates, 'recent').slice(-3)) {
    const obs = asRecord(entry);
    lines.push(`  - ${readString(obs, 'date') ?? '?'}: ${readString(obs, 'value') ?? '?'} ${unit}`);
  }
  return lines;
}

function disclosuresSection(payload: unknown): string[] {
  if (!Array.isArray(payload) || payload.length === 0) return [];
  const lines = [
    '### Disclosures',
    'Source label: `DISCLOSURE <date>` (titles only; disclosures carry no financial figures)',
  ];
  for (const entry of payload.slice(0, 5)) {
    const item = asRecord(entry);
    const pubdate = readString(item, 'pubdate') ?? '?';
    const title = readString(item, 'title') ?? '?';
    const category = readString(item, 'category') ?? '?';
    lines.push(`- ${pubdate}: ${title} [${category}]  [Source: DISCLOSURE ${pubdate}]`);
  }
  return lines;
}

function priceSection(payload: unknown, entityId: string): string[] {
  const price = asRecord(payload);
  if (!price) return [];
  const priceDate = readString(price, 'date') ?? 'latest';
  const ticker = readString(price, 'ticker') ?? entityId;

  const lines = [`### Stock Price Data (${ticker})`, `Source label: \`PRICE ${priceDate}\``];
  const close = readNumber(price, 'close');
  lines.push(`- Close: ${close !== null ? formatNumber(close, 2) : '?'}`);
  const high = readNumber(price, 'high');
  const low = readNumber(price, 'low');
  if (high !== null) lines.push(`- High: ${formatNumber(high, 2)}`);
  if (low !== null) lines.push(`- Low: ${formatNumber(low, 2)}`);

  const changePct = readNumber(price, 'change_pct');
  if (changePct !== null) lines.push(`- Change: ${changePct >= 0 ? '+' : ''}${changePct.toFixed(2)}%`);

  const week52High = readNumber(price, 'week52_high');
  const week52Low = readNumber(price, 'week52_low');
  if (week52High !== null && week52Low !== null) {
    lines.push(`- 52-week High: ${formatNumber(week52High, 2)}`);
    lines.push(`- 52-week Low: ${formatNumber(week52Low, 2)}`);
    if (close !== null && week52High > week52Low) {
      const position = ((close - week52Low) / (week52High - week52Low)) * 100;
      lines.push(`- Position in 52-week range: ${position.toFixed(1)}%`);
    }
  }

  const volume = readNumber(price, 'volume');
  lines.push(`- Volume: ${volume !== null ? formatNumber(volume) : 'N/A'}`);
  const avg30 = readNumber(price, 'avg_volume_30d');
  if (avg30 !== null) lines.push(`- Avg Volume (30-day): ${formatNumber(avg30)}`);

  const trailingPe = readNumber(price, 'trailing_pe');
  if (trailingPe !== null) lines.push(`- P/E (trailing): ${trailingPe.toFixed(1)}x`);
  const forwardPe = readNumber(price, 'forward_pe');
  if (forwardPe !== null) lines.push(`- P/E (forward): ${forwardPe.toFixed(1)}x`);
  const priceToBook = readNumber(price, 'price_to_book');
  if (priceToBook !== null) lines.push(`- P/B: ${priceToBook.toFixed(2)}x`);
  const marketCap = readNumber(price, 'market_cap');
  if (marketCap !== null) lines.push(`- Market Cap: ${formatNumber(marketCap)}`);
  const sector = readString(price, 'sector');
  if (sector) lines.push(`- Sector: ${sector}`);
  const eps = readNumber(price, 'trailing_eps');
  if (eps !== null) lines.push(`- EPS (trailing): ${eps.toFixed(1)}`);

  // Yields arrive as decimals; anything above 30% is a data error.
  const dividendYield = readNumber(price, 'dividend_yield');
  if (dividendYield !== null && dividendYield > 0 && dividendYield * 100 < 30) {
    lines.push(`- Dividend Yield: ${(dividendYield * 100).toFixed(2)}%`);
  }
  return lines;
}

function fxSection(payload: unknown): string[] {
  const rates = asRecord(asRecord(payload)?.rates ?? null);
  if (!rates) return [];
  const lines = ['### FX Rates', 'Source label: `FX`'];
  for (const [pair, value] of Object.entries(rates)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) continue;
    const label = pair.length === 6 ? `${pair.slice(0, 3)}/${pair.slice(3)}` : pair;
    lines.push(`- ${label}: ${value.toFixed(2)}`);
  }
  lines.push('(FX context for exporters and importers; not a company figure)');
  return lines;
}

function macroSection(payload: unknown): string[] {
  if (!Array.isArray(payload) || payload.length === 0) return [];
  const lines = ['### Macro Statistics (table metadata only)', 'Source label: `STATS`'];
  for (const entry of payload.slice(0, 4)) {
    const table = asRecord(entry);
    const title = readString(table, 'title') ?? '?';
    const organization = readString(table, 'organization') ?? '?';
    const surveyDate = readString(table, 'survey_date') ?? '?';
    lines.push(`- ${title} (${organization}, ${surveyDate})`);
  }
  lines.push('⚠️ These are table titles only. Do not cite economic values from them.');
  return lines;
}

function newsSection(payload: unknown): string[] {
  if (!Array.isArray(payload) || payload.length === 0) return [];
  const lines = ['### News Headlines (sentiment reference only)', 'Source label: `NEWS`'];
  for (const entry of payload.slice(0, 5)) {
    const item = asRecord(entry);
    lines.push(`- [${readString(item, 'source_name') ?? '?'}] ${readString(item, 'title') ?? '?'}`);
  }
  return lines;
}

/**
 * Build the source-labeled summary for one entity. Sources that are null
 * are omitted; malformed payload fields render as '?'.
 */
export function buildVerifiedDataSummary(data: SourceData, entityId: string): string {
  const sections: string[][] = [];

  const statements = statementsSection(data.statements, entityId);
  if (statements.length > 0) {
    const sector = readString(asRecord(data.stock_price), 'sector');
    const note = sector ? sectorNote(sector) : null;
    sections.push(note ? [...statements, note] : statements);
  }
  sections.push(
    ratesSection(data.rates),
    disclosuresSection(data.disclosures),
    priceSection(data.stock_price, entityId),
    fxSection(data.fx),
    macroSection(data.macro),
    newsSection(data.news),
  );

  const lines = [
    '## Verified Data Summary',
    '**IMPORTANT: key_facts must cite ONLY values from this list. Citing figures not listed here is prohibited.**',
    '',
  ];
  for (const section of sections) {
    if (section.length === 0) continue;
    lines.push(...section, '');
  }
  return lines.join('\n');
}
