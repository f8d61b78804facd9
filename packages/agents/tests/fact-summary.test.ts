// Tests for the verified data summary

import { describe, it, expect } from 'vitest';
import { buildVerifiedDataSummary, sectorNote } from '../utils/fact-summary.js';
import { sampleData } from './helpers/fixtures.js';

const HEADER =
  '## Verified Data Summary\n' +
  '**IMPORTANT: key_facts must cite ONLY values from this list. Citing figures not listed here is prohibited.**\n';

describe('buildVerifiedDataSummary', () => {
  it('renders only the header when every source is absent', () => {
    expect(buildVerifiedDataSummary({}, '7203')).toBe(HEADER);
  });

  it('renders a single source exactly', () => {
    const summary = buildVerifiedDataSummary({ fx: { rates: { USDJPY: 150.25, EURJPY: 'n/a' } } }, '7203');

    expect(summary).toBe(
      HEADER +
        '\n### FX Rates\n' +
        'Source label: `FX`\n' +
        '- USD/JPY: 150.25\n' +
        '(FX context for exporters and importers; not a company figure)\n',
    );
  });

  it('labels every section of a full data set', () => {
    const lines = buildVerifiedDataSummary(sampleData(), '7203').split('\n');

    expect(lines).toContain('### Financial Statements [Example Motors / E00001]');
    expect(lines).toContain('Source label: `FILING 2026-06-20`');
    expect(lines).toContain('- operating_income: 95000');
    expect(lines).toContain('- Policy Rate: 0.5 % (2026-09-30)');
    expect(lines).toContain('- 2026-08-01: Share buyback announcement [buyback]  [Source: DISCLOSURE 2026-08-01]');
    expect(lines).toContain('Source label: `PRICE 2026-10-16`');
    expect(lines).toContain('- Close: 1,000.00');
    expect(lines).toContain('- Position in 52-week range: 50.0%');
    expect(lines).toContain('- Volume: 1,500,000');
    expect(lines).toContain('- [Test Wire] Example Motors lifts output');
    expect(lines).not.toContain('Source label: `STATS`');
  });

  it('keeps the section order fixed', () => {
    const summary = buildVerifiedDataSummary(sampleData(), '7203');
    const order = ['### Financial Statements', '### Policy Rates', '### Disclosures', '### Stock Price Data', '### FX Rates', '### News Headlines'];

    const positions = order.map((heading) => summary.indexOf(heading));

    expect(positions.every((p) => p >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it('adds the sector note after the statements for banks', () => {
    const data = { ...sampleData(), stock_price: { close: 500, sector: 'Financial Services' } };

    const summary = buildVerifiedDataSummary(data, '8306');

    expect(summary).toContain('⚠️ [Financial Sector Interpretation]');
    expect(summary.indexOf('[Financial Sector Interpretation]')).toBeLessThan(summary.indexOf('### Policy Rates'));
  });

  it('renders placeholders for malformed entries and caps list sections', () => {
    const disclosures = [{}, ...Array.from({ length: 6 }, (_, i) => ({ pubdate: `2026-09-0${i + 1}`, title: 'Notice', category: 'other' }))];

    const summary = buildVerifiedDataSummary({ disclosures }, '7203');

    expect(summary).toContain('- ?: ? [?]  [Source: DISCLOSURE ?]');
    expect(summary.split('[Source: DISCLOSURE').length - 1).toBe(5);
  });

  it('shows plausible dividend yields only', () => {
    const plausible = buildVerifiedDataSummary({ stock_price: { close: 100, dividend_yield: 0.025 } }, 'X');
    const implausible = buildVerifiedDataSummary({ stock_price: { close: 100, dividend_yield: 0.5 } }, 'X');

    expect(plausible).toContain('- Dividend Yield: 2.50%');
    expect(implausible).not.toContain('Dividend Yield');
  });

  it('marks macro tables as metadata only', () => {
    const summary = buildVerifiedDataSummary(
      { macro: [{ title: 'Household Survey', organization: 'Statistics Bureau', survey_date: '2026-08' }] },
      'X',
    );

    expect(summary).toContain('- Household Survey (Statistics Bureau, 2026-08)');
    expect(summary).toContain('⚠️ These are table titles only. Do not cite economic values from them.');
  });
});

describe('sectorNote', () => {
  it('matches sectors case-insensitively', () => {
    expect(sectorNote('Real Estate')).toContain('LTV ratio');
    expect(sectorNote('UTILITIES')).toContain('regulated returns');
    expect(sectorNote('Technology')).toBeNull();
  });
});
