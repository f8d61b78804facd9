// Shared test data. All figures are made up.

import type { DataFetcher, SourceAvailability, SourceData } from '../../types/data.js';
import { SOURCE_NAMES } from '../../types/data.js';
import type { AnalysisResult, RiskReview, TradingDecision } from '../../types/results.js';

export function sampleData(): SourceData {
  return {
    statements: {
      company_name: 'Example Motors',
      filing_date: '2026-06-20',
      filer_code: 'E00001',
      metrics: { revenue: 1_000_000, operating_income: 95_000, roe: 0.11 },
    },
    disclosures: [{ pubdate: '2026-08-01', title: 'Share buyback announcement', category: 'buyback' }],
    stock_price: {
      ticker: '7203',
      date: '2026-10-16',
      close: 1000,
      high: 1010,
      low: 990,
      week52_high: 1200,
      week52_low: 800,
      volume: 1_500_000,
      sector: 'Consumer Cyclical',
    },
    news: [{ title: 'Example Motors lifts output', source_name: 'Test Wire' }],
    macro: null,
    rates: { series_code: 'POLICY', name: 'Policy Rate', unit: '%', latest: { date: '2026-09-30', value: '0.5' } },
    fx: { rates: { USDJPY: 150.25 } },
  };
}

export class StaticFetcher implements DataFetcher {
  fetchCount = 0;

  constructor(private readonly data: SourceData = sampleData()) {}

  async fetch(): Promise<SourceData> {
    this.fetchCount++;
    return this.data;
  }

  async checkSources(): Promise<SourceAvailability[]> {
    return SOURCE_NAMES.map((source) => ({ source, tool: `get_${source}`, available: this.data[source] != null }));
  }
}

export class FailingFetcher implements DataFetcher {
  async fetch(): Promise<SourceData> {
    throw new Error('data server unreachable');
  }

  async checkSources(): Promise<SourceAvailability[]> {
    throw new Error('data server unreachable');
  }
}

export function makeDecision(overrides: Partial<TradingDecision> = {}): TradingDecision {
  return {
    action: 'HOLD',
    confidence: 0.5,
    reasoning: 'Mixed signals.',
    thesis: 'Waiting for the next filing.',
    watchConditions: [],
    keyFacts: [],
    targetPrice: null,
    stopLoss: null,
    positionSize: null,
    ...overrides,
  };
}

export function makeReview(overrides: Partial<RiskReview> = {}): RiskReview {
  return {
    approved: true,
    concerns: [],
    maxPositionPct: null,
    reasoning: 'Acceptable.',
    ...overrides,
  };
}

export function makeResult(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    entityId: '7203',
    companyName: 'Example Motors',
    analystReports: [],
    debate: null,
    decision: makeDecision(),
    riskReview: makeReview(),
    sourcesUsed: [],
    phaseErrors: {},
    rawData: {},
    model: 'test-model',
    timestamp: '2026-10-16T09:30:00.000Z',
    ...overrides,
  };
}
