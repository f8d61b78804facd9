// Artifacts produced by the pipeline phases. All are treated as immutable;
// verification and refinement produce revised copies of a decision.

import type { AgentKind } from './agents.js';

export const ACTIONS = ['BUY', 'SELL', 'HOLD'] as const;
export type Action = (typeof ACTIONS)[number];

export const POSITION_SIZES = ['small', 'medium', 'large'] as const;
export type PositionSize = (typeof POSITION_SIZES)[number];

export interface AgentReport {
  readonly agentKind: AgentKind;
  readonly displayName: string;
  readonly content: string;
  readonly dataSources: readonly string[];
}

export interface DebateOutcome {
  readonly bullCase: AgentReport;
  readonly bearCase: AgentReport;
  readonly rounds: number;
}

export interface KeyFact {
  readonly fact: string;
  readonly source: string;
}

export interface TradingDecision {
  readonly action: Action;
  readonly confidence: number;
  readonly reasoning: string;
  readonly thesis: string;
  readonly watchConditions: readonly string[];
  readonly keyFacts: readonly KeyFact[];
  readonly targetPrice: number | null;
  readonly stopLoss: number | null;
  readonly positionSize: PositionSize | null;
}

export interface RiskReview {
  readonly approved: boolean;
  readonly concerns: readonly string[];
  readonly maxPositionPct: number | null;
  readonly reasoning: string;
}

export interface AnalysisResult {
  readonly entityId: string;
  readonly companyName: string | null;
  readonly analystReports: readonly AgentReport[];
  readonly debate: DebateOutcome | null;
  readonly decision: TradingDecision | null;
  readonly riskReview: RiskReview | null;
  readonly sourcesUsed: readonly string[];
  readonly phaseErrors: Readonly<Record<string, string>>;
  readonly rawData: Readonly<Record<string, unknown>>;
  readonly model: string;
  readonly timestamp: string;
}

export interface PortfolioResult {
  readonly entityIds: readonly string[];
  readonly results: readonly AnalysisResult[];
  readonly failedIds: readonly string[];
  readonly timestamp: string;
  readonly model: string;
}

/** Replace the fact list; action and confidence carry over untouched. */
export function withKeyFacts(decision: TradingDecision, keyFacts: readonly KeyFact[]): TradingDecision {
  return { ...decision, keyFacts: [...keyFacts] };
}

/** Replace narrative fields; anything not supplied is kept. */
export function withNarrative(
  decision: TradingDecision,
  narrative: { thesis?: string; reasoning?: string },
): TradingDecision {
  return {
    ...decision,
    thesis: narrative.thesis ?? decision.thesis,
    reasoning: narrative.reasoning ?? decision.reasoning,
  };
}

export interface SignalGroups {
  buy: AnalysisResult[];
  hold: AnalysisResult[];
  sell: AnalysisResult[];
}

/** Group successful results by action, highest confidence first within each group. */
export function groupBySignal(portfolio: PortfolioResult): SignalGroups {
  const groups: SignalGroups = { buy: [], hold: [], sell: [] };
  for (const result of portfolio.results) {
    const action = result.decision?.action;
    if (action === 'BUY') groups.buy.push(result);
    else if (action === 'SELL') groups.sell.push(result);
    else if (action === 'HOLD') groups.hold.push(result);
  }
  const byConfidence = (a: AnalysisResult, b: AnalysisResult) =>
    (b.decision?.confidence ?? 0) - (a.decision?.confidence ?? 0);
  groups.buy.sort(byConfidence);
  groups.hold.sort(byConfidence);
  groups.sell.sort(byConfidence);
  return groups;
}
